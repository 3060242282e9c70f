import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { Droid } from '../../src/droid.js';
import { MockTransport, type MockReply } from '../../src/mock-transport.js';
import {
  AnimatronicCommand,
  AudioPlaybackMode,
  DeviceId,
  DriveCommand,
  IoCommand,
  LegAction,
  LegState,
  RawMotorMode,
  StabilizationMode
} from '../../src/protocol/constants.js';
import type { Packet } from '../../src/protocol/packet.js';

describe('Droid components', () => {
  let mock: MockTransport;
  let droid: Droid;
  const replies = new Map<number, MockReply>();

  // Requests after the wake-up sent on connect
  const commands = (): Packet[] => mock.requests.slice(1);
  const lastCommand = (): Packet => {
    const sent = commands();
    expect(sent.length).toBeGreaterThan(0);
    return sent[sent.length - 1];
  };

  beforeEach(async () => {
    replies.clear();
    mock = new MockTransport({
      latencyMs: 1,
      responder: request => replies.get((request.deviceId << 8) | request.commandId) ?? {}
    });
    droid = new Droid({ link: mock, commandIntervalMs: 0, commandTimeoutMs: 1000 });
    await droid.connect();
  });

  afterEach(async () => {
    await droid.disconnect();
  });

  describe('drive', () => {
    it('should roll with speed, big-endian heading and forward flag', async () => {
      await droid.drive.roll(90, 100);
      expect(lastCommand()).toMatchObject({ deviceId: DeviceId.DRIVE, commandId: DriveCommand.DRIVE_WITH_HEADING });
      expect(lastCommand().payload).toEqual(Uint8Array.of(100, 0x00, 0x5A, 0x00));
    });

    it('should turn negative speed into a reversed heading', async () => {
      await droid.drive.roll(0, -50);
      expect(lastCommand().payload).toEqual(Uint8Array.of(50, 0x00, 0xB4, 0x01));
      expect(droid.drive.heading).toBe(180);
    });

    it('should normalize headings and clamp speed', async () => {
      await droid.drive.roll(-90, 400);
      expect(lastCommand().payload).toEqual(Uint8Array.of(255, 0x01, 0x0E, 0x00));
    });

    it('should stop on the current heading', async () => {
      await droid.drive.right(80);
      await droid.drive.stop();
      expect(lastCommand().payload).toEqual(Uint8Array.of(0, 0x00, 0x5A, 0x00));
    });

    it('should stop after a duration', async () => {
      await droid.drive.forward(60, 10);
      expect(commands().map(c => c.payload[0])).toEqual([60, 0]);
    });

    it('should reset the heading', async () => {
      await droid.drive.left();
      await droid.drive.resetHeading();
      expect(lastCommand().commandId).toBe(DriveCommand.RESET_YAW);
      expect(droid.drive.heading).toBe(0);
    });

    it('should drive the motors directly', async () => {
      await droid.drive.setRawMotors(RawMotorMode.FORWARD, 300, RawMotorMode.REVERSE, 20);
      expect(lastCommand()).toMatchObject({ deviceId: DeviceId.DRIVE, commandId: DriveCommand.SET_RAW_MOTORS });
      expect(lastCommand().payload).toEqual(Uint8Array.of(1, 255, 2, 20));
    });

    it('should spin counterclockwise with the wheels reversed', async () => {
      await droid.drive.spin('counterclockwise', 90);
      expect(lastCommand().payload).toEqual(Uint8Array.of(2, 90, 1, 90));
    });

    it('should set the stabilization mode', async () => {
      await droid.drive.setStabilization(StabilizationMode.DISABLED);
      expect(lastCommand()).toMatchObject({ commandId: DriveCommand.SET_STABILIZATION });
      expect(lastCommand().payload).toEqual(Uint8Array.of(0));
    });
  });

  describe('dome', () => {
    it('should send the angle as a big-endian float', async () => {
      await droid.dome.setPosition(90);
      expect(lastCommand()).toMatchObject({
        deviceId: DeviceId.ANIMATRONIC,
        commandId: AnimatronicCommand.SET_HEAD_POSITION
      });
      expect(lastCommand().payload).toEqual(Uint8Array.of(0x42, 0xB4, 0x00, 0x00));
    });

    it('should clamp the angle to the dome limits', async () => {
      await droid.dome.setPosition(200);
      expect(Buffer.from(lastCommand().payload).readFloatBE(0)).toBe(180);

      await droid.dome.lookLeft(170);
      expect(Buffer.from(lastCommand().payload).readFloatBE(0)).toBe(-160);
    });

    it('should read the current position', async () => {
      const payload = Buffer.alloc(4);
      payload.writeFloatBE(45.5, 0);
      replies.set((DeviceId.ANIMATRONIC << 8) | AnimatronicCommand.GET_HEAD_POSITION, { payload });

      await expect(droid.dome.getPosition()).resolves.toBe(45.5);
    });
  });

  describe('stance', () => {
    it('should perform leg actions', async () => {
      await droid.stance.tripod();
      await droid.stance.bipod();
      await droid.stance.stopWaddle();
      expect(commands().map(c => c.payload[0])).toEqual([LegAction.TRIPOD, LegAction.BIPOD, LegAction.STOP]);
      expect(lastCommand().commandId).toBe(AnimatronicCommand.PERFORM_LEG_ACTION);
    });

    it('should waddle for a duration', async () => {
      await droid.stance.waddle(10);
      expect(commands().map(c => c.payload[0])).toEqual([LegAction.WADDLE, LegAction.STOP]);
    });

    it('should read the leg state', async () => {
      replies.set((DeviceId.ANIMATRONIC << 8) | AnimatronicCommand.GET_LEG_ACTION, { payload: Uint8Array.of(2) });
      await expect(droid.stance.getStance()).resolves.toBe(LegState.BIPOD);
    });

    it('should map unknown leg states to UNKNOWN', async () => {
      replies.set((DeviceId.ANIMATRONIC << 8) | AnimatronicCommand.GET_LEG_ACTION, { payload: Uint8Array.of(9) });
      await expect(droid.stance.getStance()).resolves.toBe(LegState.UNKNOWN);
    });
  });

  describe('leds', () => {
    it('should set the front light with a 32-bit mask', async () => {
      await droid.leds.setFront(255, 0, 128);
      expect(lastCommand()).toMatchObject({ deviceId: DeviceId.IO, commandId: IoCommand.SET_ALL_LEDS_32_BIT_MASK });
      expect(lastCommand().payload).toEqual(Uint8Array.of(0x00, 0x00, 0x00, 0x07, 255, 0, 128));
    });

    it('should order values by mask bit', async () => {
      await droid.leds.setAll({ back: [1, 2, 3], holoProjector: 4, logicDisplays: 5 });
      expect(lastCommand().payload).toEqual(Uint8Array.of(0x00, 0x00, 0x00, 0xF8, 5, 1, 2, 3, 4));
    });

    it('should switch everything off', async () => {
      await droid.leds.off();
      expect(lastCommand().payload).toEqual(Uint8Array.of(0x00, 0x00, 0x00, 0xFF, 0, 0, 0, 0, 0, 0, 0, 0));
    });

    it('should send nothing for an empty update', async () => {
      await droid.leds.setAll({});
      expect(commands()).toHaveLength(0);
    });
  });

  describe('audio', () => {
    it('should play a sound by id', async () => {
      await droid.audio.playSound(1862);
      expect(lastCommand()).toMatchObject({ deviceId: DeviceId.IO, commandId: IoCommand.PLAY_AUDIO_FILE });
      expect(lastCommand().payload).toEqual(Uint8Array.of(0x07, 0x46, 0x00));
    });

    it('should pass the playback mode', async () => {
      await droid.audio.playSound(1, AudioPlaybackMode.PLAY_AFTER_CURRENT);
      expect(lastCommand().payload).toEqual(Uint8Array.of(0x00, 0x01, 0x02));
    });

    it('should clamp and read the volume', async () => {
      await droid.audio.setVolume(300);
      expect(lastCommand().payload).toEqual(Uint8Array.of(255));

      replies.set((DeviceId.IO << 8) | IoCommand.GET_AUDIO_VOLUME, { payload: Uint8Array.of(128) });
      await expect(droid.audio.getVolume()).resolves.toBe(128);
    });

    it('should play and stop animations', async () => {
      await droid.audio.playAnimation(0x0102);
      expect(lastCommand()).toMatchObject({
        deviceId: DeviceId.ANIMATRONIC,
        commandId: AnimatronicCommand.PLAY_ANIMATION
      });
      expect(lastCommand().payload).toEqual(Uint8Array.of(0x01, 0x02));

      await droid.audio.stopAnimation();
      expect(lastCommand().commandId).toBe(AnimatronicCommand.STOP_ANIMATION);
    });
  });
});
