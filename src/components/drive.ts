import { Component } from './base.js';
import {
  DeviceId,
  DriveCommand,
  DriveFlags,
  RawMotorMode,
  type StabilizationMode
} from '../protocol/constants.js';
import { clamp, sleep } from '../utils.js';

export type SpinDirection = 'clockwise' | 'counterclockwise';

/**
 * Wheel motion. Headings are degrees clockwise from the droid's forward
 * direction, speeds 0-255 with negative values driving in reverse.
 */
export class DriveComponent extends Component {
  private currentHeading = 0;

  get heading(): number {
    return this.currentHeading;
  }

  /**
   * Drive toward a heading. With a duration, stops again afterwards.
   */
  async roll(heading: number, speed: number, durationMs?: number): Promise<void> {
    let flags: number = DriveFlags.FORWARD;
    if (speed < 0) {
      flags = DriveFlags.BACKWARD;
      heading += 180;
      speed = -speed;
    }

    const normalizedHeading = ((Math.round(heading) % 360) + 360) % 360;
    this.currentHeading = normalizedHeading;

    // speed:u8 heading:u16be flags:u8
    const payload = Buffer.alloc(4);
    payload.writeUInt8(clamp(Math.round(speed), 0, 255), 0);
    payload.writeUInt16BE(normalizedHeading, 1);
    payload.writeUInt8(flags, 3);
    await this.send(DeviceId.DRIVE, DriveCommand.DRIVE_WITH_HEADING, payload);

    if (durationMs !== undefined) {
      await sleep(durationMs);
      await this.stop();
    }
  }

  stop(): Promise<void> {
    return this.roll(this.currentHeading, 0);
  }

  /**
   * Turn in place to face a heading without moving.
   */
  setHeading(heading: number): Promise<void> {
    return this.roll(heading, 0);
  }

  async resetHeading(): Promise<void> {
    await this.send(DeviceId.DRIVE, DriveCommand.RESET_YAW);
    this.currentHeading = 0;
  }

  async setRawMotors(
    leftMode: RawMotorMode,
    leftSpeed: number,
    rightMode: RawMotorMode,
    rightSpeed: number
  ): Promise<void> {
    const payload = Uint8Array.of(
      leftMode,
      clamp(Math.round(leftSpeed), 0, 255),
      rightMode,
      clamp(Math.round(rightSpeed), 0, 255)
    );
    await this.send(DeviceId.DRIVE, DriveCommand.SET_RAW_MOTORS, payload);
  }

  async setStabilization(mode: StabilizationMode): Promise<void> {
    await this.send(DeviceId.DRIVE, DriveCommand.SET_STABILIZATION, Uint8Array.of(mode));
  }

  forward(speed = 100, durationMs?: number): Promise<void> {
    return this.roll(0, speed, durationMs);
  }

  backward(speed = 100, durationMs?: number): Promise<void> {
    return this.roll(180, speed, durationMs);
  }

  left(speed = 100, durationMs?: number): Promise<void> {
    return this.roll(270, speed, durationMs);
  }

  right(speed = 100, durationMs?: number): Promise<void> {
    return this.roll(90, speed, durationMs);
  }

  async spin(direction: SpinDirection = 'clockwise', speed = 100, durationMs?: number): Promise<void> {
    if (direction === 'clockwise') {
      await this.setRawMotors(RawMotorMode.FORWARD, speed, RawMotorMode.REVERSE, speed);
    } else {
      await this.setRawMotors(RawMotorMode.REVERSE, speed, RawMotorMode.FORWARD, speed);
    }

    if (durationMs !== undefined) {
      await sleep(durationMs);
      await this.stop();
    }
  }
}
