import { Component } from './base.js';
import { AnimatronicCommand, AudioPlaybackMode, DeviceId, IoCommand } from '../protocol/constants.js';
import { ProtocolError } from '../errors.js';
import { clamp } from '../utils.js';

export class AudioComponent extends Component {
  async playSound(
    soundId: number,
    mode: AudioPlaybackMode = AudioPlaybackMode.PLAY_IMMEDIATELY
  ): Promise<void> {
    // sound:u16be mode:u8
    const payload = Buffer.alloc(3);
    payload.writeUInt16BE(soundId, 0);
    payload.writeUInt8(mode, 2);
    await this.send(DeviceId.IO, IoCommand.PLAY_AUDIO_FILE, payload);
  }

  async stop(): Promise<void> {
    await this.send(DeviceId.IO, IoCommand.STOP_ALL_AUDIO);
  }

  async setVolume(volume: number): Promise<void> {
    await this.send(DeviceId.IO, IoCommand.SET_AUDIO_VOLUME, Uint8Array.of(clamp(Math.round(volume), 0, 255)));
  }

  async getVolume(): Promise<number> {
    const response = await this.send(DeviceId.IO, IoCommand.GET_AUDIO_VOLUME);
    if (response.length < 1) {
      throw new ProtocolError('Empty volume response');
    }
    return response[0];
  }

  /**
   * Canned routine combining sound, dome and lights.
   */
  async playAnimation(animationId: number): Promise<void> {
    const payload = Buffer.alloc(2);
    payload.writeUInt16BE(animationId, 0);
    await this.send(DeviceId.ANIMATRONIC, AnimatronicCommand.PLAY_ANIMATION, payload);
  }

  async stopAnimation(): Promise<void> {
    await this.send(DeviceId.ANIMATRONIC, AnimatronicCommand.STOP_ANIMATION);
  }
}
