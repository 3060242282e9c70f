import { Component } from './base.js';
import { AnimatronicCommand, DeviceId } from '../protocol/constants.js';
import { clamp } from '../utils.js';
import { ProtocolError } from '../errors.js';

export const DOME_LIMITS = {
  MIN_ANGLE: -160,
  MAX_ANGLE: 180
} as const;

/**
 * Dome rotation in degrees, negative to the left.
 */
export class DomeComponent extends Component {
  async setPosition(angle: number): Promise<void> {
    const payload = Buffer.alloc(4);
    payload.writeFloatBE(clamp(angle, DOME_LIMITS.MIN_ANGLE, DOME_LIMITS.MAX_ANGLE), 0);
    await this.send(DeviceId.ANIMATRONIC, AnimatronicCommand.SET_HEAD_POSITION, payload);
  }

  async getPosition(): Promise<number> {
    const response = await this.send(DeviceId.ANIMATRONIC, AnimatronicCommand.GET_HEAD_POSITION);
    if (response.length < 4) {
      throw new ProtocolError(`Head position response too short: ${response.length} bytes`);
    }
    return Buffer.from(response).readFloatBE(0);
  }

  center(): Promise<void> {
    return this.setPosition(0);
  }

  lookLeft(angle = 90): Promise<void> {
    return this.setPosition(-Math.abs(angle));
  }

  lookRight(angle = 90): Promise<void> {
    return this.setPosition(Math.abs(angle));
  }
}
