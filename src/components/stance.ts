import { Component } from './base.js';
import { AnimatronicCommand, DeviceId, LegAction, LegState } from '../protocol/constants.js';
import { ProtocolError } from '../errors.js';
import { sleep } from '../utils.js';

const LEG_STATES = new Set<number>(Object.values(LegState));

function isLegState(value: number): value is LegState {
  return LEG_STATES.has(value);
}

export class StanceComponent extends Component {
  async setStance(action: LegAction): Promise<void> {
    await this.send(DeviceId.ANIMATRONIC, AnimatronicCommand.PERFORM_LEG_ACTION, Uint8Array.of(action));
  }

  async getStance(): Promise<LegState> {
    const response = await this.send(DeviceId.ANIMATRONIC, AnimatronicCommand.GET_LEG_ACTION);
    if (response.length < 1) {
      throw new ProtocolError('Empty leg state response');
    }
    const state = response[0];
    return isLegState(state) ? state : LegState.UNKNOWN;
  }

  tripod(): Promise<void> {
    return this.setStance(LegAction.TRIPOD);
  }

  bipod(): Promise<void> {
    return this.setStance(LegAction.BIPOD);
  }

  async waddle(durationMs?: number): Promise<void> {
    await this.setStance(LegAction.WADDLE);
    if (durationMs !== undefined) {
      await sleep(durationMs);
      await this.stopWaddle();
    }
  }

  stopWaddle(): Promise<void> {
    return this.setStance(LegAction.STOP);
  }
}
