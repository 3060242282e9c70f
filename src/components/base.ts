import type { SendOptions } from '../dispatcher.js';

/**
 * Anything that can run a command against a droid, normally a connected Droid.
 */
export interface CommandSender {
  sendCommand(
    deviceId: number,
    commandId: number,
    payload?: Uint8Array,
    options?: SendOptions
  ): Promise<Uint8Array>;
}

export abstract class Component {
  constructor(protected readonly droid: CommandSender) {}

  protected send(deviceId: number, commandId: number, payload?: Uint8Array): Promise<Uint8Array> {
    return this.droid.sendCommand(deviceId, commandId, payload);
  }
}

