import { Component } from './base.js';
import { DeviceId, IoCommand, Led } from '../protocol/constants.js';
import { clamp } from '../utils.js';

export type Color = readonly [red: number, green: number, blue: number];

export interface LedState {
  front?: Color;
  back?: Color;
  logicDisplays?: number;
  holoProjector?: number;
}

const level = (value: number): number => clamp(Math.round(value), 0, 255);

export class LedComponent extends Component {
  /**
   * Set any combination of lights in one command. Values follow the mask's
   * bit order; nothing is sent when no light is given.
   */
  async setAll(state: LedState): Promise<void> {
    let mask = 0;
    const values: number[] = [];

    if (state.front) {
      mask |= (1 << Led.FRONT_RED) | (1 << Led.FRONT_GREEN) | (1 << Led.FRONT_BLUE);
      values.push(...state.front.map(level));
    }
    if (state.logicDisplays !== undefined) {
      mask |= 1 << Led.LOGIC_DISPLAYS;
      values.push(level(state.logicDisplays));
    }
    if (state.back) {
      mask |= (1 << Led.BACK_RED) | (1 << Led.BACK_GREEN) | (1 << Led.BACK_BLUE);
      values.push(...state.back.map(level));
    }
    if (state.holoProjector !== undefined) {
      mask |= 1 << Led.HOLO_PROJECTOR;
      values.push(level(state.holoProjector));
    }

    if (mask === 0) {
      return;
    }

    const payload = Buffer.alloc(4 + values.length);
    payload.writeUInt32BE(mask, 0);
    payload.set(values, 4);
    await this.send(DeviceId.IO, IoCommand.SET_ALL_LEDS_32_BIT_MASK, payload);
  }

  setFront(red: number, green: number, blue: number): Promise<void> {
    return this.setAll({ front: [red, green, blue] });
  }

  setBack(red: number, green: number, blue: number): Promise<void> {
    return this.setAll({ back: [red, green, blue] });
  }

  setLogicDisplays(brightness: number): Promise<void> {
    return this.setAll({ logicDisplays: brightness });
  }

  setHoloProjector(brightness: number): Promise<void> {
    return this.setAll({ holoProjector: brightness });
  }

  off(): Promise<void> {
    return this.setAll({ front: [0, 0, 0], back: [0, 0, 0], logicDisplays: 0, holoProjector: 0 });
  }
}
