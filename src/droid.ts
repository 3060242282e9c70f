import { EventEmitter } from 'events';
import { Logger } from './logger.js';
import { CommandDispatcher, type SendOptions } from './dispatcher.js';
import { ConfigError, DisconnectedError, ProtocolError } from './errors.js';
import { MockTransport } from './mock-transport.js';
import { WebSocketTransport } from './ws-transport.js';
import type { DroidConfig } from './config.js';
import type { DroidPeripheral } from './scanner.js';
import type { Transport, TransportKind } from './transport.js';
import { AudioComponent } from './components/audio.js';
import type { CommandSender } from './components/base.js';
import { DomeComponent } from './components/dome.js';
import { DriveComponent } from './components/drive.js';
import { LedComponent } from './components/leds.js';
import { StanceComponent } from './components/stance.js';
import { PacketAssembler } from './protocol/assembler.js';
import {
  BatteryState,
  CoreCommand,
  DeviceId,
  DROID_NAME_PREFIX,
  PowerCommand,
  SystemInfoCommand,
  TIMING
} from './protocol/constants.js';
import type { Packet } from './protocol/packet.js';
import { errorMessage } from './utils.js';

export interface DroidOptions extends Partial<DroidConfig> {
  // Ready-made transport; otherwise one of `transport` kind is created on connect
  link?: Transport;
  // Discovered peripheral for the BLE transport
  peripheral?: DroidPeripheral;
}

const BATTERY_STATES = new Set<number>(Object.values(BatteryState));

function transportName(transport: Transport): string | undefined {
  if ('name' in transport && typeof transport.name === 'string') {
    return transport.name;
  }
  return undefined;
}

/**
 * One droid: owns the transport, the dispatcher and the components.
 *
 * Events:
 * - 'connect': () - Link up and droid awake
 * - 'disconnect': () - Link dropped on its own
 * - 'notification': (packet: Packet) - Packet that answered no request
 */
export class Droid extends EventEmitter implements CommandSender {
  readonly drive: DriveComponent;
  readonly dome: DomeComponent;
  readonly stance: StanceComponent;
  readonly leds: LedComponent;
  readonly audio: AudioComponent;

  private transport: Transport | null;
  private dispatcher: CommandDispatcher | null = null;
  private assembler: PacketAssembler | null = null;
  private logger: Logger;

  constructor(private readonly options: DroidOptions = {}) {
    super();
    this.transport = options.link ?? null;
    this.logger = new Logger(`Droid${options.deviceName ? `:${options.deviceName}` : ''}`);

    this.drive = new DriveComponent(this);
    this.dome = new DomeComponent(this);
    this.stance = new StanceComponent(this);
    this.leds = new LedComponent(this);
    this.audio = new AudioComponent(this);
  }

  get name(): string | undefined {
    const fromTransport = this.transport ? transportName(this.transport) : undefined;
    return fromTransport ?? this.options.peripheral?.advertisement.localName ?? this.options.deviceName;
  }

  async connect(): Promise<void> {
    if (this.isConnected()) {
      return;
    }

    const transport = this.transport ?? await this.createTransport(this.options.transport ?? 'ble');
    this.transport = transport;

    const dispatcher = new CommandDispatcher(transport, {
      commandIntervalMs: this.options.commandIntervalMs,
      defaultTimeoutMs: this.options.commandTimeoutMs,
      logger: this.logger.child('dispatch')
    });
    const assembler = new PacketAssembler(packet => dispatcher.onPacketReceived(packet), {
      logger: this.logger.child('rx')
    });
    dispatcher.on('unsolicited', (packet: Packet) => this.emit('notification', packet));
    transport.onReceive(data => assembler.feed(data));

    await transport.connect();

    this.dispatcher = dispatcher;
    this.assembler = assembler;
    if (transport instanceof EventEmitter) {
      // Reconnects reuse the transport
      transport.off('disconnect', this.handleLinkLoss);
      transport.on('disconnect', this.handleLinkLoss);
    }

    try {
      await this.wake();
    } catch (error) {
      this.logger.error(`Droid did not wake: ${errorMessage(error)}`);
      await this.disconnect();
      throw error;
    }

    this.logger.info(`Connected to ${this.name ?? 'droid'}`);
    this.emit('connect');
  }

  async disconnect(): Promise<void> {
    const transport = this.transport;
    const dispatcher = this.dispatcher;
    this.dispatcher = null;

    if (dispatcher) {
      dispatcher.onDisconnected('Disconnected by host');
      dispatcher.removeAllListeners();
    }
    this.assembler?.reset();
    this.assembler = null;

    if (transport) {
      if (transport instanceof EventEmitter) {
        transport.off('disconnect', this.handleLinkLoss);
      }
      await transport.disconnect();
    }
  }

  isConnected(): boolean {
    return this.dispatcher !== null
      && !this.dispatcher.isClosed
      && this.transport !== null
      && this.transport.isConnected();
  }

  sendCommand(
    deviceId: number,
    commandId: number,
    payload?: Uint8Array,
    options?: SendOptions
  ): Promise<Uint8Array> {
    if (!this.dispatcher) {
      return Promise.reject(new DisconnectedError());
    }
    return this.dispatcher.sendCommand(deviceId, commandId, payload, options);
  }

  /**
   * Battery voltage in volts
   */
  async getBatteryVoltage(): Promise<number> {
    const response = await this.sendCommand(DeviceId.POWER, PowerCommand.GET_BATTERY_VOLTAGE);
    return readUInt16(response, 'Battery voltage') / 100;
  }

  async getBatteryState(): Promise<BatteryState> {
    const response = await this.sendCommand(DeviceId.POWER, PowerCommand.GET_BATTERY_STATE);
    if (response.length < 1) {
      throw new ProtocolError('Empty battery state response');
    }
    const state = response[0];
    return isBatteryState(state) ? state : BatteryState.UNKNOWN;
  }

  async getBatteryPercentage(): Promise<number> {
    const response = await this.sendCommand(DeviceId.POWER, PowerCommand.GET_BATTERY_PERCENTAGE);
    if (response.length < 1) {
      throw new ProtocolError('Empty battery percentage response');
    }
    return response[0];
  }

  /**
   * Main application version as `major.minor.patch`
   */
  async getFirmwareVersion(): Promise<string> {
    const response = await this.sendCommand(DeviceId.SYSTEM_INFO, SystemInfoCommand.GET_MAIN_APP_VERSION);
    if (response.length < 6) {
      throw new ProtocolError(`Firmware version response too short: ${response.length} bytes`);
    }
    const view = Buffer.from(response);
    return `${view.readUInt16BE(0)}.${view.readUInt16BE(2)}.${view.readUInt16BE(4)}`;
  }

  /**
   * Round trip time of an empty command, in milliseconds.
   */
  async ping(): Promise<number> {
    const start = Date.now();
    await this.sendCommand(DeviceId.CORE, CoreCommand.PING);
    return Date.now() - start;
  }

  async sleep(): Promise<void> {
    await this.sendCommand(DeviceId.POWER, PowerCommand.SLEEP);
  }

  private async wake(): Promise<void> {
    await this.sendCommand(DeviceId.POWER, PowerCommand.WAKE);
  }

  private readonly handleLinkLoss = (): void => {
    this.logger.warn(`Lost link to ${this.name ?? 'droid'}`);
    this.dispatcher?.onDisconnected('Droid disconnected');
    this.assembler?.reset();
    this.emit('disconnect');
  };

  private async createTransport(kind: TransportKind): Promise<Transport> {
    switch (kind) {
      case 'mock':
        return new MockTransport({ name: this.options.deviceName });
      case 'bridge':
        if (!this.options.bridgeUrl) {
          throw new ConfigError('A bridge URL is required for the bridge transport');
        }
        return new WebSocketTransport({
          url: this.options.bridgeUrl,
          device: this.options.deviceName ?? this.options.namePrefix ?? DROID_NAME_PREFIX
        });
      case 'ble': {
        // Loaded on demand so nothing touches the Bluetooth adapter until needed
        const { NobleTransport } = await import('./noble-transport.js');
        return new NobleTransport({
          peripheral: this.options.peripheral,
          name: this.options.deviceName,
          namePrefix: this.options.namePrefix,
          scanTimeoutMs: this.options.scanTimeoutMs ?? TIMING.SCAN_TIMEOUT_MS,
          chunkSize: this.options.writeChunkSize,
          chunkDelayMs: this.options.chunkDelayMs
        });
      }
    }
  }
}

function isBatteryState(value: number): value is BatteryState {
  return BATTERY_STATES.has(value);
}

function readUInt16(response: Uint8Array, what: string): number {
  if (response.length < 2) {
    throw new ProtocolError(`${what} response too short: ${response.length} bytes`);
  }
  return Buffer.from(response).readUInt16BE(0);
}
