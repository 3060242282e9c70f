import { EventEmitter } from 'events';
import noble from '@stoprocent/noble';
import type { Transport } from './transport.js';
import { Logger } from './logger.js';
import { ConnectionError, DisconnectedError } from './errors.js';
import { BLE_UUIDS, DROID_NAME_PREFIX, HANDSHAKE_PAYLOAD, TIMING } from './protocol/constants.js';
import { findDroid, type DroidCharacteristic, type DroidPeripheral } from './scanner.js';
import { compactUuid, errorMessage, sleep } from './utils.js';

export interface NobleTransportOptions {
  // Already-discovered peripheral; skips scanning
  peripheral?: DroidPeripheral;
  name?: string;
  namePrefix?: string;
  scanTimeoutMs?: number;
  connectTimeoutMs?: number;
  chunkSize?: number;
  chunkDelayMs?: number;
}

/**
 * Noble BLE Transport
 *
 * Talks to the droid over its API v2 characteristic. Outbound frames are split
 * into ATT-sized chunks with a pause between them; the droid drops bytes when
 * chunks arrive back to back.
 *
 * Events:
 * - 'disconnect': () - Droid disconnected without disconnect() being called
 */
export class NobleTransport extends EventEmitter implements Transport {
  private peripheral: DroidPeripheral | null = null;
  private apiChar: DroidCharacteristic | null = null;
  private receiver: ((data: Uint8Array) => void) | null = null;
  private closing = false;
  private readonly chunkSize: number;
  private readonly chunkDelayMs: number;
  private logger: Logger;

  constructor(private readonly options: NobleTransportOptions = {}) {
    super();
    this.chunkSize = options.chunkSize ?? TIMING.WRITE_CHUNK_SIZE;
    this.chunkDelayMs = options.chunkDelayMs ?? TIMING.COMMAND_INTERVAL_MS;
    this.logger = new Logger('NobleTransport');
  }

  get name(): string | undefined {
    return this.peripheral?.advertisement.localName ?? this.options.name;
  }

  get address(): string | undefined {
    return this.peripheral?.address;
  }

  async connect(): Promise<void> {
    if (this.peripheral) {
      return;
    }

    if (noble.state !== 'poweredOn') {
      this.logger.info(`State: ${noble.state}, waiting for power on...`);
      await this.withTimeout(
        noble.waitForPoweredOnAsync(),
        15000,
        'Bluetooth adapter timeout - check if Bluetooth is enabled'
      );
    }

    const peripheral = this.options.peripheral ?? await findDroid({
      name: this.options.name,
      namePrefix: this.options.namePrefix ?? DROID_NAME_PREFIX,
      timeoutMs: this.options.scanTimeoutMs
    });
    const deviceName = peripheral.advertisement.localName ?? peripheral.id;
    const timeoutMs = this.options.connectTimeoutMs ?? 10000;

    try {
      this.logger.info(`Connecting to ${deviceName}...`);
      await this.withTimeout(peripheral.connectAsync(), timeoutMs, 'Device connection timeout');

      const { characteristics } = await this.withTimeout(
        peripheral.discoverSomeServicesAndCharacteristicsAsync(
          [],
          [compactUuid(BLE_UUIDS.API_V2), compactUuid(BLE_UUIDS.HANDSHAKE)]
        ),
        timeoutMs,
        'Characteristic discovery timeout'
      );

      const apiChar = characteristics.find(c => compactUuid(c.uuid) === compactUuid(BLE_UUIDS.API_V2));
      const handshakeChar = characteristics.find(c => compactUuid(c.uuid) === compactUuid(BLE_UUIDS.HANDSHAKE));
      if (!apiChar || !handshakeChar) {
        throw new ConnectionError('Required characteristics not found');
      }

      // The droid ignores API traffic until it sees this
      await handshakeChar.writeAsync(Buffer.from(HANDSHAKE_PAYLOAD, 'ascii'), false);

      apiChar.on('data', data => {
        this.receiver?.(new Uint8Array(data));
      });
      await this.withTimeout(apiChar.subscribeAsync(), timeoutMs, 'Notification subscription timeout');

      peripheral.once('disconnect', () => this.handleDisconnect());

      this.peripheral = peripheral;
      this.apiChar = apiChar;
      this.closing = false;
      this.logger.info(`Connected successfully to ${deviceName}`);
    } catch (error) {
      this.logger.warn(`Connection failed: ${errorMessage(error)}`);
      peripheral.removeAllListeners('disconnect');
      if (peripheral.state === 'connected' || peripheral.state === 'connecting') {
        await peripheral.disconnectAsync().catch(cleanupError => {
          this.logger.debug(`Cleanup disconnect failed: ${errorMessage(cleanupError)}`);
        });
      }
      if (error instanceof ConnectionError) {
        throw error;
      }
      throw new ConnectionError(`Failed to connect to ${deviceName}: ${errorMessage(error)}`, { cause: error });
    }
  }

  async disconnect(): Promise<void> {
    const peripheral = this.peripheral;
    const apiChar = this.apiChar;
    if (!peripheral) {
      return;
    }

    this.closing = true;
    this.peripheral = null;
    this.apiChar = null;
    peripheral.removeAllListeners('disconnect');

    if (apiChar) {
      apiChar.removeAllListeners('data');
      try {
        await this.withTimeout(apiChar.unsubscribeAsync(), 1000, 'Unsubscribe timeout');
      } catch (error) {
        this.logger.debug(`Unsubscribe failed: ${errorMessage(error)}`);
      }
    }

    const disconnectStart = Date.now();
    try {
      await this.withTimeout(peripheral.disconnectAsync(), 5000, 'Disconnect timeout');
      this.logger.info(`Disconnected in ${Date.now() - disconnectStart}ms`);
    } catch (error) {
      this.logger.warn(`Disconnect did not complete: ${errorMessage(error)}`);
    }
  }

  async write(data: Uint8Array): Promise<void> {
    for (let offset = 0; offset < data.length; offset += this.chunkSize) {
      const apiChar = this.apiChar;
      if (!apiChar) {
        throw new DisconnectedError();
      }
      if (offset > 0 && this.chunkDelayMs > 0) {
        await sleep(this.chunkDelayMs);
      }
      await apiChar.writeAsync(Buffer.from(data.subarray(offset, offset + this.chunkSize)), false);
    }
  }

  onReceive(callback: (data: Uint8Array) => void): void {
    this.receiver = callback;
  }

  isConnected(): boolean {
    return this.peripheral !== null && this.peripheral.state === 'connected';
  }

  private handleDisconnect(): void {
    if (this.closing) {
      return;
    }
    this.logger.warn(`Device ${this.name ?? 'droid'} disconnected`);
    this.apiChar?.removeAllListeners('data');
    this.peripheral = null;
    this.apiChar = null;
    this.emit('disconnect');
  }

  private async withTimeout<T>(promise: Promise<T>, timeoutMs: number, message: string): Promise<T> {
    let timer: NodeJS.Timeout | undefined;
    try {
      return await Promise.race([
        promise,
        new Promise<never>((_, reject) => {
          timer = setTimeout(() => reject(new ConnectionError(message)), timeoutMs);
        })
      ]);
    } finally {
      clearTimeout(timer);
    }
  }
}
