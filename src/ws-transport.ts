import { EventEmitter } from 'events';
import WebSocket from 'ws';
import { z } from 'zod';
import type { Transport } from './transport.js';
import { Logger } from './logger.js';
import { ConnectionError, DisconnectedError } from './errors.js';
import { BLE_UUIDS } from './protocol/constants.js';
import { errorMessage } from './utils.js';

/**
 * Close codes a byte-tunnel bridge uses when it cannot reach the BLE device.
 * 4000-4999 is the application range of RFC 6455.
 */
export const BRIDGE_CLOSE_CODES = {
  HARDWARE_NOT_FOUND: 4001,
  GATT_CONNECTION_FAILED: 4002,
  SERVICE_NOT_FOUND: 4003,
  CHARACTERISTICS_NOT_FOUND: 4004,
  BLE_DISCONNECTED: 4005
} as const;

const CLOSE_CODE_MESSAGES: Record<number, string> = {
  [BRIDGE_CLOSE_CODES.HARDWARE_NOT_FOUND]: 'Droid not found by the bridge',
  [BRIDGE_CLOSE_CODES.GATT_CONNECTION_FAILED]: 'Bridge could not open a GATT connection',
  [BRIDGE_CLOSE_CODES.SERVICE_NOT_FOUND]: 'Required BLE service not available on droid',
  [BRIDGE_CLOSE_CODES.CHARACTERISTICS_NOT_FOUND]: 'Required BLE characteristics not found',
  [BRIDGE_CLOSE_CODES.BLE_DISCONNECTED]: 'Droid disconnected from the bridge'
};

const BridgeMessageSchema = z.discriminatedUnion('type', [
  z.object({ type: z.literal('connected'), device: z.string().optional() }),
  z.object({ type: z.literal('data'), data: z.array(z.number().int().min(0).max(255)) }),
  z.object({ type: z.literal('disconnected'), error: z.string().optional() }),
  z.object({ type: z.literal('error'), error: z.string().optional() })
]);

export type BridgeMessage = z.infer<typeof BridgeMessageSchema>;

const parseLogger = new Logger('BridgeMessage');

export interface WebSocketTransportOptions {
  url: string;
  // Name prefix or id the bridge should connect to
  device?: string;
  service?: string;
  write?: string;
  notify?: string;
  connectTimeoutMs?: number;
}

/**
 * Transport that tunnels bytes through a WebSocket-to-BLE bridge.
 *
 * The bridge forwards `{type: 'data', data: number[]}` messages to the write
 * characteristic and notifications back the same way. It does not write the
 * handshake characteristic, so the droid must already be unlocked.
 *
 * Events:
 * - 'disconnect': () - Socket closed or the bridge lost the droid
 */
export class WebSocketTransport extends EventEmitter implements Transport {
  private ws: WebSocket | null = null;
  private receiver: ((data: Uint8Array) => void) | null = null;
  private deviceName: string | undefined;
  private logger: Logger;

  constructor(private readonly options: WebSocketTransportOptions) {
    super();
    this.logger = new Logger('WebSocketTransport');
  }

  async connect(): Promise<void> {
    if (this.ws) {
      return;
    }

    const url = new URL(this.options.url);
    if (this.options.device) url.searchParams.set('device', this.options.device);
    url.searchParams.set('service', this.options.service ?? BLE_UUIDS.API_V2_SERVICE);
    url.searchParams.set('write', this.options.write ?? BLE_UUIDS.API_V2);
    url.searchParams.set('notify', this.options.notify ?? BLE_UUIDS.API_V2);

    this.logger.info(`Connecting to bridge at ${url.origin}`);
    const ws = new WebSocket(url.toString());
    this.ws = ws;

    try {
      await this.waitForConnected(ws, this.options.connectTimeoutMs ?? 10000);
    } catch (error) {
      this.ws = null;
      ws.removeAllListeners();
      ws.on('error', () => undefined);
      ws.terminate();
      throw error;
    }

    this.logger.info(`Connected to ${this.deviceName ?? 'droid'} through bridge`);
  }

  async disconnect(): Promise<void> {
    const ws = this.ws;
    if (!ws) {
      return;
    }

    this.ws = null;
    ws.removeAllListeners();

    if (ws.readyState === WebSocket.CLOSED) {
      return;
    }

    await new Promise<void>(resolve => {
      const timeout = setTimeout(() => {
        ws.terminate();
        resolve();
      }, 2000);
      ws.once('close', () => {
        clearTimeout(timeout);
        resolve();
      });
      ws.on('error', () => undefined);
      ws.close(1000, 'client disconnect');
    });
  }

  async write(data: Uint8Array): Promise<void> {
    const ws = this.ws;
    if (!ws || ws.readyState !== WebSocket.OPEN) {
      throw new DisconnectedError();
    }

    const message = JSON.stringify({ type: 'data', data: Array.from(data) });
    await new Promise<void>((resolve, reject) => {
      ws.send(message, error => (error ? reject(error) : resolve()));
    });
  }

  onReceive(callback: (data: Uint8Array) => void): void {
    this.receiver = callback;
  }

  isConnected(): boolean {
    return this.ws !== null && this.ws.readyState === WebSocket.OPEN;
  }

  // Name the bridge reported for the droid it connected to
  get name(): string | undefined {
    return this.deviceName;
  }

  private waitForConnected(ws: WebSocket, timeoutMs: number): Promise<void> {
    return new Promise((resolve, reject) => {
      const timeout = setTimeout(() => {
        cleanup();
        reject(new ConnectionError(`Bridge did not confirm the connection within ${timeoutMs}ms`));
      }, timeoutMs);

      const onMessage = (raw: WebSocket.RawData) => {
        const msg = parseBridgeMessage(raw.toString());
        if (msg?.type === 'connected') {
          cleanup();
          this.deviceName = msg.device;
          // Attach before yielding so data sent right after 'connected' is not lost
          this.attach(ws);
          resolve();
        } else if (msg?.type === 'error') {
          cleanup();
          reject(new ConnectionError(msg.error ?? 'Bridge refused the connection'));
        }
      };

      const onError = (error: Error) => {
        cleanup();
        reject(new ConnectionError(`Bridge socket error: ${error.message}`, { cause: error }));
      };

      const onClose = (code: number, reason: Buffer) => {
        cleanup();
        const detail = reason.toString() || CLOSE_CODE_MESSAGES[code] || 'connection closed';
        reject(new ConnectionError(`Bridge closed the connection (${code}): ${detail}`));
      };

      const cleanup = () => {
        clearTimeout(timeout);
        ws.off('message', onMessage);
        ws.off('error', onError);
        ws.off('close', onClose);
      };

      ws.on('message', onMessage);
      ws.on('error', onError);
      ws.on('close', onClose);
    });
  }

  private attach(ws: WebSocket): void {
    ws.on('message', raw => this.handleMessage(raw.toString()));
    ws.on('close', (code, reason) => {
      this.logger.info(`Bridge socket closed - code: ${code}, reason: ${reason.toString() || 'none'}`);
      this.handleLinkLoss();
    });
    ws.on('error', error => {
      this.logger.warn(`Bridge socket error: ${error.message}`);
    });
  }

  private handleMessage(text: string): void {
    const msg = parseBridgeMessage(text);
    if (!msg) {
      this.logger.debug(`Ignoring bridge message: ${text.slice(0, 80)}`);
      return;
    }

    switch (msg.type) {
      case 'data':
        this.receiver?.(Uint8Array.from(msg.data));
        break;
      case 'disconnected':
        this.logger.warn(`Bridge reports droid disconnected${msg.error ? `: ${msg.error}` : ''}`);
        this.handleLinkLoss();
        break;
      case 'error':
        this.logger.warn(`Bridge error: ${msg.error ?? 'unknown'}`);
        break;
      case 'connected':
        break;
    }
  }

  private handleLinkLoss(): void {
    const ws = this.ws;
    if (!ws) {
      return;
    }
    this.ws = null;
    ws.removeAllListeners();
    ws.on('error', () => undefined);
    if (ws.readyState === WebSocket.OPEN) {
      ws.close();
    }
    this.emit('disconnect');
  }
}

export function parseBridgeMessage(text: string): BridgeMessage | null {
  let json: unknown;
  try {
    json = JSON.parse(text);
  } catch (error) {
    parseLogger.debug(`Unparseable bridge message: ${errorMessage(error)}`);
    return null;
  }
  const result = BridgeMessageSchema.safeParse(json);
  return result.success ? result.data : null;
}
