/**
 * Byte transport the dispatcher talks through.
 *
 * `write` must deliver exactly the given bytes in order; it may split them into
 * smaller chunks. `onReceive` delivers raw bytes with no message boundaries.
 *
 * The transports in this package also extend EventEmitter and emit
 * 'disconnect' when the link drops without `disconnect()` being called.
 */
export interface Transport {
  connect(): Promise<void>;
  disconnect(): Promise<void>;
  write(data: Uint8Array): Promise<void>;
  onReceive(callback: (data: Uint8Array) => void): void;
  isConnected(): boolean;
}

export type TransportKind = 'ble' | 'bridge' | 'mock';
