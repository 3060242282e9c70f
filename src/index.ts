export * from './protocol/index.js';
export {
  DroidError,
  ProtocolError,
  FramingError,
  ChecksumError,
  CommandTimeoutError,
  CommandError,
  DisconnectedError,
  ConnectionError,
  ConfigError,
  ScanError,
  NotFoundError,
  describeErrorCode
} from './errors.js';
export { CommandDispatcher, type DispatcherOptions, type SendOptions } from './dispatcher.js';
export type { Transport, TransportKind } from './transport.js';
export { MockTransport, type MockReply, type MockResponder, type MockTransportOptions } from './mock-transport.js';
export { WebSocketTransport, parseBridgeMessage, BRIDGE_CLOSE_CODES, type BridgeMessage } from './ws-transport.js';
export { NobleTransport, type NobleTransportOptions } from './noble-transport.js';
export {
  scanForDroids,
  findDroid,
  type DiscoveredDroid,
  type DroidPeripheral,
  type DroidCharacteristic,
  type ScanOptions,
  type FindOptions
} from './scanner.js';
export * from './components/index.js';
export { Droid, type DroidOptions } from './droid.js';
export { Fleet, type DroidAction, type ScanAndConnectOptions } from './fleet.js';
export { loadConfig, loadEnvFile, type DroidConfig } from './config.js';
export { Logger } from './logger.js';
export { formatHex, normalizeLogLevel, type LogLevel } from './utils.js';
