import { ERROR_CODE_MESSAGES, isErrorCode, type ErrorCode } from './protocol/constants.js';
import type { PacketIdentity } from './protocol/packet.js';
import { formatByte } from './utils.js';

export function describeIdentity(identity: PacketIdentity): string {
  return `DID=${formatByte(identity.deviceId)}, CID=${formatByte(identity.commandId)}, SEQ=${identity.sequence}`;
}

/**
 * Fixed diagnostic text for a device-reported error code
 */
export function describeErrorCode(code: number): string {
  if (isErrorCode(code)) {
    return ERROR_CODE_MESSAGES[code];
  }
  return `Unknown error ${formatByte(code)}`;
}

/**
 * Base class for everything this library throws on purpose
 */
export class DroidError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'DroidError';
  }
}

export class ProtocolError extends DroidError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ProtocolError';
  }
}

/**
 * Malformed frame: bad length, markers, escape sequence or field layout.
 * Fatal to the frame being parsed, never to the stream.
 */
export class FramingError extends ProtocolError {
  constructor(message: string) {
    super(message);
    this.name = 'FramingError';
  }
}

export class ChecksumError extends ProtocolError {
  constructor(
    public readonly expected: number,
    public readonly actual: number
  ) {
    super(`Checksum mismatch: got ${formatByte(actual)}, expected ${formatByte(expected)}`);
    this.name = 'ChecksumError';
  }
}

export class CommandTimeoutError extends DroidError {
  constructor(
    public readonly timeoutMs: number,
    public readonly identity: PacketIdentity
  ) {
    super(`Command timed out after ${timeoutMs}ms (${describeIdentity(identity)})`);
    this.name = 'CommandTimeoutError';
  }
}

export class CommandError extends DroidError {
  public readonly description: string;

  constructor(
    public readonly errorCode: ErrorCode,
    public readonly identity: PacketIdentity
  ) {
    const description = describeErrorCode(errorCode);
    super(`${description} (${describeIdentity(identity)})`);
    this.name = 'CommandError';
    this.description = description;
  }
}

export class DisconnectedError extends DroidError {
  constructor(message = 'Not connected to droid') {
    super(message);
    this.name = 'DisconnectedError';
  }
}

export class ConnectionError extends DroidError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ConnectionError';
  }
}

export class ScanError extends DroidError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ScanError';
  }
}

export class NotFoundError extends ScanError {
  constructor(
    public readonly deviceName: string | undefined,
    public readonly timeoutMs: number
  ) {
    super(deviceName
      ? `Droid '${deviceName}' not found within ${timeoutMs}ms`
      : `No droids found within ${timeoutMs}ms`);
    this.name = 'NotFoundError';
  }
}

export class ConfigError extends DroidError {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}
