import {
  ErrorCode,
  FRAME_BYTES,
  MIN_FRAME_LENGTH,
  PacketFlags,
  isErrorCode
} from './constants.js';
import { computeChecksum } from './checksum.js';
import { escapeBytes, unescapeBytes } from './escape.js';
import { ChecksumError, FramingError } from '../errors.js';
import { formatByte, formatHex } from '../utils.js';

export interface Packet {
  flags: number;
  deviceId: number;
  commandId: number;
  sequence: number;
  targetId?: number;
  sourceId?: number;
  errorCode?: ErrorCode;
  payload: Uint8Array;
}

/**
 * (device, command, sequence): what a response shares with its request
 */
export interface PacketIdentity {
  deviceId: number;
  commandId: number;
  sequence: number;
}

// Source id the host uses when addressing a specific processor
export const HOST_SOURCE_ID = 0x01;

export function hasFlag(flags: number, flag: number): boolean {
  return (flags & flag) === flag;
}

export function isResponse(packet: Packet): boolean {
  return hasFlag(packet.flags, PacketFlags.IS_RESPONSE);
}

export function packetIdentity(packet: Packet): PacketIdentity {
  return {
    deviceId: packet.deviceId,
    commandId: packet.commandId,
    sequence: packet.sequence
  };
}

export function identityKey(identity: PacketIdentity): number {
  return (identity.deviceId << 16) | (identity.commandId << 8) | identity.sequence;
}

function assertByte(field: string, value: number): void {
  if (!Number.isInteger(value) || value < 0 || value > 0xFF) {
    throw new RangeError(`${field} must be an unsigned byte, got ${value}`);
  }
}

/**
 * Request packet as the host sends it. A target id switches on both the
 * target and source fields.
 */
export function createRequest(
  deviceId: number,
  commandId: number,
  sequence: number,
  payload: Uint8Array = new Uint8Array(0),
  targetId?: number
): Packet {
  let flags = PacketFlags.REQUESTS_RESPONSE | PacketFlags.IS_ACTIVITY;
  if (targetId === undefined) {
    return { flags, deviceId, commandId, sequence, payload };
  }
  flags |= PacketFlags.HAS_TARGET_ID | PacketFlags.HAS_SOURCE_ID;
  return { flags, deviceId, commandId, sequence, targetId, sourceId: HOST_SOURCE_ID, payload };
}

/**
 * Response to `request` as the droid would send it, with source and target swapped.
 */
export function createResponse(
  request: Packet,
  payload: Uint8Array = new Uint8Array(0),
  errorCode: ErrorCode = ErrorCode.SUCCESS
): Packet {
  let flags: number = PacketFlags.IS_RESPONSE;
  const response: Packet = {
    flags,
    deviceId: request.deviceId,
    commandId: request.commandId,
    sequence: request.sequence,
    errorCode,
    payload
  };
  if (request.sourceId !== undefined) {
    flags |= PacketFlags.HAS_TARGET_ID;
    response.targetId = request.sourceId;
  }
  if (request.targetId !== undefined) {
    flags |= PacketFlags.HAS_SOURCE_ID;
    response.sourceId = request.targetId;
  }
  response.flags = flags;
  return response;
}

export function encodePacket(packet: Packet): Uint8Array {
  assertByte('flags', packet.flags);
  assertByte('deviceId', packet.deviceId);
  assertByte('commandId', packet.commandId);
  assertByte('sequence', packet.sequence);

  const body: number[] = [packet.flags];

  if (hasFlag(packet.flags, PacketFlags.HAS_TARGET_ID)) {
    const targetId = packet.targetId ?? 0;
    assertByte('targetId', targetId);
    body.push(targetId);
  }

  if (hasFlag(packet.flags, PacketFlags.HAS_SOURCE_ID)) {
    const sourceId = packet.sourceId ?? 0;
    assertByte('sourceId', sourceId);
    body.push(sourceId);
  }

  body.push(packet.deviceId, packet.commandId, packet.sequence);

  if (hasFlag(packet.flags, PacketFlags.IS_RESPONSE)) {
    body.push(packet.errorCode ?? ErrorCode.SUCCESS);
  }

  body.push(...packet.payload);
  body.push(computeChecksum(Uint8Array.from(body)));

  const escaped = escapeBytes(Uint8Array.from(body));
  const frame = new Uint8Array(escaped.length + 2);
  frame[0] = FRAME_BYTES.START;
  frame.set(escaped, 1);
  frame[frame.length - 1] = FRAME_BYTES.END;
  return frame;
}

export function decodePacket(frame: Uint8Array): Packet {
  if (frame.length < MIN_FRAME_LENGTH) {
    throw new FramingError(`Packet too short: ${frame.length} bytes`);
  }

  if (frame[0] !== FRAME_BYTES.START) {
    throw new FramingError(`Invalid start byte: ${formatByte(frame[0])}`);
  }

  if (frame[frame.length - 1] !== FRAME_BYTES.END) {
    throw new FramingError(`Invalid end byte: ${formatByte(frame[frame.length - 1])}`);
  }

  // At least 3 bytes survive unescaping given the minimum frame length
  const unescaped = unescapeBytes(frame.subarray(1, frame.length - 1));

  const body = unescaped.subarray(0, unescaped.length - 1);
  const checksum = unescaped[unescaped.length - 1];
  const expected = computeChecksum(body);
  if (checksum !== expected) {
    throw new ChecksumError(expected, checksum);
  }

  const flags = body[0];
  const hasTarget = hasFlag(flags, PacketFlags.HAS_TARGET_ID);
  const hasSource = hasFlag(flags, PacketFlags.HAS_SOURCE_ID);
  const response = hasFlag(flags, PacketFlags.IS_RESPONSE);

  const headerLength = 1 + (hasTarget ? 1 : 0) + (hasSource ? 1 : 0) + 3 + (response ? 1 : 0);
  if (body.length < headerLength) {
    throw new FramingError(`Packet body too short for flags ${formatByte(flags)}: ${body.length} < ${headerLength} bytes`);
  }

  let offset = 1;
  const packet: Packet = {
    flags,
    deviceId: 0,
    commandId: 0,
    sequence: 0,
    payload: new Uint8Array(0)
  };

  if (hasTarget) {
    packet.targetId = body[offset++];
  }
  if (hasSource) {
    packet.sourceId = body[offset++];
  }

  packet.deviceId = body[offset++];
  packet.commandId = body[offset++];
  packet.sequence = body[offset++];

  if (response) {
    const errorCode = body[offset++];
    if (!isErrorCode(errorCode)) {
      throw new FramingError(`Unknown error code: ${formatByte(errorCode)}`);
    }
    packet.errorCode = errorCode;
  }

  packet.payload = body.slice(offset);
  return packet;
}

/**
 * One-line summary for logs
 */
export function describePacket(packet: Packet): string {
  const parts = [
    isResponse(packet) ? 'RSP' : 'REQ',
    `flags=${formatByte(packet.flags)}`,
    `did=${formatByte(packet.deviceId)}`,
    `cid=${formatByte(packet.commandId)}`,
    `seq=${packet.sequence}`
  ];
  if (packet.targetId !== undefined) parts.push(`tid=${formatByte(packet.targetId)}`);
  if (packet.sourceId !== undefined) parts.push(`sid=${formatByte(packet.sourceId)}`);
  if (packet.errorCode !== undefined) parts.push(`err=${formatByte(packet.errorCode)}`);
  parts.push(`data=[${formatHex(packet.payload)}]`);
  return parts.join(' ');
}
