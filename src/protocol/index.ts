export * from './constants.js';
export { computeChecksum, verifyChecksum } from './checksum.js';
export { escapeBytes, unescapeBytes, isReservedByte } from './escape.js';
export {
  HOST_SOURCE_ID,
  createRequest,
  createResponse,
  decodePacket,
  describePacket,
  encodePacket,
  hasFlag,
  identityKey,
  isResponse,
  packetIdentity,
  type Packet,
  type PacketIdentity
} from './packet.js';
export { SequenceAllocator } from './sequence.js';
export { PacketAssembler, type PacketAssemblerOptions } from './assembler.js';
