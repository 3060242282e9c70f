import { FRAME_BYTES } from './constants.js';
import { decodePacket, describePacket, type Packet } from './packet.js';
import { Logger } from '../logger.js';
import { errorMessage, formatHex } from '../utils.js';

export interface PacketAssemblerOptions {
  // Bytes without an END marker before the buffer is thrown away
  maxFrameSize?: number;
  logger?: Logger;
}

const DEFAULT_MAX_FRAME_SIZE = 1024;

/**
 * Turns an arbitrarily chunked byte stream into decoded packets.
 *
 * Malformed frames are dropped and the stream picks up again at the next
 * START byte, so noise or a torn notification never reaches the caller.
 */
export class PacketAssembler {
  private buffer: number[] = [];
  private readonly maxFrameSize: number;
  private readonly logger: Logger;
  private droppedFrames = 0;

  constructor(
    private readonly onPacket: (packet: Packet) => void,
    options: PacketAssemblerOptions = {}
  ) {
    this.maxFrameSize = options.maxFrameSize ?? DEFAULT_MAX_FRAME_SIZE;
    this.logger = options.logger ?? new Logger('PacketAssembler');
  }

  feed(data: Uint8Array): void {
    for (const byte of data) {
      // START never appears unescaped inside a frame, so it always opens a new one
      if (byte === FRAME_BYTES.START && this.buffer.length > 0) {
        this.drop('frame interrupted by start byte');
      }

      this.buffer.push(byte);

      if (byte === FRAME_BYTES.END) {
        this.complete();
      } else if (this.buffer.length > this.maxFrameSize) {
        this.drop(`no end byte within ${this.maxFrameSize} bytes`);
      }
    }
  }

  reset(): void {
    this.buffer = [];
  }

  get bufferedLength(): number {
    return this.buffer.length;
  }

  get droppedFrameCount(): number {
    return this.droppedFrames;
  }

  private complete(): void {
    const frame = Uint8Array.from(this.buffer);
    this.buffer = [];

    let packet: Packet;
    try {
      packet = decodePacket(frame);
    } catch (error) {
      this.droppedFrames++;
      this.logger.debug(`Dropped frame [${formatHex(frame)}]: ${errorMessage(error)}`);
      return;
    }

    this.logger.debug(`RX ${describePacket(packet)}`);
    this.onPacket(packet);
  }

  private drop(reason: string): void {
    this.droppedFrames++;
    this.logger.debug(`Discarding ${this.buffer.length} buffered bytes: ${reason}`);
    this.buffer = [];
  }
}
