import { EventEmitter } from 'events';
import { Logger } from './logger.js';
import { CommandError, DisconnectedError } from './errors.js';
import { PendingRequests } from './pending-requests.js';
import { SendMutex } from './send-mutex.js';
import { ErrorCode, TIMING } from './protocol/constants.js';
import {
  createRequest,
  describePacket,
  encodePacket,
  packetIdentity,
  type Packet,
  type PacketIdentity
} from './protocol/packet.js';
import { SequenceAllocator } from './protocol/sequence.js';
import type { Transport } from './transport.js';
import { formatHex, sleep } from './utils.js';

export interface DispatcherOptions {
  // Minimum spacing between the starts of two transmissions
  commandIntervalMs?: number;
  defaultTimeoutMs?: number;
  logger?: Logger;
}

export interface SendOptions {
  timeoutMs?: number;
  // Processor to address on multi-processor droids
  targetId?: number;
}

/**
 * Command/response engine for one connection.
 *
 * Sends are serialized through a FIFO mutex and spaced by the command interval;
 * responses are matched to requests purely by (device, command, sequence).
 *
 * Events:
 * - 'unsolicited': (packet: Packet) - Packet that matched no pending request
 */
export class CommandDispatcher extends EventEmitter {
  private readonly sequences = new SequenceAllocator();
  private readonly pending = new PendingRequests();
  private readonly sendMutex: SendMutex;
  private readonly logger: Logger;
  private readonly commandIntervalMs: number;
  private readonly defaultTimeoutMs: number;
  private lastSendAt: number | null = null;
  private closed = false;

  constructor(
    private readonly transport: Transport,
    options: DispatcherOptions = {}
  ) {
    super();
    this.commandIntervalMs = options.commandIntervalMs ?? TIMING.COMMAND_INTERVAL_MS;
    this.defaultTimeoutMs = options.defaultTimeoutMs ?? TIMING.COMMAND_TIMEOUT_MS;
    this.logger = options.logger ?? new Logger('Dispatcher');
    this.sendMutex = new SendMutex(this.logger.child('mutex'));
  }

  /**
   * Send a command and resolve with the response payload.
   *
   * Rejects with DisconnectedError, CommandTimeoutError, or CommandError when
   * the droid answers with a non-success code. Never retries.
   */
  async sendCommand(
    deviceId: number,
    commandId: number,
    payload: Uint8Array = new Uint8Array(0),
    options: SendOptions = {}
  ): Promise<Uint8Array> {
    this.assertOpen();
    const timeoutMs = options.timeoutMs ?? this.defaultTimeoutMs;

    const { identity, response } = await this.sendMutex.runExclusive(async () => {
      await this.waitForSendWindow();
      // The link may have gone away while this call sat in the queue
      this.assertOpen();

      const packet = createRequest(deviceId, commandId, this.sequences.next(), payload, options.targetId);
      const identity = packetIdentity(packet);
      const frame = encodePacket(packet);
      const response = this.pending.register(identity, timeoutMs);
      // Settlement can land before the caller awaits it (deadline shorter than the write)
      response.catch(() => undefined);

      this.logger.debug(`TX ${describePacket(packet)} [${formatHex(frame)}]`);
      try {
        await this.transport.write(frame);
      } catch (error) {
        this.pending.delete(identity);
        throw error;
      }
      this.lastSendAt = Date.now();

      return { identity, response };
    });

    try {
      const packet = await response;
      if (packet.errorCode !== undefined && packet.errorCode !== ErrorCode.SUCCESS) {
        throw new CommandError(packet.errorCode, identity);
      }
      return packet.payload;
    } finally {
      this.pending.delete(identity);
    }
  }

  /**
   * Entry point for packets coming out of the PacketAssembler.
   */
  onPacketReceived(packet: Packet): void {
    if (this.pending.resolve(packet)) {
      return;
    }

    // Notifications and responses to requests that already timed out
    this.logger.debug(`No pending request for ${describePacket(packet)}`);
    this.emit('unsolicited', packet);
  }

  /**
   * Fail everything in flight and refuse further sends. Must run before or as
   * part of transport teardown.
   */
  onDisconnected(reason = 'Droid disconnected'): void {
    this.closed = true;
    const failed = this.pending.rejectAll(() => new DisconnectedError(reason));
    if (failed > 0) {
      this.logger.warn(`Failed ${failed} pending request(s): ${reason}`);
    }
    this.sequences.reset();
    this.lastSendAt = null;
  }

  hasPending(identity: PacketIdentity): boolean {
    return this.pending.has(identity);
  }

  get pendingCount(): number {
    return this.pending.size;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  private assertOpen(): void {
    if (this.closed || !this.transport.isConnected()) {
      throw new DisconnectedError();
    }
  }

  private async waitForSendWindow(): Promise<void> {
    if (this.lastSendAt === null) {
      return;
    }
    const elapsed = Date.now() - this.lastSendAt;
    if (elapsed < this.commandIntervalMs) {
      await sleep(this.commandIntervalMs - elapsed);
    }
  }
}
