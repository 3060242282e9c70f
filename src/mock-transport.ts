// In-process droid for testing without hardware
import { EventEmitter } from 'events';
import type { Transport } from './transport.js';
import { Logger } from './logger.js';
import { DisconnectedError } from './errors.js';
import { PacketAssembler } from './protocol/assembler.js';
import { ErrorCode } from './protocol/constants.js';
import { createResponse, encodePacket, type Packet } from './protocol/packet.js';

export interface MockReply {
  payload?: Uint8Array;
  errorCode?: ErrorCode;
  delayMs?: number;
}

/**
 * Decides how the simulated droid answers a request.
 * Returning null leaves the request unanswered.
 */
export type MockResponder = (request: Packet) => MockReply | null;

export interface MockTransportOptions {
  name?: string;
  responder?: MockResponder;
  // Size of the notification chunks responses are delivered in
  chunkSize?: number;
  latencyMs?: number;
}

const acknowledge: MockResponder = () => ({});

/**
 * Events:
 * - 'request': (packet: Packet) - Request frame decoded by the simulated droid
 * - 'disconnect': () - Link dropped via simulateDisconnect()
 */
export class MockTransport extends EventEmitter implements Transport {
  private connected = false;
  private receiver: ((data: Uint8Array) => void) | null = null;
  private responder: MockResponder;
  private readonly chunkSize: number;
  private readonly latencyMs: number;
  private readonly droidSide: PacketAssembler;
  private readonly timers = new Set<NodeJS.Timeout>();
  private logger: Logger;

  readonly name: string;
  readonly writes: Uint8Array[] = [];
  readonly requests: Packet[] = [];

  constructor(options: MockTransportOptions = {}) {
    super();
    this.name = options.name ?? 'D2-0000';
    this.responder = options.responder ?? acknowledge;
    this.chunkSize = options.chunkSize ?? 20;
    this.latencyMs = options.latencyMs ?? 5;
    this.logger = new Logger('MockTransport');
    this.droidSide = new PacketAssembler(packet => this.handleRequest(packet), {
      logger: this.logger.child('droid')
    });
  }

  async connect(): Promise<void> {
    this.logger.info('Simulating connection');
    this.connected = true;
  }

  async disconnect(): Promise<void> {
    this.logger.info(`Disconnecting (connected: ${this.connected})`);
    this.connected = false;
    this.clearTimers();
    this.droidSide.reset();
  }

  async write(data: Uint8Array): Promise<void> {
    if (!this.connected) {
      throw new DisconnectedError();
    }
    this.writes.push(Uint8Array.from(data));
    this.droidSide.feed(data);
  }

  onReceive(callback: (data: Uint8Array) => void): void {
    this.receiver = callback;
  }

  isConnected(): boolean {
    return this.connected;
  }

  setResponder(responder: MockResponder): void {
    this.responder = responder;
  }

  /**
   * Push raw bytes at the host as if the droid had notified them.
   */
  inject(data: Uint8Array): void {
    this.deliver(data);
  }

  /**
   * Send a packet to the host, split into notification-sized chunks.
   */
  sendPacket(packet: Packet): void {
    this.deliver(encodePacket(packet));
  }

  simulateDisconnect(): void {
    this.logger.info('Simulating link loss');
    this.connected = false;
    this.clearTimers();
    this.emit('disconnect');
  }

  private handleRequest(request: Packet): void {
    this.requests.push(request);
    this.emit('request', request);

    const reply = this.responder(request);
    if (reply === null) {
      return;
    }

    const response = createResponse(request, reply.payload, reply.errorCode ?? ErrorCode.SUCCESS);
    const timer = setTimeout(() => {
      this.timers.delete(timer);
      if (this.connected) {
        this.sendPacket(response);
      }
    }, reply.delayMs ?? this.latencyMs);
    this.timers.add(timer);
  }

  private deliver(data: Uint8Array): void {
    if (!this.receiver) {
      return;
    }
    for (let offset = 0; offset < data.length; offset += this.chunkSize) {
      this.receiver(data.slice(offset, offset + this.chunkSize));
    }
  }

  private clearTimers(): void {
    for (const timer of this.timers) {
      clearTimeout(timer);
    }
    this.timers.clear();
  }
}
