import { CommandTimeoutError, ProtocolError, describeIdentity } from './errors.js';
import { identityKey, type Packet, type PacketIdentity } from './protocol/packet.js';

interface PendingRequest {
  identity: PacketIdentity;
  timer: NodeJS.Timeout;
  resolve: (packet: Packet) => void;
  reject: (error: Error) => void;
}

/**
 * Requests awaiting their response, keyed by packet identity.
 *
 * Every entry settles exactly once: by `resolve`, by its own deadline, or by
 * `rejectAll`. Settling removes the entry, so a late duplicate finds nothing.
 */
export class PendingRequests {
  private requests = new Map<number, PendingRequest>();

  /**
   * Register `identity` and start its deadline. The returned promise settles
   * with the matching response packet or rejects with CommandTimeoutError.
   */
  register(identity: PacketIdentity, timeoutMs: number): Promise<Packet> {
    const key = identityKey(identity);
    if (this.requests.has(key)) {
      throw new ProtocolError(`A request is already pending for ${describeIdentity(identity)}`);
    }

    return new Promise<Packet>((resolve, reject) => {
      const timer = setTimeout(() => {
        this.requests.delete(key);
        reject(new CommandTimeoutError(timeoutMs, identity));
      }, timeoutMs);

      this.requests.set(key, { identity, timer, resolve, reject });
    });
  }

  /**
   * Complete the request matching the packet's identity.
   * Returns false when nothing was waiting for it.
   */
  resolve(packet: Packet): boolean {
    const key = identityKey(packet);
    const request = this.requests.get(key);
    if (!request) {
      return false;
    }

    this.requests.delete(key);
    clearTimeout(request.timer);
    request.resolve(packet);
    return true;
  }

  /**
   * Fail a single request, e.g. when its bytes never made it onto the link.
   */
  reject(identity: PacketIdentity, error: Error): boolean {
    const key = identityKey(identity);
    const request = this.requests.get(key);
    if (!request) {
      return false;
    }

    this.requests.delete(key);
    clearTimeout(request.timer);
    request.reject(error);
    return true;
  }

  delete(identity: PacketIdentity): void {
    const key = identityKey(identity);
    const request = this.requests.get(key);
    if (request) {
      clearTimeout(request.timer);
      this.requests.delete(key);
    }
  }

  rejectAll(createError: () => Error): number {
    const requests = Array.from(this.requests.values());
    this.requests.clear();

    for (const request of requests) {
      clearTimeout(request.timer);
      request.reject(createError());
    }
    return requests.length;
  }

  has(identity: PacketIdentity): boolean {
    return this.requests.has(identityKey(identity));
  }

  get size(): number {
    return this.requests.size;
  }
}
