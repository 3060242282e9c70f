import { Logger } from './logger.js';

/**
 * FIFO async mutex guarding the transmit critical section.
 * Waiters are granted the lock strictly in the order they asked for it.
 */
export class SendMutex {
  private locked = false;
  private waiters: Array<() => void> = [];
  private logger: Logger;

  constructor(logger?: Logger) {
    this.logger = logger ?? new Logger('SendMutex');
  }

  acquire(): Promise<void> {
    if (!this.locked) {
      this.locked = true;
      return Promise.resolve();
    }

    this.logger.debug(`Lock busy, queueing (${this.waiters.length + 1} waiting)`);
    return new Promise<void>(resolve => {
      this.waiters.push(resolve);
    });
  }

  release(): void {
    if (!this.locked) {
      this.logger.warn('Release called on an unlocked mutex');
      return;
    }

    const next = this.waiters.shift();
    if (next) {
      // Ownership passes straight to the next waiter; `locked` stays true
      next();
    } else {
      this.locked = false;
    }
  }

  async runExclusive<T>(fn: () => Promise<T>): Promise<T> {
    await this.acquire();
    try {
      return await fn();
    } finally {
      this.release();
    }
  }

  isLocked(): boolean {
    return this.locked;
  }

  get waitingCount(): number {
    return this.waiters.length;
  }
}
