import { Droid, type DroidOptions } from './droid.js';
import { Logger } from './logger.js';
import type { DiscoveredDroid, ScanOptions } from './scanner.js';
import { errorMessage } from './utils.js';

export interface ScanAndConnectOptions extends ScanOptions {
  maxDroids?: number;
  // Applied to every droid created from the scan
  droidOptions?: Omit<DroidOptions, 'peripheral' | 'deviceName' | 'link'>;
}

export type DroidAction<T> = (droid: Droid) => Promise<T>;

/**
 * A group of droids driven together.
 */
export class Fleet {
  private droids: Droid[] = [];
  private logger = new Logger('Fleet');

  get robots(): Droid[] {
    return [...this.droids];
  }

  get count(): number {
    return this.droids.length;
  }

  add(droid: Droid): void {
    if (!this.droids.includes(droid)) {
      this.droids.push(droid);
    }
  }

  remove(droid: Droid): void {
    this.droids = this.droids.filter(d => d !== droid);
  }

  byName(name: string): Droid | undefined {
    return this.droids.find(droid => droid.name === name);
  }

  /**
   * Run an action on every droid at once. Rejects with the first failure.
   */
  all<T>(action: DroidAction<T>): Promise<T[]> {
    return Promise.all(this.droids.map(droid => action(droid)));
  }

  async sequential<T>(action: DroidAction<T>): Promise<T[]> {
    const results: T[] = [];
    for (const droid of this.droids) {
      results.push(await action(droid));
    }
    return results;
  }

  async disconnectAll(): Promise<void> {
    const droids = this.droids;
    this.droids = [];
    const results = await Promise.allSettled(droids.map(droid => droid.disconnect()));
    results.forEach((result, i) => {
      if (result.status === 'rejected') {
        this.logger.warn(`Disconnect of ${droids[i].name ?? 'droid'} failed: ${errorMessage(result.reason)}`);
      }
    });
  }

  /**
   * Scan, then connect to every droid found in parallel. Droids that fail to
   * connect are logged and left out. Resolves with the fleet size.
   */
  async scanAndConnect(options: ScanAndConnectOptions = {}): Promise<number> {
    const { scanForDroids } = await import('./scanner.js');
    let found = await scanForDroids({ timeoutMs: options.timeoutMs, namePrefix: options.namePrefix });
    if (options.maxDroids !== undefined) {
      found = found.slice(0, options.maxDroids);
    }
    return this.connectDiscovered(found, options.droidOptions);
  }

  async connectDiscovered(
    found: DiscoveredDroid[],
    droidOptions: ScanAndConnectOptions['droidOptions'] = {}
  ): Promise<number> {
    const connected = await Promise.all(found.map(async discovered => {
      const droid = new Droid({
        ...droidOptions,
        transport: droidOptions.transport ?? 'ble',
        deviceName: discovered.name,
        peripheral: discovered.peripheral
      });
      try {
        await droid.connect();
        return droid;
      } catch (error) {
        this.logger.warn(`Could not connect to ${discovered.name}: ${errorMessage(error)}`);
        return null;
      }
    }));

    for (const droid of connected) {
      if (droid) this.add(droid);
    }
    this.logger.info(`Fleet has ${this.count} droid(s)`);
    return this.count;
  }
}
