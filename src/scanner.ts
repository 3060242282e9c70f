import noble from '@stoprocent/noble';
import { Logger } from './logger.js';
import { NotFoundError, ScanError } from './errors.js';
import { DROID_NAME_PREFIX, TIMING } from './protocol/constants.js';
import { errorMessage } from './utils.js';

/**
 * The part of a noble peripheral this package touches.
 */
export interface DroidPeripheral {
  id: string;
  address: string;
  rssi: number;
  state: string;
  advertisement: { localName?: string };
  connectAsync(): Promise<void>;
  disconnectAsync(): Promise<void>;
  discoverSomeServicesAndCharacteristicsAsync(
    serviceUUIDs: string[],
    characteristicUUIDs: string[]
  ): Promise<{ characteristics: DroidCharacteristic[] }>;
  once(event: 'disconnect', listener: () => void): unknown;
  removeAllListeners(event?: string): unknown;
}

export interface DroidCharacteristic {
  uuid: string;
  writeAsync(data: Buffer, withoutResponse: boolean): Promise<void>;
  subscribeAsync(): Promise<void>;
  unsubscribeAsync(): Promise<void>;
  on(event: 'data', listener: (data: Buffer) => void): unknown;
  removeAllListeners(event?: string): unknown;
}

export interface DiscoveredDroid {
  name: string;
  id: string;
  address: string;
  rssi: number;
  peripheral: DroidPeripheral;
}

export interface ScanOptions {
  timeoutMs?: number;
  namePrefix?: string;
}

export interface FindOptions extends ScanOptions {
  // Exact advertised name; the first prefix match wins when absent
  name?: string;
}

const logger = new Logger('Scanner');

async function ensurePoweredOn(): Promise<void> {
  if (noble.state === 'poweredOn') {
    return;
  }
  logger.info(`Adapter state: ${noble.state}, waiting for power on...`);
  try {
    await noble.waitForPoweredOnAsync();
  } catch (error) {
    throw new ScanError(`Bluetooth adapter not available: ${errorMessage(error)}`, { cause: error });
  }
}

/**
 * Scan for the full timeout and return every droid seen, deduplicated by id.
 */
export async function scanForDroids(options: ScanOptions = {}): Promise<DiscoveredDroid[]> {
  const timeoutMs = options.timeoutMs ?? TIMING.SCAN_TIMEOUT_MS;
  const namePrefix = options.namePrefix ?? DROID_NAME_PREFIX;
  await ensurePoweredOn();

  const found = new Map<string, DiscoveredDroid>();
  const onDiscover = (peripheral: DroidPeripheral) => {
    const name = peripheral.advertisement.localName;
    if (!name || !name.startsWith(namePrefix) || found.has(peripheral.id)) {
      return;
    }
    logger.info(`Discovered ${name} [${peripheral.id}] RSSI ${peripheral.rssi}`);
    found.set(peripheral.id, {
      name,
      id: peripheral.id,
      address: peripheral.address,
      rssi: peripheral.rssi,
      peripheral
    });
  };

  noble.on('discover', onDiscover);
  try {
    await noble.startScanningAsync([], false);
    await new Promise(resolve => setTimeout(resolve, timeoutMs));
  } catch (error) {
    throw new ScanError(`Scan failed: ${errorMessage(error)}`, { cause: error });
  } finally {
    noble.removeListener('discover', onDiscover);
    await noble.stopScanningAsync();
  }

  logger.info(`Scan complete: ${found.size} droid(s)`);
  return Array.from(found.values());
}

/**
 * Resolve as soon as a matching droid advertises.
 */
export async function findDroid(options: FindOptions = {}): Promise<DroidPeripheral> {
  const timeoutMs = options.timeoutMs ?? TIMING.SCAN_TIMEOUT_MS;
  const namePrefix = options.namePrefix ?? DROID_NAME_PREFIX;
  await ensurePoweredOn();

  const matches = (name: string | undefined): boolean => {
    if (!name) return false;
    return options.name ? name === options.name : name.startsWith(namePrefix);
  };

  logger.info(`Scanning for ${options.name ?? `any ${namePrefix}* droid`}...`);

  return new Promise<DroidPeripheral>((resolve, reject) => {
    const cleanupScan = () => {
      clearTimeout(timeout);
      noble.removeListener('discover', onDiscover);
      noble.stopScanningAsync().catch(error => {
        logger.debug(`Stop scanning failed: ${errorMessage(error)}`);
      });
    };

    const timeout = setTimeout(() => {
      cleanupScan();
      reject(new NotFoundError(options.name, timeoutMs));
    }, timeoutMs);

    const onDiscover = (peripheral: DroidPeripheral) => {
      const name = peripheral.advertisement.localName;
      if (matches(name)) {
        cleanupScan();
        logger.info(`Found ${name} [${peripheral.id}]`);
        resolve(peripheral);
      }
    };
    noble.on('discover', onDiscover);

    noble.startScanningAsync([], false).catch(error => {
      cleanupScan();
      reject(new ScanError(`Scan failed: ${errorMessage(error)}`, { cause: error }));
    });
  });
}
