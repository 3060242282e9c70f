import * as dotenv from 'dotenv';
import * as path from 'path';
import { z } from 'zod';
import { ConfigError } from './errors.js';
import { DROID_NAME_PREFIX, TIMING } from './protocol/constants.js';
import type { TransportKind } from './transport.js';

const milliseconds = (fallback: number) =>
  z.coerce.number().int().nonnegative().default(fallback);

const EnvSchema = z.object({
  ASTROMECH_DEVICE_NAME: z.string().min(1).optional(),
  ASTROMECH_NAME_PREFIX: z.string().min(1).default(DROID_NAME_PREFIX),
  ASTROMECH_SCAN_TIMEOUT_MS: milliseconds(TIMING.SCAN_TIMEOUT_MS),
  ASTROMECH_COMMAND_TIMEOUT_MS: milliseconds(TIMING.COMMAND_TIMEOUT_MS),
  ASTROMECH_COMMAND_INTERVAL_MS: milliseconds(TIMING.COMMAND_INTERVAL_MS),
  ASTROMECH_WRITE_CHUNK_SIZE: z.coerce.number().int().min(1).max(512).default(TIMING.WRITE_CHUNK_SIZE),
  ASTROMECH_CHUNK_DELAY_MS: milliseconds(TIMING.COMMAND_INTERVAL_MS),
  ASTROMECH_TRANSPORT: z.enum(['ble', 'bridge', 'mock']).default('ble'),
  ASTROMECH_BRIDGE_URL: z.string().url().optional()
});

export interface DroidConfig {
  deviceName?: string;
  namePrefix: string;
  scanTimeoutMs: number;
  commandTimeoutMs: number;
  commandIntervalMs: number;
  writeChunkSize: number;
  chunkDelayMs: number;
  transport: TransportKind;
  bridgeUrl?: string;
}

/**
 * Load .env.local from the working directory into process.env, if present.
 * Variables already set in the environment win.
 */
export function loadEnvFile(file = '.env.local'): void {
  dotenv.config({ path: path.resolve(process.cwd(), file) });
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): DroidConfig {
  // Unset and empty are the same thing in a shell environment
  const present = Object.fromEntries(
    Object.entries(env).filter(([key, value]) => key.startsWith('ASTROMECH_') && value !== '')
  );

  const result = EnvSchema.safeParse(present);
  if (!result.success) {
    const details = result.error.issues
      .map(issue => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new ConfigError(`Invalid configuration - ${details}`);
  }

  const parsed = result.data;
  if (parsed.ASTROMECH_TRANSPORT === 'bridge' && !parsed.ASTROMECH_BRIDGE_URL) {
    throw new ConfigError('Invalid configuration - ASTROMECH_BRIDGE_URL: required when ASTROMECH_TRANSPORT is bridge');
  }

  return {
    deviceName: parsed.ASTROMECH_DEVICE_NAME,
    namePrefix: parsed.ASTROMECH_NAME_PREFIX,
    scanTimeoutMs: parsed.ASTROMECH_SCAN_TIMEOUT_MS,
    commandTimeoutMs: parsed.ASTROMECH_COMMAND_TIMEOUT_MS,
    commandIntervalMs: parsed.ASTROMECH_COMMAND_INTERVAL_MS,
    writeChunkSize: parsed.ASTROMECH_WRITE_CHUNK_SIZE,
    chunkDelayMs: parsed.ASTROMECH_CHUNK_DELAY_MS,
    transport: parsed.ASTROMECH_TRANSPORT,
    bridgeUrl: parsed.ASTROMECH_BRIDGE_URL
  };
}
