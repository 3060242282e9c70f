#!/usr/bin/env node

import { realpathSync } from 'fs';
import { pathToFileURL } from 'url';
import { Droid } from './droid.js';
import { loadConfig, loadEnvFile, type DroidConfig } from './config.js';
import { BatteryState, LegAction } from './protocol/constants.js';
import { errorMessage } from './utils.js';

export type CliCommand =
  | { name: 'scan' }
  | { name: 'info' }
  | { name: 'sound'; soundId: number }
  | { name: 'dome'; angle: number }
  | { name: 'leds'; color: [number, number, number] }
  | { name: 'stance'; action: LegAction };

export const USAGE = `Usage: astromech <command>

Commands:
  scan                              List droids in range
  info                              Battery and firmware of the configured droid
  sound <id>                        Play a sound
  dome <angle>                      Turn the dome (-160 to 180 degrees)
  leds <r> <g> <b>                  Set the front light
  stance <tripod|bipod|waddle|stop> Change leg stance

Environment: ASTROMECH_DEVICE_NAME, ASTROMECH_TRANSPORT, ASTROMECH_BRIDGE_URL, ...`;

const STANCES: Record<string, LegAction> = {
  tripod: LegAction.TRIPOD,
  bipod: LegAction.BIPOD,
  waddle: LegAction.WADDLE,
  stop: LegAction.STOP
};

export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'UsageError';
  }
}

function integerArg(value: string | undefined, what: string, min: number, max: number): number {
  if (value === undefined || !/^-?\d+$/.test(value)) {
    throw new UsageError(`${what} must be an integer`);
  }
  const parsed = parseInt(value, 10);
  if (parsed < min || parsed > max) {
    throw new UsageError(`${what} must be between ${min} and ${max}`);
  }
  return parsed;
}

export function parseCommand(args: string[]): CliCommand {
  const [command, ...rest] = args;
  switch (command) {
    case 'scan':
      return { name: 'scan' };
    case 'info':
      return { name: 'info' };
    case 'sound':
      return { name: 'sound', soundId: integerArg(rest[0], 'Sound id', 0, 0xFFFF) };
    case 'dome': {
      const angle = Number(rest[0]);
      if (rest[0] === undefined || !Number.isFinite(angle)) {
        throw new UsageError('Angle must be a number');
      }
      return { name: 'dome', angle };
    }
    case 'leds':
      return {
        name: 'leds',
        color: [
          integerArg(rest[0], 'Red', 0, 255),
          integerArg(rest[1], 'Green', 0, 255),
          integerArg(rest[2], 'Blue', 0, 255)
        ]
      };
    case 'stance': {
      const action = rest[0] === undefined ? undefined : STANCES[rest[0]];
      if (action === undefined) {
        throw new UsageError(`Stance must be one of: ${Object.keys(STANCES).join(', ')}`);
      }
      return { name: 'stance', action };
    }
    case undefined:
      throw new UsageError('No command given');
    default:
      throw new UsageError(`Unknown command: ${command}`);
  }
}

const BATTERY_STATE_NAMES: Record<number, string> = Object.fromEntries(
  Object.entries(BatteryState).map(([name, value]) => [value, name.toLowerCase().replace('_', ' ')])
);

async function scan(config: DroidConfig): Promise<void> {
  const { scanForDroids } = await import('./scanner.js');
  console.log(`🔍 Scanning for ${config.scanTimeoutMs / 1000}s...`);
  const droids = await scanForDroids({ timeoutMs: config.scanTimeoutMs, namePrefix: config.namePrefix });
  if (droids.length === 0) {
    console.log('No droids found');
    return;
  }
  for (const droid of droids) {
    console.log(`  ${droid.name}  ${droid.address || droid.id}  RSSI ${droid.rssi}`);
  }
}

async function withDroid(config: DroidConfig, action: (droid: Droid) => Promise<void>): Promise<void> {
  const droid = new Droid(config);
  await droid.connect();
  try {
    await action(droid);
  } finally {
    await droid.disconnect();
  }
}

export async function runCommand(command: CliCommand, config: DroidConfig): Promise<void> {
  switch (command.name) {
    case 'scan':
      return scan(config);
    case 'info':
      return withDroid(config, async droid => {
        const voltage = await droid.getBatteryVoltage();
        const state = await droid.getBatteryState();
        const firmware = await droid.getFirmwareVersion();
        console.log(`Name:     ${droid.name ?? 'unknown'}`);
        console.log(`Firmware: ${firmware}`);
        console.log(`Battery:  ${voltage.toFixed(2)}V (${BATTERY_STATE_NAMES[state] ?? 'unknown'})`);
      });
    case 'sound': {
      const { soundId } = command;
      return withDroid(config, droid => droid.audio.playSound(soundId));
    }
    case 'dome': {
      const { angle } = command;
      return withDroid(config, droid => droid.dome.setPosition(angle));
    }
    case 'leds': {
      const [red, green, blue] = command.color;
      return withDroid(config, droid => droid.leds.setFront(red, green, blue));
    }
    case 'stance': {
      const { action } = command;
      return withDroid(config, droid => droid.stance.setStance(action));
    }
  }
}

async function main(): Promise<void> {
  loadEnvFile();

  let command: CliCommand;
  try {
    command = parseCommand(process.argv.slice(2));
  } catch (error) {
    console.error(`❌ ${errorMessage(error)}\n`);
    console.error(USAGE);
    process.exit(2);
  }

  await runCommand(command, loadConfig());
}

// npm links the bin, so compare against the resolved script path
const entry = process.argv[1];
if (entry && import.meta.url === pathToFileURL(realpathSync(entry)).href) {
  main().catch(error => {
    console.error(`❌ ${errorMessage(error)}`);
    process.exit(1);
  });
}
