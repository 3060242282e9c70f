import { describe, it, expect } from 'vitest';
import { parseCommand, UsageError } from '../../src/cli.js';
import { LegAction } from '../../src/protocol/constants.js';

describe('parseCommand', () => {
  it('should parse commands without arguments', () => {
    expect(parseCommand(['scan'])).toEqual({ name: 'scan' });
    expect(parseCommand(['info'])).toEqual({ name: 'info' });
  });

  it('should parse numeric arguments', () => {
    expect(parseCommand(['sound', '1862'])).toEqual({ name: 'sound', soundId: 1862 });
    expect(parseCommand(['dome', '-45.5'])).toEqual({ name: 'dome', angle: -45.5 });
    expect(parseCommand(['leds', '255', '0', '128'])).toEqual({ name: 'leds', color: [255, 0, 128] });
  });

  it('should parse stances by name', () => {
    expect(parseCommand(['stance', 'bipod'])).toEqual({ name: 'stance', action: LegAction.BIPOD });
  });

  it('should reject missing and unknown commands', () => {
    expect(() => parseCommand([])).toThrow(new UsageError('No command given'));
    expect(() => parseCommand(['fly'])).toThrow('Unknown command: fly');
  });

  it('should reject bad arguments', () => {
    expect(() => parseCommand(['sound'])).toThrow('Sound id must be an integer');
    expect(() => parseCommand(['sound', '1.5'])).toThrow('Sound id must be an integer');
    expect(() => parseCommand(['leds', '255', '256', '0'])).toThrow('Green must be between 0 and 255');
    expect(() => parseCommand(['dome', 'left'])).toThrow('Angle must be a number');
    expect(() => parseCommand(['stance', 'sit'])).toThrow('Stance must be one of: tripod, bipod, waddle, stop');
  });
});
