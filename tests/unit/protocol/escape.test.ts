import { describe, it, expect } from 'vitest';
import { escapeBytes, isReservedByte, unescapeBytes } from '../../../src/protocol/escape.js';
import { FramingError } from '../../../src/errors.js';

describe('escapeBytes', () => {
  it('should leave ordinary bytes untouched', () => {
    expect(escapeBytes(Uint8Array.of(0x00, 0x11, 0x7F, 0xFF))).toEqual(Uint8Array.of(0x00, 0x11, 0x7F, 0xFF));
  });

  it('should replace each reserved byte with ESC and its substitute', () => {
    expect(escapeBytes(Uint8Array.of(0xAB, 0x8D, 0xD8))).toEqual(
      Uint8Array.of(0xAB, 0x23, 0xAB, 0x05, 0xAB, 0x50)
    );
  });

  it('should never emit START or END', () => {
    const all = Uint8Array.from({ length: 256 }, (_, i) => i);
    const escaped = escapeBytes(all);
    expect(escaped.includes(0x8D)).toBe(false);
    expect(escaped.includes(0xD8)).toBe(false);
    expect(escaped.length).toBe(259);
  });
});

describe('unescapeBytes', () => {
  it('should restore every byte value', () => {
    const all = Uint8Array.from({ length: 256 }, (_, i) => i);
    expect(unescapeBytes(escapeBytes(all))).toEqual(all);
  });

  it('should reject an escape byte at the end of the body', () => {
    expect(() => unescapeBytes(Uint8Array.of(0x01, 0xAB))).toThrow(FramingError);
    expect(() => unescapeBytes(Uint8Array.of(0x01, 0xAB))).toThrow('Truncated escape sequence at end of body');
  });

  it('should reject an unknown escape substitute', () => {
    expect(() => unescapeBytes(Uint8Array.of(0xAB, 0x11))).toThrow('Invalid escape sequence: 0xAB 0x11');
  });
});

describe('isReservedByte', () => {
  it('should flag exactly START, END and ESC', () => {
    const reserved = Array.from({ length: 256 }, (_, i) => i).filter(isReservedByte);
    expect(reserved).toEqual([0x8D, 0xAB, 0xD8]);
  });
});
