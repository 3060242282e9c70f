import { ESCAPED_BYTES, FRAME_BYTES } from './constants.js';
import { FramingError } from '../errors.js';
import { formatByte } from '../utils.js';

const SUBSTITUTES = new Map<number, number>([
  [FRAME_BYTES.START, ESCAPED_BYTES.START],
  [FRAME_BYTES.END, ESCAPED_BYTES.END],
  [FRAME_BYTES.ESCAPE, ESCAPED_BYTES.ESCAPE]
]);

const ORIGINALS = new Map<number, number>(
  Array.from(SUBSTITUTES, ([original, substitute]) => [substitute, original])
);

export function isReservedByte(value: number): boolean {
  return SUBSTITUTES.has(value);
}

export function escapeBytes(data: Uint8Array): Uint8Array {
  const result: number[] = [];
  for (const byte of data) {
    const substitute = SUBSTITUTES.get(byte);
    if (substitute === undefined) {
      result.push(byte);
    } else {
      result.push(FRAME_BYTES.ESCAPE, substitute);
    }
  }
  return Uint8Array.from(result);
}

/**
 * Reverse of escapeBytes. Operates on a complete frame body, so a dangling
 * escape byte is malformed rather than "to be continued".
 */
export function unescapeBytes(data: Uint8Array): Uint8Array {
  const result: number[] = [];
  for (let i = 0; i < data.length; i++) {
    const byte = data[i];
    if (byte !== FRAME_BYTES.ESCAPE) {
      result.push(byte);
      continue;
    }

    i++;
    if (i >= data.length) {
      throw new FramingError('Truncated escape sequence at end of body');
    }

    const original = ORIGINALS.get(data[i]);
    if (original === undefined) {
      throw new FramingError(`Invalid escape sequence: ${formatByte(FRAME_BYTES.ESCAPE)} ${formatByte(data[i])}`);
    }
    result.push(original);
  }
  return Uint8Array.from(result);
}
