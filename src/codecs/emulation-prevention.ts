/**
 * Emulation prevention for H.264/H.265 payloads
 *
 * Inside a NAL unit the byte pattern 00 00 0x (x <= 3) is reserved for
 * start codes. `encode` breaks every such run in an RBSP with an inserted
 * 0x03 byte; `decode` strips those bytes again.
 *
 * Both transforms are pure and make a single forward pass: the input is
 * only read and a freshly allocated Uint8Array of exactly the output
 * length is returned.
 */

import { toUint8Array, type ByteSource } from '../utils/buffer.js';

/** The byte inserted after each 00 00 pair */
export const EMULATION_PREVENTION_BYTE = 0x03;

/**
 * 00 00 followed by 00..03, with the third byte inside the buffer
 */
function needsEscape(data: Uint8Array, i: number): boolean {
  return (
    i + 2 < data.length &&
    data[i] === 0x00 &&
    data[i + 1] === 0x00 &&
    data[i + 2] <= EMULATION_PREVENTION_BYTE
  );
}

/**
 * 00 00 03, with the third byte inside the buffer
 */
function isEscaped(data: Uint8Array, i: number): boolean {
  return (
    i + 2 < data.length &&
    data[i] === 0x00 &&
    data[i + 1] === 0x00 &&
    data[i + 2] === EMULATION_PREVENTION_BYTE
  );
}

/**
 * Length of `encode(input)` without producing it
 */
export function encodedLength(input: ByteSource): number {
  const data = toUint8Array(input, 'input');
  let length = data.length;
  let i = 0;
  while (i < data.length) {
    if (needsEscape(data, i)) {
      length++;
      // The byte at i + 2 is examined again as the start of the next run
      i += 2;
    } else {
      i++;
    }
  }
  return length;
}

/**
 * Length of `decode(input)` without producing it
 */
export function decodedLength(input: ByteSource): number {
  const data = toUint8Array(input, 'input');
  let length = 0;
  let i = 0;
  while (i < data.length) {
    if (isEscaped(data, i)) {
      length += 2;
      i += 3;
    } else {
      length++;
      i++;
    }
  }
  return length;
}

/**
 * Number of emulation prevention bytes `decode` would remove
 */
export function countEmulationPreventionBytes(input: ByteSource): number {
  return toUint8Array(input, 'input').length - decodedLength(input);
}

/**
 * Insert emulation prevention bytes (RBSP -> escaped NAL payload).
 *
 * A trailing 00 00 with fewer than three bytes left is emitted as is.
 *
 * @example
 * encode(new Uint8Array([0, 0, 1]))    // [0, 0, 3, 1]
 * encode(new Uint8Array([0, 0, 0, 1])) // [0, 0, 3, 0, 1]
 */
export function encode(input: ByteSource): Uint8Array {
  const data = toUint8Array(input, 'input');
  // Each escape consumes two input bytes, so at most length / 2 are inserted
  const output = new Uint8Array(data.length + (data.length >> 1));

  let o = 0;
  let i = 0;
  while (i < data.length) {
    if (needsEscape(data, i)) {
      output[o++] = 0x00;
      output[o++] = 0x00;
      output[o++] = EMULATION_PREVENTION_BYTE;
      i += 2;
    } else {
      output[o++] = data[i];
      i++;
    }
  }

  return output.slice(0, o);
}

/**
 * Remove emulation prevention bytes (escaped NAL payload -> RBSP).
 *
 * Identity on input without any 00 00 03 sequence.
 */
export function decode(input: ByteSource): Uint8Array {
  const data = toUint8Array(input, 'input');
  const output = new Uint8Array(data.length);

  let o = 0;
  let i = 0;
  while (i < data.length) {
    if (isEscaped(data, i)) {
      output[o++] = 0x00;
      output[o++] = 0x00;
      i += 3;
    } else {
      output[o++] = data[i];
      i++;
    }
  }

  return output.slice(0, o);
}

/**
 * Find the first start-code emulation (00 00 00, 00 00 01 or 00 00 02).
 *
 * @returns Byte index of the run, or -1 if there is none
 * @throws {TypeError} If fromIndex is not a non-negative integer
 */
export function findStartCodeEmulation(input: ByteSource, fromIndex: number = 0): number {
  if (!Number.isInteger(fromIndex) || fromIndex < 0) {
    throw new TypeError(`fromIndex must be a non-negative integer, got ${fromIndex}`);
  }

  const data = toUint8Array(input, 'input');
  for (let i = fromIndex; i + 2 < data.length; i++) {
    if (data[i] === 0x00 && data[i + 1] === 0x00 && data[i + 2] < EMULATION_PREVENTION_BYTE) {
      return i;
    }
  }
  return -1;
}
