/**
 * RBSP trailing-bits helpers
 *
 * An RBSP ends with rbsp_stop_one_bit followed by zero alignment bits.
 * Bit positions are MSB-first across the whole buffer.
 */

import { toUint8Array, type ByteSource } from '../utils/buffer.js';

/**
 * Bit position of the last 1 bit (the stop bit), or -1 if all bits are zero
 */
export function findRbspStopBit(rbsp: ByteSource): number {
  const data = toUint8Array(rbsp, 'rbsp');
  for (let byteIndex = data.length - 1; byteIndex >= 0; byteIndex--) {
    const byte = data[byteIndex];
    if (byte === 0) continue;
    // Lowest set bit is the last one in MSB-first order
    let bit = 7;
    while ((byte & (1 << (7 - bit))) === 0) {
      bit--;
    }
    return byteIndex * 8 + bit;
  }
  return -1;
}

/**
 * more_rbsp_data(): whether syntax elements remain before the stop bit
 *
 * @param rbsp - Payload with emulation prevention already removed
 * @param bitPosition - Current read position in bits
 * @throws {TypeError} If bitPosition is not a non-negative integer
 */
export function moreRbspData(rbsp: ByteSource, bitPosition: number): boolean {
  if (!Number.isInteger(bitPosition) || bitPosition < 0) {
    throw new TypeError(`bitPosition must be a non-negative integer, got ${bitPosition}`);
  }

  const data = toUint8Array(rbsp, 'rbsp');
  if (bitPosition >= data.length * 8) {
    return false;
  }

  const stopBit = findRbspStopBit(data);
  return stopBit !== -1 && bitPosition < stopBit;
}
