/**
 * Demo: Emulation prevention round trip
 *
 * Builds a zero-heavy synthetic payload, runs encode/decode over it a few
 * times and prints timings plus the escape overhead.
 *
 * Payload size and pass count come from the `demo` section of
 * nalu-config.json.
 */

import {
  decode,
  encode,
  findStartCodeEmulation,
} from '../codecs/emulation-prevention.js';
import { getConfig } from '../config/nalu-config.js';

const DEFAULT_PAYLOAD_BYTES = 1024 * 1024;
const DEFAULT_ITERATIONS = 10;

/**
 * Deterministic payload with frequent 00 00 runs
 */
function createPayload(size: number): Uint8Array {
  const data = new Uint8Array(size);
  let seed = 0x2545f491;
  for (let i = 0; i < size; i++) {
    seed = (Math.imul(seed, 1103515245) + 12345) >>> 0;
    // Roughly half of all bytes are zero
    data[i] = (seed >>> 16) & 1 ? 0 : (seed >>> 24) & 0x07;
  }
  return data;
}

function bytesEqual(a: Uint8Array, b: Uint8Array): boolean {
  if (a.length !== b.length) return false;
  for (let i = 0; i < a.length; i++) {
    if (a[i] !== b[i]) return false;
  }
  return true;
}

function main(): void {
  const config = getConfig();
  const payloadBytes = config.demo?.payloadBytes ?? DEFAULT_PAYLOAD_BYTES;
  const iterations = config.demo?.iterations ?? DEFAULT_ITERATIONS;

  console.log('Emulation Prevention Round Trip Demo');
  console.log('====================================');
  console.log(`Payload: ${payloadBytes} bytes, ${iterations} passes\n`);

  const payload = createPayload(payloadBytes);

  let encoded: Uint8Array = new Uint8Array(0);
  let decoded: Uint8Array = new Uint8Array(0);
  let encodeMs = 0;
  let decodeMs = 0;

  for (let pass = 0; pass < iterations; pass++) {
    let start = performance.now();
    encoded = encode(payload);
    encodeMs += performance.now() - start;

    start = performance.now();
    decoded = decode(encoded);
    decodeMs += performance.now() - start;
  }

  const escapes = encoded.length - payload.length;
  console.log(`Encoded size:  ${encoded.length} bytes (+${escapes} escape bytes, ${((escapes / payload.length) * 100).toFixed(2)}%)`);
  console.log(`Encode time:   ${(encodeMs / iterations).toFixed(2)}ms per pass`);
  console.log(`Decode time:   ${(decodeMs / iterations).toFixed(2)}ms per pass`);

  const emulation = findStartCodeEmulation(encoded);
  console.log(`Start-code emulation in encoded payload: ${emulation === -1 ? 'none' : `at byte ${emulation}`}`);

  const ok = bytesEqual(decoded, payload);
  console.log(`Round trip: ${ok ? 'OK' : 'MISMATCH'}`);

  if (!ok || emulation !== -1) {
    process.exitCode = 1;
  }
}

main();
