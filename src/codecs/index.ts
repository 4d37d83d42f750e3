/**
 * Codecs module
 *
 * Emulation prevention and RBSP helpers.
 */

export {
  encode,
  decode,
  encodedLength,
  decodedLength,
  countEmulationPreventionBytes,
  findStartCodeEmulation,
  EMULATION_PREVENTION_BYTE,
} from './emulation-prevention.js';

export { findRbspStopBit, moreRbspData } from './rbsp.js';
