/**
 * nalu-rbsp
 *
 * Emulation prevention (00 00 03 escaping) for H.264/H.265 payloads.
 */

export * from './codecs/index.js';

export {
  encodeFile,
  decodeFile,
  readPayload,
  writePayload,
  hashFile,
  isSameFile,
  type TransformResult,
} from './io/payload-file.js';

export {
  getConfig,
  loadConfig,
  clearConfigCache,
  type NaluConfig,
  type DemoConfig,
} from './config/nalu-config.js';

export * from './utils/index.js';
