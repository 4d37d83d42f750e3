/**
 * Whole-file helpers for escaped payloads
 *
 * Files are treated as a single payload: no start-code scanning, the
 * entire contents go through the codec in one call.
 */

import * as fs from 'fs';
import * as fsp from 'fs/promises';
import { createHash } from 'crypto';
import { decode, encode } from '../codecs/emulation-prevention.js';
import { toUint8Array, type ByteSource } from '../utils/buffer.js';
import { createLogger } from '../utils/logger.js';
import {
  getErrorCode,
  getErrorMessage,
  notFoundError,
  notReadableError,
} from '../utils/errors.js';

const logger = createLogger('PayloadFile');

/**
 * Byte counts of a file transform
 */
export interface TransformResult {
  inputBytes: number;
  outputBytes: number;
}

function toIoError(err: unknown, filePath: string, action: string): DOMException {
  if (getErrorCode(err) === 'ENOENT') {
    return notFoundError(`No such file: ${filePath}`);
  }
  const reason = getErrorCode(err) ?? getErrorMessage(err);
  return notReadableError(`Failed to ${action} ${filePath}: ${reason}`);
}

/**
 * Read a whole file into a Uint8Array
 *
 * @throws DOMException NotFoundError if the file does not exist
 * @throws DOMException NotReadableError for any other I/O failure
 */
export async function readPayload(filePath: string): Promise<Uint8Array> {
  try {
    const buffer = await fsp.readFile(filePath);
    return new Uint8Array(buffer.buffer, buffer.byteOffset, buffer.byteLength);
  } catch (err) {
    throw toIoError(err, filePath, 'read');
  }
}

/**
 * Write a payload to a file, replacing any existing contents
 */
export async function writePayload(filePath: string, data: ByteSource): Promise<void> {
  try {
    await fsp.writeFile(filePath, toUint8Array(data));
  } catch (err) {
    throw toIoError(err, filePath, 'write');
  }
}

async function transformFile(
  inPath: string,
  outPath: string,
  transform: (input: Uint8Array) => Uint8Array,
  label: string
): Promise<TransformResult> {
  const input = await readPayload(inPath);
  const output = transform(input);
  await writePayload(outPath, output);

  logger.debug(`${label} ${inPath} -> ${outPath}`, {
    inputBytes: input.length,
    outputBytes: output.length,
  });

  return { inputBytes: input.length, outputBytes: output.length };
}

/**
 * Insert emulation prevention bytes into a file's contents
 */
export function encodeFile(inPath: string, outPath: string): Promise<TransformResult> {
  return transformFile(inPath, outPath, encode, 'Encoded');
}

/**
 * Remove emulation prevention bytes from a file's contents
 */
export function decodeFile(inPath: string, outPath: string): Promise<TransformResult> {
  return transformFile(inPath, outPath, decode, 'Decoded');
}

/**
 * SHA-256 of a file's full contents, hex encoded
 */
export async function hashFile(filePath: string): Promise<string> {
  const hash = createHash('sha256');
  try {
    for await (const chunk of fs.createReadStream(filePath)) {
      hash.update(chunk);
    }
  } catch (err) {
    throw toIoError(err, filePath, 'read');
  }
  return hash.digest('hex');
}

/**
 * Check whether all files have identical contents.
 *
 * Zero or one path is trivially the same.
 */
export async function isSameFile(...filePaths: string[]): Promise<boolean> {
  let previous: string | null = null;
  for (const filePath of filePaths) {
    const current = await hashFile(filePath);
    if (previous !== null && current !== previous) {
      return false;
    }
    previous = current;
  }
  return true;
}
