/**
 * Buffer utilities
 *
 * Public entry points accept any ByteSource; internally everything is
 * read through a Uint8Array window over the caller's memory.
 */

/**
 * Anything that can be viewed as bytes: a (Shared)ArrayBuffer, a typed
 * array, a Buffer or a DataView
 */
export type ByteSource = ArrayBufferLike | ArrayBufferView;

function isArrayBufferLike(value: unknown): value is ArrayBufferLike {
  return (
    value instanceof ArrayBuffer ||
    (typeof SharedArrayBuffer !== 'undefined' && value instanceof SharedArrayBuffer)
  );
}

/**
 * Check if a value is an ArrayBuffer(Like) or an ArrayBufferView
 */
export function isByteSource(value: unknown): value is ByteSource {
  return isArrayBufferLike(value) || ArrayBuffer.isView(value);
}

/**
 * View a ByteSource as a Uint8Array without copying.
 *
 * Views keep their byteOffset/byteLength window.
 *
 * @throws {TypeError} If the value is not a ByteSource
 */
export function toUint8Array(data: unknown, name: string = 'data'): Uint8Array {
  if (data instanceof Uint8Array) {
    return data;
  }
  if (isArrayBufferLike(data)) {
    return new Uint8Array(data);
  }
  if (ArrayBuffer.isView(data)) {
    return new Uint8Array(data.buffer, data.byteOffset, data.byteLength);
  }
  throw new TypeError(`${name} must be an ArrayBuffer or ArrayBufferView`);
}

/**
 * Copy a ByteSource into a new, independently owned Uint8Array
 */
export function copyToUint8Array(data: ByteSource): Uint8Array {
  return toUint8Array(data).slice();
}
