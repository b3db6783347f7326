/**
 * Byte views over host text and binary values.
 *
 * @fileoverview String extraction.
 */

const encoder = new TextEncoder();

/**
 * Get the raw bytes of a text or binary value.
 *
 * Binary values (`Uint8Array`, `Buffer`, `ArrayBuffer` and other
 * `ArrayBufferView`s) are viewed in place, not copied. Strings are encoded
 * to UTF-8. Any other value is unsupported and yields `undefined`.
 *
 * A view is only valid while the value it was taken from is; don't hold on
 * to it past that.
 */
export function getStrData(value: unknown): Uint8Array | undefined {
  if (typeof value === 'string') {
    return encoder.encode(value);
  }
  if (value instanceof Uint8Array) {
    return value;
  }
  if (value instanceof ArrayBuffer) {
    return new Uint8Array(value);
  }
  if (ArrayBuffer.isView(value)) {
    return new Uint8Array(value.buffer, value.byteOffset, value.byteLength);
  }
  return undefined;
}
