import { BufferOverflowError } from '../errors.js';

function ensure(data: Uint8Array, offset: number, size: number): void {
  if (offset < 0 || offset + size > data.length) {
    throw new BufferOverflowError(offset + size, data.length);
  }
}

/**
 * Read an unsigned 16-bit integer (big-endian)
 */
export function readUint16BE(data: Uint8Array, offset: number): number {
  ensure(data, offset, 2);
  return (data[offset]! << 8) | data[offset + 1]!;
}

/**
 * Read an unsigned 16-bit integer (little-endian)
 */
export function readUint16LE(data: Uint8Array, offset: number): number {
  ensure(data, offset, 2);
  return data[offset]! | (data[offset + 1]! << 8);
}

/**
 * Read an unsigned 32-bit integer (big-endian)
 */
export function readUint32BE(data: Uint8Array, offset: number): number {
  ensure(data, offset, 4);
  return (
    ((data[offset]! << 24) >>> 0) +
    (data[offset + 1]! << 16) +
    (data[offset + 2]! << 8) +
    data[offset + 3]!
  );
}

/**
 * Read an unsigned 32-bit integer (little-endian)
 */
export function readUint32LE(data: Uint8Array, offset: number): number {
  ensure(data, offset, 4);
  return (
    data[offset]! +
    (data[offset + 1]! << 8) +
    (data[offset + 2]! << 16) +
    ((data[offset + 3]! << 24) >>> 0)
  );
}

/**
 * Read a signed 32-bit integer (little-endian). BMP stores a negative
 * height for top-down rows.
 */
export function readInt32LE(data: Uint8Array, offset: number): number {
  return readUint32LE(data, offset) | 0;
}

/**
 * Read 16-bit integer with configurable endianness
 */
export function readUint16(data: Uint8Array, offset: number, littleEndian: boolean): number {
  return littleEndian ? readUint16LE(data, offset) : readUint16BE(data, offset);
}

/**
 * Read 32-bit integer with configurable endianness
 */
export function readUint32(data: Uint8Array, offset: number, littleEndian: boolean): number {
  return littleEndian ? readUint32LE(data, offset) : readUint32BE(data, offset);
}
