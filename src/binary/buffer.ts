/**
 * Check if pattern exists at a specific offset
 */
export function matchesAt(
  data: Uint8Array,
  offset: number,
  pattern: Uint8Array | number[]
): boolean {
  if (offset < 0 || offset + pattern.length > data.length) {
    return false;
  }
  for (let i = 0; i < pattern.length; i++) {
    if (data[offset + i] !== pattern[i]) {
      return false;
    }
  }
  return true;
}

/**
 * Check if data starts with a specific pattern
 */
export function startsWith(data: Uint8Array, pattern: Uint8Array | number[]): boolean {
  return matchesAt(data, 0, pattern);
}

/**
 * Convert a byte range to an ASCII string
 */
export function toAscii(data: Uint8Array, offset = 0, length?: number): string {
  const end = Math.min(length !== undefined ? offset + length : data.length, data.length);
  let result = '';
  for (let i = offset; i < end; i++) {
    result += String.fromCharCode(data[i]!);
  }
  return result;
}
