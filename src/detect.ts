import type { OutputFormat, SupportedFormat } from './types.js';
import * as buffer from './binary/buffer.js';
import { FILE_SIGNATURES } from './signatures.js';

/**
 * Extensions accepted by the batch exporter
 */
export const SUPPORTED_EXTENSIONS: ReadonlySet<string> = new Set([
  '.jpg', '.jpeg', '.png', '.bmp', '.tif', '.tiff', '.webp',
]);

/**
 * Extensions accepted by the date-watermark CLI (no BMP: BMP carries no EXIF)
 */
export const DATE_STAMP_EXTENSIONS: ReadonlySet<string> = new Set([
  '.jpg', '.jpeg', '.png', '.tif', '.tiff', '.webp',
]);

/**
 * Detect image format from binary data
 */
export function detectFormat(data: Uint8Array): SupportedFormat {
  if (buffer.startsWith(data, FILE_SIGNATURES.JPEG)) {
    return 'jpeg';
  }

  if (buffer.startsWith(data, FILE_SIGNATURES.PNG)) {
    return 'png';
  }

  // WebP: starts with RIFF....WEBP
  if (
    buffer.startsWith(data, FILE_SIGNATURES.RIFF) &&
    buffer.matchesAt(data, 8, FILE_SIGNATURES.WEBP)
  ) {
    return 'webp';
  }

  if (
    buffer.startsWith(data, FILE_SIGNATURES.TIFF_LE) ||
    buffer.startsWith(data, FILE_SIGNATURES.TIFF_BE)
  ) {
    return 'tiff';
  }

  // BMP: "BM" plus a 14-byte file header and at least a core DIB header
  if (data.length >= 26 && buffer.startsWith(data, FILE_SIGNATURES.BMP)) {
    return 'bmp';
  }

  return 'unknown';
}

/**
 * File extension written for an export format
 */
export function extensionFor(format: OutputFormat): '.jpg' | '.png' {
  return format === 'jpeg' ? '.jpg' : '.png';
}
