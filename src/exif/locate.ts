/**
 * Find the TIFF-structured EXIF block inside an image container.
 */

import { detectFormat } from '../detect.js';
import { jpeg } from '../formats/jpeg.js';
import { png } from '../formats/png.js';
import { webp } from '../formats/webp.js';
import type { SupportedFormat } from '../types.js';

type ExifLocator = (data: Uint8Array) => Uint8Array | undefined;

const locators: Partial<Record<SupportedFormat, ExifLocator>> = {
  jpeg: jpeg.findExif,
  png: png.findExif,
  webp: webp.findExif,
  // A TIFF file is itself a TIFF-structured block
  tiff: data => data,
};

/**
 * Locate the EXIF block of an encoded image.
 * Returns `undefined` for formats without EXIF and for containers that fail
 * to parse.
 */
export function locateExifBlock(data: Uint8Array): Uint8Array | undefined {
  const locate = locators[detectFormat(data)];
  if (!locate) return undefined;
  try {
    return locate(data);
  } catch {
    // Corrupt container: treat the metadata as unreadable
    return undefined;
  }
}
