import { CorruptedFileError } from '../errors.js';
import * as buffer from '../binary/buffer.js';
import * as dataview from '../binary/dataview.js';
import { FILE_SIGNATURES } from '../signatures.js';

/**
 * JPEG marker constants
 */
const MARKERS = {
  EOI: 0xd9, // End of Image
  SOS: 0xda, // Start of Scan (image data follows)
  APP1: 0xe1, // EXIF, XMP
} as const;

/**
 * JPEG segment header: marker byte plus the payload range (after the
 * 2-byte length field)
 */
export interface JpegSegment {
  marker: number;
  start: number;
  end: number;
}

/**
 * Walk the marker segments that precede the entropy-coded scan.
 */
function parseSegments(data: Uint8Array): JpegSegment[] {
  if (!buffer.startsWith(data, FILE_SIGNATURES.JPEG)) {
    throw new CorruptedFileError('Invalid JPEG: missing SOI marker');
  }

  const segments: JpegSegment[] = [];
  let offset = 2; // Skip SOI

  while (offset < data.length - 1) {
    if (data[offset] !== 0xff) {
      throw new CorruptedFileError('Invalid JPEG: expected marker', offset);
    }

    // Skip fill bytes
    while (offset < data.length && data[offset] === 0xff) {
      offset++;
    }
    if (offset >= data.length) break;

    const marker = data[offset]!;
    offset++;

    if (marker === MARKERS.EOI || marker === MARKERS.SOS) break;

    // RST markers and TEM carry no length
    if ((marker >= 0xd0 && marker <= 0xd7) || marker === 0x01) continue;

    const length = dataview.readUint16BE(data, offset);
    if (length < 2) {
      throw new CorruptedFileError('Invalid JPEG: segment length too small', offset);
    }
    const end = offset + length;
    if (end > data.length) {
      throw new CorruptedFileError('Invalid JPEG: segment extends beyond file', offset);
    }

    segments.push({ marker, start: offset + 2, end });
    offset = end;
  }

  return segments;
}

/**
 * Return the TIFF-structured EXIF block of the first `Exif\0\0` APP1 segment.
 */
function findExif(data: Uint8Array): Uint8Array | undefined {
  for (const segment of parseSegments(data)) {
    if (segment.marker !== MARKERS.APP1) continue;
    if (buffer.matchesAt(data, segment.start, FILE_SIGNATURES.EXIF_HEADER)) {
      return data.subarray(segment.start + FILE_SIGNATURES.EXIF_HEADER.length, segment.end);
    }
  }
  return undefined;
}

export const jpeg = {
  parseSegments,
  findExif,
};

export default jpeg;
