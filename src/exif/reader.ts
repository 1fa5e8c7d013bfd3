/**
 * Low-level EXIF / TIFF IFD reader.
 *
 * Reads a raw TIFF-formatted block (starting with the II/MM byte-order mark)
 * as found in a JPEG APP1 segment, a PNG eXIf chunk, a WebP EXIF chunk or a
 * TIFF file header, and pulls out the capture-date tags.
 */

import * as buffer from '../binary/buffer.js';
import * as dataview from '../binary/dataview.js';
import type { CaptureDateTags } from '../types.js';

// ─── Tags ────────────────────────────────────────────────────────────────────

export const TAGS = {
  DATE_TIME: 306,
  EXIF_IFD_POINTER: 34665,
  DATE_TIME_ORIGINAL: 36867,
  DATE_TIME_DIGITIZED: 36868,
} as const;

// ─── Type sizes ──────────────────────────────────────────────────────────────

const TYPE_SIZES: Record<number, number> = {
  1: 1,  // BYTE
  2: 1,  // ASCII
  3: 2,  // SHORT
  4: 4,  // LONG
  5: 8,  // RATIONAL
  7: 1,  // UNDEFINED
  9: 4,  // SLONG
  10: 8, // SRATIONAL
};

// ─── Raw IFD entry ────────────────────────────────────────────────────────────

export interface IfdEntry {
  tag: number;
  type: number;
  count: number;
  /** Absolute offset of the value bytes inside the block */
  valueOffset: number;
}

function readAscii(data: Uint8Array, offset: number, count: number): string {
  let s = '';
  for (let i = 0; i < count && offset + i < data.length; i++) {
    const ch = data[offset + i]!;
    if (ch === 0) break;
    s += String.fromCharCode(ch);
  }
  return s.trim();
}

// ─── IFD parser ──────────────────────────────────────────────────────────────

/**
 * Parse all entries of one IFD. Values of four bytes or less live inline in
 * the entry, so `valueOffset` points at the entry's value field for those.
 */
export function parseIfd(data: Uint8Array, offset: number, le: boolean): IfdEntry[] {
  const entries: IfdEntry[] = [];
  if (offset < 8 || offset + 2 > data.length) return entries;

  const numEntries = dataview.readUint16(data, offset, le);
  if (numEntries > 512) return entries;

  for (let i = 0; i < numEntries; i++) {
    const pos = offset + 2 + i * 12;
    if (pos + 12 > data.length) break;
    const type = dataview.readUint16(data, pos + 2, le);
    const count = dataview.readUint32(data, pos + 4, le);
    const size = (TYPE_SIZES[type] ?? 1) * count;
    entries.push({
      tag: dataview.readUint16(data, pos, le),
      type,
      count,
      valueOffset: size <= 4 ? pos + 8 : dataview.readUint32(data, pos + 8, le),
    });
  }

  return entries;
}

/**
 * Read a tag's value as a string (ASCII/UNDEFINED) or number (SHORT/LONG).
 */
export function readEntryValue(data: Uint8Array, entry: IfdEntry, le: boolean): string | number | null {
  switch (entry.type) {
    case 2 /* ASCII */:
    case 7 /* UNDEFINED */:
      return readAscii(data, entry.valueOffset, entry.count);
    case 3 /* SHORT */:
      return dataview.readUint16(data, entry.valueOffset, le);
    case 4 /* LONG */:
      return dataview.readUint32(data, entry.valueOffset, le);
    default:
      return null;
  }
}

/**
 * Parse an IFD into a tag→value Map.
 */
export function parseIfdValues(data: Uint8Array, ifdOffset: number, le: boolean): Map<number, string | number> {
  const map = new Map<number, string | number>();
  for (const entry of parseIfd(data, ifdOffset, le)) {
    const val = readEntryValue(data, entry, le);
    if (val !== null) map.set(entry.tag, val);
  }
  return map;
}

// ─── Main entry point ────────────────────────────────────────────────────────

/**
 * Read DateTime (IFD0) and DateTimeOriginal / DateTimeDigitized (Exif IFD)
 * from a TIFF-structured block. Malformed data yields whatever was readable.
 */
export function readCaptureDateTags(exifData: Uint8Array): CaptureDateTags {
  const out: CaptureDateTags = {};
  if (exifData.length < 8) return out;

  try {
    const byteOrder = buffer.toAscii(exifData, 0, 2);
    if (byteOrder !== 'II' && byteOrder !== 'MM') return out;
    const le = byteOrder === 'II';
    if (dataview.readUint16(exifData, 2, le) !== 42) return out; // TIFF magic

    const ifd0 = parseIfdValues(exifData, dataview.readUint32(exifData, 4, le), le);
    const str = (tags: Map<number, string | number>, tag: number) => {
      const v = tags.get(tag);
      return typeof v === 'string' && v.length > 0 ? v : undefined;
    };

    const dt = str(ifd0, TAGS.DATE_TIME);
    if (dt) out.dateTime = dt;

    const exifPtr = ifd0.get(TAGS.EXIF_IFD_POINTER);
    if (typeof exifPtr === 'number') {
      const exif = parseIfdValues(exifData, exifPtr, le);
      const dto = str(exif, TAGS.DATE_TIME_ORIGINAL);
      if (dto) out.dateTimeOriginal = dto;
      const dtd = str(exif, TAGS.DATE_TIME_DIGITIZED);
      if (dtd) out.dateTimeDigitized = dtd;
    }
  } catch {
    // Truncated IFDs: keep the tags read so far
    return out;
  }

  return out;
}
