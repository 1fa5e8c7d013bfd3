import { locateExifBlock } from './locate.js';
import { readCaptureDateTags } from './reader.js';
import type { CaptureDateTags } from '../types.js';

export interface ExtractDateOptions {
  /**
   * Called when the normalised value does not parse as a calendar date.
   * The value is still returned.
   */
  onUnverified?: (value: string, tag: keyof CaptureDateTags) => void;
}

const PRIORITY: readonly (keyof CaptureDateTags)[] = [
  'dateTimeOriginal',
  'dateTimeDigitized',
  'dateTime',
];

/**
 * Strict `YYYY-MM-DD` check, including day-of-month range
 */
export function isCalendarDate(value: string): boolean {
  const m = /^(\d{4})-(\d{2})-(\d{2})$/.exec(value);
  if (!m) return false;
  const year = Number(m[1]);
  const month = Number(m[2]);
  const day = Number(m[3]);
  if (month < 1 || month > 12 || day < 1) return false;
  const daysInMonth = new Date(Date.UTC(year, month, 0)).getUTCDate();
  return day <= daysInMonth;
}

/**
 * Normalise the first present capture-date tag to `YYYY-MM-DD`.
 *
 * EXIF stores `YYYY:MM:DD HH:MM:SS`; the date token has its colons replaced
 * by hyphens. Values that already use hyphens pass through.
 */
export function extractExifDate(
  tags: CaptureDateTags,
  options: ExtractDateOptions = {},
): string | undefined {
  for (const tag of PRIORITY) {
    const token = tags[tag]?.trim().split(/\s+/)[0];
    if (!token) continue;

    const date = token.replace(/:/g, '-');
    if (!isCalendarDate(date)) options.onUnverified?.(date, tag);
    return date;
  }
  return undefined;
}

/**
 * Read the capture date straight from encoded image bytes.
 */
export function readExifDate(
  data: Uint8Array,
  options: ExtractDateOptions = {},
): string | undefined {
  const block = locateExifBlock(data);
  if (!block) return undefined;
  return extractExifDate(readCaptureDateTags(block), options);
}
