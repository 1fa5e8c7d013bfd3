import { InvalidColorError } from '../errors.js';
import type { Rgb } from '../raster/composite.js';

export const WHITE: Rgb = [255, 255, 255];
export const BLACK: Rgb = [0, 0, 0];

const NAMED_COLORS: Record<string, Rgb> = {
  white: [255, 255, 255],
  black: [0, 0, 0],
  red: [255, 0, 0],
  lime: [0, 255, 0],
  green: [0, 128, 0],
  blue: [0, 0, 255],
  yellow: [255, 255, 0],
  cyan: [0, 255, 255],
  aqua: [0, 255, 255],
  magenta: [255, 0, 255],
  fuchsia: [255, 0, 255],
  gray: [128, 128, 128],
  grey: [128, 128, 128],
  silver: [192, 192, 192],
  orange: [255, 165, 0],
  purple: [128, 0, 128],
  navy: [0, 0, 128],
  maroon: [128, 0, 0],
  olive: [128, 128, 0],
  teal: [0, 128, 128],
};

/**
 * Parse `#RGB`, `#RRGGBB`, `rgb(r, g, b)` or a basic colour name.
 *
 * @throws InvalidColorError
 */
export function parseColor(value: string): Rgb {
  const s = value.trim().toLowerCase();

  const named = NAMED_COLORS[s];
  if (named) return named;

  let hex = /^#([0-9a-f]{3}|[0-9a-f]{6})$/.exec(s)?.[1];
  if (hex) {
    if (hex.length === 3) hex = hex.split('').map(c => c + c).join('');
    return [
      parseInt(hex.slice(0, 2), 16),
      parseInt(hex.slice(2, 4), 16),
      parseInt(hex.slice(4, 6), 16),
    ];
  }

  const fn = /^rgb\(\s*(\d{1,3})\s*,\s*(\d{1,3})\s*,\s*(\d{1,3})\s*\)$/.exec(s);
  if (fn) {
    const rgb = [Number(fn[1]), Number(fn[2]), Number(fn[3])] as const;
    if (rgb.every(c => c <= 255)) return rgb;
  }

  throw new InvalidColorError(value);
}
