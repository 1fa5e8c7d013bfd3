export const clamp = (v: number, lo: number, hi: number) => Math.max(lo, Math.min(hi, v));

/**
 * Percent (0..100) to a 0..1 factor, clamped
 */
export const percentToUnit = (percent: number) => clamp(percent, 0, 100) / 100;
