import { describe, it, expect, vi } from 'vitest';
import { anchorPosition, resolvePlacement, DEFAULT_MARGIN_PX } from '../../src/geometry/placement.js';
import type { CustomPlacement } from '../../src/types.js';

const image = { width: 800, height: 600 };
const mark = { width: 100, height: 40 };

function custom(overrides: Partial<CustomPlacement> = {}): CustomPlacement {
  return {
    kind: 'custom',
    previewX: 100,
    previewY: 75,
    previewCanvasWidth: 400,
    previewCanvasHeight: 300,
    ...overrides,
  };
}

describe('anchorPosition', () => {
  it('should place each preset anchor', () => {
    expect(anchorPosition('top-left', image, mark, 12)).toEqual({ x: 12, y: 12 });
    expect(anchorPosition('top-right', image, mark, 12)).toEqual({ x: 688, y: 12 });
    expect(anchorPosition('bottom-left', image, mark, 12)).toEqual({ x: 12, y: 548 });
    expect(anchorPosition('bottom-right', image, mark, 12)).toEqual({ x: 688, y: 548 });
  });

  it('should floor the centre position and ignore the margin', () => {
    expect(anchorPosition('center', image, mark, 50)).toEqual({ x: 350, y: 280 });
    expect(anchorPosition('center', { width: 101, height: 51 }, { width: 10, height: 10 }, 0)).toEqual({
      x: 45,
      y: 20,
    });
  });

  it('should not clamp an oversize watermark', () => {
    expect(anchorPosition('bottom-right', { width: 50, height: 50 }, mark, 12)).toEqual({ x: -62, y: -2 });
  });
});

describe('resolvePlacement', () => {
  it('should use the preset formula for preset rules', () => {
    expect(resolvePlacement({ kind: 'preset', anchor: 'bottom-right', marginPx: 12 }, image, mark)).toEqual({
      x: 688,
      y: 548,
    });
  });

  it('should map a custom point from preview to full resolution', () => {
    expect(resolvePlacement(custom(), image, mark)).toEqual({ x: 200, y: 150 });
  });

  it('should clamp a custom point so the watermark stays inside', () => {
    expect(resolvePlacement(custom({ previewX: 390, previewY: 290 }), image, mark)).toEqual({ x: 700, y: 560 });
    expect(resolvePlacement(custom({ previewX: -10, previewY: -5 }), image, mark)).toEqual({ x: 0, y: 0 });
  });

  it('should pin an oversize watermark to the origin', () => {
    expect(resolvePlacement(custom(), image, { width: 900, height: 700 })).toEqual({ x: 0, y: 0 });
  });

  it('should fall back to bottom-right when the canvas has no area', () => {
    const onFallback = vi.fn();
    const at = resolvePlacement(custom({ previewCanvasWidth: 0 }), image, mark, { onFallback });
    expect(at).toEqual({ x: 688, y: 548 });
    expect(onFallback).toHaveBeenCalledTimes(1);
    expect(onFallback).toHaveBeenCalledWith('Invalid preview canvas size 0x300');
  });

  it('should fall back with the rule margin when it has one', () => {
    expect(resolvePlacement(custom({ previewCanvasHeight: -4, marginPx: 20 }), image, mark)).toEqual({
      x: 680,
      y: 540,
    });
  });

  it('should fall back when the point is not finite', () => {
    const onFallback = vi.fn();
    expect(resolvePlacement(custom({ previewX: Number.NaN }), image, mark, { onFallback })).toEqual({
      x: 800 - 100 - DEFAULT_MARGIN_PX,
      y: 600 - 40 - DEFAULT_MARGIN_PX,
    });
    expect(onFallback).toHaveBeenCalledWith('preview point (NaN, 75) is not finite');
  });
});
