import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import { copyFile, mkdir } from 'node:fs/promises';
import { join } from 'node:path';
import { GlobalFonts } from '@napi-rs/canvas';
import { canvasRasterizer } from '../../src/text/rasterizer.js';
import {
  bundledFontProvider,
  findSystemFontFile,
  registerFontFile,
  resolveFont,
  systemFontProvider,
  type FontHandle,
} from '../../src/text/fonts.js';
import { renderTextWatermark } from '../../src/render/text.js';
import { createRaster } from '../../src/raster/raster.js';
import type { CoverageMask } from '../../src/raster/composite.js';
import { makeTempDir, removeDir } from '../helpers/images.js';

const regular = { sizePx: 24, bold: false, italic: false };
const systemFont = findSystemFontFile();

function inked(mask: CoverageMask): number {
  return mask.coverage.reduce((n, c) => n + (c > 0 ? 1 : 0), 0);
}

describe('canvasRasterizer', () => {
  let font: FontHandle;

  beforeAll(() => {
    font = resolveFont({});
  });

  it('should draw a mask cropped to the ink', () => {
    const mask = canvasRasterizer.rasterize('2023-11-05', font, regular);
    expect(mask.width).toBeGreaterThan(0);
    expect(mask.height).toBeGreaterThan(0);
    expect(mask.height).toBeLessThanOrEqual(48);
    expect(mask.coverage.length).toBe(mask.width * mask.height);
    expect(inked(mask)).toBeGreaterThan(0);
  });

  it('should grow wider with longer text', () => {
    const short = canvasRasterizer.rasterize('2023', font, regular);
    const long = canvasRasterizer.rasterize('2023-11-05', font, regular);
    expect(long.width).toBeGreaterThan(short.width);
  });

  it('should grow taller with the font size', () => {
    const small = canvasRasterizer.rasterize('2023-11-05', font, regular);
    const large = canvasRasterizer.rasterize('2023-11-05', font, { ...regular, sizePx: 48 });
    expect(large.height).toBeGreaterThan(small.height);
  });

  it('should return an empty mask for empty text', () => {
    const mask = canvasRasterizer.rasterize('', font, regular);
    expect(mask).toMatchObject({ width: 0, height: 0 });
    expect(mask.coverage.length).toBe(0);
  });

  it('should draw bold italic text', () => {
    const mask = canvasRasterizer.rasterize('2023-11-05', font, { sizePx: 24, bold: true, italic: true });
    expect(inked(mask)).toBeGreaterThan(0);
  });
});

describe('renderTextWatermark with the default dependencies', () => {
  it('should paint the text onto the photo', () => {
    const base = createRaster(240, 80, 3, [0, 0, 0]);
    const out = renderTextWatermark(
      base,
      {
        kind: 'text',
        content: '2023-11-05',
        fontFamily: '',
        fontSizePx: 24,
        bold: false,
        italic: false,
        color: '#FFFFFF',
        opacityPercent: 100,
        shadowEnabled: false,
      },
      { kind: 'preset', anchor: 'top-left', marginPx: 4 },
    );

    let changed = 0;
    for (let i = 0; i < out.data.length; i++) if (out.data[i] !== 0) changed++;
    expect(out.channels).toBe(3);
    expect(changed).toBeGreaterThan(0);
    // nothing above or left of the margin
    for (let x = 0; x < 240; x++) expect(out.data[x * 3]).toBe(0);
  });
});

describe('font file providers', () => {
  let dir: string;

  beforeAll(async () => {
    dir = await makeTempDir();
  });

  afterAll(async () => {
    await removeDir(dir);
  });

  it('should pass when no bundled font ships', () => {
    expect(bundledFontProvider({})).toBeUndefined();
  });

  it.skipIf(systemFont === undefined)('should register the platform font', () => {
    const handle = systemFontProvider({});
    expect(handle?.source).toBe('system');
    expect(handle && GlobalFonts.has(handle.family)).toBe(true);
  });

  it.skipIf(systemFont === undefined)('should keep same-named files apart', async () => {
    if (systemFont === undefined) return;
    const first = join(dir, 'one', 'default.ttf');
    const second = join(dir, 'two', 'default.ttf');
    await mkdir(join(dir, 'one'));
    await mkdir(join(dir, 'two'));
    await copyFile(systemFont, first);
    await copyFile(systemFont, second);

    const a = registerFontFile(first, 'file');
    const b = registerFontFile(second, 'file');
    expect(a.family).toMatch(/^photomark-\d+-default$/);
    expect(b.family).toMatch(/^photomark-\d+-default$/);
    expect(a.family).not.toBe(b.family);
    expect(registerFontFile(first, 'file')).toEqual(a);
  });
});
