import { describe, it, expect } from 'vitest';
import { bmp } from '../../src/formats/bmp.js';
import { CorruptedFileError } from '../../src/errors.js';
import { buildBmp24 } from '../helpers/images.js';
import type { RasterImage } from '../../src/types.js';

/** 3x2 image, odd width so rows carry padding */
const image: RasterImage = {
  width: 3,
  height: 2,
  channels: 3,
  data: new Uint8Array([
    255, 0, 0,    0, 255, 0,    0, 0, 255,
    10, 20, 30,   40, 50, 60,   70, 80, 90,
  ]),
};

function bmp32(alpha: boolean): Uint8Array {
  // 1x1, BITFIELDS with a 56-byte DIB header
  const dib = 56;
  const pixelOffset = 14 + dib;
  const out = new Uint8Array(pixelOffset + 4);
  const view = new DataView(out.buffer);
  out.set([0x42, 0x4d], 0);
  view.setUint32(2, out.length, true);
  view.setUint32(10, pixelOffset, true);
  view.setUint32(14, dib, true);
  view.setInt32(18, 1, true);
  view.setInt32(22, 1, true);
  view.setUint16(26, 1, true);
  view.setUint16(28, 32, true);
  view.setUint32(30, 3, true);
  view.setUint32(54, 0x00ff0000, true);
  view.setUint32(58, 0x0000ff00, true);
  view.setUint32(62, 0x000000ff, true);
  view.setUint32(66, alpha ? 0xff000000 : 0, true);
  out.set([30, 20, 10, 128], pixelOffset); // BGRA
  return out;
}

describe('bmp.decode', () => {
  it('should decode a bottom-up 24-bit BMP', () => {
    const decoded = bmp.decode(buildBmp24(image));
    expect(decoded).toMatchObject({ width: 3, height: 2, channels: 3 });
    expect(Array.from(decoded.data)).toEqual(Array.from(image.data));
  });

  it('should decode a top-down 24-bit BMP', () => {
    expect(Array.from(bmp.decode(buildBmp24(image, true)).data)).toEqual(Array.from(image.data));
  });

  it('should keep alpha from a 32-bit BMP with an alpha mask', () => {
    const decoded = bmp.decode(bmp32(true));
    expect(decoded.channels).toBe(4);
    expect(Array.from(decoded.data)).toEqual([10, 20, 30, 128]);
  });

  it('should drop the fourth byte when there is no alpha mask', () => {
    const decoded = bmp.decode(bmp32(false));
    expect(decoded.channels).toBe(3);
    expect(Array.from(decoded.data)).toEqual([10, 20, 30]);
  });

  it('should reject truncated pixel data', () => {
    const data = buildBmp24(image);
    expect(() => bmp.decode(data.subarray(0, data.length - 1))).toThrow(CorruptedFileError);
  });

  it('should reject unsupported bit depths', () => {
    const data = buildBmp24(image);
    new DataView(data.buffer).setUint16(28, 8, true);
    expect(() => bmp.decode(data)).toThrow('Unsupported BMP bit depth 8 at offset 28');
  });
});

describe('bmp.parseHeader', () => {
  it('should report the dimensions and row order', () => {
    expect(bmp.parseHeader(buildBmp24(image, true))).toEqual({
      pixelOffset: 54,
      width: 3,
      height: 2,
      topDown: true,
      bitsPerPixel: 24,
      hasAlpha: false,
    });
  });

  it('should reject data without the BM signature', () => {
    expect(() => bmp.parseHeader(new Uint8Array(40))).toThrow('Invalid BMP: missing BM signature');
  });
});
