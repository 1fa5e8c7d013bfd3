import { CorruptedFileError } from '../errors.js';
import * as buffer from '../binary/buffer.js';
import * as dataview from '../binary/dataview.js';
import { FILE_SIGNATURES } from '../signatures.js';
import type { RasterImage } from '../types.js';

/**
 * DIB compression values
 */
const BI_RGB = 0;
const BI_BITFIELDS = 3;

/**
 * Largest edge we are willing to allocate for
 */
const MAX_DIMENSION = 0x7fff;

interface BmpHeader {
  pixelOffset: number;
  width: number;
  height: number;
  topDown: boolean;
  bitsPerPixel: number;
  hasAlpha: boolean;
}

/**
 * Parse BITMAPFILEHEADER + the DIB header that follows it.
 */
function parseHeader(data: Uint8Array): BmpHeader {
  if (data.length < 26 || !buffer.startsWith(data, FILE_SIGNATURES.BMP)) {
    throw new CorruptedFileError('Invalid BMP: missing BM signature');
  }

  const pixelOffset = dataview.readUint32LE(data, 10);
  const dibSize = dataview.readUint32LE(data, 14);

  let width: number;
  let rawHeight: number;
  let bitsPerPixel: number;
  let compression = BI_RGB;

  if (dibSize === 12) {
    // BITMAPCOREHEADER
    width = dataview.readUint16LE(data, 18);
    rawHeight = dataview.readUint16LE(data, 20);
    bitsPerPixel = dataview.readUint16LE(data, 24);
  } else if (dibSize >= 40) {
    width = dataview.readInt32LE(data, 18);
    rawHeight = dataview.readInt32LE(data, 22);
    bitsPerPixel = dataview.readUint16LE(data, 28);
    compression = dataview.readUint32LE(data, 30);
  } else {
    throw new CorruptedFileError(`Invalid BMP: unknown DIB header size ${dibSize}`, 14);
  }

  const height = Math.abs(rawHeight);
  if (width <= 0 || height === 0 || width > MAX_DIMENSION || height > MAX_DIMENSION) {
    throw new CorruptedFileError(`Invalid BMP: bad dimensions ${width}x${rawHeight}`, 18);
  }
  if (bitsPerPixel !== 24 && bitsPerPixel !== 32) {
    throw new CorruptedFileError(`Unsupported BMP bit depth ${bitsPerPixel}`, 28);
  }

  let hasAlpha = false;
  if (compression === BI_BITFIELDS && bitsPerPixel === 32) {
    // Masks follow a 40-byte header, or live inside V4/V5 headers
    const maskOffset = 14 + 40;
    const red = dataview.readUint32LE(data, maskOffset);
    const green = dataview.readUint32LE(data, maskOffset + 4);
    const blue = dataview.readUint32LE(data, maskOffset + 8);
    if (red !== 0x00ff0000 || green !== 0x0000ff00 || blue !== 0x000000ff) {
      throw new CorruptedFileError('Unsupported BMP channel masks', maskOffset);
    }
    hasAlpha = dibSize >= 56 && dataview.readUint32LE(data, maskOffset + 12) === 0xff000000;
  } else if (compression !== BI_RGB) {
    throw new CorruptedFileError(`Unsupported BMP compression ${compression}`, 30);
  }

  return { pixelOffset, width, height, topDown: rawHeight < 0, bitsPerPixel, hasAlpha };
}

/**
 * Decode an uncompressed 24/32-bit BMP into RGB or RGBA pixels.
 */
function decode(data: Uint8Array): RasterImage {
  const header = parseHeader(data);
  const { width, height, bitsPerPixel } = header;
  const bytesPerPixel = bitsPerPixel / 8;
  const stride = Math.ceil((bitsPerPixel * width) / 32) * 4;

  if (header.pixelOffset + stride * height > data.length) {
    throw new CorruptedFileError('Invalid BMP: pixel data truncated', header.pixelOffset);
  }

  const channels = header.hasAlpha ? 4 : 3;
  const out = new Uint8Array(width * height * channels);

  for (let row = 0; row < height; row++) {
    const srcRow = header.topDown ? row : height - 1 - row;
    let src = header.pixelOffset + srcRow * stride;
    let dst = row * width * channels;
    for (let col = 0; col < width; col++) {
      out[dst] = data[src + 2]!;
      out[dst + 1] = data[src + 1]!;
      out[dst + 2] = data[src]!;
      if (channels === 4) out[dst + 3] = data[src + 3]!;
      src += bytesPerPixel;
      dst += channels;
    }
  }

  return { width, height, channels, data: out };
}

export const bmp = {
  parseHeader,
  decode,
};

export default bmp;
