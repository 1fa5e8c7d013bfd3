import { CorruptedFileError } from '../errors.js';
import * as buffer from '../binary/buffer.js';
import * as dataview from '../binary/dataview.js';
import { FILE_SIGNATURES } from '../signatures.js';

/**
 * PNG chunk view: type plus the payload range
 */
export interface PngChunk {
  type: string;
  start: number;
  end: number;
}

/**
 * Parse PNG into chunks
 */
function parseChunks(data: Uint8Array): PngChunk[] {
  if (!buffer.startsWith(data, FILE_SIGNATURES.PNG)) {
    throw new CorruptedFileError('Invalid PNG: missing PNG signature');
  }

  const chunks: PngChunk[] = [];
  let offset = 8; // Skip signature

  while (offset + 8 <= data.length) {
    const length = dataview.readUint32BE(data, offset);
    const type = buffer.toAscii(data, offset + 4, 4);
    const start = offset + 8;
    const end = start + length;

    if (end + 4 > data.length) {
      // Truncated trailing ancillary data after the image is tolerated
      if (chunks.some(c => c.type === 'IDAT')) break;
      throw new CorruptedFileError(`Invalid PNG: truncated ${type} chunk`, offset);
    }

    chunks.push({ type, start, end });
    offset = end + 4; // payload + CRC

    if (type === 'IEND') break;
  }

  return chunks;
}

/**
 * PNG eXIf chunks contain a raw TIFF-formatted EXIF block (II/MM header).
 */
function findExif(data: Uint8Array): Uint8Array | undefined {
  const chunk = parseChunks(data).find(c => c.type === 'eXIf');
  return chunk ? data.subarray(chunk.start, chunk.end) : undefined;
}

export const png = {
  parseChunks,
  findExif,
};

export default png;
