import { CorruptedFileError } from '../errors.js';
import * as buffer from '../binary/buffer.js';
import * as dataview from '../binary/dataview.js';
import { FILE_SIGNATURES } from '../signatures.js';

export interface WebpChunk {
  fourcc: string;
  start: number;
  end: number;
}

/**
 * Parse the RIFF chunks of a WebP file
 */
function parseChunks(data: Uint8Array): WebpChunk[] {
  if (
    data.length < 12 ||
    !buffer.startsWith(data, FILE_SIGNATURES.RIFF) ||
    !buffer.matchesAt(data, 8, FILE_SIGNATURES.WEBP)
  ) {
    throw new CorruptedFileError('Invalid WebP: missing RIFF/WEBP header');
  }

  const fileSize = dataview.readUint32LE(data, 4) + 8;
  const chunks: WebpChunk[] = [];
  let offset = 12;

  while (offset + 8 <= data.length && offset < fileSize) {
    const fourcc = buffer.toAscii(data, offset, 4);
    const size = dataview.readUint32LE(data, offset + 4);
    const start = offset + 8;
    if (start + size > data.length) {
      throw new CorruptedFileError(`Invalid WebP: truncated ${fourcc} chunk`, offset);
    }
    chunks.push({ fourcc, start, end: start + size });
    // Chunks are padded to even bytes
    offset = start + size + (size % 2);
  }

  return chunks;
}

/**
 * Some encoders prefix the EXIF chunk with `Exif\0\0`; strip it when present.
 */
function findExif(data: Uint8Array): Uint8Array | undefined {
  const chunk = parseChunks(data).find(c => c.fourcc === 'EXIF');
  if (!chunk) return undefined;
  const block = data.subarray(chunk.start, chunk.end);
  return buffer.startsWith(block, FILE_SIGNATURES.EXIF_HEADER)
    ? block.subarray(FILE_SIGNATURES.EXIF_HEADER.length)
    : block;
}

export const webp = {
  parseChunks,
  findExif,
};

export default webp;
