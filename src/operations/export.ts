import { mkdir, readFile, writeFile } from 'node:fs/promises';
import { dirname } from 'node:path';
import { decodeImage, encodeImage } from '../raster/codec.js';
import { renderWatermark, type RenderDeps } from '../render/index.js';
import { DecodeError, WriteError, describeError } from '../errors.js';
import type { ExportOptions, PlacementRule, WatermarkSpec } from '../types.js';

/**
 * Decode one file, watermark it, encode per `options` and write the result
 * to `outputPath` (creating its directory).
 *
 * @throws DecodeError | EncodeError | WriteError
 */
export async function exportFile(
  sourcePath: string,
  outputPath: string,
  spec: WatermarkSpec,
  placement: PlacementRule,
  options: ExportOptions,
  deps: RenderDeps = {},
): Promise<void> {
  let bytes: Uint8Array;
  try {
    bytes = await readFile(sourcePath);
  } catch (err) {
    throw new DecodeError(`cannot read ${sourcePath}: ${describeError(err)}`);
  }

  const image = await decodeImage(bytes);
  const result = await renderWatermark(image, spec, placement, deps);
  const encoded = await encodeImage(result, {
    format: options.outputFormat,
    quality: options.jpegQuality,
  });

  try {
    await mkdir(dirname(outputPath), { recursive: true });
    await writeFile(outputPath, encoded);
  } catch (err) {
    throw new WriteError(outputPath, describeError(err));
  }
}
