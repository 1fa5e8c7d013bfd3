import { basename, extname, join } from 'node:path';
import { extensionFor } from '../detect.js';
import type { ExportOptions } from '../types.js';

/**
 * Source file name without directory or extension
 */
export function fileStem(sourcePath: string): string {
  return basename(sourcePath, extname(sourcePath));
}

/**
 * Output file name for a source under the naming policy. The extension
 * always follows the output format, whatever the source's was.
 *
 * @example outputFileName('/in/photo.png', { outputFormat: 'jpeg', namingPolicy: { kind: 'prefix', prefix: 'wm_' } })
 * // 'wm_photo.jpg'
 */
export function outputFileName(
  sourcePath: string,
  options: Pick<ExportOptions, 'outputFormat' | 'namingPolicy'>,
): string {
  const stem = fileStem(sourcePath);
  const ext = extensionFor(options.outputFormat);
  const policy = options.namingPolicy;

  switch (policy.kind) {
    case 'keep':   return `${stem}${ext}`;
    case 'prefix': return `${policy.prefix}${stem}${ext}`;
    case 'suffix': return `${stem}${policy.suffix}${ext}`;
  }
}

export function outputPathFor(
  sourcePath: string,
  outputDir: string,
  options: Pick<ExportOptions, 'outputFormat' | 'namingPolicy'>,
): string {
  return join(outputDir, outputFileName(sourcePath, options));
}
