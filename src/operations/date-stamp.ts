/**
 * Stamp each photo's EXIF capture date onto it as text.
 */

import { mkdir, readFile, stat, writeFile } from 'node:fs/promises';
import { basename, dirname, extname, join, resolve } from 'node:path';
import { readExifDate } from '../exif/date.js';
import { decodeImage, encodeImage, type EncodeFormat } from '../raster/codec.js';
import { renderTextWatermark, type TextRenderDeps } from '../render/text.js';
import { collectImageFiles } from './files.js';
import { DATE_STAMP_EXTENSIONS } from '../detect.js';
import { MissingMetadataDateError, WriteError, describeError } from '../errors.js';
import { silentLogger } from '../log.js';
import type { DateStampOptions } from '../config.js';
import type { Anchor, PresetPlacement, TextWatermarkSpec } from '../types.js';

const POSITION_ANCHORS: Record<DateStampOptions['position'], Anchor> = {
  tl: 'top-left',
  tr: 'top-right',
  bl: 'bottom-left',
  br: 'bottom-right',
  center: 'center',
};

const EXTENSION_FORMATS: Record<string, EncodeFormat> = {
  '.jpg': 'jpeg',
  '.jpeg': 'jpeg',
  '.png': 'png',
  '.tif': 'tiff',
  '.tiff': 'tiff',
  '.webp': 'webp',
};

/** JPEG quality used when re-saving stamped photos */
export const DATE_STAMP_JPEG_QUALITY = 95;

export type DateStampResult =
  | { status: 'ok'; source: string; output: string; date: string }
  | { status: 'skipped'; source: string; reason: string }
  | { status: 'error'; source: string; reason: string };

/**
 * Output folder for an input path: `<dir>_watermark` beside the source
 * directory (for a file input, beside the file's directory).
 */
export async function dateStampOutputDir(inputPath: string): Promise<string> {
  const absolute = resolve(inputPath);
  const info = await stat(absolute);
  const sourceDir = info.isDirectory() ? absolute : dirname(absolute);
  return join(dirname(sourceDir), `${basename(sourceDir)}_watermark`);
}

/**
 * Input files for the CLI: the file itself, or the directory's direct
 * entries, filtered by extension.
 */
export async function dateStampInputs(inputPath: string): Promise<string[]> {
  const info = await stat(inputPath);
  if (info.isDirectory()) {
    return collectImageFiles(inputPath, { extensions: DATE_STAMP_EXTENSIONS });
  }
  return DATE_STAMP_EXTENSIONS.has(extname(inputPath).toLowerCase()) ? [inputPath] : [];
}

export function dateStampSpec(date: string, options: DateStampOptions): TextWatermarkSpec {
  return {
    kind: 'text',
    content: date,
    fontFamily: '',
    ...(options.font !== undefined && { fontPath: options.font }),
    fontSizePx: options.fontSize,
    bold: false,
    italic: false,
    color: options.color,
    opacityPercent: 100,
    shadowEnabled: true,
  };
}

export function dateStampPlacement(options: DateStampOptions): PresetPlacement {
  return { kind: 'preset', anchor: POSITION_ANCHORS[options.position], marginPx: options.margin };
}

/**
 * Stamp one file into `outDir` under its own name and format.
 * Never throws; files without a capture date are skipped.
 */
export async function stampCaptureDate(
  sourcePath: string,
  outDir: string,
  options: DateStampOptions,
  deps: TextRenderDeps = {},
): Promise<DateStampResult> {
  const logger = deps.logger ?? silentLogger;

  try {
    const bytes = await readFile(sourcePath);
    const date = readExifDate(bytes, {
      onUnverified: value => logger.warn(`Unverified EXIF date "${value}" in ${sourcePath}`),
    });
    if (!date) {
      return { status: 'skipped', source: sourcePath, reason: new MissingMetadataDateError(sourcePath).message };
    }

    const image = await decodeImage(bytes);
    const stamped = renderTextWatermark(image, dateStampSpec(date, options), dateStampPlacement(options), deps);

    const output = join(outDir, basename(sourcePath));
    const format = EXTENSION_FORMATS[extname(sourcePath).toLowerCase()] ?? 'png';
    const encoded = await encodeImage(stamped, { format, quality: DATE_STAMP_JPEG_QUALITY, chromaSubsampling: '4:2:0' });

    try {
      await mkdir(outDir, { recursive: true });
      await writeFile(output, encoded);
    } catch (err) {
      throw new WriteError(output, describeError(err));
    }

    return { status: 'ok', source: sourcePath, output, date };
  } catch (err) {
    return { status: 'error', source: sourcePath, reason: describeError(err) };
  }
}
