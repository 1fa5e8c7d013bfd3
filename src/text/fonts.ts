/**
 * Font resolution as an ordered chain of providers. Each provider either
 * returns a handle the canvas can draw with, or passes.
 */

import { existsSync } from 'node:fs';
import { basename, dirname, join } from 'node:path';
import { fileURLToPath } from 'node:url';
import { GlobalFonts } from '@napi-rs/canvas';
import { FontResolutionError, describeError } from '../errors.js';
import { silentLogger, type Logger } from '../log.js';

export type FontSource = 'file' | 'named' | 'bundled' | 'system' | 'generic';

/**
 * A face the glyph rasterizer can draw with
 */
export interface FontHandle {
  /** Family name registered with the canvas font manager */
  readonly family: string;
  readonly source: FontSource;
}

export interface FontRequest {
  family?: string;
  /** Explicit .ttf/.otf path */
  path?: string;
}

export type FontProvider = (request: FontRequest) => FontHandle | undefined;

const BUNDLED_FONT = join(
  dirname(fileURLToPath(import.meta.url)),
  '..',
  '..',
  'assets',
  'fonts',
  'default.ttf',
);

const SYSTEM_FONT_PATHS: Partial<Record<NodeJS.Platform, string[]>> = {
  linux: [
    '/usr/share/fonts/truetype/dejavu/DejaVuSans.ttf',
    '/usr/share/fonts/dejavu/DejaVuSans.ttf',
    '/usr/share/fonts/truetype/liberation/LiberationSans-Regular.ttf',
  ],
  darwin: [
    '/System/Library/Fonts/Supplemental/Arial.ttf',
    '/Library/Fonts/Arial.ttf',
    '/System/Library/Fonts/Helvetica.ttc',
  ],
  win32: ['C:\\Windows\\Fonts\\arial.ttf', 'C:\\Windows\\Fonts\\segoeui.ttf'],
};

const registered = new Map<string, string>();

/**
 * Register a font file once; repeated calls return the same family alias.
 * Aliases carry a per-path sequence number, so two files sharing a base
 * name stay distinct families.
 *
 * @throws FontResolutionError when the file is missing or not a font
 */
export function registerFontFile(path: string, source: FontSource): FontHandle {
  const known = registered.get(path);
  if (known) return { family: known, source };

  if (!existsSync(path)) {
    throw new FontResolutionError(source, `no such file ${path}`);
  }
  const alias = `photomark-${registered.size + 1}-${basename(path).replace(/\.[^.]+$/, '')}`;
  if (!GlobalFonts.registerFromPath(path, alias)) {
    throw new FontResolutionError(source, `cannot load ${path}`);
  }
  registered.set(path, alias);
  return { family: alias, source };
}

export const fileFontProvider: FontProvider = request =>
  request.path ? registerFontFile(request.path, 'file') : undefined;

export const namedFontProvider: FontProvider = request => {
  if (!request.family) return undefined;
  if (!GlobalFonts.has(request.family)) {
    throw new FontResolutionError('named', `family "${request.family}" is not installed`);
  }
  return { family: request.family, source: 'named' };
};

export const bundledFontProvider: FontProvider = () =>
  existsSync(BUNDLED_FONT) ? registerFontFile(BUNDLED_FONT, 'bundled') : undefined;

/**
 * First known sans-serif font file present on this platform
 */
export function findSystemFontFile(platform: NodeJS.Platform = process.platform): string | undefined {
  return (SYSTEM_FONT_PATHS[platform] ?? []).find(p => existsSync(p));
}

export const systemFontProvider: FontProvider = () => {
  const path = findSystemFontFile();
  return path ? registerFontFile(path, 'system') : undefined;
};

/**
 * Last resort: the canvas' generic family. Always succeeds.
 */
export const genericFontProvider: FontProvider = () => ({ family: 'sans-serif', source: 'generic' });

export const DEFAULT_FONT_PROVIDERS: readonly FontProvider[] = [
  fileFontProvider,
  namedFontProvider,
  bundledFontProvider,
  systemFontProvider,
  genericFontProvider,
];

/**
 * Try each provider in order and return the first handle.
 * Provider failures are logged and skipped; when every provider passes the
 * generic family is used.
 */
export function resolveFont(
  request: FontRequest,
  providers: readonly FontProvider[] = DEFAULT_FONT_PROVIDERS,
  logger: Logger = silentLogger,
): FontHandle {
  for (const provider of providers) {
    try {
      const handle = provider(request);
      if (handle) return handle;
    } catch (err) {
      logger.warn(`${describeError(err)}; trying next font`);
    }
  }
  return { family: 'sans-serif', source: 'generic' };
}

/**
 * CSS font shorthand for a handle at a pixel size
 */
export function fontShorthand(font: FontHandle, sizePx: number, bold = false, italic = false): string {
  const style = italic ? 'italic ' : '';
  const weight = bold ? 'bold ' : '';
  const family = font.source === 'generic' ? font.family : `"${font.family}"`;
  return `${style}${weight}${sizePx}px ${family}`;
}
