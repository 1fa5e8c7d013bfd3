import { readdir } from 'node:fs/promises';
import { dirname, extname, join, resolve } from 'node:path';
import { SUPPORTED_EXTENSIONS } from '../detect.js';

export interface CollectOptions {
  /** Descend into sub-directories (default: false) */
  recursive?: boolean;
  /** Lower-case extensions with leading dot */
  extensions?: ReadonlySet<string>;
}

/**
 * List image files under a directory, sorted by path.
 */
export async function collectImageFiles(dir: string, options: CollectOptions = {}): Promise<string[]> {
  const extensions = options.extensions ?? SUPPORTED_EXTENSIONS;
  const results: string[] = [];
  const entries = await readdir(dir, { withFileTypes: true });

  for (const entry of entries) {
    const fullPath = join(dir, entry.name);
    if (entry.isDirectory()) {
      if (options.recursive) {
        results.push(...(await collectImageFiles(fullPath, options)));
      }
    } else if (entry.isFile() && extensions.has(extname(entry.name).toLowerCase())) {
      results.push(fullPath);
    }
  }

  return results.sort();
}

/**
 * Whether writing into `outputDir` would put results next to any of the
 * originals (and possibly overwrite them). Callers ask the user before
 * starting such a batch.
 */
export function sharesSourceDirectory(files: readonly string[], outputDir: string): boolean {
  const target = resolve(outputDir);
  return files.some(f => resolve(dirname(f)) === target);
}
