/**
 * photomark CLI: stamp each photo's EXIF capture date onto the image.
 *
 *  • Single file or a directory's direct entries
 *  • Output to a `<dir>_watermark` folder beside the source directory
 *  • Files without a capture date are skipped, never modified
 */

import { readFileSync } from 'node:fs';
import { mkdir, stat } from 'node:fs/promises';
import { fileURLToPath } from 'node:url';
import { dirname, join } from 'node:path';
import {
  dateStampInputs,
  dateStampOutputDir,
  stampCaptureDate,
} from './operations/date-stamp.js';
import { parseDateStampOptions, type DateStampOptions } from './config.js';
import { ConfigError, describeError } from './errors.js';
import { consoleLogger, silentLogger } from './log.js';

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

// ─── Helpers ──────────────────────────────────────────────────────────────────

function getVersion(): string {
  const pkgPath = join(__dirname, '..', 'package.json');
  const pkg = JSON.parse(readFileSync(pkgPath, 'utf-8')) as { version: string };
  return pkg.version;
}

async function pathExists(path: string): Promise<boolean> {
  try {
    await stat(path);
    return true;
  } catch {
    return false;
  }
}

// ─── Help text ────────────────────────────────────────────────────────────────

const HELP = `
photomark <input_path> [options]

Stamp the EXIF capture date (YYYY-MM-DD) onto photos.
Results go to <dir>_watermark next to the source directory.

OPTIONS
  --font-size <px>            Text size in pixels (default: 36)
  --color <color>             #RGB, #RRGGBB, rgb(r,g,b) or a name (default: #FFFFFF)
  --position <pos>            tl | tr | bl | br | center (default: br)
  --margin <px>               Distance from the image edge (default: 12)
  --font <file>               TrueType/OpenType font file
  -q, --quiet                 Only print errors
  -h, --help                  Show this help
  -v, --version               Show version
`.trim();

// ─── Argument parser ──────────────────────────────────────────────────────────

interface CliArgs {
  inputPath?: string;
  quiet: boolean;
  help: boolean;
  version: boolean;
  /** Raw option values, validated by parseDateStampOptions */
  options: Record<string, string | number>;
}

function toInteger(flag: string, value: string): number {
  const n = Number(value);
  if (!Number.isInteger(n)) {
    throw new ConfigError('options', [`${flag} must be an integer, got "${value}"`]);
  }
  return n;
}

export function parseArgs(raw: readonly string[]): CliArgs {
  const args: CliArgs = { quiet: false, help: false, version: false, options: {} };

  const take = (i: number, flag: string): [number, string] => {
    const val = raw[i + 1];
    if (val === undefined || (val.startsWith('-') && val.length > 1)) {
      throw new ConfigError('options', [`${flag} requires a value`]);
    }
    return [i + 1, val];
  };

  for (let i = 0; i < raw.length; i++) {
    const a = raw[i]!;
    switch (a) {
      case '-h': case '--help':    args.help = true; break;
      case '-v': case '--version': args.version = true; break;
      case '-q': case '--quiet':   args.quiet = true; break;

      case '--font-size': {
        const [ni, v] = take(i, a); i = ni; args.options['fontSize'] = toInteger(a, v); break;
      }
      case '--margin': {
        const [ni, v] = take(i, a); i = ni; args.options['margin'] = toInteger(a, v); break;
      }
      case '--color': {
        const [ni, v] = take(i, a); i = ni; args.options['color'] = v; break;
      }
      case '--position': {
        const [ni, v] = take(i, a); i = ni; args.options['position'] = v; break;
      }
      case '--font': {
        const [ni, v] = take(i, a); i = ni; args.options['font'] = v; break;
      }

      default:
        if (a.startsWith('-')) {
          throw new ConfigError('options', [`unknown option ${a}`]);
        }
        if (args.inputPath !== undefined) {
          throw new ConfigError('options', [`unexpected argument ${a}`]);
        }
        args.inputPath = a;
    }
  }

  return args;
}

// ─── Main ─────────────────────────────────────────────────────────────────────

/**
 * Run the CLI and resolve to its exit code.
 */
export async function main(argv: readonly string[]): Promise<number> {
  let args: CliArgs;
  let options: DateStampOptions;
  try {
    args = parseArgs(argv);
    if (args.help) {
      console.log(HELP);
      return 0;
    }
    if (args.version) {
      console.log(getVersion());
      return 0;
    }
    options = parseDateStampOptions(args.options);
  } catch (err) {
    console.error(`Error: ${describeError(err)}`);
    return 1;
  }

  const inputPath = args.inputPath;
  if (inputPath === undefined) {
    console.error(HELP);
    return 1;
  }
  if (!(await pathExists(inputPath))) {
    console.error(`Input path does not exist: ${inputPath}`);
    return 1;
  }

  const files = await dateStampInputs(inputPath);
  if (files.length === 0) {
    console.error('No supported image files found.');
    return 1;
  }

  const outDir = await dateStampOutputDir(inputPath);
  await mkdir(outDir, { recursive: true });

  const logger = args.quiet ? silentLogger : consoleLogger;
  let stamped = 0;

  for (const file of files) {
    const result = await stampCaptureDate(file, outDir, options, { logger });
    switch (result.status) {
      case 'ok':
        stamped++;
        if (!args.quiet) console.log(`[OK] ${result.source} -> ${result.output}`);
        break;
      case 'skipped':
        if (!args.quiet) console.log(`[SKIP] ${result.reason}`);
        break;
      case 'error':
        console.error(`[ERROR] Failed to process ${result.source}: ${result.reason}`);
        break;
    }
  }

  if (!args.quiet) console.log(`\n  ${stamped} of ${files.length} file(s) written to ${outDir}`);
  return 0;
}
