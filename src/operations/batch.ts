/**
 * Batch export for Node.js environments.
 *
 * runBatch() plans every output name up front, then watermarks the files on
 * a bounded pool of async workers. One file's failure never stops the
 * others; the result lists successes and failures in input order.
 */

import { resolve } from 'node:path';
import { exportFile } from './export.js';
import { outputPathFor } from './naming.js';
import { describeError } from '../errors.js';
import { silentLogger, type Logger } from '../log.js';
import type { RenderDeps } from '../render/index.js';
import type {
  BatchFailure,
  BatchProgress,
  BatchResult,
  ExportOptions,
  PlacementRule,
  WatermarkSpec,
} from '../types.js';

export interface BatchOptions extends RenderDeps {
  /** Directory that receives every output file */
  outputDir: string;
  /** Max files in flight (default: 4) */
  concurrency?: number;
  /** Checked between files; once aborted no further file is started */
  signal?: AbortSignal;
  /** Called after each file settles */
  onProgress?: (progress: BatchProgress) => void;
  logger?: Logger;
}

interface PlannedJob {
  index: number;
  source: string;
  output: string;
}

type Outcome = { ok: true } | { ok: false; reason: string };

// ─── Output planning ──────────────────────────────────────────────────────────

function destinationKey(path: string): string {
  const abs = resolve(path);
  return process.platform === 'win32' || process.platform === 'darwin' ? abs.toLowerCase() : abs;
}

/**
 * Compute every destination before anything is written. A file whose
 * destination was already claimed by an earlier file is rejected.
 */
export function planOutputs(
  files: readonly string[],
  outputDir: string,
  options: Pick<ExportOptions, 'outputFormat' | 'namingPolicy'>,
): { jobs: PlannedJob[]; rejected: Array<BatchFailure & { index: number }> } {
  const claimed = new Map<string, string>();
  const jobs: PlannedJob[] = [];
  const rejected: Array<BatchFailure & { index: number }> = [];

  files.forEach((source, index) => {
    const output = outputPathFor(source, outputDir, options);
    const key = destinationKey(output);
    const owner = claimed.get(key);
    if (owner !== undefined) {
      rejected.push({ index, path: source, reason: `duplicate destination ${output} (also produced by ${owner})` });
      return;
    }
    claimed.set(key, source);
    jobs.push({ index, source, output });
  });

  return { jobs, rejected };
}

// ─── Concurrency helper ───────────────────────────────────────────────────────

async function runPool<T>(
  items: readonly T[],
  concurrency: number,
  signal: AbortSignal | undefined,
  fn: (item: T) => Promise<void>,
): Promise<number> {
  let next = 0;

  const worker = async () => {
    while (next < items.length && !signal?.aborted) {
      const item = items[next++]!;
      await fn(item);
    }
  };

  await Promise.all(Array.from({ length: Math.min(concurrency, items.length) }, worker));
  return next;
}

// ─── Public API ───────────────────────────────────────────────────────────────

/**
 * Watermark and export a list of files.
 *
 * @param files      Source image paths.
 * @param spec       The watermark to apply to every file.
 * @param placement  Where to put it.
 * @param options    Output format, JPEG quality and naming policy.
 * @param batch      Output directory, concurrency, cancellation, progress.
 */
export async function runBatch(
  files: readonly string[],
  spec: WatermarkSpec,
  placement: PlacementRule,
  options: ExportOptions,
  batch: BatchOptions,
): Promise<BatchResult> {
  const logger = batch.logger ?? silentLogger;
  const concurrency = Math.max(1, batch.concurrency ?? 4);
  const total = files.length;
  const outcomes: Array<Outcome | undefined> = new Array(total);
  let completed = 0;

  const settle = (index: number, path: string, outcome: Outcome) => {
    outcomes[index] = outcome;
    completed++;
    if (!outcome.ok) logger.error(`Failed to export ${path}: ${outcome.reason}`);
    try {
      batch.onProgress?.({ completed, total, path, ok: outcome.ok });
    } catch (err) {
      logger.warn(`progress callback threw: ${describeError(err)}`);
    }
  };

  const { jobs, rejected } = planOutputs(files, batch.outputDir, options);
  for (const r of rejected) settle(r.index, r.path, { ok: false, reason: r.reason });

  const started = await runPool(jobs, concurrency, batch.signal, async job => {
    try {
      await exportFile(job.source, job.output, spec, placement, options, batch);
      logger.debug(`exported ${job.source} -> ${job.output}`);
      settle(job.index, job.source, { ok: true });
    } catch (err) {
      settle(job.index, job.source, { ok: false, reason: describeError(err) });
    }
  });

  const result: BatchResult = { succeeded: [], failed: [], cancelled: started < jobs.length };
  outcomes.forEach((outcome, index) => {
    if (!outcome) return;
    const path = files[index]!;
    if (outcome.ok) result.succeeded.push(path);
    else result.failed.push({ path, reason: outcome.reason });
  });

  logger.info(
    `Exported ${result.succeeded.length} of ${total} file(s)` +
      (result.failed.length > 0 ? `, ${result.failed.length} failed` : '') +
      (result.cancelled ? ' (cancelled)' : ''),
  );
  return result;
}
