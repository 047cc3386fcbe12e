/**
 * Sequential batch runner. Jobs run one at a time; a failed job is logged and
 * recorded, and the batch moves on to the next one.
 */
import { errorCode } from '../errors.js';
import { logger } from '../utils/logger.js';
import type { JobHandle, JobRegistry, ProgressListener } from './registry.js';
import type { AssemblyResult } from '../types.js';

export interface BatchJob {
  id: string;
  run: (handle: JobHandle) => Promise<AssemblyResult>;
  onProgress?: ProgressListener;
}

export type BatchOutcome =
  | { id: string; ok: true; result: AssemblyResult }
  | { id: string; ok: false; error: string; code: string };

export interface BatchSummary {
  succeeded: number;
  failed: number;
  outcomes: BatchOutcome[];
}

export async function runBatch(jobs: readonly BatchJob[], registry: JobRegistry): Promise<BatchSummary> {
  logger.info('Batch: starting', { jobs: jobs.length });
  const outcomes: BatchOutcome[] = [];

  for (const job of jobs) {
    let handle: JobHandle;
    try {
      handle = registry.open(job.id, job.onProgress);
    } catch (err) {
      logger.warn('Batch: job already running, skipping', { jobId: job.id, err });
      outcomes.push({ id: job.id, ok: false, error: String(err), code: errorCode(err) });
      continue;
    }

    try {
      const result = await job.run(handle);
      outcomes.push({ id: job.id, ok: true, result });
    } catch (err) {
      handle.fail(err);
      logger.error('Batch: job failed, continuing', { jobId: job.id, err });
      outcomes.push({
        id: job.id,
        ok: false,
        error: err instanceof Error ? err.message : String(err),
        code: errorCode(err),
      });
    }
  }

  const succeeded = outcomes.filter(o => o.ok).length;
  const summary = { succeeded, failed: outcomes.length - succeeded, outcomes };
  logger.info('Batch: finished', { succeeded: summary.succeeded, failed: summary.failed });
  return summary;
}
