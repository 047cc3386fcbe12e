/**
 * Per-job progress registry.
 *
 * Each job gets exactly one writer handle from `open()`; everything else reads
 * copies through `get()` / `list()`. Stage changes follow the assembly state
 * machine and are rejected otherwise. Only the most recent finished jobs are
 * kept; running jobs are never dropped.
 */
import { StageTransitionError, errorCode } from '../errors.js';

export type AssemblyStage =
  | 'Idle'
  | 'ReconcilingTiming'
  | 'PreparingBackground'
  | 'RasterizingCues'
  | 'Compositing'
  | 'Validating'
  | 'Done'
  | 'Failed';

export interface JobProgress {
  jobId: string;
  stage: AssemblyStage;
  percent: number;
  message: string;
  updatedAt: string;
  /** Set when stage is Failed. */
  errorCode?: string;
}

const TRANSITIONS: Record<AssemblyStage, readonly AssemblyStage[]> = {
  Idle:                ['ReconcilingTiming', 'Failed'],
  ReconcilingTiming:   ['PreparingBackground', 'Failed'],
  PreparingBackground: ['RasterizingCues', 'Failed'],
  RasterizingCues:     ['Compositing', 'Failed'],
  Compositing:         ['Validating', 'Failed'],
  Validating:          ['Done', 'Failed'],
  Done:                [],
  Failed:              [],
};

// Percent reached on entering each stage.
export const STAGE_PERCENT: Record<Exclude<AssemblyStage, 'Failed'>, number> = {
  Idle:                0,
  ReconcilingTiming:   5,
  PreparingBackground: 15,
  RasterizingCues:     30,
  Compositing:         50,
  Validating:          90,
  Done:                100,
};

export function canTransition(from: AssemblyStage, to: AssemblyStage): boolean {
  return TRANSITIONS[from].includes(to);
}

export function isTerminal(stage: AssemblyStage): boolean {
  return TRANSITIONS[stage].length === 0;
}

export type ProgressListener = (progress: Readonly<JobProgress>) => void;

export interface JobHandle {
  readonly jobId: string;
  readonly stage: AssemblyStage;
  /** Move to the next stage; throws StageTransitionError when the move is not allowed. */
  advance(stage: Exclude<AssemblyStage, 'Failed'>, message?: string): void;
  /** Update percent/message within the current stage. */
  report(percent: number, message: string): void;
  fail(err: unknown): void;
}

/** Finished jobs kept for readers before the oldest are dropped. */
export const DEFAULT_RETAIN_FINISHED = 100;

export class JobRegistry {
  private readonly entries = new Map<string, JobProgress>();
  private readonly writers = new Set<string>();
  // Terminal job ids, oldest first.
  private readonly finished: string[] = [];

  constructor(private readonly retainFinished = DEFAULT_RETAIN_FINISHED) {}

  /**
   * Claim the writer handle for a job. A job that is still being written
   * cannot be opened again; a finished one starts over from Idle.
   */
  open(jobId: string, listener?: ProgressListener): JobHandle {
    if (this.writers.has(jobId)) {
      throw new Error(`Job "${jobId}" already has an active writer`);
    }
    this.writers.add(jobId);
    this.forgetFinished(jobId);

    // The handle's own view; a finished handle cannot write into a later run.
    let state = idle(jobId);
    const publish = (next: JobProgress) => {
      state = next;
      this.entries.set(jobId, next);
      if (isTerminal(next.stage)) this.retire(jobId);
      listener?.({ ...next });
    };

    publish(state);

    return {
      jobId,
      get stage() { return state.stage; },
      advance(stage, message) {
        const from = state.stage;
        if (!canTransition(from, stage)) throw new StageTransitionError(from, stage);
        publish({ jobId, stage, percent: STAGE_PERCENT[stage], message: message ?? stage, updatedAt: now() });
      },
      report(percent, message) {
        if (isTerminal(state.stage)) return;
        const bounded = Math.min(100, Math.max(state.percent, Math.round(percent)));
        publish({ ...state, percent: bounded, message, updatedAt: now() });
      },
      fail(err) {
        if (isTerminal(state.stage)) return;
        publish({
          ...state,
          stage: 'Failed',
          message: err instanceof Error ? err.message : String(err),
          errorCode: errorCode(err),
          updatedAt: now(),
        });
      },
    };
  }

  get(jobId: string): JobProgress | undefined {
    const entry = this.entries.get(jobId);
    return entry ? { ...entry } : undefined;
  }

  list(): JobProgress[] {
    return [...this.entries.values()].map(e => ({ ...e }));
  }

  private retire(jobId: string): void {
    this.writers.delete(jobId);
    this.finished.push(jobId);
    while (this.finished.length > this.retainFinished) {
      const oldest = this.finished.shift();
      if (oldest !== undefined) this.entries.delete(oldest);
    }
  }

  private forgetFinished(jobId: string): void {
    const i = this.finished.indexOf(jobId);
    if (i >= 0) this.finished.splice(i, 1);
  }
}

function idle(jobId: string): JobProgress {
  return { jobId, stage: 'Idle', percent: 0, message: 'queued', updatedAt: now() };
}

function now(): string {
  return new Date().toISOString();
}
