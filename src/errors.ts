/**
 * Error taxonomy for the assembly core.
 *
 * Fatal (job level): DegenerateTimingError, EncodingFailedError, CueOrderError,
 * SubtitleParseError, JobManifestError.
 * Recoverable: BackgroundUnavailableError (the orchestrator swaps in a
 * flat-color background).
 */

export type AssemblyErrorCode =
  | 'DEGENERATE_TIMING'
  | 'CUE_ORDER'
  | 'SUBTITLE_PARSE'
  | 'BACKGROUND_UNAVAILABLE'
  | 'ENCODING_FAILED'
  | 'JOB_MANIFEST'
  | 'POLL_TIMEOUT'
  | 'STAGE_TRANSITION';

export abstract class AssemblyError extends Error {
  abstract readonly code: AssemblyErrorCode;

  constructor(message: string, public readonly cause?: unknown) {
    super(message);
    this.name = new.target.name;
  }
}

export class DegenerateTimingError extends AssemblyError {
  readonly code = 'DEGENERATE_TIMING';

  constructor(public readonly estimatedDuration: number, public readonly actualDuration: number) {
    super(
      `Cannot reconcile subtitle timing: estimated=${estimatedDuration}s actual=${actualDuration}s ` +
      '(both durations must be positive)',
    );
  }
}

export class CueOrderError extends AssemblyError {
  readonly code = 'CUE_ORDER';

  constructor(message: string, public readonly cueIndex: number) {
    super(message);
  }
}

export class SubtitleParseError extends AssemblyError {
  readonly code = 'SUBTITLE_PARSE';

  constructor(message: string, public readonly block: number) {
    super(`Subtitle block ${block}: ${message}`);
  }
}

export class BackgroundUnavailableError extends AssemblyError {
  readonly code = 'BACKGROUND_UNAVAILABLE';

  constructor(public readonly sourcePath: string, reason: string, cause?: unknown) {
    super(`Background "${sourcePath}" unavailable: ${reason}`, cause);
  }
}

export class EncodingFailedError extends AssemblyError {
  readonly code = 'ENCODING_FAILED';

  constructor(
    public readonly exitCode: number,
    public readonly diagnostics: string,
    cause?: unknown,
  ) {
    super(`Encoder exited with code ${exitCode}: ${lastLine(diagnostics)}`, cause);
  }
}

export class JobManifestError extends AssemblyError {
  readonly code = 'JOB_MANIFEST';
}

export class PollTimeoutError extends AssemblyError {
  readonly code = 'POLL_TIMEOUT';

  constructor(label: string, public readonly timeoutMs: number) {
    super(`${label}: not ready after ${timeoutMs}ms`);
  }
}

export class StageTransitionError extends AssemblyError {
  readonly code = 'STAGE_TRANSITION';

  constructor(public readonly from: string, public readonly to: string) {
    super(`Illegal stage transition ${from} -> ${to}`);
  }
}

/** Stable code for logs and status files; non-assembly errors report UNEXPECTED. */
export function errorCode(err: unknown): AssemblyErrorCode | 'UNEXPECTED' {
  return err instanceof AssemblyError ? err.code : 'UNEXPECTED';
}

function lastLine(text: string): string {
  const lines = text.trim().split('\n');
  return lines[lines.length - 1] ?? '';
}
