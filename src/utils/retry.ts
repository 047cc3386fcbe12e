import { logger } from './logger.js';
import { PollTimeoutError } from '../errors.js';

export class NonRetryableError extends Error {
  constructor(message: string, public readonly cause?: unknown) {
    super(message);
    this.name = 'NonRetryableError';
  }
}

export interface RetryOptions {
  maxAttempts: number;
  baseDelayMs?: number;
  backoffFactor?: number;
  isRetryable?: (err: unknown) => boolean;
  onRetry?: (attempt: number, err: unknown) => void;
}

const sleep = (ms: number) => new Promise<void>(r => setTimeout(r, ms));

/**
 * Run `fn` until it resolves or attempts run out. Delay before attempt n+1 is
 * baseDelayMs * backoffFactor^(n-1). For I/O call sites, not render stages.
 */
export async function withRetry<T>(fn: () => Promise<T>, opts: RetryOptions): Promise<T> {
  const { maxAttempts, baseDelayMs = 1_000, backoffFactor = 2,
    isRetryable = (e) => !(e instanceof NonRetryableError), onRetry } = opts;
  let lastErr: unknown;
  for (let attempt = 1; attempt <= maxAttempts; attempt++) {
    try { return await fn(); }
    catch (err) {
      lastErr = err;
      if (!isRetryable(err) || attempt === maxAttempts) throw err;
      const delay = baseDelayMs * Math.pow(backoffFactor, attempt - 1);
      logger.warn(`Retry ${attempt}/${maxAttempts} in ${delay}ms`, { error: String(err) });
      onRetry?.(attempt, err);
      await sleep(delay);
    }
  }
  throw lastErr;
}

export interface PollOptions {
  intervalMs: number;
  timeoutMs: number;
  label: string;
}

/**
 * Call `check` every intervalMs until it returns a value other than undefined.
 * Throws PollTimeoutError once timeoutMs of wall-clock time has elapsed.
 */
export async function pollUntil<T>(
  check: () => Promise<T | undefined>,
  opts: PollOptions,
): Promise<T> {
  const deadline = Date.now() + opts.timeoutMs;
  for (;;) {
    const value = await check();
    if (value !== undefined) return value;
    if (Date.now() + opts.intervalMs > deadline) {
      throw new PollTimeoutError(opts.label, opts.timeoutMs);
    }
    logger.debug('Poll: not ready yet', { label: opts.label, intervalMs: opts.intervalMs });
    await sleep(opts.intervalMs);
  }
}
