/**
 * External process invocation for ffmpeg / ffprobe.
 *
 * The runner is injected wherever a stage shells out, so tests substitute a
 * fake that records arguments instead of encoding anything.
 */
import { spawn } from 'child_process';
import { EncodingFailedError } from '../errors.js';
import { logger } from '../utils/logger.js';

export interface ProcessOutcome {
  exitCode: number;
  stdout: string;
  stderr: string;
}

export type ProcessRunner = (command: string, args: readonly string[]) => Promise<ProcessOutcome>;

// ffmpeg progress output is long; errors keep only the tail.
const DIAGNOSTIC_TAIL_CHARS = 4_000;

/**
 * Spawn `command` and resolve once it exits. Rejects only if the process
 * could not be started at all (e.g. binary not on PATH).
 */
export const spawnProcess: ProcessRunner = (command, args) =>
  new Promise((resolve, reject) => {
    const child = spawn(command, [...args], { stdio: ['ignore', 'pipe', 'pipe'] });
    const stdout: Buffer[] = [];
    const stderr: Buffer[] = [];
    child.stdout.on('data', (chunk: Buffer) => stdout.push(chunk));
    child.stderr.on('data', (chunk: Buffer) => stderr.push(chunk));
    child.on('error', reject);
    child.on('close', (code, signal) => {
      const err = Buffer.concat(stderr).toString('utf-8');
      resolve({
        // A signal-terminated process has no exit code; report it as a failure.
        exitCode: code ?? 1,
        stdout: Buffer.concat(stdout).toString('utf-8'),
        stderr: signal ? `${err}\nterminated by ${signal}` : err,
      });
    });
  });

export function diagnosticTail(stderr: string): string {
  return stderr.length > DIAGNOSTIC_TAIL_CHARS ? stderr.slice(-DIAGNOSTIC_TAIL_CHARS) : stderr;
}

/**
 * Run ffmpeg to completion. Non-zero exit (or a failure to start) becomes an
 * EncodingFailedError carrying ffmpeg's diagnostic output.
 */
export async function runExternalEncoder(
  args: readonly string[],
  opts: { ffmpegPath: string; runner?: ProcessRunner; label: string },
): Promise<ProcessOutcome> {
  const runner = opts.runner ?? spawnProcess;
  const fullArgs = ['-y', '-hide_banner', ...args];
  logger.debug(`FFmpeg [${opts.label}]`, { args: fullArgs.join(' ') });

  let outcome: ProcessOutcome;
  try {
    outcome = await runner(opts.ffmpegPath, fullArgs);
  } catch (err) {
    throw new EncodingFailedError(-1, `could not start ${opts.ffmpegPath}: ${String(err)}`, err);
  }

  if (outcome.exitCode !== 0) {
    logger.error(`FFmpeg [${opts.label}] failed`, { exitCode: outcome.exitCode });
    throw new EncodingFailedError(outcome.exitCode, diagnosticTail(outcome.stderr));
  }
  return outcome;
}
