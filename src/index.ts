#!/usr/bin/env node
/**
 * Shorts assembler — entry point.
 *
 *   assemble <jobDir>                          assemble one job directory
 *   batch <rootDir>                            assemble every job under rootDir, one at a time
 *   serve                                      watch JOBS_INBOX on a node-cron schedule
 *   status <jobDir>                            print the job's last recorded progress
 *   reconcile <srt> <estimated> <actual> [out] rescale a cue file ("last-cue" for estimated)
 *
 * Exit code is 1 when a job fails on timing, manifest or encoder errors.
 * Platform validation issues are reported but never change the exit code.
 */
import * as fs from 'fs';
import * as path from 'path';
import cron from 'node-cron';
import { SERVICE } from './config.js';
import { runBatch, type BatchJob } from './pipeline/batch.js';
import { findJobDirs, findPendingJobs, loadJob, readStatus, writeStatus } from './pipeline/job.js';
import { assemble, defaultServices, type AssemblyServices } from './pipeline/orchestrator.js';
import { JobRegistry, type JobProgress } from './pipeline/registry.js';
import { parseSrt, serializeSrt } from './subtitles/srt.js';
import { inferEstimatedDuration, reconcileCues } from './subtitles/timing.js';
import { logger } from './utils/logger.js';

const USAGE = [
  'Usage:',
  '  assemble <jobDir>',
  '  batch <rootDir>',
  '  serve',
  '  status <jobDir>',
  '  reconcile <srt> <estimated|last-cue> <actual> [out]',
].join('\n');

// ── Helpers ───────────────────────────────────────────────────────────────────

function mirrorStatus(jobDir: string, progress: Readonly<JobProgress>): void {
  try {
    writeStatus(jobDir, progress);
  } catch (err) {
    logger.warn('Status: could not write status file', { jobDir, err });
  }
}

function jobFromDir(
  jobDir: string,
  services: AssemblyServices,
  waitForInputs?: { intervalMs: number; timeoutMs: number },
): BatchJob {
  return {
    id: path.basename(path.resolve(jobDir)),
    onProgress: (progress) => mirrorStatus(jobDir, progress),
    run: async (handle) => {
      handle.report(0, waitForInputs ? 'waiting for inputs' : 'loading job');
      const request = await loadJob(jobDir, { settings: services.settings, probe: services.probe, waitForInputs });
      return assemble(request, services, handle);
    },
  };
}

function requireArg(value: string | undefined, name: string): string {
  if (!value) {
    process.stderr.write(`Missing <${name}>\n${USAGE}\n`);
    process.exit(1);
  }
  return value;
}

// ── Commands ──────────────────────────────────────────────────────────────────

async function assembleCommand(jobDir: string): Promise<void> {
  const services = defaultServices();
  const registry = new JobRegistry();
  const job = jobFromDir(jobDir, services);
  const result = await job.run(registry.open(job.id, job.onProgress));
  process.stdout.write(JSON.stringify(result, null, 2) + '\n');
}

async function batchCommand(rootDir: string): Promise<void> {
  const services = defaultServices();
  const dirs = findJobDirs(rootDir);
  if (dirs.length === 0) logger.warn('Batch: no job directories found', { rootDir });

  const summary = await runBatch(dirs.map(dir => jobFromDir(dir, services)), new JobRegistry());
  process.stdout.write(JSON.stringify(summary, null, 2) + '\n');
  process.exitCode = summary.failed > 0 ? 1 : 0;
}

function serveCommand(): void {
  const services = defaultServices();
  const registry = new JobRegistry();
  const wait = { intervalMs: SERVICE.readyPollMs, timeoutMs: SERVICE.readyTimeoutMs };
  let running = false;

  const tick = async (): Promise<void> => {
    if (running) {
      logger.debug('Serve: previous run still in progress, skipping tick');
      return;
    }
    running = true;
    try {
      const pending = findPendingJobs(SERVICE.inbox);
      if (pending.length === 0) return;
      logger.info('Serve: picked up jobs', { count: pending.length });
      await runBatch(pending.map(dir => jobFromDir(dir, services, wait)), registry);
    } finally {
      running = false;
    }
  };

  cron.schedule(SERVICE.schedule, async () => {
    await tick().catch((err) => {
      logger.error('Serve: inbox run error', { err });
    });
  });

  logger.info('Serve: watching inbox', { inbox: SERVICE.inbox, schedule: SERVICE.schedule });
}

function statusCommand(jobDir: string): void {
  const status = readStatus(jobDir);
  if (!status) {
    process.stdout.write(`No status recorded for ${jobDir}\n`);
    process.exitCode = 1;
    return;
  }
  process.stdout.write(JSON.stringify(status, null, 2) + '\n');
}

function reconcileCommand(srtPath: string, estimated: string, actual: string, outPath?: string): void {
  const cues = parseSrt(fs.readFileSync(srtPath, 'utf-8'));
  const estimatedDuration = estimated === 'last-cue' ? inferEstimatedDuration(cues) : Number(estimated);
  const output = serializeSrt(reconcileCues(cues, estimatedDuration, Number(actual)));

  if (outPath) {
    fs.writeFileSync(outPath, output, 'utf-8');
    logger.info('Reconcile: wrote cue file', { outPath, cues: cues.length });
  } else {
    process.stdout.write(output);
  }
}

// ── CLI entrypoint ────────────────────────────────────────────────────────────

const [,, command, ...args] = process.argv;

async function main(): Promise<void> {
  logger.debug('Shorts assembler: starting', { command: command ?? 'none' });

  switch (command) {
    case 'assemble':
      await assembleCommand(requireArg(args[0], 'jobDir'));
      break;

    case 'batch':
      await batchCommand(requireArg(args[0], 'rootDir'));
      break;

    case 'serve':
      // Keeps the process alive through the cron timer
      serveCommand();
      break;

    case 'status':
      statusCommand(requireArg(args[0], 'jobDir'));
      break;

    case 'reconcile':
      reconcileCommand(
        requireArg(args[0], 'srt'),
        requireArg(args[1], 'estimated'),
        requireArg(args[2], 'actual'),
        args[3],
      );
      break;

    default:
      process.stderr.write(`${USAGE}\n`);
      process.exitCode = 1;
      break;
  }
}

main().catch((err) => {
  logger.error('Fatal error', { err });
  process.exit(1);
});
