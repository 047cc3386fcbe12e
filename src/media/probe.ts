/**
 * ffprobe wrapper. Produces a MediaProbe from `-show_format -show_streams`
 * JSON output.
 */
import * as fs from 'fs';
import { z } from 'zod';
import { spawnProcess, diagnosticTail, type ProcessRunner } from './process.js';
import { logger } from '../utils/logger.js';
import type { MediaProbe } from '../types.js';

export type Prober = (filePath: string) => Promise<MediaProbe>;

// ffprobe reports most numbers as strings ("25.000000"); accept both.
const numeric = z.union([z.number(), z.string()]).transform(Number).pipe(z.number().finite());

const ProbeOutputSchema = z.object({
  streams: z.array(z.object({
    codec_type: z.string(),
    codec_name: z.string().optional(),
    width:      z.number().optional(),
    height:     z.number().optional(),
    duration:   numeric.optional(),
  })).default([]),
  format: z.object({
    duration: numeric.optional(),
    size:     numeric.optional(),
  }).default({}),
});

export class ProbeFailedError extends Error {
  constructor(public readonly filePath: string, reason: string) {
    super(`Could not probe "${filePath}": ${reason}`);
    this.name = 'ProbeFailedError';
  }
}

/**
 * Interpret ffprobe JSON. `sizeOnDisk` is used when the container does not
 * report its own size.
 */
export function parseProbeOutput(json: string, sizeOnDisk = 0): MediaProbe {
  const parsed = ProbeOutputSchema.parse(JSON.parse(json));
  const video = parsed.streams.find(s => s.codec_type === 'video');
  const hasAudioStream = parsed.streams.some(s => s.codec_type === 'audio');

  return {
    width:           video?.width ?? 0,
    height:          video?.height ?? 0,
    durationSeconds: parsed.format.duration ?? video?.duration ?? 0,
    sizeBytes:       parsed.format.size ?? sizeOnDisk,
    hasAudioStream,
    videoCodec:      video?.codec_name ?? null,
  };
}

export function createProber(ffprobePath: string, runner: ProcessRunner = spawnProcess): Prober {
  return async (filePath) => {
    if (!fs.existsSync(filePath)) throw new ProbeFailedError(filePath, 'file not found');

    logger.debug('FFprobe: probing', { filePath });
    const outcome = await runner(ffprobePath, [
      '-v', 'error',
      '-print_format', 'json',
      '-show_format',
      '-show_streams',
      filePath,
    ]);
    if (outcome.exitCode !== 0) {
      throw new ProbeFailedError(filePath, diagnosticTail(outcome.stderr).trim() || `exit code ${outcome.exitCode}`);
    }

    try {
      return parseProbeOutput(outcome.stdout, fs.statSync(filePath).size);
    } catch (err) {
      throw new ProbeFailedError(filePath, `unreadable ffprobe output (${String(err)})`);
    }
  };
}
