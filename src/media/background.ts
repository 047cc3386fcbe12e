/**
 * Background normalization — turns a background source into an ffmpeg input
 * plus filter chain that yields exactly `targetDuration` seconds of
 * frame-sized video.
 *
 * visual: short clips are concatenated ceil(T / Ds) times and trimmed to T;
 *         long clips are trimmed to [0, T]. Then scale to frame height and
 *         center-crop (or center-pad when the scaled clip is too narrow).
 * color:  a lavfi constant-color stream at frame size and rate, no scaling.
 * avatar: scale/crop only; the clip's own length and narration are kept.
 *
 * Nothing is encoded here; the compositor runs the only ffmpeg pass.
 */
import * as fs from 'fs';
import * as path from 'path';
import type { RenderSettings } from '../config.js';
import { BackgroundUnavailableError } from '../errors.js';
import { logger } from '../utils/logger.js';
import type { Prober } from './probe.js';
import type { BackgroundSource, BackgroundStrategy, MediaProbe, Rgb } from '../types.js';

const log = logger.child('Background');

// ── Types ─────────────────────────────────────────────────────────────────────

export interface BackgroundTrack {
  strategy: BackgroundStrategy;
  /** ffmpeg arguments that declare this track as an input. */
  inputArgs: string[];
  /** Filters applied to the track's video stream; empty means pass-through. */
  videoFilters: string[];
  durationSeconds: number;
  /** True when the track's own audio is the narration (avatar clips). */
  audioFromTrack: boolean;
}

export interface LoopPlan {
  copies: number;
  concatenatedSeconds: number;
  trimSeconds: number;
}

export interface FramePlan {
  scaledWidth: number;
  scaledHeight: number;
  cropX?: number;
  padX?: number;
}

export interface BackgroundContext {
  settings: RenderSettings;
  probe: Prober;
  /** Directory for scratch files such as concat lists. */
  workDir: string;
}

// ── Planning ──────────────────────────────────────────────────────────────────

export function planLoop(sourceDuration: number, targetDuration: number): LoopPlan {
  const copies = sourceDuration < targetDuration ? Math.ceil(targetDuration / sourceDuration) : 1;
  return {
    copies,
    concatenatedSeconds: copies * sourceDuration,
    trimSeconds: targetDuration,
  };
}

/** Scale to the frame height keeping aspect ratio (even width), then crop or pad horizontally. */
export function planFrame(
  sourceWidth: number,
  sourceHeight: number,
  frame: Pick<RenderSettings, 'width' | 'height'>,
): FramePlan {
  const scaledHeight = frame.height;
  const scaledWidth = Math.max(2, Math.round((sourceWidth * frame.height) / sourceHeight / 2) * 2);

  if (scaledWidth > frame.width) {
    return { scaledWidth, scaledHeight, cropX: Math.floor((scaledWidth - frame.width) / 2) };
  }
  if (scaledWidth < frame.width) {
    return { scaledWidth, scaledHeight, padX: Math.floor((frame.width - scaledWidth) / 2) };
  }
  return { scaledWidth, scaledHeight };
}

export function frameFilters(plan: FramePlan, settings: RenderSettings): string[] {
  const filters = [`scale=${plan.scaledWidth}:${plan.scaledHeight}`];
  if (plan.cropX !== undefined) {
    filters.push(`crop=${settings.width}:${settings.height}:${plan.cropX}:0`);
  }
  if (plan.padX !== undefined) {
    filters.push(`pad=${settings.width}:${settings.height}:${plan.padX}:0:color=${ffmpegColor(settings.fallbackColor)}`);
  }
  filters.push('setsar=1', `fps=${settings.fps}`);
  return filters;
}

export function ffmpegColor([r, g, b]: Rgb): string {
  const hex = (n: number) => Math.max(0, Math.min(255, Math.round(n))).toString(16).padStart(2, '0');
  return `0x${hex(r)}${hex(g)}${hex(b)}`;
}

export function formatSeconds(seconds: number): string {
  return seconds.toFixed(3);
}

// ── Tracks ────────────────────────────────────────────────────────────────────

export function colorTrack(
  rgb: Rgb,
  targetDuration: number,
  settings: RenderSettings,
  strategy: BackgroundStrategy = 'color',
): BackgroundTrack {
  log.info('flat-color background', { color: ffmpegColor(rgb), duration: targetDuration });
  return {
    strategy,
    inputArgs: [
      '-f', 'lavfi',
      '-t', formatSeconds(targetDuration),
      '-i', `color=c=${ffmpegColor(rgb)}:s=${settings.width}x${settings.height}:r=${settings.fps}`,
    ],
    videoFilters: [],
    durationSeconds: targetDuration,
    audioFromTrack: false,
  };
}

async function probeSource(sourcePath: string, probe: Prober): Promise<MediaProbe> {
  let info: MediaProbe;
  try {
    info = await probe(sourcePath);
  } catch (err) {
    throw new BackgroundUnavailableError(sourcePath, err instanceof Error ? err.message : String(err), err);
  }
  if (!info.videoCodec || info.width <= 0 || info.height <= 0) {
    throw new BackgroundUnavailableError(sourcePath, 'no decodable video stream');
  }
  if (!(info.durationSeconds > 0)) {
    throw new BackgroundUnavailableError(sourcePath, 'zero or unknown duration');
  }
  return info;
}

function writeConcatList(sourcePath: string, copies: number, workDir: string): string {
  fs.mkdirSync(workDir, { recursive: true });
  const listPath = path.join(workDir, 'background_concat.txt');
  const entry = `file '${path.resolve(sourcePath).replace(/'/g, "'\\''")}'`;
  fs.writeFileSync(listPath, Array.from({ length: copies }, () => entry).join('\n') + '\n', 'utf-8');
  return listPath;
}

export async function visualTrack(
  sourcePath: string,
  targetDuration: number,
  ctx: BackgroundContext,
): Promise<BackgroundTrack> {
  const info = await probeSource(sourcePath, ctx.probe);
  const loop = planLoop(info.durationSeconds, targetDuration);
  const frame = planFrame(info.width, info.height, ctx.settings);

  log.info('visual background', {
    sourcePath,
    sourceDuration: info.durationSeconds,
    targetDuration,
    copies: loop.copies,
    scaledWidth: frame.scaledWidth,
    cropX: frame.cropX,
    padX: frame.padX,
  });

  const trim = ['-t', formatSeconds(loop.trimSeconds)];
  const inputArgs = loop.copies > 1
    ? ['-f', 'concat', '-safe', '0', ...trim, '-i', writeConcatList(sourcePath, loop.copies, ctx.workDir)]
    : [...trim, '-i', sourcePath];

  return {
    strategy: 'visual',
    inputArgs,
    videoFilters: frameFilters(frame, ctx.settings),
    durationSeconds: targetDuration,
    audioFromTrack: false,
  };
}

export async function avatarTrack(sourcePath: string, ctx: BackgroundContext): Promise<BackgroundTrack> {
  const info = await probeSource(sourcePath, ctx.probe);
  const frame = planFrame(info.width, info.height, ctx.settings);

  log.info('avatar background', {
    sourcePath,
    duration: info.durationSeconds,
    hasAudio: info.hasAudioStream,
  });

  return {
    strategy: 'avatar',
    inputArgs: ['-i', sourcePath],
    videoFilters: frameFilters(frame, ctx.settings),
    durationSeconds: info.durationSeconds,
    audioFromTrack: info.hasAudioStream,
  };
}

/**
 * Build the background track for a source. Visual and avatar sources throw
 * BackgroundUnavailableError when they cannot be opened or decoded; choosing
 * a fallback is the caller's decision.
 */
export async function prepareBackground(
  source: BackgroundSource,
  targetDuration: number,
  ctx: BackgroundContext,
): Promise<BackgroundTrack> {
  switch (source.kind) {
    case 'visual': return visualTrack(source.path, targetDuration, ctx);
    case 'avatar': return avatarTrack(source.path, ctx);
    case 'color':  return colorTrack(source.rgb, targetDuration, ctx.settings);
  }
}
