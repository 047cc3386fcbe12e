/**
 * Layers the background track, the narration and the subtitle bitmaps into
 * one ffmpeg filter graph and encodes the result in a single pass.
 *
 * Input order: background (0), narration (1, unless the background carries
 * its own audio), then one still image per subtitle layer.
 */
import * as fs from 'fs';
import * as path from 'path';
import type { RenderSettings } from '../config.js';
import { logger } from '../utils/logger.js';
import { formatSeconds, type BackgroundTrack } from './background.js';
import { runExternalEncoder, type ProcessRunner } from './process.js';
import type { StyleConfig } from '../types.js';

// ── Types ─────────────────────────────────────────────────────────────────────

export interface SubtitleLayer {
  imagePath: string;
  start: number;
  duration: number;
  /** Top edge of the bitmap in frame coordinates. */
  y: number;
}

export interface Composition {
  background: BackgroundTrack;
  audioPath: string;
  layers: readonly SubtitleLayer[];
  outputPath: string;
}

// ── Helpers ───────────────────────────────────────────────────────────────────

/** Place a bitmap so its bottom edge sits marginBottom pixels above the frame bottom. */
export function subtitleY(
  style: Pick<StyleConfig, 'marginBottom'>,
  bitmapHeight: number,
  frameHeight: number,
): number {
  return Math.max(0, frameHeight - style.marginBottom - bitmapHeight);
}

/** Half-open interval so adjacent cues never share a frame. */
function enableExpr(layer: SubtitleLayer): string {
  const start = formatSeconds(layer.start);
  const end = formatSeconds(layer.start + layer.duration);
  return `gte(t,${start})*lt(t,${end})`;
}

export function buildFilterGraph(background: BackgroundTrack, layers: readonly SubtitleLayer[], firstLayerInput: number): string {
  const bgChain = background.videoFilters.length > 0 ? background.videoFilters.join(',') : 'null';
  if (layers.length === 0) return `[0:v]${bgChain}[vout]`;

  const parts = [`[0:v]${bgChain}[bg]`];
  let previous = 'bg';
  layers.forEach((layer, i) => {
    const label = i === layers.length - 1 ? 'vout' : `v${i + 1}`;
    parts.push(`[${previous}][${firstLayerInput + i}:v]overlay=0:${layer.y}:enable='${enableExpr(layer)}'[${label}]`);
    previous = label;
  });
  return parts.join(';');
}

// ── Public API ────────────────────────────────────────────────────────────────

/** Full ffmpeg argument list for one composition (without the -y/-hide_banner prefix). */
export function buildCompositionArgs(composition: Composition, settings: RenderSettings): string[] {
  const { background, layers } = composition;
  const narrationInput = background.audioFromTrack ? [] : ['-i', composition.audioPath];
  const firstLayerInput = background.audioFromTrack ? 1 : 2;

  return [
    ...background.inputArgs,
    ...narrationInput,
    ...layers.flatMap(l => ['-i', l.imagePath]),
    '-filter_complex', buildFilterGraph(background, layers, firstLayerInput),
    '-map', '[vout]',
    '-map', background.audioFromTrack ? '0:a:0' : '1:a:0',
    '-c:v', settings.videoCodec,
    '-preset', settings.preset,
    '-crf', String(settings.crf),
    '-pix_fmt', settings.pixelFormat,
    '-r', String(settings.fps),
    '-c:a', settings.audioCodec,
    '-b:a', settings.audioBitrate,
    '-shortest',
    '-movflags', '+faststart',
    composition.outputPath,
  ];
}

/** Encode the composition. Throws EncodingFailedError when ffmpeg exits non-zero. */
export async function composeTimeline(
  composition: Composition,
  settings: RenderSettings,
  runner?: ProcessRunner,
): Promise<string> {
  logger.info('Compositor: encoding timeline', {
    background: composition.background.strategy,
    layers: composition.layers.length,
    outputPath: composition.outputPath,
  });

  fs.mkdirSync(path.dirname(path.resolve(composition.outputPath)), { recursive: true });
  await runExternalEncoder(buildCompositionArgs(composition, settings), {
    ffmpegPath: settings.ffmpegPath,
    runner,
    label: 'composeTimeline',
  });

  logger.info('Compositor: encode complete', { outputPath: composition.outputPath });
  return composition.outputPath;
}
