/**
 * Assembly orchestrator — runs one job through the state machine:
 *
 *   Idle → ReconcilingTiming → PreparingBackground → RasterizingCues
 *        → Compositing → Validating → Done | Failed
 *
 * Background choice:
 *   color  → flat-color track
 *   visual → normalized footage; unusable footage falls back to flat color
 *   avatar → clip as video (and audio when it has some); unusable clip falls
 *            back to flat color with the narration
 *
 * Every stage awaits the previous one. Errors other than an unavailable
 * background mark the job Failed and propagate; nothing is retried here.
 */
import * as fs from 'fs';
import * as path from 'path';
import { PLATFORM_LIMITS, renderSettings, type PlatformLimits, type RenderSettings } from '../config.js';
import { BackgroundUnavailableError } from '../errors.js';
import { colorTrack, prepareBackground, type BackgroundTrack } from '../media/background.js';
import { composeTimeline, subtitleY, type SubtitleLayer } from '../media/compositor.js';
import { createProber, type Prober } from '../media/probe.js';
import type { ProcessRunner } from '../media/process.js';
import { createCanvasRasterizer, type RasterizerFactory } from '../media/raster.js';
import { inferEstimatedDuration, reconcileCues } from '../subtitles/timing.js';
import { logger, type Logger } from '../utils/logger.js';
import { validateOutput } from './validator.js';
import { JobRegistry, STAGE_PERCENT, type JobHandle } from './registry.js';
import type { AssemblyRequest, AssemblyResult, StyleConfig, SubtitleCue } from '../types.js';

// ── Services ──────────────────────────────────────────────────────────────────

/** Everything the orchestrator touches outside its own process. */
export interface AssemblyServices {
  settings: RenderSettings;
  limits: Readonly<PlatformLimits>;
  probe: Prober;
  rasterizerFactory: RasterizerFactory;
  /** ffmpeg runner; defaults to spawning the configured binary. */
  runner?: ProcessRunner;
}

export function defaultServices(overrides: Partial<RenderSettings> = {}): AssemblyServices {
  const settings = renderSettings(overrides);
  return {
    settings,
    limits: PLATFORM_LIMITS,
    probe: createProber(settings.ffprobePath),
    rasterizerFactory: createCanvasRasterizer,
  };
}

// ── Stages ────────────────────────────────────────────────────────────────────

async function selectBackground(
  request: AssemblyRequest,
  services: AssemblyServices,
  workDir: string,
  log: Logger,
): Promise<BackgroundTrack> {
  const { settings } = services;
  const target = request.audioDuration;
  const source = request.background;

  switch (source.kind) {
    case 'color':
      return colorTrack(source.rgb, target, settings);

    case 'visual':
    case 'avatar': {
      let track: BackgroundTrack;
      try {
        track = await prepareBackground(source, target, { settings, probe: services.probe, workDir });
      } catch (err) {
        if (!(err instanceof BackgroundUnavailableError)) throw err;
        log.warn('background unavailable, using flat color', { kind: source.kind, err });
        return colorTrack(settings.fallbackColor, target, settings, 'color-fallback');
      }
      if (track.strategy === 'avatar' && track.durationSeconds < target) {
        log.warn('avatar clip is shorter than the narration', {
          avatarSeconds: track.durationSeconds,
          audioSeconds: target,
        });
      }
      return track;
    }
  }
}

function rasterizeCues(
  cues: readonly SubtitleCue[],
  style: Readonly<StyleConfig>,
  services: AssemblyServices,
  workDir: string,
  handle: JobHandle,
): SubtitleLayer[] {
  const { settings } = services;
  const rasterizer = services.rasterizerFactory(style, settings.width);
  const span = STAGE_PERCENT.Compositing - STAGE_PERCENT.RasterizingCues;
  const layers: SubtitleLayer[] = [];

  cues.forEach((cue, i) => {
    const bitmap = rasterizer.rasterize(cue.text);
    if (bitmap.lines.length > 0) {
      const imagePath = path.join(workDir, `cue_${String(i + 1).padStart(4, '0')}.png`);
      fs.writeFileSync(imagePath, bitmap.png);
      layers.push({
        imagePath,
        start: cue.start,
        duration: cue.end - cue.start,
        y: subtitleY(style, bitmap.height, settings.height),
      });
    }
    handle.report(
      STAGE_PERCENT.RasterizingCues + (span * (i + 1)) / cues.length,
      `rasterized cue ${i + 1}/${cues.length}`,
    );
  });

  return layers;
}

/** Cue timestamps were written against the narration they end with; no cues means nothing to rescale. */
function defaultEstimate(request: AssemblyRequest): number {
  return request.cues.length > 0 ? inferEstimatedDuration(request.cues) : request.audioDuration;
}

// ── Public API ────────────────────────────────────────────────────────────────

/**
 * Assemble one video. Resolves with the output path and validation report;
 * validation issues never reject. Pass a registry handle to expose progress.
 */
export async function assemble(
  request: AssemblyRequest,
  services: AssemblyServices,
  handle: JobHandle = new JobRegistry().open(request.jobId),
): Promise<AssemblyResult> {
  const log = logger.child('Orchestrator', { jobId: request.jobId });
  const { settings } = services;
  const workDir = path.join(settings.tempDir, `${request.jobId.replace(/[^\w.-]/g, '_')}_${Date.now()}`);

  try {
    fs.mkdirSync(workDir, { recursive: true });

    handle.advance('ReconcilingTiming');
    const estimated = request.estimatedDuration ?? defaultEstimate(request);
    const cues = reconcileCues(request.cues, estimated, request.audioDuration);

    handle.advance('PreparingBackground');
    const background = await selectBackground(request, services, workDir, log);

    handle.advance('RasterizingCues');
    const layers = rasterizeCues(cues, request.style, services, workDir, handle);

    handle.advance('Compositing', `encoding with ${background.strategy} background`);
    await composeTimeline(
      { background, audioPath: request.audioPath, layers, outputPath: request.outputPath },
      settings,
      services.runner,
    );

    handle.advance('Validating');
    const validation = await validateOutput(request.outputPath, services.probe, services.limits);
    if (!validation.passed) {
      log.warn('output does not meet platform limits', { issues: validation.issues });
    }

    handle.advance('Done', validation.passed ? 'complete' : `complete with ${validation.issues.length} issue(s)`);
    log.info('job complete', { outputPath: request.outputPath, background: background.strategy, layers: layers.length });

    return {
      outputPath: request.outputPath,
      validation,
      background: background.strategy,
      cueCount: cues.length,
    };
  } catch (err) {
    const stage = handle.stage;
    handle.fail(err);
    log.error('job failed', { stage, err });
    throw err;
  } finally {
    fs.rmSync(workDir, { recursive: true, force: true });
  }
}
