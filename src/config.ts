import { z } from 'zod';
import { config as dotenvConfig } from 'dotenv';
import type { Rgb, StyleConfig } from './types.js';

dotenvConfig();

// ── Env Schema ────────────────────────────────────────────────────────────────

const HEX_COLOR = /^#[0-9a-fA-F]{6}$/;

const EnvSchema = z.object({
  // Logging
  LOG_LEVEL:                 z.enum(['debug', 'info', 'warn', 'error']).default('info'),
  LOG_FORMAT:                z.enum(['text', 'json']).default('text'),

  // External tools
  FFMPEG_PATH:               z.string().min(1).default('ffmpeg'),
  FFPROBE_PATH:              z.string().min(1).default('ffprobe'),

  // Local storage
  TEMP_DIR:                  z.string().default('/tmp/shorts-assembler'),
  JOBS_INBOX:                z.string().default('./jobs'),

  // Output encoding
  OUTPUT_WIDTH:              z.coerce.number().int().positive().default(1080),
  OUTPUT_HEIGHT:             z.coerce.number().int().positive().default(1920),
  OUTPUT_FPS:                z.coerce.number().int().positive().default(30),
  AUDIO_BITRATE:             z.string().default('128k'),
  VIDEO_PRESET:              z.string().default('medium'),
  VIDEO_CRF:                 z.coerce.number().int().min(0).max(51).default(23),
  FALLBACK_COLOR:            z.string().regex(HEX_COLOR).default('#141428'),

  // Subtitle style defaults
  SUBTITLE_FONT_FAMILY:      z.string().default('Arial'),
  SUBTITLE_FONT_PATH:        z.string().optional(),
  SUBTITLE_FONT_SIZE:        z.coerce.number().positive().default(85),
  SUBTITLE_FILL_COLOR:       z.string().default('#00FFFF'),
  SUBTITLE_OUTLINE_COLOR:    z.string().default('#000000'),
  SUBTITLE_OUTLINE_WIDTH:    z.coerce.number().int().min(0).default(5),
  SUBTITLE_MARGIN_BOTTOM:    z.coerce.number().int().min(0).default(150),

  // Service mode
  SERVE_SCHEDULE:            z.string().default('* * * * *'),
  JOB_READY_POLL_MS:         z.coerce.number().int().positive().default(2_000),
  JOB_READY_TIMEOUT_MS:      z.coerce.number().int().positive().default(120_000),
});

const parsed = EnvSchema.safeParse(process.env);
if (!parsed.success) {
  const invalid = parsed.error.issues.map(i => i.path.join('.')).join(', ');
  throw new Error(`Missing or invalid environment variables: ${invalid}`);
}

export const env = parsed.data;

// ── Colors ────────────────────────────────────────────────────────────────────

export function parseHexColor(hex: string): Rgb {
  if (!HEX_COLOR.test(hex)) throw new Error(`Invalid hex color "${hex}" (expected #RRGGBB)`);
  return [
    parseInt(hex.slice(1, 3), 16),
    parseInt(hex.slice(3, 5), 16),
    parseInt(hex.slice(5, 7), 16),
  ];
}

// ── Render Settings ───────────────────────────────────────────────────────────

export interface RenderSettings {
  width: number;
  height: number;
  fps: number;
  videoCodec: string;
  audioCodec: string;
  audioBitrate: string;
  preset: string;
  crf: number;
  pixelFormat: string;
  fallbackColor: Rgb;
  ffmpegPath: string;
  ffprobePath: string;
  tempDir: string;
}

export const RENDER_DEFAULTS: Readonly<RenderSettings> = Object.freeze({
  width:         env.OUTPUT_WIDTH,
  height:        env.OUTPUT_HEIGHT,
  fps:           env.OUTPUT_FPS,
  videoCodec:    'libx264',
  audioCodec:    'aac',
  audioBitrate:  env.AUDIO_BITRATE,
  preset:        env.VIDEO_PRESET,
  crf:           env.VIDEO_CRF,
  pixelFormat:   'yuv420p',
  fallbackColor: parseHexColor(env.FALLBACK_COLOR),
  ffmpegPath:    env.FFMPEG_PATH,
  ffprobePath:   env.FFPROBE_PATH,
  tempDir:       env.TEMP_DIR,
});

export function renderSettings(overrides: Partial<RenderSettings> = {}): RenderSettings {
  return { ...RENDER_DEFAULTS, ...overrides };
}

// ── Subtitle Style ────────────────────────────────────────────────────────────

export const DEFAULT_STYLE: Readonly<StyleConfig> = Object.freeze({
  fontFamily:    env.SUBTITLE_FONT_FAMILY,
  fontPath:      env.SUBTITLE_FONT_PATH || undefined,
  fontSize:      env.SUBTITLE_FONT_SIZE,
  fillColor:     env.SUBTITLE_FILL_COLOR,
  outlineColor:  env.SUBTITLE_OUTLINE_COLOR,
  outlineWidth:  env.SUBTITLE_OUTLINE_WIDTH,
  marginBottom:  env.SUBTITLE_MARGIN_BOTTOM,
  alignment:     'center',
  highlightMode: 'static',
  bitmapHeight:  250,
  lineSpacing:   10,
});

// Lines may use at most this share of the frame width.
export const WRAP_WIDTH_RATIO = 0.8;

// ── Platform Limits ───────────────────────────────────────────────────────────

export interface PlatformLimits {
  width: number;
  height: number;
  minDurationSeconds: number;
  maxDurationSeconds: number;
  maxSizeBytes: number;
  requireAudio: boolean;
}

export const PLATFORM_LIMITS: Readonly<PlatformLimits> = Object.freeze({
  width:              1080,
  height:             1920,
  minDurationSeconds: 15,
  maxDurationSeconds: 60,
  maxSizeBytes:       50 * 1024 * 1024,
  requireAudio:       true,
});

// ── Service Mode ──────────────────────────────────────────────────────────────

export const SERVICE = {
  inbox:          env.JOBS_INBOX,
  schedule:       env.SERVE_SCHEDULE,
  readyPollMs:    env.JOB_READY_POLL_MS,
  readyTimeoutMs: env.JOB_READY_TIMEOUT_MS,
} as const;

// ── Retry Policy ──────────────────────────────────────────────────────────────

export const MANIFEST_RETRY_POLICY = {
  maxAttempts:   4,
  baseDelayMs:   250,
  backoffFactor: 2,
} as const;
