/**
 * Core data model shared by the timing, rendering and validation stages.
 * All times are in seconds.
 */

export type Rgb = readonly [r: number, g: number, b: number];

// ── Subtitles ─────────────────────────────────────────────────────────────────

export interface WordTiming {
  text: string;
  start: number;
  end: number;
}

export interface SubtitleCue {
  start: number;
  end: number;
  text: string;
  /** Per-word sub-timestamps; empty when the transcript has none. */
  words: readonly WordTiming[];
}

export type TextAlignment = 'left' | 'center' | 'right';

/**
 * 'word-reveal' is accepted but renders the same static bitmap per cue as
 * 'static'; see DESIGN.md.
 */
export type HighlightMode = 'static' | 'word-reveal';

export interface StyleConfig {
  fontFamily: string;
  /** Font file registered under fontFamily before rendering. */
  fontPath?: string;
  fontSize: number;
  fillColor: string;
  outlineColor: string;
  outlineWidth: number;
  /** Distance in pixels between the bottom of the subtitle bitmap and the frame bottom. */
  marginBottom: number;
  alignment: TextAlignment;
  highlightMode: HighlightMode;
  bitmapHeight: number;
  lineSpacing: number;
}

// ── Backgrounds ───────────────────────────────────────────────────────────────

export type BackgroundSource =
  | { kind: 'visual'; path: string }
  | { kind: 'color'; rgb: Rgb }
  | { kind: 'avatar'; path: string };

export type BackgroundStrategy = 'visual' | 'color' | 'color-fallback' | 'avatar';

// ── Jobs ──────────────────────────────────────────────────────────────────────

export interface AssemblyRequest {
  readonly jobId: string;
  readonly audioPath: string;
  readonly audioDuration: number;
  /** Duration the cue timestamps were computed against; defaults to the last cue's end. */
  readonly estimatedDuration?: number;
  readonly background: BackgroundSource;
  readonly cues: readonly SubtitleCue[];
  readonly style: Readonly<StyleConfig>;
  readonly outputPath: string;
}

export interface MediaProbe {
  readonly width: number;
  readonly height: number;
  readonly durationSeconds: number;
  readonly sizeBytes: number;
  readonly hasAudioStream: boolean;
  readonly videoCodec: string | null;
}

export interface ValidationReport {
  passed: boolean;
  issues: string[];
}

export interface AssemblyResult {
  outputPath: string;
  validation: ValidationReport;
  background: BackgroundStrategy;
  cueCount: number;
}
