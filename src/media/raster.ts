/**
 * Subtitle rasterization — renders one cue's text to a transparent PNG the
 * width of the frame, wrapped to 80% of that width, with a rounded outline.
 *
 * Layout is computed separately from drawing so it can be checked against any
 * text measurer.
 */
import { createCanvas, GlobalFonts, type SKRSContext2D } from '@napi-rs/canvas';
import { WRAP_WIDTH_RATIO } from '../config.js';
import { wrapWords, type MeasureText } from '../subtitles/wrap.js';
import { logger } from '../utils/logger.js';
import type { StyleConfig, TextAlignment } from '../types.js';

const log = logger.child('Raster');

// Family used when the configured font cannot be loaded.
export const FALLBACK_FONT_FAMILY = 'sans-serif';

// ── Types ─────────────────────────────────────────────────────────────────────

export interface PositionedLine {
  text: string;
  x: number;
  y: number;
  width: number;
}

export interface CueLayout {
  width: number;
  height: number;
  lines: PositionedLine[];
}

export interface CueBitmap {
  png: Buffer;
  width: number;
  height: number;
  lines: string[];
}

export interface CueRasterizer {
  readonly fontFamily: string;
  rasterize(text: string): CueBitmap;
}

export type RasterizerFactory = (style: Readonly<StyleConfig>, frameWidth: number) => CueRasterizer;

// ── Layout ────────────────────────────────────────────────────────────────────

/**
 * Every integer offset inside a circle of the given radius. Stamping the text
 * at each of these gives a rounded stroke rather than a square one.
 */
export function strokeOffsets(radius: number): Array<[dx: number, dy: number]> {
  const r = Math.max(0, Math.floor(radius));
  const offsets: Array<[number, number]> = [];
  for (let dx = -r; dx <= r; dx++) {
    for (let dy = -r; dy <= r; dy++) {
      if (dx * dx + dy * dy <= r * r) offsets.push([dx + 0, dy + 0]); // no -0
    }
  }
  return offsets;
}

function alignedX(
  alignment: TextAlignment,
  lineWidth: number,
  frameWidth: number,
  areaLeft: number,
  areaWidth: number,
): number {
  switch (alignment) {
    case 'left':   return areaLeft;
    case 'right':  return areaLeft + areaWidth - lineWidth;
    case 'center': return (frameWidth - lineWidth) / 2;
  }
}

export function layoutCue(
  text: string,
  frameWidth: number,
  style: Pick<StyleConfig, 'fontSize' | 'lineSpacing' | 'bitmapHeight' | 'outlineWidth' | 'alignment'>,
  measure: MeasureText,
): CueLayout {
  const maxLineWidth = Math.floor(frameWidth * WRAP_WIDTH_RATIO);
  const areaLeft = Math.floor((frameWidth - maxLineWidth) / 2);
  const lineHeight = style.fontSize + style.lineSpacing;

  const wrapped = wrapWords(text.replace(/\n/g, ' '), maxLineWidth, measure);
  const blockHeight = wrapped.length * lineHeight;
  const height = Math.max(style.bitmapHeight, blockHeight + 2 * style.outlineWidth);
  const top = Math.floor((height - blockHeight) / 2);

  const lines = wrapped.map((line, i) => {
    const width = measure(line);
    const x = alignedX(style.alignment, width, frameWidth, areaLeft, maxLineWidth);
    return { text: line, x: Math.floor(x), y: top + i * lineHeight, width };
  });

  return { width: frameWidth, height, lines };
}

// ── Canvas rendering ──────────────────────────────────────────────────────────

/** Register the style's font, falling back to the built-in family when it is unusable. */
export function resolveFontFamily(style: Pick<StyleConfig, 'fontFamily' | 'fontPath'>): string {
  if (style.fontPath) {
    let registered = false;
    try {
      registered = GlobalFonts.registerFromPath(style.fontPath, style.fontFamily);
    } catch (err) {
      log.warn('font file could not be read', { fontPath: style.fontPath, err });
    }
    if (registered) return style.fontFamily;
    log.warn('font not loaded, using fallback', { fontPath: style.fontPath, fallback: FALLBACK_FONT_FAMILY });
    return FALLBACK_FONT_FAMILY;
  }

  if (GlobalFonts.has(style.fontFamily)) return style.fontFamily;
  log.warn('font family not installed, using fallback', {
    fontFamily: style.fontFamily,
    fallback: FALLBACK_FONT_FAMILY,
  });
  return FALLBACK_FONT_FAMILY;
}

function drawLine(ctx: SKRSContext2D, line: PositionedLine, style: Readonly<StyleConfig>): void {
  ctx.fillStyle = style.outlineColor;
  for (const [dx, dy] of strokeOffsets(style.outlineWidth)) {
    ctx.fillText(line.text, line.x + dx, line.y + dy);
  }
  ctx.fillStyle = style.fillColor;
  ctx.fillText(line.text, line.x, line.y);
}

export class CanvasRasterizer implements CueRasterizer {
  readonly fontFamily: string;
  private readonly font: string;
  private readonly measureCtx: SKRSContext2D;

  constructor(private readonly style: Readonly<StyleConfig>, private readonly frameWidth: number) {
    this.fontFamily = resolveFontFamily(style);
    // Generic families must stay unquoted to be recognised.
    this.font = this.fontFamily === FALLBACK_FONT_FAMILY
      ? `${style.fontSize}px ${FALLBACK_FONT_FAMILY}`
      : `${style.fontSize}px "${this.fontFamily}"`;
    this.measureCtx = createCanvas(1, 1).getContext('2d');
    this.measureCtx.font = this.font;

    if (style.highlightMode === 'word-reveal') {
      // Word timings are accepted but the whole cue is drawn at once.
      log.debug('word-reveal requested; rendering cues statically');
    }
  }

  rasterize(text: string): CueBitmap {
    const layout = layoutCue(text, this.frameWidth, this.style, (t) => this.measureCtx.measureText(t).width);

    const canvas = createCanvas(layout.width, layout.height);
    const ctx = canvas.getContext('2d');
    ctx.font = this.font;
    ctx.textBaseline = 'top';
    for (const line of layout.lines) drawLine(ctx, line, this.style);

    return {
      png: canvas.toBuffer('image/png'),
      width: layout.width,
      height: layout.height,
      lines: layout.lines.map(l => l.text),
    };
  }
}

export const createCanvasRasterizer: RasterizerFactory = (style, frameWidth) =>
  new CanvasRasterizer(style, frameWidth);
