/**
 * Numbered-cue subtitle files:
 *
 *   1
 *   00:00:01,250 --> 00:00:03,000
 *   text (one or more lines)
 *
 * Timestamps carry millisecond precision; serialization rounds to the nearest ms.
 */
import { SubtitleParseError } from '../errors.js';
import type { SubtitleCue } from '../types.js';

const TIMING_LINE =
  /^(\d+):(\d{2}):(\d{2})[,.](\d{1,3})\s*-->\s*(\d+):(\d{2}):(\d{2})[,.](\d{1,3})/;

function toSeconds(h: string, m: string, s: string, ms: string): number {
  // "5" in the millisecond field means 500ms, not 5ms
  const millis = parseInt(ms.padEnd(3, '0'), 10);
  return (parseInt(h, 10) * 3600_000 + parseInt(m, 10) * 60_000 + parseInt(s, 10) * 1000 + millis) / 1000;
}

export function formatTimestamp(seconds: number): string {
  const totalMs = Math.max(0, Math.round(seconds * 1000));
  const pad = (n: number, width = 2) => String(n).padStart(width, '0');
  const h = Math.floor(totalMs / 3_600_000);
  const m = Math.floor((totalMs % 3_600_000) / 60_000);
  const s = Math.floor((totalMs % 60_000) / 1000);
  return `${pad(h)}:${pad(m)}:${pad(s)},${pad(totalMs % 1000, 3)}`;
}

export function parseSrt(content: string): SubtitleCue[] {
  const normalized = content.replace(/^\uFEFF/, '').replace(/\r\n?/g, '\n').trim();
  if (!normalized) return [];

  const blocks = normalized.split(/\n(?:[ \t]*\n)+/);
  const cues: SubtitleCue[] = [];

  blocks.forEach((block, i) => {
    const lines = block.split('\n').map(l => l.trimEnd());
    // The index line is optional in the wild; locate the timing line instead.
    const timingAt = lines.findIndex(l => TIMING_LINE.test(l));
    if (timingAt === -1 || timingAt > 1) {
      throw new SubtitleParseError('missing "HH:MM:SS,mmm --> HH:MM:SS,mmm" timing line', i + 1);
    }
    const match = TIMING_LINE.exec(lines[timingAt] ?? '');
    if (!match) throw new SubtitleParseError('unreadable timing line', i + 1);
    const [, h1 = '0', m1 = '0', s1 = '0', ms1 = '0', h2 = '0', m2 = '0', s2 = '0', ms2 = '0'] = match;

    const start = toSeconds(h1, m1, s1, ms1);
    const end = toSeconds(h2, m2, s2, ms2);
    if (end <= start) {
      throw new SubtitleParseError(`end ${formatTimestamp(end)} is not after start ${formatTimestamp(start)}`, i + 1);
    }

    cues.push({
      start,
      end,
      text: lines.slice(timingAt + 1).join('\n').trim(),
      words: [],
    });
  });

  return cues;
}

export function serializeSrt(cues: readonly SubtitleCue[]): string {
  return cues
    .map((cue, i) => `${i + 1}\n${formatTimestamp(cue.start)} --> ${formatTimestamp(cue.end)}\n${cue.text}\n\n`)
    .join('');
}
