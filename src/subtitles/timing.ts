/**
 * Maps cues timed against an estimated narration length onto the real audio
 * duration with one uniform scale factor.
 */
import { CueOrderError, DegenerateTimingError } from '../errors.js';
import { logger } from '../utils/logger.js';
import type { SubtitleCue } from '../types.js';

const log = logger.child('Timing');

/**
 * Rescale every cue (and its word timings) by actual / estimated.
 * Returns a new array; the input cues are left untouched.
 */
export function reconcileCues(
  cues: readonly SubtitleCue[],
  estimatedDuration: number,
  actualDuration: number,
): SubtitleCue[] {
  if (!(estimatedDuration > 0) || !(actualDuration > 0) || !Number.isFinite(estimatedDuration)) {
    throw new DegenerateTimingError(estimatedDuration, actualDuration);
  }

  const factor = actualDuration / estimatedDuration;
  log.info('reconciling cues', {
    cues: cues.length,
    estimated: estimatedDuration,
    actual: actualDuration,
    factor: Number(factor.toFixed(4)),
  });

  const scaled = cues.map((cue) => ({
    start: cue.start * factor,
    end:   cue.end * factor,
    text:  cue.text,
    words: cue.words.map(w => ({ text: w.text, start: w.start * factor, end: w.end * factor })),
  }));

  assertCueOrder(scaled);
  return scaled;
}

/** Throws CueOrderError unless every cue has end > start and none overlaps its predecessor. */
export function assertCueOrder(cues: readonly SubtitleCue[]): void {
  let previousEnd = 0;
  cues.forEach((cue, i) => {
    if (!(cue.end > cue.start)) {
      throw new CueOrderError(`cue ${i + 1} ends at ${cue.end}s, not after its start ${cue.start}s`, i);
    }
    if (i > 0 && cue.start < previousEnd) {
      throw new CueOrderError(`cue ${i + 1} starts at ${cue.start}s, before the previous cue ends (${previousEnd}s)`, i);
    }
    previousEnd = cue.end;
  });
}

/** End of the last cue. Used as the estimate when none was recorded. */
export function inferEstimatedDuration(cues: readonly SubtitleCue[]): number {
  const last = cues[cues.length - 1];
  return last ? last.end : 0;
}
