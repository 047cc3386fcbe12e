import { describe, it, expect } from 'vitest';
import { assertCueOrder, inferEstimatedDuration, reconcileCues } from '../../src/subtitles/timing.js';
import { CueOrderError, DegenerateTimingError } from '../../src/errors.js';
import type { SubtitleCue } from '../../src/types.js';

const cue = (start: number, end: number, text: string): SubtitleCue => ({ start, end, text, words: [] });

describe('reconcileCues', () => {
  it('stretches cues from the estimated onto the actual duration', () => {
    const result = reconcileCues([cue(0, 3, 'Hi'), cue(3, 6, 'There')], 6, 8);

    expect(result).toHaveLength(2);
    expect(result[0]?.start).toBeCloseTo(0, 9);
    expect(result[0]?.end).toBeCloseTo(4, 9);
    expect(result[1]?.start).toBeCloseTo(4, 9);
    expect(result[1]?.end).toBeCloseTo(8, 9);
    expect(result.map(c => c.text)).toEqual(['Hi', 'There']);
  });

  it('scales word timings with their cue', () => {
    const input: SubtitleCue[] = [{
      start: 1, end: 3, text: 'two words',
      words: [{ text: 'two', start: 1, end: 2 }, { text: 'words', start: 2, end: 3 }],
    }];
    const [out] = reconcileCues(input, 10, 5);

    expect(out?.words).toEqual([{ text: 'two', start: 0.5, end: 1 }, { text: 'words', start: 1, end: 1.5 }]);
  });

  it('leaves the input cues untouched', () => {
    const input = [cue(0, 2, 'a'), cue(2, 4, 'b')];
    reconcileCues(input, 4, 8);
    expect(input).toEqual([cue(0, 2, 'a'), cue(2, 4, 'b')]);
  });

  it('keeps each cue\'s start/end ratio and its ordering', () => {
    const input = [cue(0.5, 1.5, 'a'), cue(1.5, 2.75, 'b'), cue(3, 4.2, 'c'), cue(4.2, 7, 'd')];
    for (const actual of [3.1, 7, 12.34, 59.9]) {
      const out = reconcileCues(input, 7, actual);
      out.forEach((c, i) => {
        const original = input[i];
        expect(original).toBeDefined();
        if (original) expect(c.start / c.end).toBeCloseTo(original.start / original.end, 9);
        if (i > 0) expect(c.start).toBeGreaterThanOrEqual(out[i - 1]?.end ?? 0);
        expect(c.end).toBeGreaterThan(c.start);
      });
      expect(out[out.length - 1]?.end).toBeCloseTo(actual, 9);
    }
  });

  it('rejects a non-positive estimated duration', () => {
    expect(() => reconcileCues([cue(0, 1, 'x')], 0, 8)).toThrow(DegenerateTimingError);
    expect(() => reconcileCues([cue(0, 1, 'x')], -2, 8)).toThrow(DegenerateTimingError);
    expect(() => reconcileCues([cue(0, 1, 'x')], Number.NaN, 8)).toThrow(DegenerateTimingError);
  });

  it('rejects a non-positive actual duration', () => {
    expect(() => reconcileCues([cue(0, 1, 'x')], 5, 0)).toThrow(DegenerateTimingError);
  });

  it('reconciles an empty cue list', () => {
    expect(reconcileCues([], 5, 10)).toEqual([]);
  });
});

describe('assertCueOrder', () => {
  it('accepts touching cues', () => {
    expect(() => assertCueOrder([cue(0, 1, 'a'), cue(1, 2, 'b')])).not.toThrow();
  });

  it('rejects overlapping cues with the offending index', () => {
    try {
      assertCueOrder([cue(0, 2, 'a'), cue(1.5, 3, 'b')]);
      expect.unreachable('expected CueOrderError');
    } catch (err) {
      expect(err).toBeInstanceOf(CueOrderError);
      expect(err instanceof CueOrderError && err.cueIndex).toBe(1);
    }
  });

  it('rejects zero-length cues', () => {
    expect(() => assertCueOrder([cue(1, 1, 'a')])).toThrow(CueOrderError);
  });
});

describe('inferEstimatedDuration', () => {
  it('is the end of the last cue', () => {
    expect(inferEstimatedDuration([cue(0, 2, 'a'), cue(2, 5.5, 'b')])).toBe(5.5);
  });

  it('is zero without cues', () => {
    expect(inferEstimatedDuration([])).toBe(0);
  });
});
