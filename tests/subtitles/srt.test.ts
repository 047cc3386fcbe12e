import { describe, it, expect } from 'vitest';
import { formatTimestamp, parseSrt, serializeSrt } from '../../src/subtitles/srt.js';
import { reconcileCues } from '../../src/subtitles/timing.js';
import { SubtitleParseError } from '../../src/errors.js';

const CANONICAL =
  '1\n00:00:00,000 --> 00:00:03,000\nHi\n\n' +
  '2\n00:00:03,000 --> 00:00:06,500\nThere\nfriend\n\n';

describe('formatTimestamp', () => {
  it('formats hours, minutes, seconds and milliseconds', () => {
    expect(formatTimestamp(0)).toBe('00:00:00,000');
    expect(formatTimestamp(3661.5)).toBe('01:01:01,500');
  });

  it('rounds to the nearest millisecond', () => {
    expect(formatTimestamp(2.3456)).toBe('00:00:02,346');
  });

  it('clamps negative values to zero', () => {
    expect(formatTimestamp(-1)).toBe('00:00:00,000');
  });
});

describe('parseSrt', () => {
  it('parses numbered blocks with multi-line text', () => {
    expect(parseSrt(CANONICAL)).toEqual([
      { start: 0, end: 3, text: 'Hi', words: [] },
      { start: 3, end: 6.5, text: 'There\nfriend', words: [] },
    ]);
  });

  it('accepts CRLF line endings and a byte-order mark', () => {
    const cues = parseSrt('\uFEFF1\r\n00:00:01,250 --> 00:00:02,000\r\nHello\r\n\r\n');
    expect(cues).toEqual([{ start: 1.25, end: 2, text: 'Hello', words: [] }]);
  });

  it('accepts a dot separator and short millisecond fields', () => {
    const [cue] = parseSrt('1\n00:00:01.5 --> 00:00:02.25\nShort');
    expect(cue?.start).toBe(1.5);
    expect(cue?.end).toBe(2.25);
  });

  it('tolerates a missing index line and extra blank lines', () => {
    const cues = parseSrt('00:00:00,000 --> 00:00:01,000\nOne\n\n\n\n00:00:01,000 --> 00:00:02,000\nTwo\n');
    expect(cues.map(c => c.text)).toEqual(['One', 'Two']);
  });

  it('returns no cues for empty input', () => {
    expect(parseSrt('')).toEqual([]);
    expect(parseSrt('\n\n  \n')).toEqual([]);
  });

  it('rejects a block without a timing line', () => {
    expect(() => parseSrt('1\nnot a time\nHello')).toThrow(SubtitleParseError);
  });

  it('rejects a cue that ends before it starts', () => {
    expect(() => parseSrt('1\n00:00:02,000 --> 00:00:01,000\nBackwards')).toThrow(/block 1/);
  });

  it('reports which block is malformed', () => {
    const content = '1\n00:00:00,000 --> 00:00:01,000\nFine\n\n2\ngarbage\n';
    try {
      parseSrt(content);
      expect.unreachable('expected a parse error');
    } catch (err) {
      expect(err).toBeInstanceOf(SubtitleParseError);
      expect(err instanceof SubtitleParseError && err.block).toBe(2);
    }
  });
});

describe('serializeSrt', () => {
  it('writes numbered blocks separated by blank lines', () => {
    const out = serializeSrt([
      { start: 0, end: 4, text: 'Hi', words: [] },
      { start: 4, end: 8, text: 'There', words: [] },
    ]);
    expect(out).toBe('1\n00:00:00,000 --> 00:00:04,000\nHi\n\n2\n00:00:04,000 --> 00:00:08,000\nThere\n\n');
  });

  it('round-trips canonical files unchanged', () => {
    expect(serializeSrt(parseSrt(CANONICAL))).toBe(CANONICAL);
  });

  it('round-trips timestamps past 99 hours', () => {
    const file = '1\n100:00:00,500 --> 100:00:02,000\nLate\n\n';
    expect(parseSrt(file)).toEqual([{ start: 360000.5, end: 360002, text: 'Late', words: [] }]);
    expect(serializeSrt(parseSrt(file))).toBe(file);
  });

  it('rounds rescaled timestamps to milliseconds', () => {
    const cues = parseSrt('1\n00:00:01,000 --> 00:00:02,000\nX\n');
    expect(serializeSrt(reconcileCues(cues, 3, 1))).toBe('1\n00:00:00,333 --> 00:00:00,667\nX\n\n');
  });
});
