import { describe, it, expect } from 'vitest';
import { wrapWords } from '../../src/subtitles/wrap.js';

// 10px per character, spaces included
const measure = (text: string) => text.length * 10;

describe('wrapWords', () => {
  it('fills each line greedily', () => {
    expect(wrapWords('the quick brown fox', 100, measure)).toEqual(['the quick', 'brown fox']);
  });

  it('puts a word wider than the limit on its own line', () => {
    expect(wrapWords('a extraordinarily b', 50, measure)).toEqual(['a', 'extraordinarily', 'b']);
  });

  it('collapses surrounding and repeated whitespace', () => {
    expect(wrapWords('  hello   world\n ', 1000, measure)).toEqual(['hello world']);
  });

  it('returns no lines for blank text', () => {
    expect(wrapWords('   ', 100, measure)).toEqual([]);
  });

  it('keeps every line within the limit and every word in order', () => {
    const texts = [
      'Bigfoot was spotted near the ridge trail just after sunset',
      'one two three four five six seven eight nine ten eleven twelve',
      'short',
      'a b c d e f g h i j k l m n o p',
    ];
    for (const text of texts) {
      for (const maxWidth of [60, 120, 250]) {
        const lines = wrapWords(text, maxWidth, measure);
        for (const line of lines) {
          if (line.includes(' ')) expect(measure(line)).toBeLessThanOrEqual(maxWidth);
        }
        expect(lines.join(' ').split(' ')).toEqual(text.split(' '));
      }
    }
  });
});
