export type MeasureText = (text: string) => number;

/**
 * Greedy word wrap. Words are added to the current line while the measured
 * width stays within maxWidth; a word is never split, so a single word wider
 * than maxWidth ends up alone on its line.
 */
export function wrapWords(text: string, maxWidth: number, measure: MeasureText): string[] {
  const words = text.split(/\s+/).filter(Boolean);
  if (words.length === 0) return [];

  const lines: string[] = [];
  let current: string[] = [];

  for (const word of words) {
    const candidate = [...current, word].join(' ');
    if (current.length === 0 || measure(candidate) <= maxWidth) {
      current.push(word);
    } else {
      lines.push(current.join(' '));
      current = [word];
    }
  }
  lines.push(current.join(' '));

  return lines;
}
