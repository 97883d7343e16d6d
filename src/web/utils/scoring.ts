import { MIN_WORD_LENGTH } from '../config';

export const wordLengthPoints: Record<number, number> = {
  3: 1,
  4: 1,
  5: 2,
  6: 3,
  7: 5,
  8: 11,
};

const LONGEST_SCORED_LENGTH = 8;

export function scoreWord(word: string): number | null {
  const length = word.length;
  if (length < MIN_WORD_LENGTH) {
    return null;
  }
  return wordLengthPoints[Math.min(length, LONGEST_SCORED_LENGTH)];
}

// Words too short to score add nothing to the total
export function scoreWords(words: Iterable<string>): number {
  let total = 0;
  for (const word of words) {
    total += scoreWord(word) ?? 0;
  }
  return total;
}
