/**
 * Word counting and word spans.
 *
 * A word is a run of non-whitespace characters. Hyphenated compounds stay one
 * word ("self-development"), a spaced dash is a word of its own ("well - made"
 * is three), and two sentences glued without a space ("end.Next") are two.
 */

import type { WordSpan } from './types.js';

const RUN_PATTERN = /\S+/g;

// Terminal punctuation between a letter and at least two more letters.
// Initials and abbreviations ("e.g.", "U.S.A.") and decimals ("3.14") don't match.
const GLUED_SENTENCE = /(?<=\p{L})[.!?…]+(?=\p{L}{2})/gu;

export function countWords(text: string): number {
  let count = 0;
  for (const run of text.matchAll(RUN_PATTERN)) {
    count += 1 + (run[0].match(GLUED_SENTENCE)?.length ?? 0);
  }
  return count;
}

export function tokenizeWords(text: string): WordSpan[] {
  const spans: WordSpan[] = [];

  for (const run of text.matchAll(RUN_PATTERN)) {
    const runStart = run.index ?? 0;
    let wordStart = runStart;

    for (const glued of run[0].matchAll(GLUED_SENTENCE)) {
      const splitAt = runStart + (glued.index ?? 0) + glued[0].length;
      spans.push({ start: wordStart, end: splitAt });
      wordStart = splitAt;
    }

    spans.push({ start: wordStart, end: runStart + run[0].length });
  }

  return spans;
}

/**
 * Index of the first word that ends after `offset` (words.length if none).
 * A word straddling the offset counts as the first word.
 */
export function firstWordAfter(words: readonly WordSpan[], offset: number): number {
  let lo = 0;
  let hi = words.length;
  while (lo < hi) {
    const mid = (lo + hi) >>> 1;
    if (words[mid].end <= offset) {
      lo = mid + 1;
    } else {
      hi = mid;
    }
  }
  return lo;
}
