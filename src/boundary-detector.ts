/**
 * Boundary detector.
 *
 * Finds the places where a portion may end: after a paragraph break (strong)
 * or after a sentence (weak). Every boundary offset points at the first
 * character of the unit that follows, so the separating whitespace stays with
 * the text before it.
 */

import { ENGLISH } from './language-profiles.js';
import { PARAGRAPH_SEPARATOR } from './normalizer.js';
import type { Boundary, BoundaryKind, LanguageProfile } from './types.js';

const OPENING_MARKS = /^["'“‘«(\[]+/u;
const LOWERCASE_START = /^\p{Ll}/u;
const SINGLE_LETTER = /^\p{L}$/u;
const DIGITS = /^\d+$/;

function charClass(chars: readonly string[]): string {
  return chars.map((c: string) => c.replace(/[\]\\^-]/g, '\\$&')).join('');
}

// Terminal marks, optional closing quotes/brackets, then spaces before more text
export function sentenceEndPattern(profile: LanguageProfile): RegExp {
  const terminal = charClass(profile.terminalMarks);
  const closing = charClass(profile.closingMarks);
  return new RegExp(`([${terminal}]+)[${closing}]*[ \\t]+(?=\\S)`, 'gu');
}

function wordBefore(text: string, index: number): string {
  let start = index;
  while (start > 0 && !/\s/.test(text[start - 1])) {
    start--;
  }
  return text.slice(start, index).replace(OPENING_MARKS, '');
}

/**
 * A single dot after an abbreviation, an initial or a bare number followed by
 * another number doesn't end the sentence.
 */
function isFalseSentenceEnd(
  text: string,
  markIndex: number,
  marks: string,
  nextOffset: number,
  abbreviations: ReadonlySet<string>
): boolean {
  if (marks !== '.') return false;

  const word = wordBefore(text, markIndex);
  if (!word) return false;

  if (abbreviations.has(word.toLowerCase())) return true;
  if (SINGLE_LETTER.test(word)) return true;
  if (DIGITS.test(word) && /\d/.test(text[nextOffset] ?? '')) return true;

  return false;
}

export function findParagraphBoundaries(text: string): number[] {
  const offsets: number[] = [];
  let idx = text.indexOf(PARAGRAPH_SEPARATOR);
  while (idx !== -1) {
    const offset = idx + PARAGRAPH_SEPARATOR.length;
    if (offset < text.length) offsets.push(offset);
    idx = text.indexOf(PARAGRAPH_SEPARATOR, offset);
  }
  return offsets;
}

export function findSentenceBoundaries(text: string, profile: LanguageProfile = ENGLISH): number[] {
  const abbreviations = new Set(profile.abbreviations.map((a: string) => a.toLowerCase()));
  const offsets: number[] = [];

  for (const match of text.matchAll(sentenceEndPattern(profile))) {
    const markIndex = match.index ?? 0;
    const nextOffset = markIndex + match[0].length;

    if (LOWERCASE_START.test(text.slice(nextOffset, nextOffset + 1))) continue;
    if (isFalseSentenceEnd(text, markIndex, match[1], nextOffset, abbreviations)) continue;

    offsets.push(nextOffset);
  }

  return offsets;
}

/**
 * Merge into one offset-ordered list. Where both kinds share an offset, the
 * paragraph boundary wins.
 */
export function mergeBoundaries(paragraphOffsets: readonly number[], sentenceOffsets: readonly number[]): Boundary[] {
  const byOffset = new Map<number, BoundaryKind>();
  for (const offset of sentenceOffsets) byOffset.set(offset, 'sentence');
  for (const offset of paragraphOffsets) byOffset.set(offset, 'paragraph');

  return [...byOffset.entries()]
    .sort((a, b) => a[0] - b[0])
    .map(([offset, kind]) => ({ offset, kind }));
}

export function detectBoundaries(text: string, profile: LanguageProfile = ENGLISH): Boundary[] {
  return mergeBoundaries(findParagraphBoundaries(text), findSentenceBoundaries(text, profile));
}
