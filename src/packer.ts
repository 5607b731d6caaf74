/**
 * Portion packer.
 *
 * Walks the text from the start offset and cuts it into portions of roughly
 * `wordsPerPortion` words. Once a portion reaches its budget, the cut goes to:
 * 1. the nearest paragraph break at/after the budget, within the look-ahead window
 * 2. else the nearest sentence break in that same window
 * 3. else the nearest break before the budget, within the look-back window
 * 4. else exactly at the budget, mid-sentence (reported as a warning)
 *
 * The last portion is whatever is left and may be short; it is never padded
 * or folded into the previous one.
 */

import { InvalidReadingPlanError } from './errors.js';
import { countWords, firstWordAfter, tokenizeWords } from './word-counter.js';
import type {
  Boundary,
  CutKind,
  PackOptions,
  PackResult,
  PackWarning,
  Portion,
  WordSpan
} from './types.js';

export const DEFAULT_PACK_OPTS: Required<PackOptions> = {
  lookAheadRatio: 0.2,
  lookBackRatio: 0.2,
  onPortion: null,
  shouldContinue: null,
  log: null
};

interface Cut {
  end: number;
  cut: CutKind;
}

/**
 * Size of a search window in words, never less than one word
 */
export function windowWords(wordsPerPortion: number, ratio: number): number {
  return Math.max(1, Math.round(wordsPerPortion * ratio));
}

// Index of the first boundary whose offset is >= `offset`
function lowerBound(boundaries: readonly Boundary[], offset: number): number {
  let lo = 0;
  let hi = boundaries.length;
  while (lo < hi) {
    const mid = (lo + hi) >>> 1;
    if (boundaries[mid].offset < offset) {
      lo = mid + 1;
    } else {
      hi = mid;
    }
  }
  return lo;
}

export class Packer {
  private readonly text: string;
  private readonly boundaries: readonly Boundary[];
  private readonly words: WordSpan[];
  private readonly opts: Required<PackOptions>;

  public readonly wordsPerPortion: number;
  public readonly lookAheadWords: number;
  public readonly lookBackWords: number;

  constructor(text: string, boundaries: readonly Boundary[], wordsPerPortion: number, userOpts: PackOptions = {}) {
    if (!Number.isInteger(wordsPerPortion) || wordsPerPortion < 1) {
      throw new InvalidReadingPlanError(`Words per portion must be a positive integer, got ${wordsPerPortion}`);
    }

    this.text = text;
    this.boundaries = boundaries;
    this.wordsPerPortion = wordsPerPortion;
    this.opts = {
      lookAheadRatio: userOpts.lookAheadRatio ?? DEFAULT_PACK_OPTS.lookAheadRatio,
      lookBackRatio: userOpts.lookBackRatio ?? DEFAULT_PACK_OPTS.lookBackRatio,
      onPortion: userOpts.onPortion ?? null,
      shouldContinue: userOpts.shouldContinue ?? null,
      log: userOpts.log ?? null
    };
    this.words = tokenizeWords(text);
    this.lookAheadWords = windowWords(wordsPerPortion, this.opts.lookAheadRatio);
    this.lookBackWords = windowWords(wordsPerPortion, this.opts.lookBackRatio);
  }

  pack(start: number = 0): PackResult {
    if (!Number.isInteger(start) || start < 0 || start > this.text.length) {
      throw new RangeError(`Start offset ${start} is outside the text (0-${this.text.length})`);
    }

    const portions: Portion[] = [];
    const warnings: PackWarning[] = [];
    let cancelled = false;

    if (start === this.text.length) {
      const message = 'Start position is at the end of the text; nothing to split';
      warnings.push({ type: 'empty-range', portionIndex: 0, offset: start, message });
      this.opts.log?.('info', message);
      return { portions, warnings, cancelled, finalPortionWordCount: 0 };
    }

    let cursor = start;
    let index = 1;

    while (cursor < this.text.length) {
      if (this.opts.shouldContinue && !this.opts.shouldContinue()) {
        cancelled = true;
        this.opts.log?.('info', `Stopped before portion ${index}`);
        break;
      }

      const { end, cut } = this._chooseCut(cursor);
      if (cut === 'budget') {
        const message = `Portion ${index} cut mid-sentence at offset ${end}: no boundary within the search window`;
        warnings.push({ type: 'degraded-cut', portionIndex: index, offset: end, message });
        this.opts.log?.('warn', message);
      }

      const text = this.text.slice(cursor, end);
      const portion: Portion = {
        index,
        text,
        wordCount: countWords(text),
        startOffset: cursor,
        endOffset: end,
        cut
      };

      portions.push(portion);
      this.opts.onPortion?.(portion);

      cursor = end;
      index++;
    }

    const last = portions[portions.length - 1];
    return {
      portions,
      warnings,
      cancelled,
      finalPortionWordCount: last ? last.wordCount : 0
    };
  }

  private _chooseCut(cursor: number): Cut {
    const words = this.words;
    const first = firstWordAfter(words, cursor);

    if (words.length - first <= this.wordsPerPortion) {
      return { end: this.text.length, cut: 'end' };
    }

    const budgetWord = first + this.wordsPerPortion - 1;
    const budgetPoint = words[budgetWord].end;

    const ahead = this._searchAhead(budgetPoint, budgetWord);
    if (ahead) return ahead;

    const behind = this._searchBehind(budgetPoint, first);
    if (behind) return behind;

    return { end: words[budgetWord + 1].start, cut: 'budget' };
  }

  // Paragraph first, then sentence, at/after the budget point
  private _searchAhead(budgetPoint: number, budgetWord: number): Cut | null {
    const limitWord = budgetWord + this.lookAheadWords + 1;
    const limit = limitWord < this.words.length ? this.words[limitWord].start : this.text.length;

    let sentence: number | null = null;
    for (let i = lowerBound(this.boundaries, budgetPoint); i < this.boundaries.length; i++) {
      const { offset, kind } = this.boundaries[i];
      if (offset > limit) break;
      if (kind === 'paragraph') return { end: offset, cut: 'paragraph' };
      if (sentence === null) sentence = offset;
    }

    return sentence === null ? null : { end: sentence, cut: 'sentence' };
  }

  // Nearest boundary of either kind before the budget point
  private _searchBehind(budgetPoint: number, firstWord: number): Cut | null {
    const minWords = Math.max(1, this.wordsPerPortion - this.lookBackWords);
    const limit = this.words[firstWord + minWords - 1].end;

    const i = lowerBound(this.boundaries, budgetPoint) - 1;
    if (i < 0) return null;

    const { offset } = this.boundaries[i];
    if (offset < limit) return null;

    return { end: offset, cut: 'lookback' };
  }
}

export function packPortions(
  text: string,
  boundaries: readonly Boundary[],
  start: number,
  wordsPerPortion: number,
  options: PackOptions = {}
): PackResult {
  return new Packer(text, boundaries, wordsPerPortion, options).pack(start);
}
