/**
 * Book portioner pipeline.
 *
 * normalize → count → detect boundaries → locate start → pack
 *
 * Everything here is synchronous and depends only on the request; reading
 * settings, files and prompts stay with the caller.
 */

import { detectBoundaries } from './boundary-detector.js';
import { InvalidReadingPlanError } from './errors.js';
import { ENGLISH } from './language-profiles.js';
import { normalizeText } from './normalizer.js';
import { packPortions } from './packer.js';
import { locateStart } from './phrase-locator.js';
import { countWords } from './word-counter.js';
import type { ReadingPlan, RunSummary, SplitPlan, SplitRequest, SplitResult } from './types.js';

/**
 * Target words per portion: speed × minutes, rounded. Throws InvalidReadingPlanError
 * for non-positive or non-finite inputs and for budgets that round to zero.
 */
export function wordsPerPortion(plan: ReadingPlan): number {
  const { speedWpm, minutesPerDay } = plan;

  if (!Number.isFinite(speedWpm) || speedWpm <= 0) {
    throw new InvalidReadingPlanError(`Reading speed must be a positive number, got ${speedWpm}`);
  }
  if (!Number.isFinite(minutesPerDay) || minutesPerDay <= 0) {
    throw new InvalidReadingPlanError(`Minutes per day must be a positive number, got ${minutesPerDay}`);
  }

  const budget = Math.round(speedWpm * minutesPerDay);
  if (budget < 1) {
    throw new InvalidReadingPlanError(`${speedWpm} wpm × ${minutesPerDay} min is less than one word per portion`);
  }
  return budget;
}

export function splitBook(request: SplitRequest): SplitResult {
  const profile = request.profile ?? ENGLISH;
  const budget = wordsPerPortion(request.plan);

  const normalized = normalizeText(request.rawText, {
    stripNoise: request.stripNoise,
    captionWords: profile.captionWords
  });
  const { text } = normalized;

  const boundaries = detectBoundaries(text, profile);
  const startOffset = locateStart(text, request.startPhrase);
  const startOffsetWordCount = countWords(text.slice(0, startOffset));

  request.log?.('info', `Normalized text: ${normalized.wordCount} words, ${boundaries.length} boundaries`);

  const planned: SplitPlan = {
    wordsPerPortion: budget,
    totalWordCount: normalized.wordCount,
    startOffset,
    startOffsetWordCount,
    estimatedPortionCount: Math.ceil(Math.max(0, normalized.wordCount - startOffsetWordCount) / budget)
  };
  request.onPlanned?.(planned);

  const packed = packPortions(text, boundaries, startOffset, budget, request);

  return { ...packed, ...planned, normalized };
}

export function summarizeRun(result: Pick<SplitResult, 'portions' | 'totalWordCount'>, plan: ReadingPlan): RunSummary {
  const portionCount = result.portions.length;
  return {
    portionCount,
    totalHours: result.totalWordCount / plan.speedWpm / 60,
    averagePortionWords: portionCount > 0 ? Math.floor(result.totalWordCount / portionCount) : 0
  };
}

export { normalizeText } from './normalizer.js';
export { countWords, tokenizeWords } from './word-counter.js';
export { detectBoundaries } from './boundary-detector.js';
export { locateStart } from './phrase-locator.js';
export { packPortions, Packer } from './packer.js';
export { ENGLISH, RUSSIAN, getLanguageProfile } from './language-profiles.js';
export * from './errors.js';
export type * from './types.js';
