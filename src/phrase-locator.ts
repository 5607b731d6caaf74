/**
 * Start-phrase locator: where in the normalized text packing begins.
 */

import { PhraseNotFoundError } from './errors.js';
import { whitespaceTolerantPattern } from './text-utils.js';

/**
 * Offset of the first case-insensitive occurrence of `phrase`, or 0 when no
 * phrase is given. Throws PhraseNotFoundError when the phrase is absent; the
 * caller decides whether to ask again or start from the beginning.
 */
export function locateStart(text: string, phrase?: string | null): number {
  if (!phrase?.trim()) return 0;

  const pattern = new RegExp(whitespaceTolerantPattern(phrase), 'iu');
  const match = pattern.exec(text);
  if (!match) {
    throw new PhraseNotFoundError(phrase.trim());
  }

  return match.index;
}
