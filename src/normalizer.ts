/**
 * Text normalizer.
 *
 * Turns decoded book text into the canonical form the rest of the pipeline
 * works on:
 * - Line endings unified, BOM and invisible formatting characters dropped
 * - Optional noise removal: footnote markers ([12], [3, 4]), superscript
 *   references, "Figure 3." / "Table 2:" caption lines and "(see Figure 3)"
 * - Paragraphs separated by exactly one blank line, every other whitespace
 *   run collapsed to a single space
 */

import { EmptyInputError } from './errors.js';
import { ENGLISH } from './language-profiles.js';
import { escapeRegExp } from './text-utils.js';
import { countWords } from './word-counter.js';
import type { NormalizedText, NormalizeOptions } from './types.js';

export const PARAGRAPH_SEPARATOR = '\n\n';

export const DEFAULT_NORMALIZE_OPTS: Required<NormalizeOptions> = {
  stripNoise: false,
  captionWords: ENGLISH.captionWords
};

const INVISIBLE_CHARS = /[\u00AD\u200B\u200C\u200D\u2060\uFEFF]/g;
const FOOTNOTE_MARKER = /[ \t]*\[\d+(?:\s*[,–-]\s*\d+)*\]/g;
const SUPERSCRIPT_REF = /(?<=[\p{L}\p{N}.,;:!?)"'”’»])[\u00B9\u00B2\u00B3\u2070\u2074-\u2079]+/gu;
const PARAGRAPH_BREAK = /\n\s*\n/;

function captionAlternation(captionWords: readonly string[]): string {
  return captionWords.map(escapeRegExp).join('|');
}

// "Figure 3. The setup", "Table 2:", "Рис. 5. Схема" on a line of their own
export function captionLinePattern(captionWords: readonly string[]): RegExp {
  const words = captionAlternation(captionWords);
  return new RegExp(
    `^[ \\t]*(?:${words})[ \\t]+\\d+(?:\\.\\d+)*(?:[.:][ \\t].*|[.:]?[ \\t]*)$\\n?`,
    'gmu'
  );
}

// "(Figure 3)", "(see Table 2)", "(см. Рис. 4)"
export function captionMentionPattern(captionWords: readonly string[]): RegExp {
  const words = captionAlternation(captionWords);
  return new RegExp(
    `[ \\t]*\\((?:\\p{L}+\\.?[ \\t]+)?(?:${words})[ \\t]+\\d+(?:\\.\\d+)*\\)`,
    'giu'
  );
}

export function stripNoise(text: string, captionWords: readonly string[] = ENGLISH.captionWords): string {
  // Markers go first so "Figure 1[2]" still reads as a caption line
  const result = text
    .replace(FOOTNOTE_MARKER, '')
    .replace(SUPERSCRIPT_REF, '');
  if (captionWords.length === 0) return result;
  return result
    .replace(captionLinePattern(captionWords), '')
    .replace(captionMentionPattern(captionWords), '');
}

export function collapseWhitespace(text: string): string {
  return text
    .split(PARAGRAPH_BREAK)
    .map((paragraph: string) => paragraph.replace(/\s+/g, ' ').trim())
    .filter((paragraph: string) => paragraph.length > 0)
    .join(PARAGRAPH_SEPARATOR);
}

/**
 * Normalize raw decoded text. Throws EmptyInputError when nothing readable is left.
 */
export function normalizeText(raw: string, userOpts: NormalizeOptions = {}): NormalizedText {
  const opts: Required<NormalizeOptions> = { ...DEFAULT_NORMALIZE_OPTS, ...userOpts };

  let text = raw.replace(/\r\n?/g, '\n').replace(INVISIBLE_CHARS, '');

  if (opts.stripNoise) {
    text = stripNoise(text, opts.captionWords);
  }

  text = collapseWhitespace(text);

  const wordCount = countWords(text);
  if (text.length === 0 || wordCount === 0) {
    throw new EmptyInputError();
  }

  return { text, wordCount };
}
