/**
 * Output formatter: file and folder names plus per-day file contents
 */

import type { OutputFile, OutputMeta, Portion } from './types.js';

const ISO_DATE = /^(\d{4})-(\d{2})-(\d{2})$/;
const MS_PER_DAY = 24 * 60 * 60 * 1000;

export function sanitizeBookName(name: string): string {
  return name.replace(/[<>:"/\\|?*]/g, '').trim();
}

export function formatFolderName(bookName: string, speedWpm: number): string {
  return `${bookName} ${speedWpm}wpm`;
}

export function formatPortionFileName(params: {
  bookName: string;
  date: string;
  wordCount: number;
  wordsUnit: string;
  speedWpm: number;
}): string {
  const { bookName, date, wordCount, wordsUnit, speedWpm } = params;
  return `${bookName}_${date}_${wordCount}-${wordsUnit}_${speedWpm}wpm.txt`;
}

// ============================================================================
// Calendar dates (UTC midnight, so DST never skips or repeats a day)
// ============================================================================

/**
 * Parse YYYY-MM-DD. Returns null for malformed or impossible dates.
 */
export function parseIsoDate(text: string): Date | null {
  const match = ISO_DATE.exec(text.trim());
  if (!match) return null;

  const year = Number(match[1]);
  const month = Number(match[2]);
  const day = Number(match[3]);
  const date = new Date(Date.UTC(year, month - 1, day));

  if (date.getUTCFullYear() !== year || date.getUTCMonth() !== month - 1 || date.getUTCDate() !== day) {
    return null;
  }
  return date;
}

export function formatIsoDate(date: Date): string {
  return date.toISOString().slice(0, 10);
}

export function addDays(date: Date, days: number): Date {
  return new Date(date.getTime() + days * MS_PER_DAY);
}

/**
 * Today's local calendar date as a UTC-midnight Date
 */
export function today(now: Date = new Date()): Date {
  return new Date(Date.UTC(now.getFullYear(), now.getMonth(), now.getDate()));
}

/**
 * One output file per portion, dated consecutively from the start date
 */
export function formatPortions(portions: readonly Portion[], meta: OutputMeta): OutputFile[] {
  return portions.map((portion: Portion, i: number) => {
    const date = formatIsoDate(addDays(meta.startDate, i));
    const content = portion.text.trim();
    return {
      index: portion.index,
      date,
      content,
      fileName: formatPortionFileName({
        bookName: meta.bookName,
        date,
        wordCount: portion.wordCount,
        wordsUnit: meta.wordsUnit,
        speedWpm: meta.speedWpm
      })
    };
  });
}
