/**
 * Localized interface strings, loaded from locales/<lang>.json
 */

import fs from 'fs';
import path from 'path';
import { fileURLToPath } from 'url';
import type { Language, Translations } from './types.js';

const __dirname = path.dirname(fileURLToPath(import.meta.url));

export const LOCALES_DIR = path.join(__dirname, '..', 'locales');

// Used when no locale file can be read at all
const FALLBACK: Translations = {
  header: '=== Book Portioner v{version} ===\n',
  language_prompt: 'Choose interface language / Выберите язык интерфейса (en/ru) [en]: ',
  invalid_language: 'Please enter en or ru',
  words_unit: 'words',
  yes_answers: 'y,yes',
  no_answers: 'n,no'
};

function readTable(file: string): Translations | null {
  if (!fs.existsSync(file)) return null;
  try {
    const data: unknown = JSON.parse(fs.readFileSync(file, 'utf-8'));
    if (typeof data !== 'object' || data === null) return null;

    const table: Translations = {};
    for (const [key, value] of Object.entries(data)) {
      if (typeof value === 'string') table[key] = value;
    }
    return table;
  } catch {
    return null;
  }
}

/**
 * Strings for a language, falling back to English and then to a built-in table
 */
export function loadTranslations(lang: Language | string, dir: string = LOCALES_DIR): Translations {
  return readTable(path.join(dir, `${lang}.json`)) ?? readTable(path.join(dir, 'en.json')) ?? { ...FALLBACK };
}

/**
 * Look up a key and fill {name} placeholders. Unknown keys render as the key.
 */
export function translate(table: Translations, key: string, vars: Record<string, string | number> = {}): string {
  const template = table[key] ?? FALLBACK[key] ?? key;
  return template.replace(/\{(\w+)\}/g, (whole: string, name: string) =>
    name in vars ? String(vars[name]) : whole
  );
}

export type Translator = (key: string, vars?: Record<string, string | number>) => string;

export function createTranslator(table: Translations): Translator {
  return (key, vars) => translate(table, key, vars);
}

/**
 * Whether an answer matches one of the comma-separated words under `key`
 */
export function answerMatches(table: Translations, key: 'yes_answers' | 'no_answers', answer: string): boolean {
  const words = translate(table, key).split(',').map((w: string) => w.trim().toLowerCase());
  return words.includes(answer.trim().toLowerCase());
}
