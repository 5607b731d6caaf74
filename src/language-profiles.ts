/**
 * Sentence and cleanup rules per language.
 *
 * The boundary detector and normalizer read these tables; adding a language
 * means adding a profile, not touching the algorithms.
 */

import type { Language, LanguageProfile } from './types.js';

const TERMINAL_MARKS = ['.', '!', '?', '…'] as const;
const CLOSING_MARKS = ['"', "'", '”', '’', '»', ')', ']'] as const;

export const ENGLISH: LanguageProfile = {
  code: 'en',
  terminalMarks: TERMINAL_MARKS,
  closingMarks: CLOSING_MARKS,
  abbreviations: [
    'mr', 'mrs', 'ms', 'dr', 'prof', 'sr', 'jr', 'st', 'mt', 'rev', 'gen', 'col',
    'capt', 'lt', 'sgt', 'vs', 'cf', 'e.g', 'i.e', 'al', 'approx', 'fig', 'figs',
    'vol', 'vols', 'ch', 'p', 'pp', 'ed', 'eds', 'jan', 'feb', 'aug',
    'sept', 'oct', 'nov', 'dec'
  ],
  captionWords: ['Figure', 'Fig.', 'Table']
};

export const RUSSIAN: LanguageProfile = {
  code: 'ru',
  terminalMarks: TERMINAL_MARKS,
  closingMarks: CLOSING_MARKS,
  abbreviations: [
    'г', 'гг', 'в', 'вв', 'т.е', 'т.к', 'т.н', 'т.п', 'т.д', 'др', 'пр', 'см', 'ср',
    'рис', 'табл', 'стр', 'с', 'гл', 'ул', 'д', 'им', 'проф', 'акад', 'тыс', 'млн',
    'млрд', 'руб', 'коп', 'напр'
  ],
  captionWords: ['Рис.', 'Рисунок', 'Таблица', 'Табл.']
};

const PROFILES: Record<Language, LanguageProfile> = {
  en: ENGLISH,
  ru: RUSSIAN
};

export function getLanguageProfile(language: Language): LanguageProfile {
  return PROFILES[language];
}
