/**
 * Settings Module
 * Persists reading speed, daily time and interface language across runs
 */

import fs from 'fs';
import os from 'os';
import path from 'path';
import type { Language, LoadedSettings, ReadingSettings } from './types.js';

export const DEFAULT_SETTINGS: ReadingSettings = {
  minutesPerDay: 8,
  wordsPerMinute: 350,
  language: 'en'
};

export const LANGUAGES: readonly Language[] = ['en', 'ru'];

export function settingsPath(): string {
  return process.env.PORTIONER_SETTINGS || path.join(os.homedir(), '.portioner_settings.json');
}

export function isLanguage(value: unknown): value is Language {
  return typeof value === 'string' && (LANGUAGES as readonly string[]).includes(value);
}

function positiveInteger(value: unknown, fallback: number): number {
  return typeof value === 'number' && Number.isInteger(value) && value > 0 ? value : fallback;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Load saved settings. A missing file, unreadable JSON or a missing/unknown
 * language counts as a first run; bad numbers fall back to the defaults.
 */
export function loadSettings(file: string = settingsPath()): LoadedSettings {
  if (!fs.existsSync(file)) {
    return { settings: { ...DEFAULT_SETTINGS }, firstRun: true };
  }

  let data: unknown;
  try {
    data = JSON.parse(fs.readFileSync(file, 'utf-8'));
  } catch {
    return { settings: { ...DEFAULT_SETTINGS }, firstRun: true };
  }

  if (!isRecord(data)) {
    return { settings: { ...DEFAULT_SETTINGS }, firstRun: true };
  }

  const language = isLanguage(data.language) ? data.language : DEFAULT_SETTINGS.language;
  return {
    settings: {
      minutesPerDay: positiveInteger(data.minutesPerDay, DEFAULT_SETTINGS.minutesPerDay),
      wordsPerMinute: positiveInteger(data.wordsPerMinute, DEFAULT_SETTINGS.wordsPerMinute),
      language
    },
    firstRun: !isLanguage(data.language)
  };
}

export function saveSettings(settings: ReadingSettings, file: string = settingsPath()): void {
  fs.writeFileSync(file, JSON.stringify(settings, null, 2));
}
