#!/usr/bin/env node

import path from 'path';
import { fileURLToPath } from 'url';
import { readBook } from './book-reader.js';
import { CliOptions, HELP_TEXT } from './cli-options.js';
import { formatFolderName, formatPortions, parseIsoDate, sanitizeBookName, today } from './formatter.js';
import { createTranslator, loadTranslations } from './locales.js';
import type { Translator } from './locales.js';
import { isNonEmptyDirectory, writePortionFiles } from './portion-writer.js';
import { PhraseNotFoundError, getLanguageProfile, splitBook, summarizeRun } from './portioner.js';
import { ProgressBar } from './progress-bar.js';
import { ReadlinePrompter, askLanguage, askPositiveInteger, askYesNo } from './prompts.js';
import type { Prompter } from './prompts.js';
import { RunLog } from './run-log.js';
import { loadSettings, saveSettings, settingsPath } from './settings.js';
import type { ReadingPlan, ReadingSettings, SplitRequest, SplitResult } from './types.js';

export const VERSION = '1.0.0';
export const LOG_FILE_NAME = 'portioner.log';

export interface RunContext {
  /** Whether missing answers may be asked; defaults to whether stdin is a terminal */
  interactive?: boolean;
  prompter?: Prompter;
  settingsFile?: string;
  now?: Date;
}

interface Session {
  options: CliOptions;
  bookFile: string;
  prompter: Prompter | null;
  settingsFile: string;
  now: Date;
}

/**
 * Run the CLI and return its exit code
 */
export async function run(argv: string[] = process.argv.slice(2), context: RunContext = {}): Promise<number> {
  const options = new CliOptions(argv);

  if (options.help) {
    console.log(HELP_TEXT);
    return 0;
  }

  const bookFile = options.bookFile;
  if (!options.isValid() || bookFile === null) {
    console.error(options.getErrorMessage() ?? '');
    console.error(options.getUsageMessage());
    return 1;
  }

  const interactive = context.interactive ?? process.stdin.isTTY === true;
  const prompter = interactive ? context.prompter ?? new ReadlinePrompter() : null;

  try {
    return await splitCommand({
      options,
      bookFile,
      prompter,
      settingsFile: context.settingsFile ?? settingsPath(),
      now: context.now ?? new Date()
    });
  } finally {
    prompter?.close();
  }
}

async function splitCommand(session: Session): Promise<number> {
  const { options, bookFile, prompter } = session;

  const settings = await resolveSettings(session);
  const table = loadTranslations(settings.language);
  const t = createTranslator(table);

  const book = await readBook(bookFile);
  console.log(t('reading_book', { file: path.basename(bookFile) }));

  const stripNoise = options.clean ?? (prompter ? await askYesNo(prompter, table, 'clean_prompt', {}, true) : true);
  console.log(t(stripNoise ? 'cleaned' : 'not_cleaned'));

  const plan: ReadingPlan = { speedWpm: settings.wordsPerMinute, minutesPerDay: settings.minutesPerDay };
  const bookName = sanitizeBookName(book.name);
  const outDir = options.outDir ?? path.join(path.dirname(bookFile), formatFolderName(bookName, plan.speedWpm));

  if (!options.dryRun && !options.force && isNonEmptyDirectory(outDir)) {
    if (!prompter) {
      console.error(`\n❌ ${t('folder_exists_error', { folder: outDir })}\n`);
      return 1;
    }
    if (!(await askYesNo(prompter, table, 'folder_exists', { folder: outDir }))) {
      console.log(t('operation_cancelled'));
      return 0;
    }
  }

  const runLog = options.dryRun ? null : new RunLog(path.join(outDir, LOG_FILE_NAME));
  runLog?.write('info', `Book: ${bookFile} (${book.format}), ${plan.speedWpm} wpm × ${plan.minutesPerDay} min, clean=${stripNoise}`);

  const startDate = await resolveStartDate(session, t);
  const request: SplitRequest = {
    rawText: book.text,
    stripNoise,
    plan,
    profile: getLanguageProfile(settings.language),
    log: runLog?.callback ?? null
  };

  let startPhrase = options.startPhrase ?? (prompter ? await prompter.ask(t('start_phrase_prompt')) : null);
  let result: SplitResult | null = null;

  while (result === null) {
    const progress: { bar: ProgressBar | null } = { bar: null };
    try {
      result = splitBook({
        ...request,
        startPhrase,
        onPlanned: (planned) => {
          console.log(t('total_words', { total_words: planned.totalWordCount }));
          console.log(t('calculation', {
            wpm: plan.speedWpm,
            minutes: plan.minutesPerDay,
            chunk: planned.wordsPerPortion
          }));
          if (startPhrase?.trim()) {
            console.log(t('found_position', { pos: planned.startOffset, word: planned.startOffsetWordCount }));
          } else {
            console.log(t('start_from_beginning'));
          }
          console.log(t('estimate', { count: planned.estimatedPortionCount }));
          progress.bar = new ProgressBar(planned.totalWordCount - planned.startOffsetWordCount, {
            label: t('splitting_progress'),
            unit: t('words_unit')
          });
        },
        onPortion: (portion) => progress.bar?.update(portion.wordCount)
      });
    } catch (err) {
      if (!(err instanceof PhraseNotFoundError)) throw err;
      console.error(`\n❌ ${t('phrase_not_found', { phrase: err.phrase })}\n`);
      runLog?.write('warn', err.message);
      if (!prompter) return 1;
      startPhrase = await prompter.ask(t('start_phrase_prompt'));
    } finally {
      progress.bar?.close();
    }
  }

  if (result.warnings.some((w) => w.type === 'empty-range')) {
    console.log(t('empty_range'));
    return 0;
  }

  const degraded = result.warnings.filter((w) => w.type === 'degraded-cut').length;
  if (degraded > 0) {
    console.log(t('degraded_cuts', { count: degraded }));
  }

  const files = formatPortions(result.portions, {
    bookName,
    startDate,
    speedWpm: plan.speedWpm,
    wordsUnit: t('words_unit')
  });

  if (options.dryRun) {
    console.log(t('dry_run', { count: files.length }));
  } else {
    writePortionFiles(outDir, files);
    console.log(t('done', { count: files.length }));
    console.log(t('output_dir', { dir: outDir }));
  }

  const summary = summarizeRun(result, plan);
  const hours = summary.totalHours.toFixed(1);
  console.log(t('stats_header'));
  console.log(t('stats_days', { days: summary.portionCount }));
  console.log(t('stats_total_time', { hours }));
  console.log(t('stats_avg_chunk', { avg: summary.averagePortionWords }));
  runLog?.write('info', `Created ${summary.portionCount} portions, ${hours} h total, ${summary.averagePortionWords} words on average`);

  return 0;
}

/**
 * Flags win over saved settings. Interactive runs ask for whatever no flag
 * gave and remember the answers; flags are remembered only with --save.
 */
async function resolveSettings(session: Session): Promise<ReadingSettings> {
  const { options, prompter, settingsFile } = session;
  const { settings: saved, firstRun } = loadSettings(settingsFile);
  const settings: ReadingSettings = { ...saved };
  let answered = false;

  if (options.language) {
    settings.language = options.language;
  } else if (firstRun && prompter) {
    settings.language = await askLanguage(prompter, loadTranslations(saved.language));
    answered = true;
  }

  const table = loadTranslations(settings.language);
  const t = createTranslator(table);
  console.log(t('header', { version: VERSION }));

  if (options.wpm !== null) {
    settings.wordsPerMinute = options.wpm;
  } else if (prompter) {
    settings.wordsPerMinute = await askPositiveInteger(prompter, table, 'wpm_prompt', saved.wordsPerMinute);
    answered = true;
  }

  if (options.minutes !== null) {
    settings.minutesPerDay = options.minutes;
  } else if (prompter) {
    settings.minutesPerDay = await askPositiveInteger(prompter, table, 'minutes_prompt', saved.minutesPerDay);
    answered = true;
  }

  if (options.save || answered) {
    const toSave: ReadingSettings = options.save ? settings : {
      language: options.language ? saved.language : settings.language,
      wordsPerMinute: options.wpm !== null ? saved.wordsPerMinute : settings.wordsPerMinute,
      minutesPerDay: options.minutes !== null ? saved.minutesPerDay : settings.minutesPerDay
    };
    try {
      saveSettings(toSave, settingsFile);
      if (options.save) console.log(t('settings_saved'));
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      console.error(`\n❌ Failed to save settings: ${message}\n`);
    }
  }

  return settings;
}

async function resolveStartDate(session: Session, t: Translator): Promise<Date> {
  const { options, prompter, now } = session;
  const answer = options.date ?? (prompter ? await prompter.ask(t('date_prompt')) : '');
  if (!answer.trim()) return today(now);

  const date = parseIsoDate(answer);
  if (date) return date;

  console.log(t('invalid_date', { date: answer }));
  return today(now);
}

// Main execution check
const modulePath = fileURLToPath(import.meta.url);
const scriptPath = process.argv[1];

if (scriptPath && (modulePath.endsWith(scriptPath) || scriptPath.endsWith('portioner') || scriptPath.endsWith('portioner-cli.js'))) {
  run().then((code) => {
    process.exitCode = code;
  }).catch(err => {
    const message = err instanceof Error ? err.message : String(err);
    console.error(`\n❌ Fatal error: ${message}\n`);
    if (process.env.DEBUG === '1' && err instanceof Error) {
      console.error(err.stack);
    }
    process.exit(1);
  });
}
