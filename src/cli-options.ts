/**
 * CLI Options Parser
 * Handles command-line argument parsing: the book file plus reading and output flags
 */

import { isLanguage } from './settings.js';
import type { CliOptionsData, Language } from './types.js';

const VALUE_FLAGS = ['wpm', 'minutes', 'start', 'date', 'lang', 'out'] as const;
type ValueFlag = typeof VALUE_FLAGS[number];

function isValueFlag(flag: string): flag is ValueFlag {
  return (VALUE_FLAGS as readonly string[]).includes(flag);
}

export class CliOptions implements CliOptionsData {
  bookFile: string | null = null;
  wpm: number | null = null;
  minutes: number | null = null;
  startPhrase: string | null = null;
  date: string | null = null;
  clean: boolean | null = null;
  language: Language | null = null;
  outDir: string | null = null;
  force: boolean = false;
  dryRun: boolean = false;
  save: boolean = false;
  help: boolean = false;
  errors: string[] = [];

  constructor(argv: string[] = process.argv.slice(2)) {
    this._parse(argv);
  }

  private _parse(argv: string[]): void {
    const args: string[] = [];

    for (let i = 0; i < argv.length; i++) {
      const arg = argv[i];

      if (arg === '-h' || arg === '--help') {
        this.help = true;
        continue;
      }

      if (!arg.startsWith('--')) {
        args.push(arg);
        continue;
      }

      const eq = arg.indexOf('=');
      const flag = eq === -1 ? arg.slice(2) : arg.slice(2, eq);

      if (isValueFlag(flag)) {
        let value: string | undefined;
        if (eq !== -1) {
          value = arg.slice(eq + 1);
        } else if (i + 1 < argv.length) {
          value = argv[++i];
        }
        if (value === undefined) {
          this.errors.push(`--${flag} requires a value`);
          continue;
        }
        this._setValue(flag, value);
        continue;
      }

      if (eq !== -1) {
        this.errors.push(`Unknown flag: ${arg}`);
      } else if (flag === 'clean') {
        this.clean = true;
      } else if (flag === 'no-clean') {
        this.clean = false;
      } else if (flag === 'force') {
        this.force = true;
      } else if (flag === 'dry-run') {
        this.dryRun = true;
      } else if (flag === 'save') {
        this.save = true;
      } else {
        this.errors.push(`Unknown flag: ${arg}`);
      }
    }

    if (this.help) return;

    if (args.length !== 1) {
      this.errors.push('Expected exactly one book file');
      return;
    }
    this.bookFile = args[0];
  }

  private _setValue(flag: ValueFlag, value: string): void {
    switch (flag) {
      case 'wpm':
        this.wpm = this._positiveInteger(value, 'Reading speed');
        break;
      case 'minutes':
        this.minutes = this._positiveInteger(value, 'Minutes per day');
        break;
      case 'start':
        this.startPhrase = value;
        break;
      case 'date':
        this.date = value;
        break;
      case 'lang':
        if (isLanguage(value)) {
          this.language = value;
        } else {
          this.errors.push(`Language must be one of: en, ru (got "${value}")`);
        }
        break;
      case 'out':
        this.outDir = value;
        break;
    }
  }

  private _positiveInteger(value: string, what: string): number | null {
    if (!/^\d+$/.test(value.trim())) {
      this.errors.push(`${what} must be a number`);
      return null;
    }
    const n = parseInt(value, 10);
    if (n < 1) {
      this.errors.push(`${what} must be at least 1`);
      return null;
    }
    return n;
  }

  isValid(): boolean {
    return this.errors.length === 0;
  }

  getErrorMessage(): string | null {
    if (this.errors.length === 0) {
      return null;
    }

    return '\n❌ ' + this.errors.join('\n❌ ') + '\n';
  }

  getUsageMessage(): string {
    return `
Usage: portioner [options] <bookFile>

Run 'portioner --help' for full usage information.

Quick examples:
  portioner book.epub                     Split with saved settings
  portioner book.fb2 --wpm 300 --minutes 10
  portioner book.txt --start "Chapter 2"  Begin at a phrase
`;
  }
}

export const HELP_TEXT = `
portioner - Split a book into daily reading portions

Usage:
  portioner [options] <bookFile>

Arguments:
  bookFile             .txt, .fb2, .fb2.zip or .epub file

Options:
  --wpm <n>            Reading speed in words per minute (default: saved, 350)
  --minutes <n>        Reading time per day (default: saved, 8)
  --start "<phrase>"   Begin at the first occurrence of a phrase
  --date YYYY-MM-DD    Date of the first portion (default: today)
  --clean              Remove footnotes, references and figure captions
  --no-clean           Keep the text as is
  --lang en|ru         Interface and text language
  --out <dir>          Output folder (default: "<book> <wpm>wpm" next to the book)
  --force              Overwrite files in a non-empty output folder
  --dry-run            Plan portions and print statistics without writing
  --save               Remember --wpm, --minutes and --lang as defaults
  --help, -h           Show this help

Missing answers are asked interactively when running in a terminal.

Examples:
  portioner "War and Peace.fb2"
  portioner book.epub --wpm 400 --minutes 15 --date 2025-01-01
  portioner book.txt --start "Chapter 5" --no-clean --dry-run
`;
