/**
 * Interactive Prompts
 * Line-based questions on stdin/stdout for values not given as flags
 */

import readline from 'readline';
import type { Interface } from 'readline';
import { answerMatches, translate } from './locales.js';
import type { Language, Translations } from './types.js';

export interface Prompter {
  ask(question: string): Promise<string>;
  close(): void;
}

export class ReadlinePrompter implements Prompter {
  private rl: Interface | null = null;

  private _interface(): Interface {
    if (!this.rl) {
      this.rl = readline.createInterface({
        input: process.stdin,
        output: process.stdout
      });
    }
    return this.rl;
  }

  ask(question: string): Promise<string> {
    const rl = this._interface();
    return new Promise((resolve) => {
      rl.question(question, (answer: string) => {
        resolve(answer.trim());
      });
    });
  }

  close(): void {
    this.rl?.close();
    this.rl = null;
  }
}

export async function askLanguage(prompter: Prompter, table: Translations): Promise<Language> {
  for (;;) {
    const choice = (await prompter.ask(translate(table, 'language_prompt'))).toLowerCase();
    if (['ru', 'русский', 'russian'].includes(choice)) return 'ru';
    if (['', 'en', 'english'].includes(choice)) return 'en';
    console.log(translate(table, 'invalid_language'));
  }
}

/**
 * Ask for a positive whole number; an empty answer keeps `current`
 */
export async function askPositiveInteger(
  prompter: Prompter,
  table: Translations,
  key: string,
  current: number
): Promise<number> {
  for (;;) {
    const answer = await prompter.ask(translate(table, key, { current }));
    if (answer === '') return current;
    if (/^\d+$/.test(answer) && parseInt(answer, 10) > 0) {
      return parseInt(answer, 10);
    }
    console.log(translate(table, 'positive_number'));
  }
}

/**
 * Ask a yes/no question; an empty answer returns `defaultAnswer` when one is given
 */
export async function askYesNo(
  prompter: Prompter,
  table: Translations,
  key: string,
  vars: Record<string, string | number> = {},
  defaultAnswer: boolean | null = null
): Promise<boolean> {
  for (;;) {
    const answer = await prompter.ask(translate(table, key, vars));
    if (answer === '' && defaultAnswer !== null) return defaultAnswer;
    if (answerMatches(table, 'yes_answers', answer)) return true;
    if (answerMatches(table, 'no_answers', answer)) return false;
    console.log(translate(table, 'invalid_choice'));
  }
}
