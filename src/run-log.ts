/**
 * Run Log Module
 * Appends "<timestamp> - <LEVEL> - <message>" lines to a log file
 */

import fs from 'fs';
import path from 'path';
import type { LogCallback } from './types.js';

export class RunLog {
  public readonly file: string;
  private readonly echo: boolean;

  constructor(file: string, options: { echo?: boolean } = {}) {
    this.file = file;
    this.echo = options.echo ?? process.env.DEBUG === '1';
  }

  static formatLine(type: string, message: string, now: Date = new Date()): string {
    return `${now.toISOString()} - ${type.toUpperCase()} - ${message}\n`;
  }

  write(type: 'info' | 'warn' | 'error', message: string): void {
    if (this.echo) {
      console.error(`[${type}] ${message}`);
    }
    try {
      fs.mkdirSync(path.dirname(this.file), { recursive: true });
      fs.appendFileSync(this.file, RunLog.formatLine(type, message), 'utf-8');
    } catch (err) {
      console.error('Failed to write log:', err);
    }
  }

  get callback(): LogCallback {
    return (type, message) => this.write(type, message);
  }
}
