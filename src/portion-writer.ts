/**
 * Portion Writer Module
 * Writes formatted portions into the output folder
 */

import fs from 'fs';
import path from 'path';
import type { OutputFile } from './types.js';

export function isNonEmptyDirectory(dir: string): boolean {
  if (!fs.existsSync(dir)) return false;
  return fs.statSync(dir).isDirectory() && fs.readdirSync(dir).length > 0;
}

/**
 * Write every file as UTF-8, creating the folder first. Returns the written paths.
 */
export function writePortionFiles(dir: string, files: readonly OutputFile[]): string[] {
  fs.mkdirSync(dir, { recursive: true });

  const written: string[] = [];
  for (const file of files) {
    const filePath = path.join(dir, file.fileName);
    try {
      fs.writeFileSync(filePath, file.content, 'utf-8');
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      throw new Error(`Failed to write ${filePath}: ${message}`);
    }
    written.push(filePath);
  }
  return written;
}
