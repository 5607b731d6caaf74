import { after, describe, it } from 'node:test';
import assert from 'node:assert';
import fs from 'fs';
import os from 'os';
import path from 'path';
import { RunLog } from '../src/run-log.js';

describe('RunLog', () => {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'portioner-log-'));

  after(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it('should format timestamped lines', () => {
    const line = RunLog.formatLine('warn', 'Portion 2 cut mid-sentence', new Date(Date.UTC(2025, 0, 2, 3, 4, 5)));
    assert.strictEqual(line, '2025-01-02T03:04:05.000Z - WARN - Portion 2 cut mid-sentence\n');
  });

  it('should append lines, creating the folder first', () => {
    const file = path.join(dir, 'out', 'portioner.log');
    const log = new RunLog(file, { echo: false });
    log.write('info', 'first');
    log.callback('error', 'second');

    const lines = fs.readFileSync(file, 'utf-8').split('\n');
    assert.strictEqual(lines.length, 3);
    assert.match(lines[0], /^\d{4}-\d{2}-\d{2}T[\d:.]+Z - INFO - first$/);
    assert.match(lines[1], /^\d{4}-\d{2}-\d{2}T[\d:.]+Z - ERROR - second$/);
    assert.strictEqual(lines[2], '');
  });
});
