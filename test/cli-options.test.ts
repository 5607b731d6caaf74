import { describe, it } from 'node:test';
import assert from 'node:assert';
import { CliOptions, HELP_TEXT } from '../src/cli-options.js';

describe('CliOptions', () => {
  describe('basic parsing', () => {
    it('should accept a single book file', () => {
      const options = new CliOptions(['book.txt']);

      assert.strictEqual(options.isValid(), true);
      assert.strictEqual(options.bookFile, 'book.txt');
      assert.strictEqual(options.wpm, null);
      assert.strictEqual(options.minutes, null);
      assert.strictEqual(options.startPhrase, null);
      assert.strictEqual(options.clean, null);
      assert.strictEqual(options.language, null);
      assert.strictEqual(options.force, false);
      assert.strictEqual(options.dryRun, false);
    });

    it('should parse every flag', () => {
      const options = new CliOptions([
        'book.epub',
        '--wpm', '300',
        '--minutes=10',
        '--start', 'Chapter 2',
        '--date', '2025-01-01',
        '--lang', 'ru',
        '--out', 'portions',
        '--force',
        '--dry-run',
        '--save',
        '--no-clean'
      ]);

      assert.strictEqual(options.isValid(), true);
      assert.strictEqual(options.bookFile, 'book.epub');
      assert.strictEqual(options.wpm, 300);
      assert.strictEqual(options.minutes, 10);
      assert.strictEqual(options.startPhrase, 'Chapter 2');
      assert.strictEqual(options.date, '2025-01-01');
      assert.strictEqual(options.language, 'ru');
      assert.strictEqual(options.outDir, 'portions');
      assert.strictEqual(options.force, true);
      assert.strictEqual(options.dryRun, true);
      assert.strictEqual(options.save, true);
      assert.strictEqual(options.clean, false);
    });

    it('should accept flags before the book file', () => {
      const options = new CliOptions(['--clean', '--wpm=250', 'book.fb2']);

      assert.strictEqual(options.isValid(), true);
      assert.strictEqual(options.bookFile, 'book.fb2');
      assert.strictEqual(options.clean, true);
      assert.strictEqual(options.wpm, 250);
    });

    it('should keep an empty start phrase', () => {
      const options = new CliOptions(['book.txt', '--start=']);
      assert.strictEqual(options.startPhrase, '');
    });
  });

  describe('help', () => {
    it('should set help without requiring a book file', () => {
      for (const flag of ['-h', '--help']) {
        const options = new CliOptions([flag]);
        assert.strictEqual(options.help, true);
        assert.strictEqual(options.isValid(), true);
      }
    });

    it('should describe every flag', () => {
      for (const flag of ['--wpm', '--minutes', '--start', '--date', '--clean', '--no-clean', '--lang', '--out', '--force', '--dry-run', '--save']) {
        assert.ok(HELP_TEXT.includes(flag), `help is missing ${flag}`);
      }
    });
  });

  describe('validation', () => {
    it('should require exactly one book file', () => {
      assert.deepStrictEqual(new CliOptions([]).errors, ['Expected exactly one book file']);
      assert.deepStrictEqual(new CliOptions(['a.txt', 'b.txt']).errors, ['Expected exactly one book file']);
    });

    it('should reject non-numeric speed', () => {
      const options = new CliOptions(['book.txt', '--wpm', 'fast']);
      assert.strictEqual(options.isValid(), false);
      assert.deepStrictEqual(options.errors, ['Reading speed must be a number']);
      assert.strictEqual(options.wpm, null);
    });

    it('should reject zero minutes', () => {
      const options = new CliOptions(['book.txt', '--minutes', '0']);
      assert.deepStrictEqual(options.errors, ['Minutes per day must be at least 1']);
    });

    it('should reject negative numbers', () => {
      const options = new CliOptions(['book.txt', '--wpm', '-5']);
      assert.deepStrictEqual(options.errors, ['Reading speed must be a number']);
    });

    it('should require a value for value flags', () => {
      const options = new CliOptions(['book.txt', '--wpm']);
      assert.deepStrictEqual(options.errors, ['--wpm requires a value']);
    });

    it('should reject unknown languages', () => {
      const options = new CliOptions(['book.txt', '--lang', 'fr']);
      assert.deepStrictEqual(options.errors, ['Language must be one of: en, ru (got "fr")']);
    });

    it('should reject unknown flags', () => {
      assert.deepStrictEqual(new CliOptions(['book.txt', '--colour']).errors, ['Unknown flag: --colour']);
      assert.deepStrictEqual(new CliOptions(['book.txt', '--force=yes']).errors, ['Unknown flag: --force=yes']);
    });
  });

  describe('messages', () => {
    it('should list every error', () => {
      const options = new CliOptions(['--wpm', 'x']);
      assert.strictEqual(
        options.getErrorMessage(),
        '\n❌ Reading speed must be a number\n❌ Expected exactly one book file\n'
      );
    });

    it('should have no error message when valid', () => {
      assert.strictEqual(new CliOptions(['book.txt']).getErrorMessage(), null);
    });

    it('should show usage', () => {
      assert.ok(new CliOptions([]).getUsageMessage().includes('Usage: portioner [options] <bookFile>'));
    });
  });
});
