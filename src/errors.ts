/**
 * Error kinds raised by the portioner.
 *
 * The core raises EmptyInput, InvalidReadingPlan and PhraseNotFound; the
 * book reader raises UnsupportedFormat and BookRead.
 */

export type PortionerErrorCode =
  | 'EMPTY_INPUT'
  | 'INVALID_READING_PLAN'
  | 'PHRASE_NOT_FOUND'
  | 'UNSUPPORTED_FORMAT'
  | 'BOOK_READ_FAILED';

export class PortionerError extends Error {
  constructor(
    message: string,
    public readonly code: PortionerErrorCode,
  ) {
    super(message);
    this.name = 'PortionerError';
  }
}

export class EmptyInputError extends PortionerError {
  constructor(message = 'No readable text left after normalization') {
    super(message, 'EMPTY_INPUT');
    this.name = 'EmptyInputError';
  }
}

export class InvalidReadingPlanError extends PortionerError {
  constructor(message: string) {
    super(message, 'INVALID_READING_PLAN');
    this.name = 'InvalidReadingPlanError';
  }
}

export class PhraseNotFoundError extends PortionerError {
  constructor(public readonly phrase: string) {
    super(`Start phrase not found: "${phrase}"`, 'PHRASE_NOT_FOUND');
    this.name = 'PhraseNotFoundError';
  }
}

export class UnsupportedFormatError extends PortionerError {
  constructor(public readonly extension: string) {
    super(`Unsupported book format: ${extension || '(none)'}`, 'UNSUPPORTED_FORMAT');
    this.name = 'UnsupportedFormatError';
  }
}

export class BookReadError extends PortionerError {
  constructor(
    public readonly filePath: string,
    cause: unknown,
  ) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(`Could not read ${filePath}: ${reason}`, 'BOOK_READ_FAILED');
    this.name = 'BookReadError';
    this.cause = cause;
  }
}
