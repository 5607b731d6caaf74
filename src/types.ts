/**
 * Shared type definitions for the book portioner
 */

// ============================================================================
// Text Types
// ============================================================================

/**
 * Book text after cleanup, with its whole-book word count
 */
export interface NormalizedText {
  /** Paragraphs joined by a single blank line, no other line breaks */
  readonly text: string;
  /** Word count of the whole text */
  readonly wordCount: number;
}

export interface NormalizeOptions {
  /** Remove footnote markers, bracketed references and figure/table captions */
  stripNoise?: boolean;
  /** Caption words to strip ("Figure", "Table", ...); defaults to the English profile */
  captionWords?: readonly string[];
}

/**
 * Character span of a single word
 */
export interface WordSpan {
  start: number;
  end: number;
}

export type BoundaryKind = 'paragraph' | 'sentence';

/**
 * Candidate cut point. The offset is the first character of the next unit.
 */
export interface Boundary {
  offset: number;
  kind: BoundaryKind;
}

/**
 * Per-language punctuation and cleanup tables
 */
export interface LanguageProfile {
  code: string;
  /** Characters that can end a sentence */
  terminalMarks: readonly string[];
  /** Quotes and brackets that may follow a terminal mark */
  closingMarks: readonly string[];
  /** Words (without their final dot) that never end a sentence */
  abbreviations: readonly string[];
  /** Caption words stripped by the normalizer */
  captionWords: readonly string[];
}

// ============================================================================
// Planning Types
// ============================================================================

export interface ReadingPlan {
  speedWpm: number;
  minutesPerDay: number;
}

/**
 * How a portion's end offset was chosen
 */
export type CutKind = 'paragraph' | 'sentence' | 'lookback' | 'budget' | 'end';

export interface Portion {
  /** 1-based sequence number */
  index: number;
  text: string;
  wordCount: number;
  startOffset: number;
  endOffset: number;
  cut: CutKind;
}

/**
 * Non-fatal condition reported alongside a packing result
 */
export interface PackWarning {
  type: 'degraded-cut' | 'empty-range';
  /** Portion the warning refers to (0 for run-level notices) */
  portionIndex: number;
  offset: number;
  message: string;
}

/**
 * Log callback function type
 */
export type LogCallback = (type: 'info' | 'warn' | 'error', message: string) => void;

export interface PackOptions {
  /** Extra words allowed past the budget when looking for a boundary (fraction of budget) */
  lookAheadRatio?: number;
  /** Words that may be given up before the budget when looking back (fraction of budget) */
  lookBackRatio?: number;
  /** Called after each portion is produced */
  onPortion?: ((portion: Portion) => void) | null;
  /** Checked before each new portion; returning false stops packing */
  shouldContinue?: (() => boolean) | null;
  log?: LogCallback | null;
}

export interface PackResult {
  portions: Portion[];
  warnings: PackWarning[];
  cancelled: boolean;
  /** Word count of the last portion (0 when there are none) */
  finalPortionWordCount: number;
}

export interface SplitRequest extends PackOptions {
  rawText: string;
  stripNoise: boolean;
  plan: ReadingPlan;
  startPhrase?: string | null;
  profile?: LanguageProfile;
  /** Called once the start is located, before any portion is packed */
  onPlanned?: ((plan: SplitPlan) => void) | null;
}

export interface SplitPlan {
  wordsPerPortion: number;
  totalWordCount: number;
  startOffset: number;
  startOffsetWordCount: number;
  estimatedPortionCount: number;
}

export interface SplitResult extends PackResult, SplitPlan {
  normalized: NormalizedText;
}

export interface RunSummary {
  portionCount: number;
  totalHours: number;
  averagePortionWords: number;
}

// ============================================================================
// Output Types
// ============================================================================

export interface OutputMeta {
  bookName: string;
  /** Date of the first portion */
  startDate: Date;
  speedWpm: number;
  /** Localized unit placed in file names ("words", "слов") */
  wordsUnit: string;
}

export interface OutputFile {
  index: number;
  fileName: string;
  content: string;
  date: string;
}

// ============================================================================
// Settings / CLI Types
// ============================================================================

export type Language = 'en' | 'ru';

export interface ReadingSettings {
  minutesPerDay: number;
  wordsPerMinute: number;
  language: Language;
}

export interface LoadedSettings {
  settings: ReadingSettings;
  /** True when no valid saved language was found */
  firstRun: boolean;
}

export interface CliOptionsData {
  bookFile: string | null;
  wpm: number | null;
  minutes: number | null;
  startPhrase: string | null;
  date: string | null;
  clean: boolean | null;
  language: Language | null;
  outDir: string | null;
  force: boolean;
  dryRun: boolean;
  save: boolean;
  help: boolean;
  errors: string[];
}

export type Translations = Record<string, string>;
