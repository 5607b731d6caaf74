/**
 * Progress Bar Module
 * Single-line terminal progress bar, redrawn in place with a carriage return
 */

const CLEAR_TO_EOL = '\x1b[K';

export interface ProgressStream {
  write(chunk: string): boolean;
  isTTY?: boolean;
}

export interface ProgressBarOptions {
  label?: string;
  unit?: string;
  width?: number;
  stream?: ProgressStream;
  /** Defaults to whether the stream is a terminal */
  enabled?: boolean;
}

export class ProgressBar {
  public readonly total: number;
  public current = 0;

  private readonly label: string;
  private readonly unit: string;
  private readonly width: number;
  private readonly stream: ProgressStream;
  private readonly enabled: boolean;
  private drawn = false;

  constructor(total: number, options: ProgressBarOptions = {}) {
    this.total = Math.max(0, total);
    this.label = options.label ?? '';
    this.unit = options.unit ?? '';
    this.width = options.width ?? 30;
    this.stream = options.stream ?? process.stderr;
    this.enabled = options.enabled ?? this.stream.isTTY === true;
  }

  /**
   * Bar text for the current value, without terminal control codes
   */
  format(): string {
    const ratio = this.total > 0 ? this.current / this.total : 1;
    const filled = Math.round(ratio * this.width);
    const bar = '█'.repeat(filled) + '░'.repeat(this.width - filled);
    const percent = Math.floor(ratio * 100);
    const label = this.label ? `${this.label} ` : '';
    const unit = this.unit ? ` ${this.unit}` : '';
    return `${label}|${bar}| ${percent}% ${this.current}/${this.total}${unit}`;
  }

  update(amount: number): void {
    this.current = Math.min(this.total, this.current + Math.max(0, amount));
    this._draw();
  }

  close(): void {
    if (this.drawn) {
      this.stream.write('\n');
      this.drawn = false;
    }
  }

  private _draw(): void {
    if (!this.enabled) return;
    this.stream.write(`\r${this.format()}${CLEAR_TO_EOL}`);
    this.drawn = true;
  }
}
