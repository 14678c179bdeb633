/**
 * CLI Progress Printer
 *
 * Status lines and a spinner for the terminal. Everything goes to stderr so
 * the generated message can be piped from stdout.
 */

import { formatDuration } from '../utils/index.js';

/**
 * When to emit ANSI colors
 */
export type ColorMode = 'auto' | 'always' | 'never';

/**
 * Stream the printer writes to
 */
export interface OutputStream {
  write(text: string): unknown;
  isTTY?: boolean;
}

/**
 * Progress printer options
 */
export interface ProgressPrinterOptions {
  /** Color mode (default: auto, which follows the TTY and NO_COLOR) */
  colorMode?: ColorMode;
  /** Enable spinner animation (default: true if TTY) */
  spinner?: boolean;
  /** Print debug lines */
  debug?: boolean;
  /** Suppress info and success lines */
  quiet?: boolean;
  /** Output stream (default: process.stderr) */
  output?: OutputStream;
}

/**
 * Progress printer interface (for null object pattern)
 */
export interface IProgressPrinter {
  success(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
  debug(message: string): void;
  /** Start a spinner line; replaced by the next call */
  progress(message: string): void;
  /** Stop the spinner, printing a final ✓/✗ line with elapsed time */
  done(success: boolean, message?: string): void;
  divider(): void;
}

/**
 * ANSI color codes
 */
const colors = {
  reset: '\x1b[0m',
  bold: '\x1b[1m',
  dim: '\x1b[2m',
  green: '\x1b[32m',
  yellow: '\x1b[33m',
  blue: '\x1b[34m',
  cyan: '\x1b[36m',
  red: '\x1b[31m',
  gray: '\x1b[90m',
};

/**
 * Spinner frames
 */
const spinnerFrames = ['⠋', '⠙', '⠹', '⠸', '⠼', '⠴', '⠦', '⠧', '⠇', '⠏'];

/**
 * Decide whether to color output
 */
export function resolveColors(
  mode: ColorMode,
  isTTY: boolean,
  env: Record<string, string | undefined> = process.env
): boolean {
  switch (mode) {
    case 'always':
      return true;
    case 'never':
      return false;
    default:
      return isTTY && !env['NO_COLOR'];
  }
}

/**
 * CLI Progress Printer
 */
export class ProgressPrinter implements IProgressPrinter {
  private useColors: boolean;
  private useSpinner: boolean;
  private showDebug: boolean;
  private quiet: boolean;
  private output: OutputStream;
  private spinnerIndex = 0;
  private spinnerInterval: ReturnType<typeof setInterval> | null = null;
  private currentSpinnerLine = '';
  private stepStartTime = Date.now();

  constructor(options: ProgressPrinterOptions = {}) {
    this.output = options.output ?? process.stderr;
    const isTTY = this.output.isTTY ?? false;
    this.useColors = resolveColors(options.colorMode ?? 'auto', isTTY);
    this.useSpinner = options.spinner ?? isTTY;
    this.showDebug = options.debug ?? false;
    this.quiet = options.quiet ?? false;
  }

  /**
   * Color helper
   */
  c(color: keyof typeof colors, text: string): string {
    if (!this.useColors) return text;
    return `${colors[color]}${text}${colors.reset}`;
  }

  private line(text: string): void {
    this.output.write(`${text}\n`);
  }

  success(message: string): void {
    this.stopSpinner();
    if (this.quiet) return;
    this.line(`${this.c('green', '✓')} ${message}`);
  }

  info(message: string): void {
    this.stopSpinner();
    if (this.quiet) return;
    this.line(`${this.c('cyan', 'ℹ')} ${message}`);
  }

  warn(message: string): void {
    this.stopSpinner();
    this.line(`${this.c('yellow', '⚠')} ${message}`);
  }

  error(message: string): void {
    this.stopSpinner();
    this.line(`${this.c('red', '✗')} ${message}`);
  }

  debug(message: string): void {
    if (!this.showDebug) return;
    this.stopSpinner();
    this.line(this.c('gray', `[DEBUG] ${message}`));
  }

  progress(message: string): void {
    this.stopSpinner();
    this.currentSpinnerLine = message;
    this.stepStartTime = Date.now();

    if (this.useSpinner) {
      this.spinnerIndex = 0;
      this.writeSpinner();
      this.spinnerInterval = setInterval(() => {
        this.spinnerIndex = (this.spinnerIndex + 1) % spinnerFrames.length;
        this.writeSpinner();
      }, 100);
    } else if (!this.quiet) {
      this.line(`${this.c('yellow', '⏳')} ${message}`);
    }
  }

  done(success: boolean, message?: string): void {
    const text = message ?? this.currentSpinnerLine;
    this.stopSpinner();
    if (!text || (this.quiet && success)) return;
    const elapsed = formatDuration(Date.now() - this.stepStartTime);
    const icon = success ? this.c('green', '✓') : this.c('red', '✗');
    this.line(`${icon} ${text} ${this.c('gray', `(${elapsed})`)}`);
  }

  divider(): void {
    this.stopSpinner();
    if (this.quiet) return;
    this.line(this.c('gray', '─'.repeat(50)));
  }

  /**
   * Write spinner frame
   */
  private writeSpinner(): void {
    const frame = spinnerFrames[this.spinnerIndex];
    this.output.write(`\r${this.c('yellow', frame ?? '⏳')} ${this.currentSpinnerLine}`);
  }

  /**
   * Stop the spinner
   */
  private stopSpinner(): void {
    if (this.spinnerInterval) {
      clearInterval(this.spinnerInterval);
      this.spinnerInterval = null;
      // Clear the line
      this.output.write('\r' + ' '.repeat(this.currentSpinnerLine.length + 4) + '\r');
    }
    this.currentSpinnerLine = '';
  }
}

/**
 * Create a progress printer instance
 */
export function createProgressPrinter(options?: ProgressPrinterOptions): ProgressPrinter {
  return new ProgressPrinter(options);
}

/**
 * Default no-op progress printer for when progress is disabled
 */
export const nullProgressPrinter: IProgressPrinter = {
  success: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
  debug: () => {},
  progress: () => {},
  done: () => {},
  divider: () => {},
};
