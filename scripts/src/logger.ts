/**
 * gcc-forge - Logger
 * Console output with colors and spinners, mirrored into the run log
 */

import chalk from 'chalk';
import ora, { Ora } from 'ora';
import { appendFileSync, mkdirSync, writeFileSync } from 'fs';
import { dirname } from 'path';
import { stripVTControlCharacters } from 'util';

export interface LoggerOptions {
  verbose?: boolean;
  logFile?: string;
}

export class Logger {
  private static instance: Logger;
  private currentSpinner: Ora | null = null;
  private stepTimes: Map<string, number> = new Map();
  private verbose = false;
  private logFile: string | null = null;

  static getInstance(): Logger {
    if (!Logger.instance) {
      Logger.instance = new Logger();
    }
    return Logger.instance;
  }

  /**
   * Apply run options. Starting a log file truncates it.
   */
  configure(options: LoggerOptions): void {
    this.verbose = options.verbose ?? this.verbose;
    if (options.logFile) {
      mkdirSync(dirname(options.logFile), { recursive: true });
      writeFileSync(options.logFile, '');
      this.logFile = options.logFile;
    }
  }

  isVerbose(): boolean {
    return this.verbose;
  }

  getLogFile(): string | null {
    return this.logFile;
  }

  /**
   * Append raw text (subprocess output) to the run log only
   */
  record(text: string): void {
    if (!this.logFile || text.length === 0) return;
    const line = text.endsWith('\n') ? text : `${text}\n`;
    appendFileSync(this.logFile, stripVTControlCharacters(line));
  }

  private emit(stream: 'out' | 'err', parts: string[]): void {
    const line = parts.join(' ');
    if (stream === 'err') {
      console.error(line);
    } else {
      console.log(line);
    }
    this.record(line);
  }

  /**
   * Log info message
   */
  info(message: string): void {
    this.stopSpinner();
    this.emit('out', [chalk.blue('[INFO]'), message]);
  }

  /**
   * Log success message
   */
  success(message: string): void {
    this.stopSpinner();
    this.emit('out', [chalk.green('[✓]'), message]);
  }

  /**
   * Log warning message
   */
  warn(message: string): void {
    this.stopSpinner();
    this.emit('out', [chalk.yellow('[WARN]'), message]);
  }

  /**
   * Log error message
   */
  error(message: string): void {
    this.stopSpinner();
    this.emit('err', [chalk.red('[ERROR]'), message]);
  }

  // Printed only in verbose mode, always recorded
  debug(message: string): void {
    if (this.verbose) {
      this.stopSpinner();
      this.emit('out', [chalk.gray('[DEBUG]'), message]);
    } else {
      this.record(`[DEBUG] ${message}`);
    }
  }

  /**
   * Log a build step
   */
  step(message: string): void {
    this.stopSpinner();
    this.emit('out', [chalk.cyan('==>'), message]);
  }

  /**
   * Log a section header
   */
  section(title: string): void {
    this.stopSpinner();
    const border = '='.repeat(title.length + 8);
    this.emit('out', ['']);
    this.emit('out', [chalk.red(border)]);
    this.emit('out', [chalk.red(`==  ${title}  ==`)]);
    this.emit('out', [chalk.red(border)]);
    this.emit('out', ['']);
  }

  /**
   * Start a spinner for long-running operations
   */
  startSpinner(text: string): Ora {
    this.stopSpinner();
    this.currentSpinner = ora({
      text,
      color: 'cyan',
      // Subprocess output would tear through the spinner line
      isEnabled: !this.verbose && process.stdout.isTTY === true,
    }).start();
    return this.currentSpinner;
  }

  /**
   * Stop current spinner
   */
  stopSpinner(): void {
    if (this.currentSpinner) {
      this.currentSpinner.stop();
      this.currentSpinner = null;
    }
  }

  /**
   * Complete spinner with success
   */
  spinnerSuccess(text?: string): void {
    if (this.currentSpinner) {
      this.currentSpinner.succeed(text);
      this.currentSpinner = null;
    }
  }

  /**
   * Complete spinner with failure
   */
  spinnerFail(text?: string): void {
    if (this.currentSpinner) {
      this.currentSpinner.fail(text);
      this.currentSpinner = null;
    }
  }

  /**
   * Start timing a step
   */
  startTimer(name: string): void {
    this.stepTimes.set(name, Date.now());
  }

  /**
   * Get elapsed time for a step
   */
  getElapsed(name: string): number {
    const start = this.stepTimes.get(name);
    if (!start) return 0;
    return (Date.now() - start) / 1000;
  }

  /**
   * Log step completion with timing
   */
  stepComplete(name: string, message?: string): void {
    const elapsed = this.getElapsed(name);
    const text = message ?? name;
    this.success(`${text} (${elapsed.toFixed(1)}s)`);
    this.stepTimes.delete(name);
  }

  /**
   * Forget running step timers
   */
  resetTimer(): void {
    this.stepTimes.clear();
  }

  /**
   * Labelled lines for the end-of-run report
   */
  fields(rows: [label: string, value: string][]): void {
    this.stopSpinner();
    for (const [label, value] of rows) {
      this.emit('out', [chalk.bold(`${label}:`), value]);
    }
  }

  /**
   * Create a boxed message
   */
  box(title: string, content: string[]): void {
    const maxLen = Math.max(title.length, ...content.map(l => l.length));
    const border = '─'.repeat(maxLen + 2);

    this.emit('out', [chalk.gray(`┌${border}┐`)]);
    this.emit('out', [chalk.gray('│'), chalk.bold(title.padEnd(maxLen)), chalk.gray('│')]);
    this.emit('out', [chalk.gray(`├${border}┤`)]);
    for (const line of content) {
      this.emit('out', [chalk.gray('│'), line.padEnd(maxLen), chalk.gray('│')]);
    }
    this.emit('out', [chalk.gray(`└${border}┘`)]);
  }
}

// Export singleton
export const logger = Logger.getInstance();
