/**
 * gcc-forge - Command Executor
 * Wraps execa for consistent command execution with logging
 */

import { execa, type Options } from 'execa';
import { stat } from 'fs/promises';
import { logger } from './logger.js';
import { ExecOptions, ExecResult } from './types.js';

/**
 * Everything that spawns a process goes through a runner, so tests can
 * swap in a recording fake.
 */
export interface CommandRunner {
  run(command: string, args: string[], options?: ExecOptions): Promise<ExecResult>;
}

/**
 * Runs commands with execa. Output is always captured for the run log;
 * in verbose mode it is also streamed to the terminal.
 */
export class ExecaRunner implements CommandRunner {
  async run(command: string, args: string[], options: ExecOptions = {}): Promise<ExecResult> {
    const stream = options.stdio === 'inherit' || (options.stdio === undefined && logger.isVerbose());
    const execaOptions: Options = {
      cwd: options.cwd,
      env: { ...process.env, ...options.env },
      stdout: stream ? ['pipe', 'inherit'] : 'pipe',
      stderr: stream ? ['pipe', 'inherit'] : 'pipe',
      all: true,
      input: options.input,
      timeout: options.timeout,
      reject: false,
    };

    const mask = (text: string): string =>
      (options.redact ?? []).filter(s => s.length > 0).reduce((t, s) => t.split(s).join('***'), text);

    logger.record(mask(`$ ${formatCommand(command, args)}${options.cwd ? `  (in ${options.cwd})` : ''}`));
    const result = await execa(command, args, execaOptions);
    logger.record(mask(String(result.all ?? '')));

    let exitCode = result.exitCode ?? 0;
    let stderr = String(result.stderr ?? '');
    if (result.failed && exitCode === 0) {
      // Spawn failure (e.g. ENOENT) or signal: no exit code was produced
      exitCode = 127;
      if ('message' in result && typeof result.message === 'string') {
        stderr = stderr ? `${stderr}\n${result.message}` : result.message;
      }
    }

    return {
      stdout: String(result.stdout ?? ''),
      stderr,
      exitCode,
    };
  }
}

export function formatCommand(command: string, args: string[]): string {
  return [command, ...args.map(a => (/[\s"']/.test(a) ? JSON.stringify(a) : a))].join(' ');
}

/**
 * Last lines of a command's output, for error reports in quiet mode
 */
export function outputTail(result: ExecResult, lines: number = 20): string {
  const text = [result.stdout, result.stderr].filter(s => s.trim().length > 0).join('\n');
  return text.trimEnd().split('\n').slice(-lines).join('\n');
}

/**
 * Return the commands from the list that are not on PATH
 */
export async function requireCommands(
  runner: CommandRunner,
  commands: string[],
  env?: Record<string, string>
): Promise<string[]> {
  const missing: string[] = [];

  for (const cmd of commands) {
    const result = await runner.run('which', [cmd], { env, stdio: 'pipe' });
    if (result.exitCode !== 0) {
      missing.push(cmd);
    }
  }

  return missing;
}

/**
 * Get file size in human-readable format
 */
export async function getFileSize(path: string): Promise<string> {
  try {
    const stats = await stat(path);
    const bytes = stats.size;

    const units = ['B', 'KiB', 'MiB', 'GiB'];
    let size = bytes;
    let unitIndex = 0;

    while (size >= 1024 && unitIndex < units.length - 1) {
      size /= 1024;
      unitIndex++;
    }

    return `${size.toFixed(1)}${units[unitIndex]}`;
  } catch {
    return 'unknown';
  }
}

/**
 * Run a timed build step
 */
export async function timedStep<T>(
  name: string,
  fn: () => Promise<T>
): Promise<T> {
  logger.startTimer(name);
  logger.startSpinner(name);

  try {
    const result = await fn();
    logger.spinnerSuccess();
    logger.stepComplete(name);
    return result;
  } catch (error) {
    logger.spinnerFail();
    logger.error(`${name} failed`);
    throw error;
  }
}
