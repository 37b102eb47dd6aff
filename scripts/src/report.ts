/**
 * gcc-forge - Build Report
 * The installed compiler binary is the only success signal of a run.
 */

import { join } from 'path';
import { existsSync } from 'fs';
import { BuildEnvironment, getExportedEnv } from './env.js';
import { logger } from './logger.js';
import { getFileSize } from './exec.js';
import { getDependency } from './resolver.js';

export interface BuildReport {
  success: boolean;
  // Wall-clock seconds
  duration: number;
  compilerVersion: string | null;
  gccCommit: string | null;
  archive: { path: string; size: string } | null;
  toolchainDir: string;
}

/**
 * Spell out a duration: "1 HOUR, 2 MINUTES, AND 3 SECONDS",
 * "5 MINUTES AND 1 SECOND"
 */
export function formatDuration(totalSeconds: number): string {
  const whole = Math.max(0, Math.floor(totalSeconds));
  let minutes = Math.floor(whole / 60);
  const seconds = whole % 60;
  let hours: number | null = null;

  if (minutes >= 60) {
    hours = Math.floor(minutes / 60);
    minutes %= 60;
  }

  let text = '';
  if (hours === 1) {
    text += '1 HOUR, ';
  } else if (hours !== null) {
    text += `${hours} HOURS, `;
  }

  text += minutes === 1 ? '1 MINUTE' : `${minutes} MINUTES`;
  text += hours !== null ? ', AND ' : ' AND ';
  text += seconds === 1 ? '1 SECOND' : `${seconds} SECONDS`;

  return text;
}

export function compilerPath(env: BuildEnvironment): string {
  return join(env.installDir, 'bin', `${env.plan.target}-gcc`);
}

/**
 * First line of `<target>-gcc --version`, or null when it cannot run
 */
export async function compilerVersion(env: BuildEnvironment): Promise<string | null> {
  const binary = compilerPath(env);
  if (!existsSync(binary)) return null;

  const result = await env.runner.run(binary, ['--version'], { env: getExportedEnv(env), stdio: 'pipe' });
  if (result.exitCode !== 0) return null;
  return result.stdout.split('\n')[0]?.trim() || null;
}

/**
 * HEAD of the compiler checkout; null for archives
 */
export async function gccHeadCommit(env: BuildEnvironment): Promise<string | null> {
  const gcc = getDependency(env.plan, 'gcc');
  if (gcc.mode !== 'checkout') return null;

  const checkout = join(env.sourcesDir, gcc.fetchPath);
  if (!existsSync(checkout)) return null;

  const result = await env.runner.run('git', ['rev-parse', 'HEAD'], { cwd: checkout, stdio: 'pipe' });
  return result.exitCode === 0 ? result.stdout.trim() : null;
}

export async function collectReport(
  env: BuildEnvironment,
  options: { duration: number; archivePath: string | null }
): Promise<BuildReport> {
  const toolchainDir = env.installDir;
  const success = existsSync(compilerPath(env));

  if (!success) {
    return { success, duration: options.duration, compilerVersion: null, gccCommit: null, archive: null, toolchainDir };
  }

  const archive = options.archivePath && existsSync(options.archivePath)
    ? { path: options.archivePath, size: await getFileSize(options.archivePath) }
    : null;

  return {
    success,
    duration: options.duration,
    compilerVersion: await compilerVersion(env),
    gccCommit: await gccHeadCommit(env),
    archive,
    toolchainDir,
  };
}

export function printReport(report: BuildReport): void {
  if (!report.success) {
    logger.section('BUILD FAILED');
    return;
  }

  logger.section('BUILD SUCCESSFUL');

  const rows: [string, string][] = [
    ['Script duration', formatDuration(report.duration)],
    ['GCC version', report.compilerVersion ?? 'unknown'],
  ];
  if (report.gccCommit) {
    rows.push(['GCC commit head', report.gccCommit]);
  }
  if (report.archive) {
    rows.push(['File location', report.archive.path], ['File size', report.archive.size]);
  } else {
    rows.push(['Toolchain location', report.toolchainDir]);
  }
  logger.fields(rows);
}
