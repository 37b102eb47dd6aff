/**
 * gcc-forge - GCC Builder
 * The compiler is built in two passes around the C library: the frontend
 * (plus libgcc where the runtime needs it first), then everything else.
 */

import { join } from 'path';
import { readFile, writeFile } from 'fs/promises';
import { existsSync } from 'fs';
import { BuildEnvironment, stageDir } from '../env.js';
import { logger } from '../logger.js';
import { getDependency } from '../resolver.js';
import { BuildPlan, Stage } from '../types.js';
import { BASE_CONFIGURATION, make, runStageCommand } from './common.js';

// Lines of the fixincluded statx.h that clash with the kernel headers;
// removed one after the other, so the second number counts after the first removal
const STATX_DROPPED_LINES = [38, 43];

/**
 * Whether libgcc is built together with the frontend. Everywhere else the
 * C library's start files have to exist first.
 */
export function buildsLibgccEarly(plan: BuildPlan): boolean {
  return plan.forHost || plan.targetArchitecture === 'x86_64';
}

export function gccConfigureArgs(env: BuildEnvironment): string[] {
  const args = [
    '--enable-languages=c,c++',
    `--target=${env.plan.target}`,
    `--prefix=${env.installDir}`,
    '--disable-nls',
  ];
  if (env.plan.libc === 'newlib') {
    args.push('--disable-shared', '--with-newlib');
  }
  return [...args, ...BASE_CONFIGURATION];
}

/**
 * Remove 1-based line numbers from text, each applied to the result of the
 * previous removal. Numbers past the end are ignored.
 */
export function dropLines(content: string, lineNumbers: readonly number[]): string {
  let lines = content.split('\n');
  for (const n of lineNumbers) {
    if (n >= 1 && n <= lines.length) {
      lines = [...lines.slice(0, n - 1), ...lines.slice(n)];
    }
  }
  return lines.join('\n');
}

export async function buildLibgcc(env: BuildEnvironment, stage: Stage): Promise<void> {
  const cwd = env.buildDirs['build-gcc'];
  await make(env, stage, cwd, ['all-target-libgcc'], 'Error while building libgcc for target!');
  await make(env, stage, cwd, ['install-target-libgcc'], 'Error while installing libgcc for target!');
}

export async function buildGccFrontend(env: BuildEnvironment): Promise<void> {
  logger.section('MAKING GCC');

  const cwd = stageDir(env, 'gcc-frontend');
  const source = join(env.workDir, getDependency(env.plan, 'gcc').treePath);

  await runStageCommand(env, 'gcc-frontend', join(source, 'configure'), gccConfigureArgs(env), cwd, 'Error while configuring gcc!');
  await make(env, 'gcc-frontend', cwd, ['all-gcc'], 'Error while building gcc!');
  await make(env, 'gcc-frontend', cwd, ['install-gcc'], 'Error while installing gcc!');

  if (buildsLibgccEarly(env.plan)) {
    await buildLibgcc(env, 'gcc-frontend');
  }
}

export async function finalizeGcc(env: BuildEnvironment): Promise<void> {
  logger.section('INSTALLING GCC');

  const cwd = stageDir(env, 'gcc-finalize');
  const statx = join(cwd, 'gcc', 'include-fixed', 'bits', 'statx.h');

  if (existsSync(statx)) {
    const content = await readFile(statx, 'utf-8');
    await writeFile(statx, dropLines(content, STATX_DROPPED_LINES));
    logger.debug(`Trimmed ${statx}`);
  }

  await make(env, 'gcc-finalize', cwd, ['all'], 'Error while building gcc!');
  await make(env, 'gcc-finalize', cwd, ['install'], 'Error while installing gcc!');
}
