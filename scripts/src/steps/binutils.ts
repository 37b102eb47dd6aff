/**
 * gcc-forge - Binutils Builder
 */

import { join } from 'path';
import { BuildEnvironment, stageDir } from '../env.js';
import { logger } from '../logger.js';
import { getDependency } from '../resolver.js';
import { BASE_CONFIGURATION, make, runStageCommand } from './common.js';

export function binutilsConfigureArgs(env: BuildEnvironment): string[] {
  return [
    `--target=${env.plan.target}`,
    `--prefix=${env.installDir}`,
    '--disable-gdb',
    '--disable-nls',
    '--enable-gold',
    '--enable-lto',
    '--enable-plugins',
    '--enable-relro',
    '--with-sysroot',
    ...BASE_CONFIGURATION,
  ];
}

export async function buildBinutils(env: BuildEnvironment): Promise<void> {
  logger.section('BUILDING BINUTILS');

  const cwd = stageDir(env, 'binutils');
  const source = join(env.workDir, getDependency(env.plan, 'binutils').treePath);

  await runStageCommand(env, 'binutils', join(source, 'configure'), binutilsConfigureArgs(env), cwd, 'Error while configuring binutils!');
  await make(env, 'binutils', cwd, [], 'Error while building binutils!');
  await make(env, 'binutils', cwd, ['install'], 'Error while installing binutils!');
}
