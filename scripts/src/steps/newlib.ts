/**
 * gcc-forge - Newlib Builder
 */

import { join } from 'path';
import { BuildEnvironment, stageDir } from '../env.js';
import { logger } from '../logger.js';
import { libcDependency } from '../resolver.js';
import { make, runStageCommand } from './common.js';

export function newlibConfigureArgs(env: BuildEnvironment): string[] {
  const { plan } = env;
  return [
    `--prefix=${env.installDir}`,
    `--build=${plan.buildTriple}`,
    `--host=${plan.buildTriple}`,
    `--target=${plan.target}`,
  ];
}

export async function buildNewlib(env: BuildEnvironment): Promise<void> {
  logger.section('MAKING NEWLIB');

  const cwd = stageDir(env, 'runtime-library');
  const source = join(env.workDir, libcDependency(env.plan).treePath);

  await runStageCommand(env, 'runtime-library', join(source, 'configure'), newlibConfigureArgs(env), cwd, 'Error while configuring newlib!');
  await make(env, 'runtime-library', cwd, [], 'Error while building newlib for target!');
  await make(env, 'runtime-library', cwd, ['install'], 'Error while installing newlib for target!');
}
