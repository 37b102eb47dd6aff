/**
 * gcc-forge - Shared helpers for configure/make stages
 */

import { BuildEnvironment, getExportedEnv } from '../env.js';
import { logger } from '../logger.js';
import { formatCommand, outputTail } from '../exec.js';
import { StageError } from '../errors.js';
import { Stage } from '../types.js';

// Passed to every configure script
export const BASE_CONFIGURATION: readonly string[] = [
  '--disable-multilib',
  '--disable-werror',
  'CFLAGS=-g0 -O3 -fstack-protector-strong',
  'CXXFLAGS=-g0 -O3 -fstack-protector-strong',
];

export function jobsFlag(env: BuildEnvironment): string {
  return `-j${env.plan.jobs}`;
}

/**
 * Run one command of a stage; a non-zero exit ends the pipeline
 */
export async function runStageCommand(
  env: BuildEnvironment,
  stage: Stage,
  command: string,
  args: string[],
  cwd: string,
  failure: string
): Promise<void> {
  logger.debug(`[${stage}] ${formatCommand(command, args)}`);
  const result = await env.runner.run(command, args, { cwd, env: getExportedEnv(env) });

  if (result.exitCode !== 0) {
    if (!logger.isVerbose()) {
      const tail = outputTail(result);
      if (tail) {
        logger.error(`Last output of ${command}:\n${tail}`);
      }
    }
    throw new StageError(stage, failure, formatCommand(command, args), result.exitCode);
  }
}

export function make(
  env: BuildEnvironment,
  stage: Stage,
  cwd: string,
  targets: string[],
  failure: string
): Promise<void> {
  return runStageCommand(env, stage, 'make', [...targets, jobsFlag(env)], cwd, failure);
}
