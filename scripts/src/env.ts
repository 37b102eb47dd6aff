/**
 * gcc-forge - Build Environment
 * Paths of one pipeline run and the environment handed to child processes
 */

import { join } from 'path';
import { mkdir } from 'fs/promises';
import { BuildPlan, Stage } from './types.js';
import { ToolchainConfig } from './config.js';
import { CommandRunner } from './exec.js';
import { AcquisitionError } from './errors.js';

export type BuildDirName = 'build-binutils' | 'build-gcc' | 'build-glibc' | 'build-newlib';

export interface BuildEnvironment {
  plan: BuildPlan;
  config: ToolchainConfig;
  runner: CommandRunner;

  workDir: string;
  sourcesDir: string;
  // Install prefix: <workDir>/<target>
  installDir: string;
  // <installDir>/<target>, the sysroot the C library is installed into
  sysrootDir: string;
  toolBinDir: string;
  logFile: string;

  // One per stage that needs its own directory
  buildDirs: Record<BuildDirName, string>;
  activeBuildDirs: BuildDirName[];

  // Searched before the inherited PATH, in this order
  toolPaths: string[];
}

/**
 * Initialize build environment with all paths and settings
 */
export function createBuildEnvironment(
  plan: BuildPlan,
  config: ToolchainConfig,
  runner: CommandRunner
): BuildEnvironment {
  const workDir = config.workDir;
  const installDir = join(workDir, plan.target);
  const toolBinDir = join(config.toolPrefix, 'bin');

  const buildDirs: Record<BuildDirName, string> = {
    'build-binutils': join(workDir, 'build-binutils'),
    'build-gcc': join(workDir, 'build-gcc'),
    'build-glibc': join(workDir, 'build-glibc'),
    'build-newlib': join(workDir, 'build-newlib'),
  };

  return {
    plan,
    config,
    runner,
    workDir,
    sourcesDir: join(workDir, 'sources'),
    installDir,
    sysrootDir: join(installDir, plan.target),
    toolBinDir,
    logFile: config.logFile ?? join(workDir, `build-${plan.target}.log`),
    buildDirs,
    activeBuildDirs: [
      plan.libc === 'newlib' ? 'build-newlib' : 'build-glibc',
      'build-gcc',
      'build-binutils',
    ],
    toolPaths: [join(installDir, 'bin'), toolBinDir],
  };
}

/**
 * Build directory a stage runs in; headers install from the kernel tree
 */
export function stageDir(env: BuildEnvironment, stage: Exclude<Stage, 'headers'>): string {
  switch (stage) {
    case 'binutils':
      return env.buildDirs['build-binutils'];
    case 'gcc-frontend':
    case 'gcc-finalize':
      return env.buildDirs['build-gcc'];
    case 'runtime-library':
      return env.buildDirs[env.plan.libc === 'newlib' ? 'build-newlib' : 'build-glibc'];
  }
}

/**
 * Ensure the base directories exist
 */
export async function ensureBuildDirs(env: BuildEnvironment): Promise<void> {
  try {
    await mkdir(env.sourcesDir, { recursive: true });
    await mkdir(env.toolBinDir, { recursive: true });
  } catch (error) {
    throw new AcquisitionError(`Failed to create sources directory: ${env.sourcesDir}`, { cause: error });
  }
}

/**
 * Export environment variables for child processes. The process's own
 * environment is never modified.
 */
export function getExportedEnv(env: BuildEnvironment): Record<string, string> {
  const inherited = process.env.PATH ?? '';
  return {
    PATH: [...env.toolPaths, inherited].filter(p => p.length > 0).join(':'),
  };
}
