/**
 * gcc-forge - Glibc Builder
 *
 * A full glibc needs a compiler that can link, which needs glibc. The cycle
 * is broken by installing the headers and start files, plus an empty
 * libc.so and stubs.h, before the real build.
 */

import { join } from 'path';
import { appendFile, copyFile, mkdir } from 'fs/promises';
import { BuildEnvironment, stageDir } from '../env.js';
import { logger } from '../logger.js';
import { libcDependency } from '../resolver.js';
import { StageError } from '../errors.js';
import { BASE_CONFIGURATION, make, runStageCommand } from './common.js';
import { buildLibgcc, buildsLibgccEarly } from './gcc.js';

const START_FILES = ['crt1.o', 'crti.o', 'crtn.o'];

export function glibcConfigureArgs(env: BuildEnvironment): string[] {
  const { plan, sysrootDir } = env;
  return [
    `--prefix=${sysrootDir}`,
    `--build=${plan.buildTriple}`,
    `--host=${plan.target}`,
    `--target=${plan.target}`,
    `--with-headers=${join(sysrootDir, 'include')}`,
    ...BASE_CONFIGURATION,
    'libc_cv_forced_unwind=yes',
    'with_selinux=no',
  ];
}

async function installStartFiles(env: BuildEnvironment, cwd: string): Promise<void> {
  const libDir = join(env.sysrootDir, 'lib');
  await mkdir(libDir, { recursive: true });

  for (const file of START_FILES) {
    try {
      await copyFile(join(cwd, 'csu', file), join(libDir, file));
    } catch (error) {
      throw new StageError('runtime-library', `Error while installing ${file}: ${String(error)}`);
    }
  }
}

export async function buildGlibc(env: BuildEnvironment): Promise<void> {
  logger.section('MAKING GLIBC');

  const { plan, sysrootDir } = env;
  const cwd = stageDir(env, 'runtime-library');
  const source = join(env.workDir, libcDependency(plan).treePath);
  const fail = 'Error while building glibc for target!';

  await runStageCommand(env, 'runtime-library', join(source, 'configure'), glibcConfigureArgs(env), cwd, 'Error while configuring glibc!');
  await make(env, 'runtime-library', cwd, ['install-bootstrap-headers=yes', 'install-headers'], fail);
  await make(env, 'runtime-library', cwd, ['csu/subdir_lib'], fail);

  await installStartFiles(env, cwd);
  await runStageCommand(
    env,
    'runtime-library',
    `${plan.target}-gcc`,
    ['-nostdlib', '-nostartfiles', '-shared', '-x', 'c', '/dev/null', '-o', join(sysrootDir, 'lib', 'libc.so')],
    cwd,
    fail
  );

  const gnuInclude = join(sysrootDir, 'include', 'gnu');
  await mkdir(gnuInclude, { recursive: true });
  await appendFile(join(gnuInclude, 'stubs.h'), '');

  if (!buildsLibgccEarly(plan)) {
    await buildLibgcc(env, 'runtime-library');
  }

  await make(env, 'runtime-library', cwd, [], fail);
  await make(env, 'runtime-library', cwd, ['install'], 'Error while installing glibc for target!');
}
