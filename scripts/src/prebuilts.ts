/**
 * gcc-forge - Auxiliary Tools
 * txt2man (for binutils/gcc docs) and pigz (for packaging) are built once
 * into the tool prefix, which env.toolPaths puts ahead of the host PATH.
 */

import { join } from 'path';
import { tmpdir } from 'os';
import { chmod, copyFile, mkdir } from 'fs/promises';
import { existsSync } from 'fs';
import { BuildEnvironment, getExportedEnv } from './env.js';
import { logger } from './logger.js';
import { requireCommands } from './exec.js';
import { AcquisitionError } from './errors.js';
import { ExecOptions } from './types.js';

const SCRATCH_DIR = join(tmpdir(), 'gcc-forge-sources');

interface ToolRecipe {
  name: string;
  repository: string;
  build(env: BuildEnvironment, checkout: string): Promise<void>;
}

async function mustRun(env: BuildEnvironment, command: string, args: string[], options: ExecOptions, message: string): Promise<void> {
  const result = await env.runner.run(command, args, options);
  if (result.exitCode !== 0) {
    throw new AcquisitionError(message);
  }
}

const TXT2MAN: ToolRecipe = {
  name: 'txt2man',
  repository: 'https://github.com/mvertes/txt2man',
  build: (env, checkout) =>
    mustRun(
      env,
      'make',
      [`prefix=${env.config.toolPrefix}`, 'install'],
      { cwd: checkout, env: getExportedEnv(env) },
      'Error installing txt2man!'
    ),
};

const PIGZ: ToolRecipe = {
  name: 'pigz',
  repository: 'https://github.com/madler/pigz',
  build: async (env, checkout) => {
    await mustRun(
      env,
      'make',
      ['-C', checkout, `-j${env.plan.jobs}`, 'pigz'],
      { env: getExportedEnv(env) },
      'Error building pigz!'
    );
    const dest = join(env.toolBinDir, 'pigz');
    try {
      await copyFile(join(checkout, 'pigz'), dest);
      await chmod(dest, 0o755);
    } catch (error) {
      throw new AcquisitionError(`Failed to install pigz into ${dest}`, { cause: error });
    }
  },
};

async function provision(env: BuildEnvironment, recipe: ToolRecipe): Promise<void> {
  const checkout = join(SCRATCH_DIR, recipe.name);
  const options: ExecOptions = { env: getExportedEnv(env) };

  logger.step(`Provisioning ${recipe.name}...`);
  await mkdir(SCRATCH_DIR, { recursive: true });

  if (!existsSync(checkout)) {
    await mustRun(env, 'git', ['clone', '--quiet', '--depth=1', recipe.repository, checkout], options, `Issue with cloning ${recipe.name} source!`);
  }
  await mustRun(env, 'git', ['-C', checkout, 'clean', '-fxdq'], options, `Issue with cleaning ${recipe.name} source!`);
  await mustRun(env, 'git', ['-C', checkout, 'pull'], options, `Issue with updating ${recipe.name} source!`);
  await recipe.build(env, checkout);
}

/**
 * Build missing auxiliary tools into the tool prefix. Any failure is fatal.
 */
export async function provisionTools(env: BuildEnvironment): Promise<string[]> {
  const provisioned: string[] = [];

  try {
    await mkdir(env.toolBinDir, { recursive: true });
  } catch (error) {
    throw new AcquisitionError(`Failed to create tool prefix ${env.toolBinDir}`, { cause: error });
  }

  const hasAxel = (await requireCommands(env.runner, ['axel'], getExportedEnv(env))).length === 0;
  if (!hasAxel && !existsSync(join(env.toolBinDir, TXT2MAN.name))) {
    await provision(env, TXT2MAN);
    provisioned.push(TXT2MAN.name);
  }

  if (!existsSync(join(env.toolBinDir, PIGZ.name))) {
    await provision(env, PIGZ);
    provisioned.push(PIGZ.name);
  }

  return provisioned;
}
