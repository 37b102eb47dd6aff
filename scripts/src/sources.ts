/**
 * gcc-forge - Source Acquisition
 *
 * Makes every dependency of a plan present on disk: a git or Subversion
 * checkout under sources/, or a downloaded archive extracted into the
 * working directory. Presence is the only check made; an existing
 * checkout or archive is never fetched again.
 */

import { join } from 'path';
import { mkdir, rename, rm } from 'fs/promises';
import { existsSync } from 'fs';
import { BuildEnvironment, getExportedEnv } from './env.js';
import { logger } from './logger.js';
import { CommandRunner, formatCommand, outputTail, requireCommands } from './exec.js';
import { AcquisitionError } from './errors.js';
import { DependencyName, DependencySource, ExecOptions } from './types.js';

export interface MaterializedSource {
  source: DependencySource;
  // Checkout directory or archive file under sources/
  fetchPath: string;
  // Tree the build uses
  treeDir: string;
  fetched: boolean;
  extracted: boolean;
}

export interface Downloader {
  command: 'aria2c' | 'wget' | 'curl';
  args(url: string, outFile: string): string[];
}

// Order checkouts are updated in
const UPDATE_ORDER: DependencyName[] = ['mpfr', 'mpc', 'glibc', 'newlib', 'isl', 'binutils', 'gcc'];

/**
 * Pick the first available downloader: aria2c, wget, then curl
 */
export async function selectDownloader(env: BuildEnvironment): Promise<Downloader> {
  const path = getExportedEnv(env);
  const { segments, connectionsPerServer } = env.config.downloader;

  const [noAria2, noWget, noCurl] = await Promise.all(
    ['aria2c', 'wget', 'curl'].map(async cmd => (await requireCommands(env.runner, [cmd], path)).length > 0)
  );

  if (!noAria2) {
    return {
      command: 'aria2c',
      args: (url, out) => [
        `--split=${segments}`,
        `--max-connection-per-server=${connectionsPerServer}`,
        '--summary-interval=0',
        `--out=${out}`,
        url,
      ],
    };
  }
  if (!noWget) {
    return { command: 'wget', args: (url, out) => ['-q', '-O', out, url] };
  }
  if (!noCurl) {
    return { command: 'curl', args: (url, out) => ['-fsSL', '-o', out, url] };
  }
  throw new AcquisitionError('Neither aria2c, wget nor curl could be found on your system!');
}

async function runOrFail(
  runner: CommandRunner,
  command: string,
  args: string[],
  options: ExecOptions,
  message: string
): Promise<void> {
  const result = await runner.run(command, args, options);
  if (result.exitCode !== 0) {
    const tail = outputTail(result);
    throw new AcquisitionError(
      `${message} (${formatCommand(command, args)} exited with ${result.exitCode})${tail ? `\n${tail}` : ''}`
    );
  }
}

function label(source: DependencySource): string {
  return source.name.toUpperCase();
}

/**
 * Fetch one dependency unless it is already on disk
 */
export async function ensureSource(
  env: BuildEnvironment,
  source: DependencySource,
  downloader: Downloader | null
): Promise<MaterializedSource> {
  const fetchPath = join(env.sourcesDir, source.fetchPath);
  const treeDir = join(env.workDir, source.treePath);
  const materialized = { source, fetchPath, treeDir, fetched: false, extracted: false };

  if (existsSync(fetchPath)) {
    logger.debug(`${source.name}: ${fetchPath} present, skipping fetch`);
    return materialized;
  }

  const options: ExecOptions = { cwd: env.sourcesDir, env: getExportedEnv(env) };
  const { revision } = source;

  switch (revision.kind) {
    case 'git': {
      logger.section(`DOWNLOADING ${label(source)}`);
      const depth = env.plan.shallow ? ['--depth=1'] : [];
      await runOrFail(
        env.runner,
        'git',
        ['clone', '--quiet', ...depth, source.url, '-b', revision.ref, source.fetchPath],
        options,
        `Failed to clone ${source.name}`
      );
      break;
    }
    case 'svn':
      logger.section(`DOWNLOADING ${label(source)}`);
      await runOrFail(env.runner, 'svn', ['co', source.url, source.fetchPath], options, `Failed to check out ${source.name}`);
      break;
    case 'tarball': {
      if (!downloader) {
        throw new AcquisitionError(`No downloader available to fetch ${source.fetchPath}`);
      }
      const suffix = source.name === 'gmp' || source.name === 'linux' ? '' : ` ${revision.version} FOR GCC ${env.plan.version}`;
      logger.section(`DOWNLOADING ${label(source)}${suffix}`);
      await runOrFail(
        env.runner,
        downloader.command,
        downloader.args(source.url, source.fetchPath),
        options,
        `Failed to download ${source.fetchPath}`
      );
      break;
    }
  }

  return { ...materialized, fetched: true };
}

/**
 * Unpack an archive into its tree directory
 */
export async function extractSource(env: BuildEnvironment, item: MaterializedSource): Promise<MaterializedSource> {
  const { source } = item;
  if (source.mode !== 'archive') return item;

  const options: ExecOptions = { cwd: env.workDir, env: getExportedEnv(env) };

  if (source.archiveMember) {
    // Only one member of the archive is wanted, under a different name
    await runOrFail(
      env.runner,
      'tar',
      ['-xf', item.fetchPath, '-C', env.workDir, source.archiveMember],
      options,
      `Failed to extract ${source.fetchPath}`
    );
    try {
      await rm(item.treeDir, { recursive: true, force: true });
      await rename(join(env.workDir, source.archiveMember), item.treeDir);
    } catch (error) {
      throw new AcquisitionError(`Failed to move ${source.archiveMember} to ${item.treeDir}`, { cause: error });
    }
  } else {
    try {
      await mkdir(item.treeDir, { recursive: true });
    } catch (error) {
      throw new AcquisitionError(`Failed to create ${item.treeDir}`, { cause: error });
    }
    await runOrFail(
      env.runner,
      'tar',
      ['-xf', item.fetchPath, '-C', item.treeDir, '--strip-components=1'],
      options,
      `Failed to extract ${source.fetchPath}`
    );
  }

  return { ...item, extracted: true };
}

/**
 * Fetch and extract every dependency of the plan
 */
export async function acquireSources(env: BuildEnvironment): Promise<MaterializedSource[]> {
  const needsDownloader = env.plan.dependencies.some(
    d => d.mode === 'archive' && !existsSync(join(env.sourcesDir, d.fetchPath))
  );
  const downloader = needsDownloader ? await selectDownloader(env) : null;

  const fetched: MaterializedSource[] = [];
  for (const source of env.plan.dependencies) {
    fetched.push(await ensureSource(env, source, downloader));
  }

  if (fetched.some(f => f.source.mode === 'archive')) {
    logger.section('EXTRACTING DOWNLOADED TARBALLS');
  }
  const extracted: MaterializedSource[] = [];
  for (const item of fetched) {
    extracted.push(await extractSource(env, item));
  }
  return extracted;
}

/**
 * Generated build files that checkouts (unlike release archives) lack
 */
async function bootstrapTree(env: BuildEnvironment, item: MaterializedSource): Promise<void> {
  const options: ExecOptions = { cwd: item.fetchPath, env: getExportedEnv(env) };
  const fail = `${item.source.name} did not get fetched properly!`;

  switch (item.source.name) {
    case 'mpfr':
      await runOrFail(env.runner, './autogen.sh', [], options, fail);
      await runOrFail(env.runner, 'automake', ['--add-missing'], options, fail);
      break;
    case 'mpc':
      await runOrFail(env.runner, 'autoreconf', ['-i'], options, fail);
      break;
    case 'isl':
      await runOrFail(env.runner, './autogen.sh', [], options, fail);
      break;
    default:
      break;
  }
}

async function updateCheckout(env: BuildEnvironment, item: MaterializedSource): Promise<void> {
  const { source } = item;
  const options: ExecOptions = { cwd: item.fetchPath, env: getExportedEnv(env) };
  const fail = `${source.name} did not get cloned properly!`;

  if (!existsSync(item.fetchPath)) {
    throw new AcquisitionError(fail);
  }

  const revision = source.revision;
  if (revision.kind === 'svn') {
    await runOrFail(env.runner, 'svn', ['up'], options, fail);
    return;
  }
  if (revision.kind !== 'git') return;

  const { ref } = revision;
  const base = env.plan.shallow ? 'FETCH_HEAD' : `origin/${ref}`;
  const depth = env.plan.shallow ? ['--depth=1'] : [];

  await runOrFail(env.runner, 'git', ['fetch', '--quiet', ...depth, 'origin', ref], options, fail);
  const checkout = await env.runner.run('git', ['checkout', '-f', ref], options);
  if (checkout.exitCode !== 0) {
    // No local branch of that name yet
    await runOrFail(env.runner, 'git', ['checkout', '-f', '-b', ref, base], options, fail);
  }
  await runOrFail(env.runner, 'git', ['reset', '--hard', base], options, fail);
}

/**
 * Bring checkouts up to their recorded revision, then regenerate their
 * build files. With updates suppressed (or archives in use) only the
 * build files of existing checkouts are regenerated.
 */
export async function updateSources(env: BuildEnvironment, sources: MaterializedSource[]): Promise<void> {
  const checkouts = UPDATE_ORDER
    .map(name => sources.find(s => s.source.name === name && s.source.mode === 'checkout'))
    .filter((s): s is MaterializedSource => s !== undefined);

  if (env.plan.update && !env.plan.tarballs) {
    logger.section('UPDATING SOURCES');
    for (const item of checkouts) {
      await updateCheckout(env, item);
      await bootstrapTree(env, item);
    }
    return;
  }

  for (const item of checkouts) {
    if (existsSync(item.fetchPath)) {
      await bootstrapTree(env, item);
    }
  }
}
