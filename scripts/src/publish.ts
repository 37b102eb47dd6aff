/**
 * gcc-forge - Release Publishing
 *
 * Replaces the contents of the <owner>/<target> repository with the
 * install tree, pushes, and announces the commit.
 */

import { join } from 'path';
import { cp, readdir, rm } from 'fs/promises';
import { BuildEnvironment } from './env.js';
import { logger } from './logger.js';
import { outputTail } from './exec.js';
import { AcquisitionError } from './errors.js';
import { Notifier } from './notify.js';
import { dateStamp } from './steps/package.js';
import { ExecOptions } from './types.js';

export interface ReleaseInfo {
  compilerVersion: string;
  gccCommit: string | null;
  builderCommit: string;
  now: Date;
}

export interface PublishedRelease {
  commit: string;
  url: string;
  message: string;
}

const GCC_COMMIT_URL = 'https://gcc.gnu.org/git/?p=gcc.git;a=commit;h=';

export function releaseCommitMessage(env: BuildEnvironment, info: ReleaseInfo): string {
  if (env.plan.tarballs || !info.gccCommit) {
    return `toolchain: Bump GCC version: ${info.compilerVersion}\n\nBUILDER COMMIT: ${info.builderCommit}`;
  }

  // DDMMYYYY
  const stamp = dateStamp(info.now, env.config.timezone);
  const date = `${stamp.slice(6, 8)}${stamp.slice(4, 6)}${stamp.slice(0, 4)}`;
  const commitUrl = `${GCC_COMMIT_URL}${info.gccCommit}`;

  return [
    `Update to ${commitUrl}, ${date} build.`,
    '',
    `GCC VERSION: ${info.compilerVersion}`,
    `GCC COMMIT URL: ${commitUrl}`,
    `BUILDER COMMIT: ${info.builderCommit}`,
  ].join('\n');
}

export function announcement(env: BuildEnvironment, release: PublishedRelease): string {
  const branch = env.plan.tarballs ? 'stable' : 'master';
  return `⚒️ New commit to ${env.plan.target}:${branch}\n\n[${release.commit.slice(0, 8)}](${release.url}): ${release.message}`;
}

async function git(env: BuildEnvironment, args: string[], options: ExecOptions, message: string): Promise<string> {
  const result = await env.runner.run('git', args, { stdio: 'pipe', ...options });
  if (result.exitCode !== 0) {
    throw new AcquisitionError(`${message}\n${outputTail(result, 5)}`);
  }
  return result.stdout.trim();
}

/**
 * Commit of the tree gcc-forge itself runs from
 */
export async function builderCommit(env: BuildEnvironment, dir: string): Promise<string> {
  const result = await env.runner.run('git', ['rev-parse', 'HEAD'], { cwd: dir, stdio: 'pipe' });
  return result.exitCode === 0 ? result.stdout.trim() : 'unknown';
}

export async function publishRelease(
  env: BuildEnvironment,
  info: ReleaseInfo,
  notifier: Notifier
): Promise<PublishedRelease> {
  const { publish, credentials } = env.config;
  const token = credentials.githubToken;
  if (!publish.owner || !token) {
    throw new AcquisitionError('Publishing needs publish.owner in the configuration and TOKEN_GITHUB in the environment');
  }

  logger.section('PUBLISHING TOOLCHAIN');

  const { target } = env.plan;
  const upstream = join(env.workDir, 'upstream');
  const remote = `https://${publish.owner}:${token}@${publish.host}/${publish.owner}/${target}`;
  const inUpstream: ExecOptions = { cwd: upstream, redact: [token] };

  await rm(upstream, { recursive: true, force: true });
  await git(env, ['clone', '--quiet', remote, 'upstream'], { cwd: env.workDir, redact: [token] }, `Failed to clone ${publish.owner}/${target}`);

  for (const entry of await readdir(upstream)) {
    if (entry !== '.git') {
      await rm(join(upstream, entry), { recursive: true, force: true });
    }
  }
  await cp(env.installDir, upstream, { recursive: true, verbatimSymlinks: true });

  const readme = await env.runner.run('git', ['checkout', 'README.md'], { ...inUpstream, stdio: 'pipe' });
  if (readme.exitCode !== 0) {
    logger.debug(`${publish.owner}/${target} has no README.md to keep`);
  }
  await git(env, ['add', '.'], inUpstream, 'Failed to stage the toolchain');
  await git(
    env,
    ['-c', `user.name=${publish.authorName}`, '-c', `user.email=${publish.authorEmail}`, 'commit', '-am', releaseCommitMessage(env, info)],
    inUpstream,
    'Failed to commit the toolchain'
  );
  await git(env, ['push'], inUpstream, `Failed to push to ${publish.owner}/${target}`);

  const commit = await git(env, ['rev-parse', 'HEAD'], inUpstream, 'Failed to read the pushed commit');
  const message = await git(env, ['log', '-1', '--pretty=%B'], inUpstream, 'Failed to read the pushed commit');
  const release: PublishedRelease = {
    commit,
    url: `https://${publish.host}/${publish.owner}/${target}/commit/${commit}`,
    message,
  };
  logger.success(`Pushed ${commit.slice(0, 8)} to ${publish.owner}/${target}`);

  if (notifier.canAnnounce) {
    await notifier.sendMessage(announcement(env, release));
  } else {
    logger.warn('TG_BOT_API or CHANNEL_ID is not set, not announcing the release');
  }

  return release;
}
