/**
 * gcc-forge - Toolchain Packaging
 */

import { join } from 'path';
import { BuildEnvironment, getExportedEnv } from '../env.js';
import { logger } from '../logger.js';
import { outputTail } from '../exec.js';
import { PackagingError } from '../errors.js';
import { BuildPlan, CompressionCodec } from '../types.js';

// Compressor handed to tar for each codec, at its highest level
export const COMPRESSORS: Record<CompressionCodec, { label: string; program: string }> = {
  gz: { label: 'GZIP', program: 'pigz -9' },
  xz: { label: 'XZ', program: 'xz -9 -T0' },
  zstd: { label: 'ZSTD', program: 'zstd -19 -T0' },
};

/**
 * YYYYMMDD of a point in time, as seen in the given IANA zone
 */
export function dateStamp(now: Date, timeZone: string): string {
  const parts = new Intl.DateTimeFormat('en-US', {
    timeZone,
    year: 'numeric',
    month: '2-digit',
    day: '2-digit',
  }).formatToParts(now);
  const part = (type: Intl.DateTimeFormatPartTypes): string =>
    parts.find(p => p.type === type)?.value ?? '';
  return `${part('year')}${part('month')}${part('day')}`;
}

export function packageName(plan: BuildPlan, codec: CompressionCodec, stamp: string): string {
  return `${plan.target}-${plan.version}.x-${plan.flavor}-${stamp}.tar.${codec}`;
}

/**
 * Compress the install tree into the working directory. Returns the
 * archive path, or null when no codec was requested.
 */
export async function packageToolchain(env: BuildEnvironment, now: Date = new Date()): Promise<string | null> {
  const { plan } = env;
  if (!plan.codec) return null;

  logger.section('PACKAGING TOOLCHAIN');

  const name = packageName(plan, plan.codec, dateStamp(now, env.config.timezone));
  const compressor = COMPRESSORS[plan.codec];
  logger.info(`Target file: ${name}`);
  logger.step(`Packaging with ${compressor.label}...`);

  const result = await env.runner.run(
    'tar',
    ['-c', `--use-compress-program=${compressor.program}`, '-f', name, plan.target],
    { cwd: env.workDir, env: getExportedEnv(env) }
  );
  if (result.exitCode !== 0) {
    throw new PackagingError(`Error while packaging ${plan.target}!\n${outputTail(result)}`);
  }

  return join(env.workDir, name);
}
