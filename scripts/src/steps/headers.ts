/**
 * gcc-forge - Linux Kernel Headers
 */

import { join } from 'path';
import { BuildEnvironment } from '../env.js';
import { logger } from '../logger.js';
import { getDependency } from '../resolver.js';
import { make } from './common.js';

export async function installHeaders(env: BuildEnvironment): Promise<void> {
  logger.section('MAKING LINUX HEADERS');

  const cwd = join(env.workDir, getDependency(env.plan, 'linux').treePath);

  await make(
    env,
    'headers',
    cwd,
    [`ARCH=${env.plan.kernelArch}`, `INSTALL_HDR_PATH=${env.sysrootDir}`, 'headers_install'],
    'Error while building/installing Linux headers!'
  );
}
