/**
 * gcc-forge - Host Probing
 * Facts about the build machine that the resolver takes as input
 */

import { availableParallelism } from 'os';
import { CommandRunner } from './exec.js';
import { AcquisitionError } from './errors.js';
import { HostInfo } from './types.js';

/**
 * Major version from `gcc -dumpversion` output ("11", "11.4.0", "4.9.4")
 */
export function parseCompilerMajor(output: string): number {
  const match = /^(\d+)/.exec(output.trim());
  return match ? Number(match[1]) : 0;
}

export async function probeHost(runner: CommandRunner): Promise<HostInfo> {
  const [machine, triple, version] = await Promise.all([
    runner.run('uname', ['-m'], { stdio: 'pipe' }),
    runner.run('gcc', ['-dumpmachine'], { stdio: 'pipe' }),
    runner.run('gcc', ['-dumpversion'], { stdio: 'pipe' }),
  ]);

  if (machine.exitCode !== 0) {
    throw new AcquisitionError('Unable to determine the host machine type (uname -m failed)');
  }
  if (triple.exitCode !== 0 || version.exitCode !== 0) {
    throw new AcquisitionError('A host gcc is required to bootstrap the toolchain but none was found on PATH');
  }

  return {
    machine: machine.stdout.trim(),
    triple: triple.stdout.trim(),
    compilerMajor: parseCompilerMajor(version.stdout),
    cpus: availableParallelism(),
  };
}
