#!/usr/bin/env node
/**
 * gcc-forge - CLI
 * Build GCC cross toolchains
 */

import { Command } from 'commander';
import { realpathSync } from 'fs';
import { fileURLToPath } from 'url';
import { Builder } from './builder.js';
import { loadToolchainConfig } from './config.js';
import { logger } from './logger.js';
import { ValidationError, describeError, isToolchainError } from './errors.js';
import { USAGE_HINT } from './resolver.js';
import {
  ARCHITECTURES,
  Architecture,
  BuildPlan,
  BuildRequest,
  COMPRESSION_CODECS,
  CompressionCodec,
  SOURCE_FLAVORS,
  SourceFlavor,
} from './types.js';

export const VERSION = '1.0.0';

export interface RequestFlags {
  arch?: string;
  source?: string;
  version?: string;
  elf?: boolean;
  fullSrc?: boolean;
  jobs?: string;
  update?: boolean;
  withNewlib?: boolean;
  package?: string;
  tarballs?: boolean;
}

interface BuildFlags extends RequestFlags {
  release?: boolean;
  tmpfs?: boolean;
  verbose?: boolean;
}

function oneOf<T extends string>(values: readonly T[], value: string | undefined): value is T {
  return value !== undefined && (values as readonly string[]).includes(value);
}

/**
 * Turn command line flags into a build request. Only the shape is checked
 * here; the resolver decides what combinations exist.
 */
export function toBuildRequest(flags: RequestFlags): BuildRequest {
  const { arch, source } = flags;
  if (!oneOf<Architecture>(ARCHITECTURES, arch)) {
    throw new ValidationError('Absent or invalid arch specified!', USAGE_HINT, true);
  }
  if (!oneOf<SourceFlavor>(SOURCE_FLAVORS, source) || flags.version === undefined || !/^\d+$/.test(flags.version)) {
    throw new ValidationError('Absent or invalid GCC version or source specified!', USAGE_HINT, true);
  }

  let codec: CompressionCodec | undefined;
  if (flags.package !== undefined) {
    if (!oneOf<CompressionCodec>(COMPRESSION_CODECS, flags.package)) {
      throw new ValidationError(`Invalid compression specified: ${flags.package}`, `Use one of ${COMPRESSION_CODECS.join(', ')}`);
    }
    codec = flags.package;
  }

  let jobs: number | undefined;
  if (flags.jobs !== undefined) {
    jobs = /^\d+$/.test(flags.jobs) ? Number(flags.jobs) : Number.NaN;
  }

  return {
    architecture: arch,
    flavor: source,
    version: Number(flags.version),
    bareMetal: flags.elf === true,
    useNewlib: flags.withNewlib === true,
    tarballs: flags.tarballs === true,
    fullHistory: flags.fullSrc === true,
    noUpdate: flags.update === false,
    jobs,
    codec,
  };
}

function addRequestOptions(cmd: Command): Command {
  return cmd
    .option('-a, --arch <arch>', `target architecture (${ARCHITECTURES.join(', ')})`)
    .option('-s, --source <flavor>', `GCC source (${SOURCE_FLAVORS.join(', ')})`)
    .option('-v, --version <major>', 'GCC major version to build (4-11, 9+ GNU only)')
    .option('-e, --elf', 'build a bare-metal toolchain with newlib')
    .option('-f, --full-src', 'clone full history instead of shallow checkouts')
    .option('-j, --jobs <n>', 'parallel make jobs (default: CPUs + 1)')
    .option('--no-update', 'do not update downloaded sources before building')
    .option('--with-newlib', 'use newlib instead of glibc')
    .option('--tarballs', 'build from release archives instead of checkouts');
}

function printPlan(plan: BuildPlan): void {
  logger.box(`Build plan: ${plan.target}`, [
    `Architecture: ${plan.targetArchitecture}${plan.forHost ? ' (host)' : ''}`,
    `Build triple: ${plan.buildTriple}`,
    `Kernel arch:  ${plan.kernelArch}`,
    `GCC:          ${plan.version} (${plan.flavor})`,
    `C library:    ${plan.libc}`,
    `Jobs:         ${plan.jobs}`,
    `Package:      ${plan.codec ?? 'none'}`,
    '',
    ...plan.dependencies.map(dep => {
      const rev = dep.revision;
      const id = rev.kind === 'git' ? rev.ref : rev.kind === 'svn' ? rev.path : rev.version;
      return `${dep.name.padEnd(9)} ${dep.mode.padEnd(8)} ${id}`;
    }),
  ]);
}

function reportFailure(error: unknown, cmd: Command): void {
  if (error instanceof ValidationError) {
    logger.error(error.message);
    logger.info(error.hint);
    if (error.showUsage) {
      cmd.outputHelp();
    }
  } else if (isToolchainError(error)) {
    logger.error(describeError(error));
  } else {
    logger.error(`Internal error: ${describeError(error)}`);
  }
}

export function createProgram(): Command {
  const program = new Command();

  program
    .name('gcc-forge')
    .description('Fetch, patch, configure, build and package GCC cross toolchains')
    .version(VERSION, '--print-version')
    .showHelpAfterError('(use "gcc-forge --help" for available commands)');

  const buildCmd = addRequestOptions(
    program
      .command('build', { isDefault: true })
      .description('Build a toolchain')
  )
    .option('-p, --package <codec>', `package the toolchain (${COMPRESSION_CODECS.join(', ')})`)
    .option('-r, --release', 'push the toolchain to its repository and announce it')
    .option('--tmpfs', 'mount the build directories as tmpfs')
    .option('-V, --verbose', 'stream subprocess output');

  buildCmd.action(async (flags: BuildFlags) => {
    try {
      const request = toBuildRequest(flags);
      const builder = new Builder(await loadToolchainConfig());
      const outcome = await builder.build({
        request,
        verbose: flags.verbose,
        tmpfs: flags.tmpfs,
        release: flags.release,
      });
      process.exit(outcome.success ? 0 : 1);
    } catch (error) {
      reportFailure(error, buildCmd);
      process.exit(1);
    }
  });

  const planCmd = addRequestOptions(
    program
      .command('plan')
      .description('Resolve and print the build plan without building')
  );

  planCmd.action(async (flags: RequestFlags) => {
    try {
      const builder = new Builder(await loadToolchainConfig());
      printPlan(await builder.plan(toBuildRequest(flags)));
    } catch (error) {
      reportFailure(error, planCmd);
      process.exit(1);
    }
  });

  const cleanCmd = addRequestOptions(
    program
      .command('clean')
      .description('Remove what a previous run left in the working directory')
  ).option('--tmpfs', 'the previous run used tmpfs build directories');

  cleanCmd.action(async (flags: RequestFlags & { tmpfs?: boolean }) => {
    try {
      const builder = new Builder(await loadToolchainConfig());
      await builder.clean(toBuildRequest(flags), { tmpfs: flags.tmpfs });
    } catch (error) {
      reportFailure(error, cleanCmd);
      process.exit(1);
    }
  });

  return program;
}

function isEntryPoint(): boolean {
  const script = process.argv[1];
  if (!script) return false;
  try {
    return realpathSync(script) === fileURLToPath(import.meta.url);
  } catch {
    return false;
  }
}

if (isEntryPoint()) {
  createProgram()
    .parseAsync(process.argv)
    .catch(error => {
      logger.error(`Internal error: ${describeError(error)}`);
      process.exit(1);
    });
}
