/**
 * gcc-forge - Workspace
 *
 * Owns the stage build directories: clears what a previous run left
 * behind, creates and (optionally) mounts one directory per stage, wires
 * the math libraries into the GCC tree and applies the version patch.
 * release() undoes the mounts, or removes plain build directories, and may
 * be called any number of times.
 */

import { join } from 'path';
import { lstat, mkdir, readdir, rm, symlink } from 'fs/promises';
import { existsSync } from 'fs';
import { BuildDirName, BuildEnvironment, getExportedEnv } from './env.js';
import { logger } from './logger.js';
import { formatCommand, outputTail } from './exec.js';
import { AcquisitionError, IntegrityError, PatchError } from './errors.js';
import { getDependency } from './resolver.js';
import { DependencyName, MountMode } from './types.js';

interface PatchRange {
  min: number;
  max: number;
  patch: string;
}

// GCC major -> patch for a missing-declaration build failure in that range
export const GCC_PATCHES: readonly PatchRange[] = [
  // asan: 'SIGSEGV' was not declared in this scope
  { min: 4, max: 4, patch: '942-asan-fix-missing-include-signal-h' },
  { min: 5, max: 5, patch: 'GCC_10_up' },
  // i686: 'PATH_MAX' undeclared here (not in a function)
  { min: 6, max: 8, patch: 'GCC_6-8' },
  // 'PATH_MAX' was not declared in this scope
  { min: 9, max: 9, patch: 'GCC_9' },
  { min: 10, max: 11, patch: 'GCC_10_up' },
];

export function selectGccPatch(version: number): string {
  const range = GCC_PATCHES.find(r => version >= r.min && version <= r.max);
  if (!range) {
    throw new PatchError(`No GCC patch is known for version ${version}`, '');
  }
  return range.patch;
}

// Math libraries GCC builds in-tree, linked under these names
const IN_TREE_LIBRARIES: DependencyName[] = ['gmp', 'mpfr', 'isl', 'mpc'];

const STALE_DIRS = new Set(['binutils', 'gcc', 'linux', 'glibc', 'newlib', 'upstream']);
const STALE_PATTERNS = [
  /^build-(binutils|gcc|glibc|newlib)$/,
  /^(gmp|mpfr|mpc|isl|glibc|newlib)-[\d.]+$/,
  /^gcc-arm-src-snapshot-/,
  /\.tar\.[a-z0-9]+$/,
];

/**
 * Entries of the working directory that belong to a previous run
 */
export async function findLeftovers(workDir: string, target: string): Promise<string[]> {
  if (!existsSync(workDir)) return [];

  const entries = await readdir(workDir, { withFileTypes: true });
  return entries
    .filter(e =>
      e.isSymbolicLink() ||
      e.name === target ||
      STALE_DIRS.has(e.name) ||
      STALE_PATTERNS.some(p => p.test(e.name))
    )
    .map(e => join(workDir, e.name))
    .sort();
}

export interface WorkspaceOptions {
  tmpfs?: boolean;
}

export class Workspace {
  readonly mode: MountMode;
  private mounted: string[] = [];
  // Plain build directories prepare() created
  private created: string[] = [];
  private privilegesChecked = false;

  constructor(private readonly env: BuildEnvironment, options: WorkspaceOptions = {}) {
    if (options.tmpfs) {
      this.mode = 'tmpfs';
    } else if (env.config.bindMountRoot) {
      this.mode = 'bind';
    } else {
      this.mode = 'plain';
    }
  }

  get mountedDirs(): readonly string[] {
    return this.mounted;
  }

  private buildDirs(): string[] {
    return this.env.activeBuildDirs.map(name => this.env.buildDirs[name]);
  }

  // mount/umount through the configured privilege command (sudo by default)
  private privileged(args: string[]): [string, string[]] {
    const priv = this.env.config.privilegeCommand;
    return priv ? [priv, args] : [args[0] ?? '', args.slice(1)];
  }

  /**
   * Make sure mount commands can run without prompting mid-build
   */
  async checkPrivileges(): Promise<void> {
    if (this.mode === 'plain' || this.privilegesChecked || !this.env.config.privilegeCommand) return;

    logger.info(`Checking if ${this.env.config.privilegeCommand} is available, please enter your password if a prompt appears!`);
    const result = await this.env.runner.run(this.env.config.privilegeCommand, ['-v'], { stdio: 'inherit' });
    if (result.exitCode !== 0) {
      throw new AcquisitionError(`${this.env.config.privilegeCommand} is not available!`);
    }
    this.privilegesChecked = true;
  }

  /**
   * Remove everything a previous run produced, or refuse to continue
   */
  async cleanUp(): Promise<void> {
    logger.section('CLEANING UP');
    const { workDir, plan } = this.env;

    if (this.mode !== 'tmpfs') {
      for (const dir of Object.values(this.env.buildDirs)) {
        if (!existsSync(dir)) continue;
        for (const entry of await readdir(dir)) {
          await rm(join(dir, entry), { recursive: true, force: true });
        }
      }
    }

    if (this.mode !== 'plain') {
      await this.checkPrivileges();
      await this.forceUnmount(this.buildDirs());
    }

    for (const path of await findLeftovers(workDir, plan.target)) {
      try {
        await rm(path, { recursive: true, force: true });
      } catch (error) {
        logger.debug(`Could not remove ${path}: ${String(error)}`);
      }
    }

    const leftovers = await findLeftovers(workDir, plan.target);
    if (leftovers.length > 0) {
      throw new IntegrityError(
        'Clean up failed! Aborting. Try checking that you have proper permissions to delete files.',
        leftovers
      );
    }
    logger.success('Clean up successful!');
  }

  /**
   * Create and mount build directories, link math libraries, patch GCC
   */
  async prepare(): Promise<void> {
    const { env } = this;
    const gcc = getDependency(env.plan, 'gcc');
    const gccTree = join(env.workDir, gcc.treePath);

    if (!existsSync(gccTree)) {
      throw new AcquisitionError(`GCC source is missing at ${gccTree}! Please check your connection and rerun.`);
    }

    for (const name of env.activeBuildDirs) {
      await mkdir(env.buildDirs[name], { recursive: true });
      if (this.mode === 'plain') {
        this.created.push(env.buildDirs[name]);
      }
    }

    await this.mountBuildDirs();
    await this.linkLibraries(gccTree);

    if (env.plan.update) {
      await this.applyPatch(gccTree);
    } else {
      logger.debug('Updates suppressed, not patching GCC');
    }
  }

  private async mountBuildDirs(): Promise<void> {
    if (this.mode === 'plain') return;
    await this.checkPrivileges();

    for (const name of this.env.activeBuildDirs) {
      const dir = this.env.buildDirs[name];
      const args = this.mode === 'tmpfs'
        ? ['mount', '-t', 'tmpfs', '-o', 'rw', 'none', dir]
        : ['mount', '-B', this.bindSource(name), dir];
      const [command, rest] = this.privileged(args);

      const result = await this.env.runner.run(command, rest);
      if (result.exitCode !== 0) {
        throw new AcquisitionError(`Failed to mount ${dir} (${formatCommand(command, rest)}): ${outputTail(result, 5)}`);
      }
      this.mounted.push(dir);
      logger.debug(`Mounted ${dir} (${this.mode})`);
    }
  }

  private bindSource(name: BuildDirName): string {
    const root = this.env.config.bindMountRoot;
    if (!root) {
      throw new AcquisitionError('bindMountRoot is not configured');
    }
    return join(root, name.replace(/^build-/, ''));
  }

  private async linkLibraries(gccTree: string): Promise<void> {
    for (const name of IN_TREE_LIBRARIES) {
      const dep = getDependency(this.env.plan, name);
      const link = join(gccTree, name);
      const existing = await lstat(link).catch(() => null);
      if (existing) {
        await rm(link, { recursive: true, force: true });
      }
      await symlink(join(this.env.workDir, dep.treePath), link);
    }
  }

  private async applyPatch(gccTree: string): Promise<void> {
    const name = selectGccPatch(this.env.plan.version);
    const file = join(this.env.config.patchesDir, `${name}.patch`);

    if (!existsSync(file)) {
      throw new PatchError(`Patch file ${file} does not exist`, file);
    }

    logger.step(`Applying ${name}.patch`);
    const result = await this.env.runner.run('patch', ['-Np1', '-i', file], {
      cwd: gccTree,
      env: getExportedEnv(this.env),
    });
    if (result.exitCode !== 0) {
      throw new PatchError(`Failed to patch GCC source!\n${outputTail(result)}`, file);
    }
  }

  private async forceUnmount(dirs: string[]): Promise<void> {
    for (const dir of dirs) {
      const [command, rest] = this.privileged(['umount', '-f', dir]);
      const result = await this.env.runner.run(command, rest, { stdio: 'pipe' });
      if (result.exitCode !== 0) {
        logger.debug(`${dir} was not mounted`);
      }
    }
  }

  /**
   * Unmount whatever this workspace mounted and remove the plain build
   * directories it created. Safe to call repeatedly and when nothing was
   * prepared.
   */
  async release(): Promise<void> {
    const created = this.created;
    this.created = [];
    for (const dir of created) {
      try {
        await rm(dir, { recursive: true, force: true });
      } catch (error) {
        logger.warn(`Could not remove ${dir}: ${String(error)}`);
      }
    }

    const dirs = [...this.mounted].reverse();
    this.mounted = [];
    if (dirs.length === 0) return;

    await this.forceUnmount(dirs);
    logger.debug(`Released ${dirs.length} mounted build director${dirs.length === 1 ? 'y' : 'ies'}`);
  }
}
