/**
 * gcc-forge - Build Plan Types
 *
 * Settings that are not part of a build request live in config/toolchain.yaml
 * (see config.ts). Everything describing *what* gets built is a BuildPlan,
 * produced once by the resolver and never mutated afterwards.
 */

// Target architecture selector; 'host' resolves to the running machine
export type Architecture = 'arm' | 'arm64' | 'i686' | 'x86_64' | 'host';

// Architecture after 'host' has been substituted
export type TargetArchitecture = Exclude<Architecture, 'host'>;

// GCC source: GNU upstream or the Linaro/ARM fork
export type SourceFlavor = 'gnu' | 'linaro';

export type LibcBackend = 'glibc' | 'newlib';

export type CompressionCodec = 'gz' | 'xz' | 'zstd';

export const ARCHITECTURES: readonly Architecture[] = ['arm', 'arm64', 'i686', 'x86_64', 'host'];
export const SOURCE_FLAVORS: readonly SourceFlavor[] = ['gnu', 'linaro'];
export const COMPRESSION_CODECS: readonly CompressionCodec[] = ['gz', 'xz', 'zstd'];

// Everything that gets fetched for a toolchain build
export type DependencyName =
  | 'binutils'
  | 'gmp'
  | 'mpfr'
  | 'mpc'
  | 'isl'
  | 'linux'
  | 'glibc'
  | 'newlib'
  | 'gcc';

// Where a dependency's source comes from
export type RevisionDescriptor =
  | { kind: 'git'; ref: string }
  | { kind: 'svn'; path: string }
  | { kind: 'tarball'; version: string };

export type AcquisitionMode = 'checkout' | 'archive';

export interface DependencySource {
  name: DependencyName;
  mode: AcquisitionMode;
  revision: RevisionDescriptor;
  url: string;
  // Checkout directory or archive file name, relative to the sources directory
  fetchPath: string;
  // Directory the tree is used from, relative to the working directory
  treePath: string;
  // Archive member to extract instead of stripping the top-level directory
  archiveMember?: string;
}

// Host facts the resolver needs; probed once by host.ts
export interface HostInfo {
  machine: string;       // uname -m
  triple: string;        // gcc -dumpmachine
  compilerMajor: number; // gcc -dumpversion
  cpus: number;
}

export interface BuildRequest {
  architecture: Architecture;
  flavor: SourceFlavor;
  version: number;
  bareMetal?: boolean;
  useNewlib?: boolean;
  tarballs?: boolean;
  fullHistory?: boolean;
  noUpdate?: boolean;
  jobs?: number;
  codec?: CompressionCodec;
}

export interface BuildPlan {
  readonly architecture: Architecture;
  readonly targetArchitecture: TargetArchitecture;
  readonly forHost: boolean;
  readonly target: string;
  readonly buildTriple: string;
  readonly kernelArch: string;
  readonly flavor: SourceFlavor;
  readonly version: number;
  readonly bareMetal: boolean;
  readonly libc: LibcBackend;
  readonly tarballs: boolean;
  readonly shallow: boolean;
  readonly update: boolean;
  readonly jobs: number;
  readonly codec?: CompressionCodec;
  readonly dependencies: readonly DependencySource[];
}

// Pipeline stages, in execution order
export type Stage = 'binutils' | 'headers' | 'gcc-frontend' | 'runtime-library' | 'gcc-finalize';

export type StageResult =
  | { stage: Stage; status: 'ok'; duration: number }
  | { stage: Stage; status: 'failed'; duration: number; cause: string };

// How a stage build directory is backed
export type MountMode = 'tmpfs' | 'bind' | 'plain';

// Command execution options
export interface ExecOptions {
  cwd?: string;
  env?: Record<string, string>;
  stdio?: 'inherit' | 'pipe' | 'ignore';
  input?: string;
  timeout?: number;
  // Substrings masked in the run log (credentials in URLs)
  redact?: string[];
}

export interface ExecResult {
  stdout: string;
  stderr: string;
  exitCode: number;
}
