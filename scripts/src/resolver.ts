/**
 * gcc-forge - Build Plan Resolver
 *
 * Maps a build request onto a concrete BuildPlan: target triple, kernel
 * header architecture, and the exact revision or archive of every
 * dependency. Pure: host facts come in as an argument, nothing is read
 * from disk or network here.
 */

import { ValidationError } from './errors.js';
import {
  ARCHITECTURES,
  Architecture,
  BuildPlan,
  BuildRequest,
  COMPRESSION_CODECS,
  DependencyName,
  DependencySource,
  HostInfo,
  LibcBackend,
  SOURCE_FLAVORS,
  SourceFlavor,
  TargetArchitecture,
} from './types.js';

export const MIN_VERSION = 4;
export const MAX_VERSION = 11;

// x86_64 toolchains are not built for GCC at or below this major
export const X86_64_LEGACY_THRESHOLD = 5;

const GMP = 'gmp-6.2.1';
const LINUX = '5.18';

const HOSTED_TRIPLES: Record<Exclude<Architecture, 'host'>, string> = {
  arm: 'arm-linux-gnueabi',
  arm64: 'aarch64-linux-gnu',
  i686: 'i686-linux-gnu',
  x86_64: 'x86_64-linux-gnu',
};

// Hosted triple -> bare-metal triple. Unlisted triples are kept as-is.
export const BARE_METAL_TRIPLES: Readonly<Record<string, string>> = {
  'arm-linux-gnueabi': 'arm-eabi',
  'aarch64-linux-gnu': 'aarch64-elf',
  'i686-linux-gnu': 'i686-elf',
  'x86_64-linux-gnu': 'x86_64-elf',
};

// Revisions used unless a version pins something else
const CHECKOUT_DEFAULTS = {
  binutils: 'master',
  mpfr: 'trunk',
  mpc: 'master',
  isl: 'master',
  glibc: 'master',
  newlib: 'master',
};

const ARCHIVE_DEFAULTS = {
  binutils: '2.38',
  mpfr: 'mpfr-4.1.0',
  mpc: 'mpc-1.2.1',
  isl: 'isl-0.24',
  glibc: 'glibc-2.35',
  newlib: 'newlib-4.1.0',
};

interface VersionPin {
  gcc: string;
  // Legacy overrides: newer revisions of these do not build with old GCC
  binutils?: string;
  glibc?: string;
  isl?: string;
  archiveExt?: 'gz' | 'xz';
}

type MatrixEntry =
  | { kind: 'pin'; pin: VersionPin }
  | { kind: 'missing'; reason: string };

const pin = (p: VersionPin): MatrixEntry => ({ kind: 'pin', pin: p });
const missing = (reason: string): MatrixEntry => ({ kind: 'missing', reason });

const NO_LINARO = (v: number) => missing(`There's no such thing as Linaro ${v}.x`);

const CHECKOUT_MATRIX: Record<SourceFlavor, Readonly<Record<number, MatrixEntry>>> = {
  gnu: {
    4: pin({ gcc: 'gcc-4_9-branch', binutils: 'binutils-2_29-branch', glibc: 'release/2.26/master', isl: 'isl-0.17.1' }),
    5: pin({ gcc: 'gcc-5-branch', glibc: 'release/2.27/master', isl: 'isl-0.17.1' }),
    6: pin({ gcc: 'gcc-6-branch' }),
    7: pin({ gcc: 'gcc-7-branch' }),
    8: pin({ gcc: 'gcc-8-branch' }),
    9: pin({ gcc: 'gcc-9-branch' }),
    10: pin({ gcc: 'gcc-10-branch' }),
    11: pin({ gcc: 'master' }),
  },
  linaro: {
    4: pin({ gcc: 'linaro-local/releases/linaro-4.9-2017.01', glibc: 'release/2.27/master', isl: 'isl-0.17.1' }),
    5: pin({ gcc: 'linaro-local/gcc-5-integration-branch', glibc: 'release/2.27/master', isl: 'isl-0.17.1' }),
    6: pin({ gcc: 'linaro-local/gcc-6-integration-branch' }),
    7: pin({ gcc: 'linaro-local/gcc-7-integration-branch' }),
    // ARM took over from Linaro with 8.x
    8: pin({ gcc: 'linaro-local/ARM/arm-8-branch' }),
    9: NO_LINARO(9),
    10: NO_LINARO(10),
  },
};

const ARCHIVE_MATRIX: Record<SourceFlavor, Readonly<Record<number, MatrixEntry>>> = {
  gnu: {
    4: pin({ gcc: 'gcc-4.9.4', binutils: '2.29.1', glibc: 'glibc-2.26', isl: 'isl-0.17.1', archiveExt: 'gz' }),
    5: pin({ gcc: 'gcc-5.5.0', glibc: 'glibc-2.27', isl: 'isl-0.17.1' }),
    6: pin({ gcc: 'gcc-6.5.0' }),
    7: pin({ gcc: 'gcc-7.4.0' }),
    8: pin({ gcc: 'gcc-8.3.0' }),
    9: pin({ gcc: 'gcc-9.2.0' }),
    10: pin({ gcc: 'gcc-10.2.0' }),
    11: missing('GCC 11 is a development branch and has no release archive; use a checkout or choose another version'),
  },
  linaro: {
    4: pin({ gcc: 'linaro-4.9-2017.01', glibc: 'glibc-2.27', isl: 'isl-0.17.1' }),
    5: pin({ gcc: 'linaro-5.5-2017.10', glibc: 'glibc-2.27', isl: 'isl-0.17.1' }),
    6: pin({ gcc: 'linaro-snapshot-6.5-2018.11' }),
    7: pin({ gcc: 'linaro-snapshot-7.4-2019.01' }),
    8: pin({ gcc: '8.3-2019.03' }),
    9: NO_LINARO(9),
    10: NO_LINARO(10),
  },
};

export const USAGE_HINT = `Supported: --arch ${ARCHITECTURES.join('|')}, --source ${SOURCE_FLAVORS.join('|')}, --version ${MIN_VERSION}-${MAX_VERSION} (9+ GNU only)`;

function assertNever(value: never): never {
  throw new Error(`Unhandled value: ${String(value)}`);
}

/**
 * Map `uname -m` onto the architecture names used for targets
 */
export function normalizeMachine(machine: string): TargetArchitecture | null {
  if (machine === 'x86_64' || machine === 'amd64') return 'x86_64';
  if (machine === 'aarch64' || machine === 'arm64') return 'arm64';
  if (/^i[3-6]86$/.test(machine)) return 'i686';
  if (machine.startsWith('arm')) return 'arm';
  return null;
}

export function kernelArchFor(arch: TargetArchitecture): string {
  switch (arch) {
    case 'i686':
    case 'x86_64':
      return 'x86';
    case 'arm':
    case 'arm64':
      return arch;
    default:
      return assertNever(arch);
  }
}

export function bareMetalTriple(triple: string): string {
  return BARE_METAL_TRIPLES[triple] ?? triple;
}

function isArchitecture(value: string): value is Architecture {
  return (ARCHITECTURES as readonly string[]).includes(value);
}

function isFlavor(value: string): value is SourceFlavor {
  return (SOURCE_FLAVORS as readonly string[]).includes(value);
}

function lookupVersion(flavor: SourceFlavor, version: number, tarballs: boolean): VersionPin {
  const matrix = tarballs ? ARCHIVE_MATRIX : CHECKOUT_MATRIX;
  const entry = matrix[flavor][version];

  if (!entry) {
    throw new ValidationError('Absent or invalid GCC version or source specified!', USAGE_HINT, true);
  }
  if (entry.kind === 'missing') {
    throw new ValidationError(entry.reason, USAGE_HINT, true);
  }
  return entry.pin;
}

function gccArchive(flavor: SourceFlavor, version: number, p: VersionPin): Pick<DependencySource, 'url' | 'fetchPath' | 'archiveMember'> {
  if (flavor === 'gnu') {
    const file = `${p.gcc}.tar.${p.archiveExt ?? 'xz'}`;
    return { url: `https://mirrors.kernel.org/gnu/gcc/${p.gcc}/${file}`, fetchPath: file };
  }
  if (version >= 8) {
    // ARM source snapshots bundle other GNU tools; only the gcc tree is used
    const member = `gcc-arm-src-snapshot-${p.gcc}`;
    return {
      url: `https://developer.arm.com/-/media/Files/downloads/gnu-a/${p.gcc}/srcrel/${member}.tar.xz`,
      fetchPath: `${member}.tar.xz`,
      archiveMember: member,
    };
  }
  const file = `gcc-${p.gcc}.tar.gz`;
  return { url: `https://git.linaro.org/toolchain/gcc.git/snapshot/${file}`, fetchPath: file };
}

function checkoutSources(libc: LibcBackend, p: VersionPin): DependencySource[] {
  const git = (name: DependencyName, url: string, ref: string): DependencySource => ({
    name,
    mode: 'checkout',
    revision: { kind: 'git', ref },
    url,
    fetchPath: name,
    treePath: `sources/${name}`,
  });

  return [
    {
      name: 'mpfr',
      mode: 'checkout',
      revision: { kind: 'svn', path: CHECKOUT_DEFAULTS.mpfr },
      url: `svn://scm.gforge.inria.fr/svnroot/mpfr/${CHECKOUT_DEFAULTS.mpfr}`,
      fetchPath: 'mpfr',
      treePath: 'sources/mpfr',
    },
    git('mpc', 'https://scm.gforge.inria.fr/anonscm/git/mpc/mpc.git', CHECKOUT_DEFAULTS.mpc),
    libc === 'newlib'
      ? git('newlib', 'git://sourceware.org/git/newlib-cygwin.git', CHECKOUT_DEFAULTS.newlib)
      : git('glibc', 'git://sourceware.org/git/glibc.git', p.glibc ?? CHECKOUT_DEFAULTS.glibc),
    git('binutils', 'https://git.linaro.org/toolchain/binutils-gdb.git', p.binutils ?? CHECKOUT_DEFAULTS.binutils),
    git('isl', 'git://repo.or.cz/isl.git', p.isl ?? CHECKOUT_DEFAULTS.isl),
    git('gcc', 'https://gcc.gnu.org/git/gcc.git', p.gcc),
  ];
}

function archiveSources(libc: LibcBackend, flavor: SourceFlavor, version: number, p: VersionPin): DependencySource[] {
  const archive = (name: DependencyName, release: string, url: string, fetchPath: string, treePath: string): DependencySource => ({
    name,
    mode: 'archive',
    revision: { kind: 'tarball', version: release },
    url,
    fetchPath,
    treePath,
  });

  const mpfr = ARCHIVE_DEFAULTS.mpfr;
  const mpc = ARCHIVE_DEFAULTS.mpc;
  const binutils = p.binutils ?? ARCHIVE_DEFAULTS.binutils;
  const isl = p.isl ?? ARCHIVE_DEFAULTS.isl;
  const newlib = ARCHIVE_DEFAULTS.newlib;
  const glibc = p.glibc ?? ARCHIVE_DEFAULTS.glibc;

  return [
    archive('mpfr', mpfr, `https://www.mpfr.org/mpfr-current/${mpfr}.tar.xz`, `${mpfr}.tar.xz`, mpfr),
    archive('mpc', mpc, `https://ftp.gnu.org/gnu/mpc/${mpc}.tar.gz`, `${mpc}.tar.gz`, mpc),
    libc === 'newlib'
      ? archive('newlib', newlib, `https://sourceware.org/pub/newlib/${newlib}.tar.gz`, `${newlib}.tar.gz`, newlib)
      : archive('glibc', glibc, `https://ftp.gnu.org/gnu/glibc/${glibc}.tar.xz`, `${glibc}.tar.xz`, glibc),
    archive('binutils', binutils, `https://ftp.gnu.org/gnu/binutils/binutils-${binutils}.tar.xz`, `binutils-${binutils}.tar.xz`, 'binutils'),
    archive('isl', isl, `http://isl.gforge.inria.fr/${isl}.tar.xz`, `${isl}.tar.xz`, isl),
    {
      name: 'gcc',
      mode: 'archive',
      revision: { kind: 'tarball', version: p.gcc },
      treePath: 'gcc',
      ...gccArchive(flavor, version, p),
    },
  ];
}

/**
 * Every check that does not need host facts. Run before probing the host
 * so a bad request fails without spawning anything.
 */
export function checkRequest(request: BuildRequest): void {
  const { architecture, flavor, version } = request;

  if (!isArchitecture(architecture)) {
    throw new ValidationError('Absent or invalid arch specified!', USAGE_HINT, true);
  }
  if (!isFlavor(flavor) || !Number.isInteger(version)) {
    throw new ValidationError('Absent or invalid GCC version or source specified!', USAGE_HINT, true);
  }
  if (request.codec !== undefined && !COMPRESSION_CODECS.includes(request.codec)) {
    throw new ValidationError(`Invalid compression specified: ${String(request.codec)}`, `Use one of ${COMPRESSION_CODECS.join(', ')}`);
  }
  if (request.jobs !== undefined && (!Number.isInteger(request.jobs) || request.jobs < 1)) {
    throw new ValidationError(`Invalid job count: ${request.jobs}`, 'Pass a positive integer to --jobs');
  }
  if (architecture === 'x86_64' && version <= X86_64_LEGACY_THRESHOLD) {
    throw new ValidationError(
      'Will not build, use a newer version instead',
      `x86_64 toolchains need GCC ${X86_64_LEGACY_THRESHOLD + 1} or newer`
    );
  }
  lookupVersion(flavor, version, request.tarballs === true);
}

/**
 * Resolve a build request into a BuildPlan, or throw ValidationError
 */
export function resolve(request: BuildRequest, host: HostInfo): BuildPlan {
  checkRequest(request);
  const { architecture, flavor, version } = request;

  let targetArchitecture: TargetArchitecture;
  let triple: string;
  let forHost = false;

  switch (architecture) {
    case 'host': {
      if (version <= host.compilerMajor) {
        throw new ValidationError(
          'Building a toolchain older than the distribution one is not supported on host target!',
          `The host compiler is GCC ${host.compilerMajor}; request version ${host.compilerMajor + 1} or newer`
        );
      }
      const machine = normalizeMachine(host.machine);
      if (!machine) {
        throw new ValidationError(`Unsupported host machine: ${host.machine}`, USAGE_HINT);
      }
      targetArchitecture = machine;
      triple = host.triple;
      forHost = true;
      break;
    }
    case 'x86_64':
    case 'arm':
    case 'arm64':
    case 'i686':
      targetArchitecture = architecture;
      triple = HOSTED_TRIPLES[architecture];
      break;
    default:
      return assertNever(architecture);
  }

  const bareMetal = request.bareMetal === true;
  const libc: LibcBackend = bareMetal || request.useNewlib === true ? 'newlib' : 'glibc';
  const target = bareMetal ? bareMetalTriple(triple) : triple;
  const tarballs = request.tarballs === true;

  const versionPin = lookupVersion(flavor, version, tarballs);

  const dependencies: DependencySource[] = [
    {
      name: 'gmp',
      mode: 'archive',
      revision: { kind: 'tarball', version: GMP },
      url: `https://gmplib.org/download/gmp/${GMP}.tar.lz`,
      fetchPath: `${GMP}.tar.lz`,
      treePath: GMP,
    },
  ];
  if (libc === 'glibc') {
    dependencies.push({
      name: 'linux',
      mode: 'archive',
      revision: { kind: 'tarball', version: LINUX },
      url: `https://cdn.kernel.org/pub/linux/kernel/v${LINUX.split('.')[0]}.x/linux-${LINUX}.tar.xz`,
      fetchPath: `linux-${LINUX}.tar.xz`,
      treePath: 'linux',
    });
  }
  dependencies.push(
    ...(tarballs ? archiveSources(libc, flavor, version, versionPin) : checkoutSources(libc, versionPin))
  );

  return Object.freeze({
    architecture,
    targetArchitecture,
    forHost,
    target,
    buildTriple: host.triple,
    kernelArch: kernelArchFor(targetArchitecture),
    flavor,
    version,
    bareMetal,
    libc,
    tarballs,
    shallow: request.fullHistory !== true,
    update: request.noUpdate !== true,
    jobs: request.jobs ?? host.cpus + 1,
    codec: request.codec,
    dependencies: Object.freeze(dependencies.map(d => Object.freeze(d))),
  });
}

/**
 * Look up one dependency of a plan
 */
export function getDependency(plan: BuildPlan, name: DependencyName): DependencySource {
  const dep = plan.dependencies.find(d => d.name === name);
  if (!dep) {
    throw new Error(`Build plan for ${plan.target} has no ${name} dependency`);
  }
  return dep;
}

export function libcDependency(plan: BuildPlan): DependencySource {
  return getDependency(plan, plan.libc);
}
