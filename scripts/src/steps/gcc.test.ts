import { mkdtemp, mkdir, readFile, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { StageError } from '../errors.js';
import { FakeRunner, testEnvironment } from '../testing.js';
import { buildGccFrontend, buildsLibgccEarly, dropLines, finalizeGcc, gccConfigureArgs } from './gcc.js';
import { buildBinutils } from './binutils.js';
import { installHeaders } from './headers.js';
import { BASE_CONFIGURATION } from './common.js';

describe('dropLines', () => {
  it('removes each line from the result of the previous removal', () => {
    const original = Array.from({ length: 50 }, (_, i) => `line ${i + 1}`);
    const kept = original.filter(l => l !== 'line 38' && l !== 'line 44');

    expect(dropLines(original.join('\n'), [38, 43])).toBe(kept.join('\n'));
  });

  it('ignores lines past the end', () => {
    expect(dropLines('a\nb', [38, 43])).toBe('a\nb');
  });
});

describe('compiler stages', () => {
  let workDir = '';
  let runner: FakeRunner;

  beforeEach(async () => {
    workDir = await mkdtemp(join(tmpdir(), 'gcc-forge-gcc-'));
    runner = new FakeRunner();
  });

  afterEach(async () => {
    await rm(workDir, { recursive: true, force: true });
  });

  it('configures binutils for the target and installs it', async () => {
    const env = testEnvironment(workDir, {}, { runner });
    await buildBinutils(env);

    expect(runner.calls.map(c => [c.command, ...c.args])).toEqual([
      [
        join(workDir, 'sources', 'binutils', 'configure'),
        '--target=aarch64-linux-gnu',
        `--prefix=${join(workDir, 'aarch64-linux-gnu')}`,
        '--disable-gdb',
        '--disable-nls',
        '--enable-gold',
        '--enable-lto',
        '--enable-plugins',
        '--enable-relro',
        '--with-sysroot',
        ...BASE_CONFIGURATION,
      ],
      ['make', '-j4'],
      ['make', 'install', '-j4'],
    ]);
    expect(new Set(runner.calls.map(c => c.options.cwd))).toEqual(new Set([join(workDir, 'build-binutils')]));
  });

  it('puts the install prefix first on PATH', async () => {
    const env = testEnvironment(workDir, {}, { runner });
    await buildBinutils(env);

    const path = runner.calls[0]?.options.env?.PATH ?? '';
    expect(path.split(':').slice(0, 2)).toEqual([
      join(workDir, 'aarch64-linux-gnu', 'bin'),
      join(workDir, 'prebuilts', 'bin'),
    ]);
  });

  it('installs kernel headers into the sysroot', async () => {
    const env = testEnvironment(workDir, { architecture: 'i686' }, { runner });
    await installHeaders(env);

    expect(runner.lines()).toEqual([
      `make ARCH=x86 INSTALL_HDR_PATH=${join(workDir, 'i686-linux-gnu', 'i686-linux-gnu')} headers_install -j4`,
    ]);
    expect(runner.calls[0]?.options.cwd).toBe(join(workDir, 'linux'));
  });

  it('builds libgcc with the frontend only for host and x86_64', () => {
    expect(buildsLibgccEarly(testEnvironment(workDir, { architecture: 'x86_64' }).plan)).toBe(true);
    expect(buildsLibgccEarly(testEnvironment(workDir, { architecture: 'host', version: 10 }).plan)).toBe(true);
    expect(buildsLibgccEarly(testEnvironment(workDir, { architecture: 'arm64' }).plan)).toBe(false);
  });

  it('configures a newlib compiler without shared libraries', () => {
    const args = gccConfigureArgs(testEnvironment(workDir, { bareMetal: true }));

    expect(args.slice(0, 6)).toEqual([
      '--enable-languages=c,c++',
      '--target=aarch64-elf',
      `--prefix=${join(workDir, 'aarch64-elf')}`,
      '--disable-nls',
      '--disable-shared',
      '--with-newlib',
    ]);
  });

  it('builds the frontend for arm64', async () => {
    const env = testEnvironment(workDir, {}, { runner });
    await buildGccFrontend(env);

    expect(runner.lines().slice(1)).toEqual(['make all-gcc -j4', 'make install-gcc -j4']);
    expect(runner.calls[0]?.command).toBe(join(workDir, 'sources', 'gcc', 'configure'));
  });

  it('adds libgcc to the x86_64 frontend', async () => {
    const env = testEnvironment(workDir, { architecture: 'x86_64' }, { runner });
    await buildGccFrontend(env);

    expect(runner.lines().slice(1)).toEqual([
      'make all-gcc -j4',
      'make install-gcc -j4',
      'make all-target-libgcc -j4',
      'make install-target-libgcc -j4',
    ]);
  });

  it('labels a failing make with its stage', async () => {
    const env = testEnvironment(workDir, {}, { runner });
    runner.fail('make all-gcc', 2, 'error: something broke');

    const error = await buildGccFrontend(env).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(StageError);
    if (error instanceof StageError) {
      expect(error.stage).toBe('gcc-frontend');
      expect(error.message).toBe('Error while building gcc!');
      expect(error.command).toBe('make all-gcc -j4');
      expect(error.exitCode).toBe(2);
    }
    expect(runner.lines()).not.toContain('make install-gcc -j4');
  });

  it('trims statx.h before the final build', async () => {
    const env = testEnvironment(workDir, {}, { runner });
    const dir = join(workDir, 'build-gcc', 'gcc', 'include-fixed', 'bits');
    await mkdir(dir, { recursive: true });
    const lines = Array.from({ length: 45 }, (_, i) => String(i + 1));
    await writeFile(join(dir, 'statx.h'), lines.join('\n'));

    await finalizeGcc(env);

    const trimmed = (await readFile(join(dir, 'statx.h'), 'utf-8')).split('\n');
    expect(trimmed).toHaveLength(43);
    expect(trimmed).not.toContain('38');
    expect(trimmed).not.toContain('44');
    expect(runner.lines()).toEqual(['make all -j4', 'make install -j4']);
  });

  it('finalizes without a statx.h', async () => {
    const env = testEnvironment(workDir, {}, { runner });
    await finalizeGcc(env);

    expect(runner.lines()).toEqual(['make all -j4', 'make install -j4']);
  });
});
