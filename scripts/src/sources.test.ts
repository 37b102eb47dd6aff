import { mkdtemp, mkdir, rm, writeFile } from 'fs/promises';
import { existsSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { AcquisitionError } from './errors.js';
import { FakeRunner, testEnvironment } from './testing.js';
import { getDependency } from './resolver.js';
import { MaterializedSource, ensureSource, extractSource, selectDownloader, updateSources } from './sources.js';
import { BuildEnvironment } from './env.js';
import { DependencyName } from './types.js';

function downloaded(env: BuildEnvironment, name: DependencyName): MaterializedSource {
  const source = getDependency(env.plan, name);
  return {
    source,
    fetchPath: join(env.sourcesDir, source.fetchPath),
    treeDir: join(env.workDir, source.treePath),
    fetched: true,
    extracted: false,
  };
}

describe('sources', () => {
  let workDir = '';
  let runner: FakeRunner;

  beforeEach(async () => {
    workDir = await mkdtemp(join(tmpdir(), 'gcc-forge-sources-'));
    runner = new FakeRunner();
  });

  afterEach(async () => {
    await rm(workDir, { recursive: true, force: true });
  });

  describe('ensureSource', () => {
    it('clones a missing checkout shallowly into the sources directory', async () => {
      const env = testEnvironment(workDir, {}, { runner });
      const result = await ensureSource(env, getDependency(env.plan, 'gcc'), null);

      expect(runner.lines()).toEqual(['git clone --quiet --depth=1 https://gcc.gnu.org/git/gcc.git -b master gcc']);
      expect(runner.calls[0]?.options.cwd).toBe(env.sourcesDir);
      expect(result.fetched).toBe(true);
      expect(result.treeDir).toBe(join(workDir, 'sources', 'gcc'));
    });

    it('clones full history on request', async () => {
      const env = testEnvironment(workDir, { fullHistory: true }, { runner });
      await ensureSource(env, getDependency(env.plan, 'binutils'), null);

      expect(runner.lines()).toEqual([
        'git clone --quiet https://git.linaro.org/toolchain/binutils-gdb.git -b master binutils',
      ]);
    });

    it('does nothing the second time', async () => {
      const env = testEnvironment(workDir, {}, { runner });
      runner.on('git clone', {}, async call => {
        await mkdir(join(env.sourcesDir, call.args[call.args.length - 1] ?? ''), { recursive: true });
      });
      const gcc = getDependency(env.plan, 'gcc');

      const first = await ensureSource(env, gcc, null);
      const second = await ensureSource(env, gcc, null);

      expect(first.fetched).toBe(true);
      expect(second.fetched).toBe(false);
      expect(runner.calls).toHaveLength(1);
    });

    it('checks out MPFR with Subversion', async () => {
      const env = testEnvironment(workDir, {}, { runner });
      await ensureSource(env, getDependency(env.plan, 'mpfr'), null);

      expect(runner.lines()).toEqual(['svn co svn://scm.gforge.inria.fr/svnroot/mpfr/trunk mpfr']);
    });

    it('downloads archives with the selected downloader', async () => {
      const env = testEnvironment(workDir, {}, { runner });
      const downloader = { command: 'wget' as const, args: (url: string, out: string) => ['-q', '-O', out, url] };
      await ensureSource(env, getDependency(env.plan, 'gmp'), downloader);

      expect(runner.lines()).toEqual(['wget -q -O gmp-6.2.1.tar.lz https://gmplib.org/download/gmp/gmp-6.2.1.tar.lz']);
    });

    it('skips an archive that is already downloaded', async () => {
      const env = testEnvironment(workDir, {}, { runner });
      await mkdir(env.sourcesDir, { recursive: true });
      await writeFile(join(env.sourcesDir, 'gmp-6.2.1.tar.lz'), '');

      const result = await ensureSource(env, getDependency(env.plan, 'gmp'), null);

      expect(result.fetched).toBe(false);
      expect(runner.calls).toHaveLength(0);
    });

    it('fails with the command that broke', async () => {
      const env = testEnvironment(workDir, {}, { runner });
      runner.fail('git clone', 128, 'fatal: unable to access');

      await expect(ensureSource(env, getDependency(env.plan, 'isl'), null)).rejects.toThrow(AcquisitionError);
    });
  });

  describe('selectDownloader', () => {
    it('prefers aria2c with the configured segments', async () => {
      const env = testEnvironment(workDir, {}, { runner });
      const downloader = await selectDownloader(env);

      expect(downloader.command).toBe('aria2c');
      expect(downloader.args('https://example.test/a.tar.xz', 'a.tar.xz')).toEqual([
        '--split=16',
        '--max-connection-per-server=16',
        '--summary-interval=0',
        '--out=a.tar.xz',
        'https://example.test/a.tar.xz',
      ]);
    });

    it('falls back to curl', async () => {
      runner.fail('which aria2c').fail('which wget');
      const downloader = await selectDownloader(testEnvironment(workDir, {}, { runner }));

      expect(downloader.command).toBe('curl');
    });

    it('fails when no downloader exists', async () => {
      runner.fail('which');
      await expect(selectDownloader(testEnvironment(workDir, {}, { runner }))).rejects.toThrow(AcquisitionError);
    });
  });

  describe('extractSource', () => {
    it('strips the top-level directory of an archive', async () => {
      const env = testEnvironment(workDir, { version: 10, tarballs: true }, { runner });
      const extracted = await extractSource(env, downloaded(env, 'binutils'));

      expect(runner.lines()).toEqual([
        `tar -xf ${join(env.sourcesDir, 'binutils-2.38.tar.xz')} -C ${join(workDir, 'binutils')} --strip-components=1`,
      ]);
      expect(extracted.extracted).toBe(true);
    });

    it('renames a single archive member to the tree directory', async () => {
      const env = testEnvironment(workDir, { flavor: 'linaro', version: 8, tarballs: true }, { runner });
      const member = 'gcc-arm-src-snapshot-8.3-2019.03';
      runner.on('tar', {}, async () => {
        await mkdir(join(workDir, member, 'gcc'), { recursive: true });
      });
      await extractSource(env, downloaded(env, 'gcc'));

      expect(existsSync(join(workDir, 'gcc', 'gcc'))).toBe(true);
      expect(existsSync(join(workDir, member))).toBe(false);
    });

    it('reports an archive without the expected member', async () => {
      const env = testEnvironment(workDir, { flavor: 'linaro', version: 8, tarballs: true }, { runner });

      const extracting = extractSource(env, downloaded(env, 'gcc'));
      await expect(extracting).rejects.toThrow(AcquisitionError);
      await expect(extracting).rejects.toThrow(
        `Failed to move gcc-arm-src-snapshot-8.3-2019.03 to ${join(workDir, 'gcc')}`
      );
    });

    it('leaves checkouts alone', async () => {
      const env = testEnvironment(workDir, {}, { runner });
      const item = await ensureSource(env, getDependency(env.plan, 'gcc'), null);
      runner.reset();

      expect((await extractSource(env, item)).extracted).toBe(false);
      expect(runner.calls).toHaveLength(0);
    });
  });

  describe('updateSources', () => {
    async function materializeAll(request: Parameters<typeof testEnvironment>[1]) {
      const env = testEnvironment(workDir, request, { runner });
      const items: MaterializedSource[] = [];
      for (const dep of env.plan.dependencies.filter(d => d.mode === 'checkout')) {
        await mkdir(join(env.sourcesDir, dep.fetchPath), { recursive: true });
        items.push(await ensureSource(env, dep, null));
      }
      runner.reset();
      return { env, items };
    }

    it('resets shallow checkouts to the fetched head', async () => {
      const { env, items } = await materializeAll({});
      await updateSources(env, items);

      const gcc = runner.calls.filter(c => c.options.cwd === join(env.sourcesDir, 'gcc')).map(c => c.line);
      expect(gcc).toEqual([
        'git fetch --quiet --depth=1 origin master',
        'git checkout -f master',
        'git reset --hard FETCH_HEAD',
      ]);
    });

    it('creates the local branch when it does not exist yet', async () => {
      const { env, items } = await materializeAll({ fullHistory: true, version: 10 });
      runner.fail('git checkout -f gcc-10-branch');
      await updateSources(env, items);

      const gcc = runner.calls.filter(c => c.options.cwd === join(env.sourcesDir, 'gcc')).map(c => c.line);
      expect(gcc).toEqual([
        'git fetch --quiet origin gcc-10-branch',
        'git checkout -f gcc-10-branch',
        'git checkout -f -b gcc-10-branch origin/gcc-10-branch',
        'git reset --hard origin/gcc-10-branch',
      ]);
    });

    it('updates in a fixed order and bootstraps the math libraries', async () => {
      const { env, items } = await materializeAll({});
      await updateSources(env, items);

      const dirs = runner.calls.map(c => c.options.cwd?.slice(env.sourcesDir.length + 1));
      expect([...new Set(dirs)]).toEqual(['mpfr', 'mpc', 'glibc', 'isl', 'binutils', 'gcc']);
      expect(runner.lines().slice(0, 3)).toEqual(['svn up', './autogen.sh', 'automake --add-missing']);
      expect(runner.lines()).toContain('autoreconf -i');
    });

    it('only bootstraps when updates are suppressed', async () => {
      const { env, items } = await materializeAll({ noUpdate: true });
      await updateSources(env, items);

      expect(runner.lines()).toEqual(['./autogen.sh', 'automake --add-missing', 'autoreconf -i', './autogen.sh']);
    });
  });
});
