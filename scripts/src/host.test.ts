import { describe, expect, it } from 'vitest';
import { AcquisitionError } from './errors.js';
import { parseCompilerMajor, probeHost } from './host.js';
import { FakeRunner } from './testing.js';

describe('parseCompilerMajor', () => {
  it.each([
    { output: '11\n', major: 11 },
    { output: '11.4.0', major: 11 },
    { output: '4.9.4', major: 4 },
    { output: 'unknown', major: 0 },
  ])('reads $major from $output', ({ output, major }) => {
    expect(parseCompilerMajor(output)).toBe(major);
  });
});

describe('probeHost', () => {
  it('collects machine, triple and compiler version', async () => {
    const runner = new FakeRunner()
      .on('uname -m', { stdout: 'aarch64\n' })
      .on('gcc -dumpmachine', { stdout: 'aarch64-linux-gnu\n' })
      .on('gcc -dumpversion', { stdout: '10.2.1\n' });

    const host = await probeHost(runner);

    expect(host.machine).toBe('aarch64');
    expect(host.triple).toBe('aarch64-linux-gnu');
    expect(host.compilerMajor).toBe(10);
    expect(host.cpus).toBeGreaterThan(0);
  });

  it('requires a host compiler', async () => {
    const runner = new FakeRunner()
      .on('uname -m', { stdout: 'x86_64\n' })
      .fail('gcc', 127);

    await expect(probeHost(runner)).rejects.toThrow(AcquisitionError);
  });
});
