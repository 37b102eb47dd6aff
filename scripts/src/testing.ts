/**
 * gcc-forge - Testing Support
 *
 * An in-process CommandRunner that records every invocation and answers
 * from scripted rules, plus a BuildEnvironment factory over a scratch
 * working directory. Nothing here spawns a process.
 */

import { join } from 'path';
import { BuildEnvironment, createBuildEnvironment } from './env.js';
import { ToolchainConfig } from './config.js';
import { CommandRunner, formatCommand } from './exec.js';
import { resolve } from './resolver.js';
import { BuildRequest, ExecOptions, ExecResult, HostInfo } from './types.js';

export interface RecordedCall {
  command: string;
  args: string[];
  options: ExecOptions;
  // command and arguments as one line
  line: string;
}

export type CallMatcher = string | ((call: RecordedCall) => boolean);

interface Rule {
  match: (call: RecordedCall) => boolean;
  result: Partial<ExecResult>;
  effect?: (call: RecordedCall) => void | Promise<void>;
}

/**
 * Every command succeeds with empty output unless a rule says otherwise.
 * String matchers match the start of the command line; later rules win.
 */
export class FakeRunner implements CommandRunner {
  readonly calls: RecordedCall[] = [];
  private readonly rules: Rule[] = [];

  on(
    matcher: CallMatcher,
    result: Partial<ExecResult> = {},
    effect?: (call: RecordedCall) => void | Promise<void>
  ): this {
    const match = typeof matcher === 'string'
      ? (call: RecordedCall) => call.line.startsWith(matcher)
      : matcher;
    this.rules.push({ match, result, effect });
    return this;
  }

  fail(matcher: CallMatcher, exitCode: number = 1, stderr: string = ''): this {
    return this.on(matcher, { exitCode, stderr });
  }

  async run(command: string, args: string[], options: ExecOptions = {}): Promise<ExecResult> {
    const call: RecordedCall = { command, args, options, line: formatCommand(command, args) };
    this.calls.push(call);

    const rule = [...this.rules].reverse().find(r => r.match(call));
    if (rule?.effect) {
      await rule.effect(call);
    }
    return { stdout: '', stderr: '', exitCode: 0, ...rule?.result };
  }

  lines(): string[] {
    return this.calls.map(c => c.line);
  }

  reset(): void {
    this.calls.length = 0;
  }
}

export const TEST_HOST: HostInfo = {
  machine: 'x86_64',
  triple: 'x86_64-pc-linux-gnu',
  compilerMajor: 9,
  cpus: 8,
};

export function testConfig(workDir: string, overrides: Partial<ToolchainConfig> = {}): ToolchainConfig {
  return {
    configPath: null,
    workDir,
    patchesDir: join(workDir, 'patches'),
    toolPrefix: join(workDir, 'prebuilts'),
    privilegeCommand: 'sudo',
    timezone: 'UTC',
    downloader: { segments: 16, connectionsPerServer: 16 },
    publish: { host: 'github.com', authorName: 'gcc-forge', authorEmail: 'gcc-forge@localhost' },
    telegramApiBase: 'https://api.telegram.test',
    credentials: {},
    ...overrides,
  };
}

export function testEnvironment(
  workDir: string,
  request: Partial<BuildRequest> = {},
  options: { runner?: CommandRunner; config?: Partial<ToolchainConfig>; host?: HostInfo } = {}
): BuildEnvironment {
  const plan = resolve(
    { architecture: 'arm64', flavor: 'gnu', version: 11, jobs: 4, ...request },
    options.host ?? TEST_HOST
  );
  return createBuildEnvironment(plan, testConfig(workDir, options.config), options.runner ?? new FakeRunner());
}
