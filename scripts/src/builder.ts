/**
 * gcc-forge - Main Builder
 * Orchestrates the complete toolchain build
 */

import { BuildEnvironment, createBuildEnvironment, ensureBuildDirs } from './env.js';
import { ToolchainConfig } from './config.js';
import { logger } from './logger.js';
import { CommandRunner, ExecaRunner, timedStep } from './exec.js';
import { describeError } from './errors.js';
import { probeHost } from './host.js';
import { checkRequest, resolve } from './resolver.js';
import { acquireSources, updateSources } from './sources.js';
import { provisionTools } from './prebuilts.js';
import { Workspace } from './workspace.js';
import { DEFAULT_HANDLERS, StageHandlers, StageRunner } from './pipeline.js';
import { packageToolchain } from './steps/index.js';
import { BuildReport, collectReport, printReport } from './report.js';
import { Notifier, TelegramNotifier, deliverLog } from './notify.js';
import { builderCommit, publishRelease } from './publish.js';
import { BuildPlan, BuildRequest, StageResult } from './types.js';

export const INTERRUPT_EXIT_CODE = 130;

export interface BuildOptions {
  request: BuildRequest;
  verbose?: boolean;
  tmpfs?: boolean;
  release?: boolean;
}

export interface BuildOutcome {
  success: boolean;
  plan: BuildPlan;
  stages: StageResult[];
  report: BuildReport;
  error?: unknown;
}

export interface BuilderDeps {
  runner?: CommandRunner;
  notifier?: Notifier;
  handlers?: StageHandlers;
  now?: () => Date;
  // Directory whose HEAD is quoted in release commits
  projectDir?: string;
  // Called after an interrupt has released the mounts
  exit?: (code: number) => void;
}

/**
 * Run fn with SIGINT/SIGTERM handlers that release the mounts, run
 * beforeExit and abort. release() also runs once fn settles, whatever the
 * outcome.
 */
export async function withInterruptGuard<T>(
  release: () => Promise<void>,
  fn: () => Promise<T>,
  exit: (code: number) => void = code => process.exit(code),
  beforeExit?: () => Promise<void>
): Promise<T> {
  const abort = async (): Promise<void> => {
    try {
      await release();
    } catch (error) {
      logger.debug(`Release after interrupt failed: ${describeError(error)}`);
    }
    logger.error('Manually aborted!');
    if (beforeExit) {
      try {
        await beforeExit();
      } catch (error) {
        logger.debug(`Interrupt handler failed: ${describeError(error)}`);
      }
    }
    exit(INTERRUPT_EXIT_CODE);
  };
  const onSignal = (): void => {
    void abort();
  };

  process.once('SIGINT', onSignal);
  process.once('SIGTERM', onSignal);
  try {
    return await fn();
  } finally {
    process.removeListener('SIGINT', onSignal);
    process.removeListener('SIGTERM', onSignal);
    await release();
  }
}

export class Builder {
  private readonly runner: CommandRunner;
  private readonly notifier: Notifier;
  private readonly now: () => Date;

  constructor(private readonly config: ToolchainConfig, private readonly deps: BuilderDeps = {}) {
    this.runner = deps.runner ?? new ExecaRunner();
    this.notifier = deps.notifier ?? new TelegramNotifier(config.telegramApiBase, config.credentials);
    this.now = deps.now ?? (() => new Date());
  }

  /**
   * Validate the request, then probe the host and resolve the plan
   */
  async plan(request: BuildRequest): Promise<BuildPlan> {
    checkRequest(request);
    const host = await probeHost(this.runner);
    return resolve(request, host);
  }

  environment(plan: BuildPlan): BuildEnvironment {
    return createBuildEnvironment(plan, this.config, this.runner);
  }

  /**
   * Full pipeline. Only a bad request throws; every later failure is
   * reported in the outcome after the log has been delivered.
   */
  async build(options: BuildOptions): Promise<BuildOutcome> {
    const startedAt = this.now();
    const plan = await this.plan(options.request);
    const env = this.environment(plan);

    logger.configure({ verbose: options.verbose, logFile: env.logFile });
    logger.resetTimer();
    logger.info(`Building ${plan.target} (GCC ${plan.version}, ${plan.flavor}, ${plan.libc})`);

    const workspace = new Workspace(env, { tmpfs: options.tmpfs });
    const stageRunner = new StageRunner(env, this.deps.handlers ?? DEFAULT_HANDLERS);
    let archivePath: string | null = null;
    let error: unknown;

    try {
      await withInterruptGuard(
        () => workspace.release(),
        async () => {
          await workspace.checkPrivileges();
          await workspace.cleanUp();
          await ensureBuildDirs(env);
          await timedStep('Provisioning build tools', () => provisionTools(env));

          const sources = await acquireSources(env);
          await updateSources(env, sources);
          await workspace.prepare();

          await stageRunner.run();
          archivePath = await packageToolchain(env, this.now());
        },
        this.deps.exit,
        () => this.deliverRunLog(plan, null).then(() => undefined)
      );
    } catch (caught) {
      error = caught;
      logger.error(describeError(caught));
    }

    const duration = (this.now().getTime() - startedAt.getTime()) / 1000;
    const report = await collectReport(env, { duration, archivePath });
    printReport(report);

    if (error === undefined && report.success && options.release) {
      try {
        await publishRelease(env, {
          compilerVersion: report.compilerVersion ?? plan.target,
          gccCommit: report.gccCommit,
          builderCommit: await builderCommit(env, this.deps.projectDir ?? process.cwd()),
          now: this.now(),
        }, this.notifier);
      } catch (caught) {
        error = caught;
        logger.error(describeError(caught));
      }
    }

    await this.deliverRunLog(plan, report.compilerVersion);

    return {
      success: error === undefined && report.success,
      plan,
      stages: [...stageRunner.results],
      report,
      error,
    };
  }

  // Best effort; never throws
  private deliverRunLog(plan: BuildPlan, compilerVersion: string | null): Promise<boolean> {
    return deliverLog(
      this.notifier,
      logger.getLogFile(),
      `Build logs GCC for Target: ${plan.target}. GCC Version: ${compilerVersion ?? 'none'}`
    );
  }

  /**
   * Clean-up step on its own
   */
  async clean(request: BuildRequest, options: { tmpfs?: boolean } = {}): Promise<void> {
    const env = this.environment(await this.plan(request));
    const workspace = new Workspace(env, options);
    await withInterruptGuard(
      () => workspace.release(),
      async () => {
        await workspace.checkPrivileges();
        await workspace.cleanUp();
      },
      this.deps.exit
    );
  }
}
