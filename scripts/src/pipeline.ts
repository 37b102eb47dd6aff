/**
 * gcc-forge - Stage Runner
 *
 * binutils -> headers -> gcc-frontend -> runtime-library -> gcc-finalize.
 * Headers are skipped for newlib. The first failing stage ends the run and
 * no later stage is started.
 */

import { BuildEnvironment } from './env.js';
import { logger } from './logger.js';
import { StageError, describeError } from './errors.js';
import { BuildPlan, Stage, StageResult } from './types.js';
import {
  buildBinutils,
  buildGccFrontend,
  buildGlibc,
  buildNewlib,
  finalizeGcc,
  installHeaders,
} from './steps/index.js';

export const STAGE_ORDER: readonly Stage[] = [
  'binutils',
  'headers',
  'gcc-frontend',
  'runtime-library',
  'gcc-finalize',
];

export type StageHandler = (env: BuildEnvironment) => Promise<void>;
export type StageHandlers = Record<Stage, StageHandler>;

export const DEFAULT_HANDLERS: StageHandlers = {
  'binutils': buildBinutils,
  'headers': installHeaders,
  'gcc-frontend': buildGccFrontend,
  'runtime-library': env => (env.plan.libc === 'newlib' ? buildNewlib(env) : buildGlibc(env)),
  'gcc-finalize': finalizeGcc,
};

export function planStages(plan: BuildPlan): Stage[] {
  return STAGE_ORDER.filter(stage => stage !== 'headers' || plan.libc !== 'newlib');
}

export type RunnerState = 'pending' | Stage | 'done' | 'failed';

export class StageRunner {
  private current: RunnerState = 'pending';
  private readonly completed: StageResult[] = [];

  constructor(
    private readonly env: BuildEnvironment,
    private readonly handlers: StageHandlers = DEFAULT_HANDLERS
  ) {}

  get state(): RunnerState {
    return this.current;
  }

  get results(): readonly StageResult[] {
    return this.completed;
  }

  /**
   * Run every planned stage in order. Rethrows the failure as a StageError
   * labelled with the stage it happened in.
   */
  async run(): Promise<StageResult[]> {
    if (this.current !== 'pending') {
      throw new Error(`Stage runner already ${this.current === 'failed' ? 'failed' : 'ran'}`);
    }

    for (const stage of planStages(this.env.plan)) {
      this.current = stage;
      const start = Date.now();

      try {
        await this.handlers[stage](this.env);
      } catch (error) {
        const stageError = error instanceof StageError
          ? error
          : new StageError(stage, describeError(error));
        this.completed.push({
          stage,
          status: 'failed',
          duration: Date.now() - start,
          cause: stageError.message,
        });
        this.current = 'failed';
        throw stageError;
      }

      const duration = Date.now() - start;
      this.completed.push({ stage, status: 'ok', duration });
      logger.debug(`Stage ${stage} finished in ${(duration / 1000).toFixed(1)}s`);
    }

    this.current = 'done';
    return [...this.completed];
  }
}
