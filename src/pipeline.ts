import { EventEmitter } from 'node:events';
import defaultLogger from './logger';
import type { Logger } from './logger';
import { AbortedError, OrchestratorError } from './errors';

/**
 * One unit of work in a command, e.g. "compose up" or "sync repositories".
 */
export interface PipelineStep {
  name: string;
  run: () => Promise<void>;
}

export interface StepTiming {
  name: string;
  durationMs: number;
}

export interface PipelineResult {
  name: string;
  steps: StepTiming[];
  durationMs: number;
}

/**
 * Listener signatures per event.
 *
 * start: pipeline begins.
 * step: a step is about to run.
 * step:done: a step finished.
 * failure: a step threw; the pipeline stops here.
 * done: every step finished.
 */
export interface PipelineEvents {
  start: [name: string];
  step: [step: string, index: number];
  'step:done': [timing: StepTiming];
  failure: [error: Error, step: string];
  done: [result: PipelineResult];
}

/**
 * Configuration for definePipeline.
 *
 * signal: checked before every step; once aborted the next step is not started.
 * onFailure: called with the error and the failing step before it is rethrown.
 */
export interface PipelineConfig {
  name: string;
  steps: PipelineStep[];
  signal?: AbortSignal;
  logger?: Logger;
  now?: () => number;
  onFailure?: (error: Error, step: string) => Promise<void>;
}

export interface PipelineInstance {
  run(): Promise<PipelineResult>;
  on<E extends keyof PipelineEvents>(event: E, listener: (...args: PipelineEvents[E]) => void): PipelineInstance;
}

const toError = (value: unknown): Error => (value instanceof Error ? value : new Error(String(value)));

/**
 * Define a sequence of steps that runs in order and stops at the first
 * failure.
 *
 * @example
 * const pipeline = definePipeline({
 *   name: 'start',
 *   steps: [
 *     { name: 'env file', run: () => ensureEnvFile(ctx) },
 *     { name: 'compose up', run: () => composeUp(ctx) },
 *   ],
 * });
 *
 * pipeline.on('failure', (err, step) => alert(step, err));
 * await pipeline.run();
 */
export const definePipeline = (config: PipelineConfig): PipelineInstance => {
  const emitter = new EventEmitter();
  const log = (config.logger ?? defaultLogger).child({ pipeline: config.name });
  const now = config.now ?? Date.now;

  const run = async (): Promise<PipelineResult> => {
    const started = now();
    const timings: StepTiming[] = [];

    emitter.emit('start', config.name);
    log.info('Starting');

    for (const [index, step] of config.steps.entries()) {
      const stepStarted = now();
      try {
        if (config.signal?.aborted) {
          throw new AbortedError(step.name);
        }

        emitter.emit('step', step.name, index);
        log.info({ step: step.name }, 'Step started');

        await step.run();
      } catch (error) {
        const err = toError(error);
        log.error({ step: step.name, err }, 'Step failed');
        emitter.emit('failure', err, step.name);
        if (config.onFailure) {
          await config.onFailure(err, step.name);
        }
        throw err;
      }

      const timing = { name: step.name, durationMs: now() - stepStarted };
      timings.push(timing);
      log.info({ step: step.name, durationMs: timing.durationMs }, 'Step completed');
      emitter.emit('step:done', timing);
    }

    const result: PipelineResult = { name: config.name, steps: timings, durationMs: now() - started };
    log.info({ durationMs: result.durationMs }, 'Completed');
    emitter.emit('done', result);
    return result;
  };

  const instance: PipelineInstance = {
    run,
    on: (event, listener) => {
      emitter.on(event, listener);
      return instance;
    },
  };

  return instance;
};

/**
 * Carries the value one step produces to a later step or back to the caller.
 */
export interface StepOutput<T> {
  set(value: T): void;
  /** Throws when the producing step has not run. */
  get(): T;
}

export const stepOutput = <T>(step: string): StepOutput<T> => {
  let slot: { value: T } | undefined;

  return {
    set: value => {
      slot = { value };
    },
    get: () => {
      if (!slot) throw new OrchestratorError(`Step "${step}" has not produced its result`);
      return slot.value;
    },
  };
};
