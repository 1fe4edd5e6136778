import type { CommandRunner } from './command-runner';
import { createProcessRunner } from './command-runner';
import type { StackConfig } from './config';
import type { FetchLike } from './health';
import type { Logger } from './logger';
import logger from './logger';

/**
 * Everything a step needs to touch the outside world. Tests swap the
 * runner, fetch and sleep for in-process fakes.
 */
export interface DeployContext {
  config: StackConfig;
  runner: CommandRunner;
  logger: Logger;
  fetch?: FetchLike;
  sleep: (ms: number) => Promise<void>;
  now: () => Date;
  signal?: AbortSignal;
}

export const sleep = (ms: number): Promise<void> => new Promise(resolve => setTimeout(resolve, ms));

export const createContext = (config: StackConfig, overrides: Partial<Omit<DeployContext, 'config'>> = {}): DeployContext => ({
  config,
  runner: overrides.runner ?? createProcessRunner(),
  logger: overrides.logger ?? logger,
  fetch: overrides.fetch,
  sleep: overrides.sleep ?? sleep,
  now: overrides.now ?? (() => new Date()),
  signal: overrides.signal,
});
