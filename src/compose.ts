import { copyFile, stat } from 'node:fs/promises';
import type { CommandResult } from './command-runner';
import type { DeployContext } from './context';

const exists = async (file: string): Promise<boolean> => {
  try {
    await stat(file);
    return true;
  } catch {
    return false;
  }
};

export type EnvFileOutcome = 'present' | 'created' | 'missing';

/**
 * docker-compose reads its variables (DB_HOST, REDIS_PASSWORD, ...) from the
 * env file. Seed it from the example when it does not exist yet.
 */
export const ensureEnvFile = async (ctx: DeployContext): Promise<EnvFileOutcome> => {
  const { envFile, envExample } = ctx.config.compose;
  if (await exists(envFile)) return 'present';

  ctx.logger.warn({ envFile }, 'Env file not found, using defaults');
  if (!(await exists(envExample))) {
    ctx.logger.warn({ envExample }, 'Env example file not found');
    return 'missing';
  }

  await copyFile(envExample, envFile);
  ctx.logger.info({ from: envExample, to: envFile }, 'Env file created from example');
  return 'created';
};

const compose = (ctx: DeployContext, args: string[]): Promise<CommandResult> => {
  const [command, ...prefix] = ctx.config.compose.command;
  return ctx.runner.run(command, [...prefix, '-f', ctx.config.compose.file, ...args], { cwd: ctx.config.rootDir });
};

export const composeUp = async (ctx: DeployContext): Promise<void> => {
  ctx.logger.info({ file: ctx.config.compose.file }, 'Starting services');
  await compose(ctx, ['up', '-d']);
};

export const composeDown = async (ctx: DeployContext): Promise<void> => {
  ctx.logger.info({ file: ctx.config.compose.file }, 'Stopping services');
  await compose(ctx, ['down']);
  ctx.logger.info('Services stopped');
};
