import type { DeployContext } from './context';
import { PrerequisiteError } from './errors';

/**
 * Binaries a command needs: git, docker and whatever the compose command
 * starts with (`docker-compose`, or `docker` for `docker compose`).
 */
export const requiredTools = (ctx: DeployContext, { git = true } = {}): string[] => {
  const tools = [...(git ? ['git'] : []), 'docker', ctx.config.compose.command[0]];
  return [...new Set(tools)];
};

export const checkPrerequisites = async (ctx: DeployContext, tools = requiredTools(ctx)): Promise<void> => {
  ctx.logger.info({ tools }, 'Checking prerequisites');

  for (const tool of tools) {
    if (!(await ctx.runner.exists(tool))) {
      throw new PrerequisiteError(tool);
    }
  }

  ctx.logger.info('All prerequisites found');
};

/**
 * `docker info` fails when the daemon is down even though the binary exists.
 */
export const checkDockerDaemon = async (ctx: DeployContext): Promise<void> => {
  await ctx.runner.run('docker', ['info']);
};
