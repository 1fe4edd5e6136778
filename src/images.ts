import type { RepositoryConfig } from './config';
import type { DeployContext } from './context';
import { isCheckedOut, orderedRepositories } from './repositories';

export interface BuildResult {
  built: string[];
  skipped: string[];
}

export const imageRef = (ctx: DeployContext, repo: RepositoryConfig): string | undefined =>
  repo.image ? `${repo.image}:${ctx.config.imageTag}` : undefined;

export const buildImage = async (ctx: DeployContext, repo: RepositoryConfig): Promise<boolean> => {
  const ref = imageRef(ctx, repo);
  if (!ref) return false;

  if (!(await isCheckedOut(repo))) {
    ctx.logger.warn({ repo: repo.name, dir: repo.dir }, 'Repository not checked out, skipping image build');
    return false;
  }

  ctx.logger.info({ repo: repo.name, image: ref }, 'Building image');
  await ctx.runner.run('docker', ['build', '-t', ref, repo.dir]);
  return true;
};

/**
 * Build an image for every repository that declares one, dependencies first.
 */
export const buildImages = async (ctx: DeployContext): Promise<BuildResult> => {
  const result: BuildResult = { built: [], skipped: [] };

  for (const repo of orderedRepositories(ctx)) {
    if (!repo.image) continue;
    if (await buildImage(ctx, repo)) {
      result.built.push(repo.name);
    } else {
      result.skipped.push(repo.name);
    }
  }

  ctx.logger.info({ built: result.built.length, skipped: result.skipped.length }, 'Image build finished');
  return result;
};
