import { cp, mkdir, stat } from 'node:fs/promises';
import type { RepositoryConfig } from './config';
import type { DeployContext } from './context';
import type { VersionManifest } from './manifest';
import { versionFor } from './manifest';
import { resolveOrder, sortByOrder } from './topology';
import { stripTag, toTag } from './version';

const isDirectory = async (dir: string): Promise<boolean> => {
  try {
    return (await stat(dir)).isDirectory();
  } catch {
    return false;
  }
};

export const isCheckedOut = (repo: RepositoryConfig): Promise<boolean> => isDirectory(repo.dir);

export const orderedRepositories = (ctx: DeployContext): RepositoryConfig[] =>
  sortByOrder(ctx.config.repositories, resolveOrder(ctx.config.repositories));

export interface SyncOptions {
  /** Check out the tag the manifest pins after pulling. */
  manifest?: VersionManifest;
}

export interface SyncResult {
  cloned: string[];
  updated: string[];
  pinned: Record<string, string>;
}

export const checkoutVersion = async (ctx: DeployContext, repo: RepositoryConfig, version: string): Promise<void> => {
  const tag = toTag(version);
  ctx.logger.info({ repo: repo.name, tag }, 'Checking out tag');
  await ctx.runner.run('git', ['fetch', '--tags', 'origin'], { cwd: repo.dir });
  await ctx.runner.run('git', ['checkout', `tags/${tag}`], { cwd: repo.dir });
};

/**
 * Clone missing repositories and pull existing ones, dependencies first.
 */
export const syncRepositories = async (ctx: DeployContext, options: SyncOptions = {}): Promise<SyncResult> => {
  const result: SyncResult = { cloned: [], updated: [], pinned: {} };
  await mkdir(ctx.config.deployDir, { recursive: true });

  for (const repo of orderedRepositories(ctx)) {
    if (await isCheckedOut(repo)) {
      ctx.logger.info({ repo: repo.name, branch: repo.branch }, 'Updating repository');
      await ctx.runner.run('git', ['pull', 'origin', repo.branch], { cwd: repo.dir });
      result.updated.push(repo.name);
    } else {
      ctx.logger.info({ repo: repo.name, url: repo.url }, 'Cloning repository');
      await ctx.runner.run('git', ['clone', '--branch', repo.branch, repo.url, repo.dir], {
        cwd: ctx.config.deployDir,
      });
      result.cloned.push(repo.name);
    }

    const version = options.manifest && repo.manifestKey ? versionFor(options.manifest, repo.manifestKey) : undefined;
    if (version) {
      await checkoutVersion(ctx, repo, version);
      result.pinned[repo.name] = version;
    }
  }

  return result;
};

/**
 * Copy configuration templates into the deploy config dir. Missing
 * templates are not fatal.
 */
export const copyConfigTemplates = async (ctx: DeployContext): Promise<boolean> => {
  const { configTemplateDir, configDir } = ctx.config;

  await mkdir(configDir, { recursive: true });
  if (!(await isDirectory(configTemplateDir))) {
    ctx.logger.warn({ dir: configTemplateDir }, 'No configuration templates found');
    return false;
  }

  await cp(configTemplateDir, configDir, { recursive: true });
  ctx.logger.info({ from: configTemplateDir, to: configDir }, 'Configuration templates copied');
  return true;
};

/**
 * Most recent tag reachable from HEAD, without the `v` prefix. Undefined
 * when the repository is not checked out or has no tags.
 */
export const deployedVersion = async (ctx: DeployContext, repo: RepositoryConfig): Promise<string | undefined> => {
  if (!(await isCheckedOut(repo))) return undefined;

  const { exitCode, stdout } = await ctx.runner.run('git', ['describe', '--tags', '--abbrev=0'], {
    cwd: repo.dir,
    allowFailure: true,
  });
  const tag = stdout.trim();
  return exitCode === 0 && tag ? stripTag(tag) : undefined;
};
