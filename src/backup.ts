import { createReadStream, createWriteStream } from 'node:fs';
import { copyFile, cp, mkdir, readdir, rm, stat, writeFile } from 'node:fs/promises';
import path from 'node:path';
import { pipeline } from 'node:stream/promises';
import { createGzip } from 'node:zlib';
import type { DeployContext } from './context';
import { BackupError } from './errors';

export interface BackupComponent {
  name: string;
  files: string[];
  ok: boolean;
  size: number;
  error?: string;
}

export interface BackupManifest {
  backupDate: string;
  backupVersion: string;
  components: BackupComponent[];
  totalSize: number;
}

export interface BackupResult {
  dir: string;
  manifest: BackupManifest;
  pruned: string[];
}

export const BACKUP_FORMAT_VERSION = '1.0.0';
const STAMP = /^(\d{4})(\d{2})(\d{2})_(\d{2})(\d{2})(\d{2})$/;
const DAY_MS = 24 * 60 * 60 * 1000;

const pad = (n: number) => String(n).padStart(2, '0');

/** Local time as YYYYMMDD_HHMMSS. */
export const backupStamp = (date: Date): string =>
  `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}_` +
  `${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`;

export const parseBackupStamp = (name: string): Date | undefined => {
  const m = STAMP.exec(name);
  if (!m) return undefined;
  const [, y, mo, d, h, mi, s] = m.map(Number);
  return new Date(y, mo - 1, d, h, mi, s);
};

const fileExists = async (file: string): Promise<boolean> => {
  try {
    return (await stat(file)).isFile();
  } catch {
    return false;
  }
};

const dirExists = async (dir: string): Promise<boolean> => {
  try {
    return (await stat(dir)).isDirectory();
  } catch {
    return false;
  }
};

export const sizeOf = async (target: string): Promise<number> => {
  const info = await stat(target);
  if (!info.isDirectory()) return info.size;

  let total = 0;
  for (const entry of await readdir(target)) {
    total += await sizeOf(path.join(target, entry));
  }
  return total;
};

const gzipFile = async (file: string): Promise<string> => {
  const target = `${file}.gz`;
  await pipeline(createReadStream(file), createGzip(), createWriteStream(target));
  await rm(file);
  return target;
};

const errorMessage = (error: unknown): string => (error instanceof Error ? error.message : String(error));

/**
 * Run one component. A failing component is logged and recorded, never
 * fatal: verification decides afterwards whether the backup is usable.
 */
const component = async (
  ctx: DeployContext,
  dir: string,
  name: string,
  work: () => Promise<string[]>
): Promise<BackupComponent> => {
  ctx.logger.info({ component: name }, 'Backing up');
  try {
    const files = await work();
    let size = 0;
    for (const file of files) size += await sizeOf(path.join(dir, file));
    ctx.logger.info({ component: name, files, size }, 'Backup component done');
    return { name, files, ok: true, size };
  } catch (error) {
    ctx.logger.warn({ component: name, err: error }, 'Backup component failed');
    return { name, files: [], ok: false, size: 0, error: errorMessage(error) };
  }
};

const backupDatabase = async (ctx: DeployContext, dir: string): Promise<string[]> => {
  const db = ctx.config.backup.database;
  if (!db) return [];

  const raw = path.join(dir, 'database.sql');
  try {
    await ctx.runner.run('docker', ['exec', db.container, 'pg_dump', '-U', db.user, db.name], { stdoutFile: raw });
  } catch (error) {
    await rm(raw, { force: true });
    throw error;
  }
  return [path.basename(await gzipFile(raw))];
};

const backupRedis = async (ctx: DeployContext, dir: string): Promise<string[]> => {
  const redis = ctx.config.backup.redis;
  if (!redis) return [];

  await ctx.runner.run('docker', ['exec', redis.container, 'redis-cli', 'SAVE']);
  const raw = path.join(dir, 'redis.rdb');
  await ctx.runner.run('docker', ['cp', `${redis.container}:${redis.dumpPath}`, raw]);
  if (!(await fileExists(raw))) {
    throw new Error(`docker cp produced no file at ${raw}`);
  }
  return [path.basename(await gzipFile(raw))];
};

const backupConfigFiles = async (ctx: DeployContext, dir: string): Promise<string[]> => {
  const { compose, configDir } = ctx.config;
  const copied: string[] = [];

  for (const file of [compose.file, compose.envFile]) {
    if (await fileExists(file)) {
      await copyFile(file, path.join(dir, path.basename(file)));
      copied.push(path.basename(file));
    }
  }

  if (await dirExists(configDir)) {
    await cp(configDir, path.join(dir, 'config'), { recursive: true });
    copied.push('config');
  }

  return copied;
};

const backupVolumes = async (ctx: DeployContext, dir: string): Promise<string[]> => {
  const { volumes, helperImage } = ctx.config.backup;
  const archived: string[] = [];

  for (const volume of volumes) {
    const inspect = await ctx.runner.run('docker', ['volume', 'inspect', volume], { allowFailure: true });
    if (inspect.exitCode !== 0) {
      ctx.logger.warn({ volume }, 'Volume does not exist, skipping');
      continue;
    }

    const archive = `${volume}.tar.gz`;
    await ctx.runner.run('docker', [
      'run', '--rm',
      '-v', `${volume}:/data`,
      '-v', `${dir}:/backup`,
      helperImage,
      'tar', '-czf', `/backup/${archive}`, '/data',
    ]);
    if (!(await fileExists(path.join(dir, archive)))) {
      throw new Error(`Archive for volume ${volume} was not written`);
    }
    archived.push(archive);
  }

  return archived;
};

/**
 * Critical files: the manifest, and the database dump when a database is configured.
 */
export const verifyBackup = async (ctx: DeployContext, dir: string): Promise<string[]> => {
  const critical = ['manifest.json', ...(ctx.config.backup.database ? ['database.sql.gz'] : [])];
  const missing: string[] = [];
  for (const file of critical) {
    if (!(await fileExists(path.join(dir, file)))) missing.push(file);
  }
  return missing;
};

/**
 * Remove backup directories whose timestamp is older than the retention.
 * Directories not named like a backup are left alone.
 */
export const pruneBackups = async (backupDir: string, retentionDays: number, now: Date): Promise<string[]> => {
  if (!(await dirExists(backupDir))) return [];

  const cutoff = now.getTime() - retentionDays * DAY_MS;
  const removed: string[] = [];

  for (const entry of await readdir(backupDir, { withFileTypes: true })) {
    if (!entry.isDirectory()) continue;
    const taken = parseBackupStamp(entry.name);
    if (taken && taken.getTime() < cutoff) {
      await rm(path.join(backupDir, entry.name), { recursive: true, force: true });
      removed.push(entry.name);
    }
  }

  return removed.sort();
};

export type CreatedBackup = Omit<BackupResult, 'pruned'>;

/**
 * Back up the database, Redis, configuration and Docker volumes into a
 * timestamped directory, write its manifest and verify it.
 */
export const createBackup = async (ctx: DeployContext): Promise<CreatedBackup> => {
  const now = ctx.now();
  const dir = path.join(ctx.config.backup.dir, backupStamp(now));
  await mkdir(dir, { recursive: true });
  ctx.logger.info({ dir }, 'Backup directory created');

  const components: BackupComponent[] = [];
  if (ctx.config.backup.database) {
    components.push(await component(ctx, dir, 'database', () => backupDatabase(ctx, dir)));
  }
  if (ctx.config.backup.redis) {
    components.push(await component(ctx, dir, 'redis', () => backupRedis(ctx, dir)));
  }
  components.push(await component(ctx, dir, 'config', () => backupConfigFiles(ctx, dir)));
  if (ctx.config.backup.volumes.length) {
    components.push(await component(ctx, dir, 'volumes', () => backupVolumes(ctx, dir)));
  }

  const manifest: BackupManifest = {
    backupDate: now.toISOString(),
    backupVersion: BACKUP_FORMAT_VERSION,
    components,
    totalSize: await sizeOf(dir),
  };
  await writeFile(path.join(dir, 'manifest.json'), `${JSON.stringify(manifest, null, 2)}\n`, 'utf8');

  const missing = await verifyBackup(ctx, dir);
  if (missing.length) {
    throw new BackupError(`Backup at ${dir} is missing critical files: ${missing.join(', ')}`);
  }
  ctx.logger.info({ dir, totalSize: manifest.totalSize }, 'Backup verified');

  return { dir, manifest };
};

/** pruneBackups with the configured directory and retention. */
export const pruneOldBackups = async (ctx: DeployContext): Promise<string[]> => {
  const { dir, retentionDays } = ctx.config.backup;
  const pruned = await pruneBackups(dir, retentionDays, ctx.now());
  if (pruned.length) {
    ctx.logger.info({ pruned, retentionDays }, 'Old backups removed');
  }
  return pruned;
};

export const runBackup = async (ctx: DeployContext): Promise<BackupResult> => {
  const created = await createBackup(ctx);
  return { ...created, pruned: await pruneOldBackups(ctx) };
};
