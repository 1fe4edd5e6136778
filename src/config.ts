import { readFile } from 'node:fs/promises';
import path from 'node:path';
import { z } from 'zod';
import { ConfigError } from './errors';
import { resolveOrder } from './topology';

const NAME = /^[A-Za-z0-9._-]+$/;

const repositorySchema = z.object({
  name: z.string().regex(NAME, 'must contain only letters, digits, ".", "_" or "-"'),
  url: z.string().min(1).optional(),
  branch: z.string().min(1).default('main'),
  image: z.string().min(1).optional(),
  dependsOn: z.array(z.string()).default([]),
  manifestKey: z
    .string()
    .regex(/^(core|frontend|plugins\.[A-Za-z0-9._-]+)$/, 'must be "core", "frontend" or "plugins.<name>"')
    .optional(),
});

const serviceSchema = z.object({
  name: z.string().min(1),
  url: z.string().url(),
  critical: z.boolean().default(true),
  expectedStatus: z.number().int().min(100).max(599).default(200),
});

const composeSchema = z
  .object({
    file: z.string().default('docker-compose.multi-repo.yml'),
    envFile: z.string().default('.env'),
    envExample: z.string().default('.env.example'),
    command: z.array(z.string().min(1)).min(1).default(['docker-compose']),
  })
  .default({});

const healthSchema = z
  .object({
    startupGraceMs: z.number().int().nonnegative().default(30_000),
    timeoutMs: z.number().int().positive().default(10_000),
    attempts: z.number().int().positive().default(3),
    intervalMs: z.number().int().nonnegative().default(5_000),
  })
  .default({});

const backupSchema = z
  .object({
    dir: z.string().default('./backups'),
    retentionDays: z.number().int().positive().default(7),
    database: z
      .object({
        container: z.string().min(1),
        user: z.string().min(1),
        name: z.string().min(1),
      })
      .optional(),
    redis: z
      .object({
        container: z.string().min(1),
        dumpPath: z.string().default('/data/dump.rdb'),
      })
      .optional(),
    volumes: z.array(z.string().min(1)).default([]),
    helperImage: z.string().default('alpine'),
  })
  .default({});

const monitorSchema = z
  .object({
    port: z.number().int().min(0).max(65_535).default(3000),
    intervalMs: z.number().int().positive().default(30_000),
    degradedIntervalMs: z.number().int().positive().default(10_000),
  })
  .default({});

export const stackConfigSchema = z.object({
  org: z.string().min(1),
  gitBaseUrl: z.string().default('https://github.com'),
  deployDir: z.string().default('./deploy'),
  configTemplateDir: z.string().default('./config'),
  configDir: z.string().default('./deploy/config'),
  manifest: z.string().default('versions.json'),
  imageTag: z.string().default('latest'),
  /** Defaults to core, frontend, plugins and resources. */
  repositories: z.array(repositorySchema).min(1).optional(),
  services: z.array(serviceSchema).default([
    { name: 'core', url: 'http://localhost:8090/api/health' },
    { name: 'frontend', url: 'http://localhost:80/', critical: false },
  ]),
  compose: composeSchema,
  health: healthSchema,
  backup: backupSchema,
  monitor: monitorSchema,
});

export type StackConfigInput = z.input<typeof stackConfigSchema>;
type ParsedConfig = z.output<typeof stackConfigSchema>;

type ParsedRepository = z.output<typeof repositorySchema>;

export type RepositoryConfig = ParsedRepository & {
  url: string;
  /** Absolute checkout directory. */
  dir: string;
};
export type ServiceConfig = ParsedConfig['services'][number];
export type BackupConfig = ParsedConfig['backup'];
export type HealthConfig = ParsedConfig['health'];
export type MonitorConfig = ParsedConfig['monitor'];

export interface StackConfig extends Omit<ParsedConfig, 'repositories'> {
  /** Directory relative paths were resolved against. */
  rootDir: string;
  repositories: RepositoryConfig[];
}

export const DEFAULT_CONFIG_FILE = 'stackpilot.json';

/**
 * The four-repository stack: core, a frontend and plugins built on it, and
 * static resources. Images are published under the organisation.
 */
export const defaultRepositories = (org: string): ParsedRepository[] =>
  z.array(repositorySchema).parse([
    { name: 'core', image: `${org}/core`, manifestKey: 'core' },
    { name: 'frontend', image: `${org}/frontend`, dependsOn: ['core'], manifestKey: 'frontend' },
    { name: 'plugins', image: `${org}/plugins`, dependsOn: ['core'] },
    { name: 'resources' },
  ]);

const findDuplicate = (names: string[]): string | undefined =>
  names.find((name, index) => names.indexOf(name) !== index);

const formatIssues = (error: z.ZodError): string =>
  error.issues.map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`).join('; ');

/**
 * Validate a raw config object and resolve every path against `rootDir`.
 */
export const parseConfig = (raw: unknown, rootDir: string): StackConfig => {
  const result = stackConfigSchema.safeParse(raw);
  if (!result.success) {
    throw new ConfigError(`Invalid stack config: ${formatIssues(result.error)}`, { cause: result.error });
  }
  const parsed = result.data;
  const repositories = parsed.repositories ?? defaultRepositories(parsed.org);

  const duplicateRepo = findDuplicate(repositories.map(r => r.name));
  if (duplicateRepo) throw new ConfigError(`Duplicate repository: ${duplicateRepo}`);

  const duplicateService = findDuplicate(parsed.services.map(s => s.name));
  if (duplicateService) throw new ConfigError(`Duplicate service: ${duplicateService}`);

  // Throws on unknown dependencies and cycles.
  resolveOrder(repositories);

  const resolve = (p: string) => path.resolve(rootDir, p);
  const deployDir = resolve(parsed.deployDir);
  const baseUrl = parsed.gitBaseUrl.replace(/\/+$/, '');

  return {
    ...parsed,
    rootDir,
    deployDir,
    configTemplateDir: resolve(parsed.configTemplateDir),
    configDir: resolve(parsed.configDir),
    manifest: resolve(parsed.manifest),
    repositories: repositories.map(repo => ({
      ...repo,
      url: repo.url ?? `${baseUrl}/${parsed.org}/${repo.name}.git`,
      dir: path.join(deployDir, repo.name),
    })),
    compose: {
      ...parsed.compose,
      file: resolve(parsed.compose.file),
      envFile: resolve(parsed.compose.envFile),
      envExample: resolve(parsed.compose.envExample),
    },
    backup: {
      ...parsed.backup,
      dir: resolve(parsed.backup.dir),
    },
  };
};

/**
 * Read and validate the stack file, `stackpilot.json` in `cwd` unless a path is given.
 */
export const loadConfig = async (file?: string, cwd = process.cwd()): Promise<StackConfig> => {
  const configPath = path.resolve(cwd, file ?? DEFAULT_CONFIG_FILE);

  let text: string;
  try {
    text = await readFile(configPath, 'utf8');
  } catch (error) {
    throw new ConfigError(`Cannot read stack config at ${configPath}`, { cause: error });
  }

  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (error) {
    throw new ConfigError(`Stack config at ${configPath} is not valid JSON`, { cause: error });
  }

  return parseConfig(raw, path.dirname(configPath));
};
