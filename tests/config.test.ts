import { writeFile } from 'node:fs/promises';
import path from 'node:path';
import { afterEach, beforeEach, describe, it, expect } from 'vitest';
import { DEFAULT_CONFIG_FILE, loadConfig, parseConfig } from '../src/config';
import { ConfigError } from '../src/errors';
import { baseConfig, makeTempDir, removeDir } from './helpers';

const EXAMPLES = path.resolve(__dirname, '../examples');

describe('parseConfig', () => {
  it('should apply defaults and resolve paths against the root dir', () => {
    const config = parseConfig(baseConfig(), '/srv/stack');

    expect(config.rootDir).toBe('/srv/stack');
    expect(config.deployDir).toBe('/srv/stack/deploy');
    expect(config.configTemplateDir).toBe('/srv/stack/config');
    expect(config.configDir).toBe('/srv/stack/deploy/config');
    expect(config.manifest).toBe('/srv/stack/versions.json');
    expect(config.compose).toEqual({
      file: '/srv/stack/docker-compose.multi-repo.yml',
      envFile: '/srv/stack/.env',
      envExample: '/srv/stack/.env.example',
      command: ['docker-compose'],
    });
    expect(config.backup.dir).toBe('/srv/stack/backups');
    expect(config.backup.retentionDays).toBe(7);
    expect(config.monitor).toEqual({ port: 3000, intervalMs: 30_000, degradedIntervalMs: 10_000 });
    expect(config.imageTag).toBe('latest');
  });

  it('should derive clone URL, branch and checkout dir per repository', () => {
    const [core] = parseConfig(baseConfig(), '/srv/stack').repositories;

    expect(core).toMatchObject({
      name: 'core',
      url: 'https://github.com/acme/core.git',
      branch: 'main',
      dir: '/srv/stack/deploy/core',
      dependsOn: [],
    });
  });

  it('should keep an explicit URL and trim a trailing slash from the base URL', () => {
    const config = parseConfig(
      {
        org: 'acme',
        gitBaseUrl: 'https://git.example.com/',
        repositories: [{ name: 'core' }, { name: 'docs', url: 'git@example.com:acme/docs.git' }],
      },
      '/srv/stack'
    );

    expect(config.repositories.map(r => r.url)).toEqual([
      'https://git.example.com/acme/core.git',
      'git@example.com:acme/docs.git',
    ]);
  });

  it('should mark services critical with expected status 200 by default', () => {
    const config = parseConfig(baseConfig(), '/srv/stack');

    expect(config.services).toEqual([
      { name: 'core', url: 'http://localhost:8090/api/health', critical: true, expectedStatus: 200 },
      { name: 'frontend', url: 'http://localhost:80/', critical: false, expectedStatus: 200 },
    ]);
  });

  it('should default to the core, frontend, plugins and resources stack', () => {
    const config = parseConfig({ org: 'acme' }, '/srv/stack');

    expect(
      config.repositories.map(({ name, image, dependsOn, manifestKey }) => ({ name, image, dependsOn, manifestKey }))
    ).toEqual([
      { name: 'core', image: 'acme/core', dependsOn: [], manifestKey: 'core' },
      { name: 'frontend', image: 'acme/frontend', dependsOn: ['core'], manifestKey: 'frontend' },
      { name: 'plugins', image: 'acme/plugins', dependsOn: ['core'], manifestKey: undefined },
      { name: 'resources', image: undefined, dependsOn: [], manifestKey: undefined },
    ]);
    expect(config.repositories[1]).toMatchObject({
      url: 'https://github.com/acme/frontend.git',
      branch: 'main',
      dir: '/srv/stack/deploy/frontend',
    });
  });

  it('should default to a critical core probe and a non-critical frontend probe', () => {
    const config = parseConfig({ org: 'acme', repositories: [{ name: 'core' }] }, '/srv/stack');

    expect(config.services).toEqual([
      { name: 'core', url: 'http://localhost:8090/api/health', critical: true, expectedStatus: 200 },
      { name: 'frontend', url: 'http://localhost:80/', critical: false, expectedStatus: 200 },
    ]);
  });

  it('should keep an empty service list when one is given', () => {
    expect(parseConfig({ org: 'acme', services: [] }, '/srv').services).toEqual([]);
  });

  it('should report schema violations with their path', () => {
    expect(() => parseConfig({ org: 'acme', repositories: [] }, '/srv')).toThrow(
      'Invalid stack config: repositories: Array must contain at least 1 element(s)'
    );
    expect(() => parseConfig({ org: 'acme', repositories: [{ name: 'core', manifestKey: 'api' }] }, '/srv')).toThrow(
      'Invalid stack config: repositories.0.manifestKey: must be "core", "frontend" or "plugins.<name>"'
    );
  });

  it('should reject duplicate names', () => {
    expect(() => parseConfig({ org: 'acme', repositories: [{ name: 'core' }, { name: 'core' }] }, '/srv')).toThrow(
      'Duplicate repository: core'
    );
    expect(() =>
      parseConfig(
        {
          org: 'acme',
          repositories: [{ name: 'core' }],
          services: [
            { name: 'api', url: 'http://localhost:1/' },
            { name: 'api', url: 'http://localhost:2/' },
          ],
        },
        '/srv'
      )
    ).toThrow('Duplicate service: api');
  });

  it('should reject dependency cycles', () => {
    const raw = {
      org: 'acme',
      repositories: [
        { name: 'a', dependsOn: ['b'] },
        { name: 'b', dependsOn: ['a'] },
      ],
    };
    expect(() => parseConfig(raw, '/srv')).toThrow(ConfigError);
  });
});

describe('loadConfig', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await makeTempDir();
  });

  afterEach(async () => {
    await removeDir(dir);
  });

  it('should load the bundled example', async () => {
    const config = await loadConfig('stackpilot.json', EXAMPLES);

    expect(config.rootDir).toBe(EXAMPLES);
    expect(config.repositories.map(r => r.name)).toEqual(['core', 'frontend', 'plugins', 'resources']);
    expect(config.backup.database).toEqual({ container: 'acme-postgres', user: 'acme', name: 'acme' });
    expect(config.backup.redis).toEqual({ container: 'acme-redis', dumpPath: '/data/dump.rdb' });
  });

  it('should read stackpilot.json from the working directory by default', async () => {
    await writeFile(path.join(dir, DEFAULT_CONFIG_FILE), JSON.stringify(baseConfig()));

    const config = await loadConfig(undefined, dir);

    expect(config.rootDir).toBe(dir);
    expect(config.org).toBe('acme');
  });

  it('should throw ConfigError for a missing file', async () => {
    await expect(loadConfig(undefined, dir)).rejects.toThrow(
      `Cannot read stack config at ${path.join(dir, 'stackpilot.json')}`
    );
  });

  it('should throw ConfigError for invalid JSON', async () => {
    await writeFile(path.join(dir, 'broken.json'), '{');

    await expect(loadConfig('broken.json', dir)).rejects.toThrow(
      `Stack config at ${path.join(dir, 'broken.json')} is not valid JSON`
    );
  });
});
