import { readFile, writeFile } from 'node:fs/promises';
import { z } from 'zod';
import { ConfigError } from './errors';
import { isValidVersion, majorOf } from './version';

/**
 * Compatibility manifest (`versions.json`): which version of every
 * component belongs to a release.
 */
export const manifestSchema = z.object({
  release: z.string(),
  core: z.string(),
  frontend: z.string(),
  plugins: z.record(z.string()).default({}),
});

export type VersionManifest = z.output<typeof manifestSchema>;

export interface CompatibilityResult {
  compatible: boolean;
  issues: string[];
}

interface ManifestLinkedRepo {
  name: string;
  dependsOn: readonly string[];
  manifestKey?: string;
}

/**
 * Resolve a `manifestKey` (`core`, `frontend` or `plugins.<name>`).
 */
export const versionFor = (manifest: VersionManifest, key: string): string | undefined => {
  if (key === 'core') return manifest.core;
  if (key === 'frontend') return manifest.frontend;
  if (key.startsWith('plugins.')) return manifest.plugins[key.slice('plugins.'.length)];
  return undefined;
};

export const parseManifest = (raw: unknown, source = 'manifest'): VersionManifest => {
  const result = manifestSchema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues.map(i => `${i.path.join('.') || '(root)'}: ${i.message}`).join('; ');
    throw new ConfigError(`Invalid ${source}: ${issues}`, { cause: result.error });
  }
  return result.data;
};

export const loadManifest = async (file: string): Promise<VersionManifest> => {
  let raw: unknown;
  try {
    raw = JSON.parse(await readFile(file, 'utf8'));
  } catch (error) {
    throw new ConfigError(`Cannot read version manifest at ${file}`, { cause: error });
  }
  return parseManifest(raw, file);
};

export const saveManifest = async (file: string, manifest: VersionManifest): Promise<void> => {
  await writeFile(file, `${JSON.stringify(manifest, null, 2)}\n`, 'utf8');
};

/**
 * Every version must be valid semver, and every repository must share its
 * major version with each dependency it depends on, as pinned by the manifest.
 */
export const checkCompatibility = (
  manifest: VersionManifest,
  repos: readonly ManifestLinkedRepo[]
): CompatibilityResult => {
  const issues: string[] = [];

  const entries: Array<[string, string]> = [
    ['release', manifest.release],
    ['core', manifest.core],
    ['frontend', manifest.frontend],
    ...Object.entries(manifest.plugins).map(([name, v]): [string, string] => [`plugins.${name}`, v]),
  ];
  for (const [key, value] of entries) {
    if (!isValidVersion(value)) issues.push(`${key}: invalid version "${value}"`);
  }

  const byName = new Map(repos.map(r => [r.name, r]));

  for (const repo of repos) {
    if (!repo.manifestKey) continue;
    const version = versionFor(manifest, repo.manifestKey);
    if (version === undefined) {
      issues.push(`${repo.name}: manifest has no entry for ${repo.manifestKey}`);
      continue;
    }
    const major = majorOf(version);
    if (major === undefined) continue;

    for (const depName of repo.dependsOn) {
      const dep = byName.get(depName);
      if (!dep?.manifestKey) continue;
      const depVersion = versionFor(manifest, dep.manifestKey);
      if (depVersion === undefined) continue;
      const depMajor = majorOf(depVersion);
      if (depMajor !== undefined && depMajor !== major) {
        issues.push(`${repo.name} ${version} is incompatible with ${dep.name} ${depVersion} (major version differs)`);
      }
    }
  }

  return { compatible: issues.length === 0, issues };
};
