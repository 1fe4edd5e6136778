const SEMVER =
  /^v?(0|[1-9]\d*)\.(0|[1-9]\d*)\.(0|[1-9]\d*)(?:-((?:0|[1-9]\d*|\d*[a-zA-Z-][0-9a-zA-Z-]*)(?:\.(?:0|[1-9]\d*|\d*[a-zA-Z-][0-9a-zA-Z-]*))*))?(?:\+([0-9a-zA-Z-]+(?:\.[0-9a-zA-Z-]+)*))?$/;

export interface ParsedVersion {
  major: number;
  minor: number;
  patch: number;
  prerelease: string[];
  build?: string;
}

export const isValidVersion = (version: string): boolean => SEMVER.test(version);

/**
 * Parse a semantic version, tolerating a leading `v`.
 * Returns undefined for anything that is not MAJOR.MINOR.PATCH[-pre][+build].
 */
export const parseVersion = (version: string): ParsedVersion | undefined => {
  const match = SEMVER.exec(version);
  if (!match) return undefined;

  const [, major, minor, patch, prerelease, build] = match;
  return {
    major: Number(major),
    minor: Number(minor),
    patch: Number(patch),
    prerelease: prerelease ? prerelease.split('.') : [],
    build,
  };
};

export const majorOf = (version: string): number | undefined => parseVersion(version)?.major;

const compareIdentifiers = (a: string, b: string): number => {
  const aNum = /^\d+$/.test(a);
  const bNum = /^\d+$/.test(b);
  if (aNum && bNum) return Math.sign(Number(a) - Number(b));
  if (aNum) return -1;
  if (bNum) return 1;
  return a < b ? -1 : a > b ? 1 : 0;
};

/**
 * Precedence comparison. Build metadata is ignored and a prerelease sorts
 * below its release. Throws on invalid input.
 */
export const compareVersions = (a: string, b: string): number => {
  const left = parseVersion(a);
  const right = parseVersion(b);
  if (!left || !right) {
    throw new TypeError(`Invalid version: ${left ? b : a}`);
  }

  for (const key of ['major', 'minor', 'patch'] as const) {
    if (left[key] !== right[key]) return Math.sign(left[key] - right[key]);
  }

  if (!left.prerelease.length || !right.prerelease.length) {
    return Math.sign(right.prerelease.length - left.prerelease.length);
  }

  const length = Math.max(left.prerelease.length, right.prerelease.length);
  for (let i = 0; i < length; i++) {
    const l = left.prerelease[i];
    const r = right.prerelease[i];
    if (l === undefined) return -1;
    if (r === undefined) return 1;
    const cmp = compareIdentifiers(l, r);
    if (cmp !== 0) return cmp;
  }
  return 0;
};

export const toTag = (version: string): string => (version.startsWith('v') ? version : `v${version}`);

export const stripTag = (tag: string): string => tag.replace(/^v/, '');

/** Equal up to the `v` prefix (`v2.1.0` and `2.1.0` are the same release). */
export const sameVersion = (a: string, b: string): boolean => stripTag(a) === stripTag(b);
