import path from 'path';
import * as semver from 'semver';
import type { SemVer } from 'semver';

/**
 * Artifact versions follow semantic versioning: ordering is by
 * major/minor/patch/pre-release precedence, build metadata is ignored.
 * Filenames and client-supplied versions go through the same parser.
 */
export interface VersionToken {
  /** The token exactly as it appeared in the filename or query string */
  raw: string;
  parsed: SemVer;
}

/** Reported as latest_version when a family has no artifacts */
export const ZERO_VERSION = '0.0.0';

export const parseVersion = (raw: string): VersionToken | null => {
  const parsed = semver.parse(raw);
  return parsed ? { raw, parsed } : null;
};

export const compareVersions = (a: VersionToken, b: VersionToken): number =>
  semver.compare(a.parsed, b.parsed);

export const isNewerVersion = (candidate: VersionToken, current: VersionToken): boolean =>
  compareVersions(candidate, current) > 0;

export type VersionExtraction =
  | { matched: true; family: string; version: VersionToken }
  | { matched: false; reason: 'no-separator' | 'empty-family' | 'invalid-version' };

/**
 * Splits `<family>_<version>.<ext>` on the LAST underscore of the
 * extension-stripped name, so family names may contain underscores.
 */
export const extractVersion = (fileName: string): VersionExtraction => {
  const baseName = path.basename(fileName, path.extname(fileName));
  const separatorIndex = baseName.lastIndexOf('_');
  if (separatorIndex === -1) {
    return { matched: false, reason: 'no-separator' };
  }

  const family = baseName.slice(0, separatorIndex);
  if (family.length === 0) {
    return { matched: false, reason: 'empty-family' };
  }

  const version = parseVersion(baseName.slice(separatorIndex + 1));
  if (!version) {
    return { matched: false, reason: 'invalid-version' };
  }

  return { matched: true, family, version };
};
