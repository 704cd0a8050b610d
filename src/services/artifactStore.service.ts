import fs from 'fs';
import path from 'path';

import { ArtifactFamily } from '../config/families';
import { createAppError, isMissingPathError } from '../utils/errors';
import { compareVersions, extractVersion, VersionToken } from '../utils/versioning';

import { logger } from '@/config/logger';

export interface ArtifactFile {
  fileName: string;
  family: string;
  version: VersionToken;
}

export interface ArtifactStoreOptions {
  rootDir: string;
  /**
   * How long a directory scan may be reused, in milliseconds.
   * 0 rescans on every call.
   */
  catalogTtlMs?: number;
  now?: () => number;
}

/**
 * A regular file, or a symlink to one.
 */
const isRegularFile = async (directory: string, entry: fs.Dirent): Promise<boolean> => {
  if (entry.isFile()) {
    return true;
  }
  if (!entry.isSymbolicLink()) {
    return false;
  }
  try {
    const stats = await fs.promises.stat(path.join(directory, entry.name));
    return stats.isFile();
  } catch (error) {
    if (isMissingPathError(error)) {
      logger.debug({ fileName: entry.name }, 'Skipping dangling symlink');
    } else {
      logger.warn({ error, fileName: entry.name }, 'Skipping unreadable symlink');
    }
    return false;
  }
};

/**
 * Scan the top level of `directory` and return every artifact whose name
 * carries a valid version, sorted ascending. Subdirectories, links to
 * directories and dangling links are skipped; links to files are kept.
 * Files without a parseable version are left out; an unreadable directory
 * rejects with ARTIFACT_DIR_UNREADABLE.
 */
export async function scanCatalog(directory: string): Promise<ArtifactFile[]> {
  let entries: fs.Dirent[];
  try {
    entries = await fs.promises.readdir(directory, { withFileTypes: true });
  } catch (error) {
    logger.error({ error, directory }, 'Could not read artifact directory');
    throw createAppError('Could not fetch available versions', 500, 'ARTIFACT_DIR_UNREADABLE', error);
  }

  const artifacts: ArtifactFile[] = [];
  for (const entry of entries) {
    if (!(await isRegularFile(directory, entry))) {
      continue;
    }

    const extraction = extractVersion(entry.name);
    if (!extraction.matched) {
      logger.debug({ fileName: entry.name, reason: extraction.reason }, 'Skipping unversioned file');
      continue;
    }

    artifacts.push({
      fileName: entry.name,
      family: extraction.family,
      version: extraction.version,
    });
  }

  // Array#sort is stable, so equal versions keep directory order
  return artifacts.sort((a, b) => compareVersions(a.version, b.version));
}

/**
 * Owns the artifact directory. Handlers receive an instance instead of
 * reading shared module state, and the optional scan cache lives here.
 */
export class ArtifactStore {
  readonly rootDir: string;
  private readonly catalogTtlMs: number;
  private readonly now: () => number;
  private cachedScan: ArtifactFile[] | null = null;
  private cacheTimestamp = 0;

  constructor(options: ArtifactStoreOptions) {
    this.rootDir = path.resolve(options.rootDir);
    this.catalogTtlMs = options.catalogTtlMs ?? 0;
    this.now = options.now ?? Date.now;
  }

  /**
   * All versioned artifacts in the store, ascending.
   */
  async scan(): Promise<ArtifactFile[]> {
    const now = this.now();
    if (this.cachedScan && this.catalogTtlMs > 0 && now - this.cacheTimestamp < this.catalogTtlMs) {
      return this.cachedScan;
    }

    const artifacts = await scanCatalog(this.rootDir);
    if (this.catalogTtlMs > 0) {
      this.cachedScan = artifacts;
      this.cacheTimestamp = now;
    }
    return artifacts;
  }

  /**
   * The ascending catalog of one family: files named after the family with
   * the family's extension.
   */
  async getCatalog(family: ArtifactFamily): Promise<ArtifactFile[]> {
    const artifacts = await this.scan();
    return artifacts.filter(
      (artifact) =>
        artifact.family === family.name && path.extname(artifact.fileName) === family.extension
    );
  }

  async getLatest(family: ArtifactFamily): Promise<ArtifactFile | null> {
    const catalog = await this.getCatalog(family);
    return catalog.length > 0 ? catalog[catalog.length - 1] : null;
  }

  /**
   * Absolute path of a file name inside the store. Callers must reject
   * names containing path separators first.
   */
  resolvePath(fileName: string): string {
    return path.join(this.rootDir, fileName);
  }

  clearCache(): void {
    this.cachedScan = null;
    this.cacheTimestamp = 0;
  }
}
