import fs from 'fs';

import { ArtifactFamily, artifactFileName } from '../config/families';
import { createAppError, isMissingPathError } from '../utils/errors';
import { ArtifactStore } from './artifactStore.service';

export interface ResolvedDownload {
  /** Name as stored on disk, used for Content-Disposition */
  fileName: string;
  filePath: string;
}

/**
 * Path separators (and NUL) would let a version escape the artifact root.
 */
export const containsPathSeparator = (value: string): boolean => /[\\/\0]/.test(value);

export class DownloadService {
  constructor(private readonly store: ArtifactStore) {}

  /**
   * Map a requested version of `family` to a file in the store.
   * The separator check runs before any filesystem access.
   */
  async resolveDownload(family: ArtifactFamily, version: string | undefined): Promise<ResolvedDownload> {
    if (!version) {
      throw createAppError('version is required', 400, 'VERSION_REQUIRED');
    }
    if (containsPathSeparator(version)) {
      throw createAppError('Invalid version parameter', 400, 'INVALID_VERSION');
    }

    const fileName = artifactFileName(family, version);
    const filePath = this.store.resolvePath(fileName);

    let stats: fs.Stats;
    try {
      stats = await fs.promises.stat(filePath);
    } catch (error) {
      if (isMissingPathError(error)) {
        throw createAppError('version not found', 404, 'VERSION_NOT_FOUND');
      }
      throw createAppError('Could not read artifact', 500, 'ARTIFACT_UNREADABLE', error);
    }

    if (stats.isDirectory()) {
      throw createAppError('Requested artifact is a directory', 400, 'NOT_A_FILE');
    }

    return { fileName, filePath };
  }
}
