import { ArtifactFamily, downloadPath } from '../config/families';
import { createAppError } from '../utils/errors';
import { isNewerVersion, parseVersion, ZERO_VERSION } from '../utils/versioning';
import { ArtifactStore } from './artifactStore.service';
import { computeSha256 } from './checksum.service';

import { logger, Logger } from '@/config/logger';

/**
 * Wire format of /check-update. download_url is present iff
 * update_available is true.
 */
export interface CheckResponse {
  update_available: boolean;
  latest_version: string;
  download_url?: string;
  checksum?: string;
}

export interface UpdateCheckOptions {
  /** Prefix that turns locators into absolute URLs, e.g. https://ota.example.com */
  publicBaseUrl?: string;
}

export class UpdateCheckService {
  constructor(
    private readonly store: ArtifactStore,
    private readonly options: UpdateCheckOptions = {}
  ) {}

  /**
   * Locator a device follows to fetch `version` of `family`.
   */
  buildLocator(family: ArtifactFamily, version: string): string {
    const locator = `${downloadPath(family)}?version=${encodeURIComponent(version)}`;
    const baseUrl = this.options.publicBaseUrl?.replace(/\/+$/, '');
    return baseUrl ? `${baseUrl}${locator}` : locator;
  }

  /**
   * Compare the client's version with the newest artifact of `family`.
   * An update is offered only when the newest artifact is strictly greater;
   * latest_version is always the catalog maximum (0.0.0 when empty).
   */
  async checkForUpdate(
    family: ArtifactFamily,
    currentVersion: string | undefined,
    log: Logger = logger
  ): Promise<CheckResponse> {
    const requested = currentVersion?.trim();
    if (!requested) {
      throw createAppError('current_version is required', 400, 'CURRENT_VERSION_REQUIRED');
    }

    const current = parseVersion(requested);
    if (!current) {
      throw createAppError(
        `Invalid current_version "${requested}": expected a semantic version such as 1.2.3`,
        400,
        'INVALID_CURRENT_VERSION'
      );
    }

    const latest = await this.store.getLatest(family);
    if (!latest || !isNewerVersion(latest.version, current)) {
      log.debug(
        { family: family.name, currentVersion: requested, latestVersion: latest?.version.raw },
        'No update available'
      );
      return {
        update_available: false,
        latest_version: latest ? latest.version.raw : ZERO_VERSION,
      };
    }

    const response: CheckResponse = {
      update_available: true,
      latest_version: latest.version.raw,
      download_url: this.buildLocator(family, latest.version.raw),
    };

    if (family.checksum) {
      const filePath = this.store.resolvePath(latest.fileName);
      try {
        response.checksum = await computeSha256(filePath);
      } catch (error) {
        // The update is still offered; the device just cannot verify it
        log.warn({ error, filePath }, 'Checksum computation failed, omitting checksum');
      }
    }

    log.info(
      { family: family.name, currentVersion: requested, latestVersion: latest.version.raw },
      'Update available'
    );
    return response;
  }
}
