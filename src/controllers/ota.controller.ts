import { Request, Response, NextFunction } from 'express';

import { ArtifactFamily } from '../config/families';
import { asyncHandler } from '../middleware/error.middleware';
import { getRequestLogger } from '../middleware/requestId.middleware';
import { DownloadService } from '../services/download.service';
import { UpdateCheckService } from '../services/updateCheck.service';
import { createAppError, isMissingPathError } from '../utils/errors';

const singleQueryValue = (value: unknown): string | undefined =>
  typeof value === 'string' ? value : undefined;

/**
 * Handlers for one artifact family. Each family gets its own controller so
 * the filename template is fixed per route rather than taken from the request.
 */
export class OtaController {
  constructor(
    private readonly family: ArtifactFamily,
    private readonly updateCheckService: UpdateCheckService,
    private readonly downloadService: DownloadService
  ) {}

  /**
   * GET /check-update?current_version=1.2.3
   * Responds with update_available, latest_version and, when newer, download_url
   */
  checkUpdate = asyncHandler(async (req: Request, res: Response) => {
    const info = await this.updateCheckService.checkForUpdate(
      this.family,
      singleQueryValue(req.query.current_version),
      getRequestLogger(req)
    );

    res.status(200).json(info);
  });

  /**
   * GET /download?version=1.2.3
   * Streams the whole artifact with Content-Disposition naming the stored file.
   * Range and conditional requests are not honored.
   * Clients that ignore the header (curl -O) save under the URL's name instead.
   */
  download = asyncHandler(async (req: Request, res: Response, next: NextFunction) => {
    const artifact = await this.downloadService.resolveDownload(
      this.family,
      singleQueryValue(req.query.version)
    );

    res.attachment(artifact.fileName);
    res.sendFile(
      artifact.filePath,
      { dotfiles: 'allow', acceptRanges: false, etag: false, lastModified: false },
      (error) => {
        if (!error) {
          return;
        }
        if (!res.headersSent) {
          res.removeHeader('Content-Disposition');
          res.removeHeader('Content-Type');
          // Removed between the stat and the transfer
          next(
            isMissingPathError(error)
              ? createAppError('version not found', 404, 'VERSION_NOT_FOUND')
              : createAppError('Could not read artifact', 500, 'ARTIFACT_UNREADABLE', error)
          );
          return;
        }
        getRequestLogger(req).error(
          { error: error.message, fileName: artifact.fileName },
          'Artifact transfer interrupted'
        );
      }
    );
  });
}
