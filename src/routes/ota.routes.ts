import { Router } from 'express';

import { ArtifactFamily, checkUpdatePath, downloadPath } from '../config/families';
import { OtaController } from '../controllers/ota.controller';
import { validateQuery } from '../middleware/validate.middleware';
import { DownloadService } from '../services/download.service';
import { UpdateCheckService } from '../services/updateCheck.service';
import { checkUpdateQuerySchema, downloadQuerySchema } from '../utils/dtoTypes';

export interface OtaServices {
  updateCheckService: UpdateCheckService;
  downloadService: DownloadService;
}

/**
 * One route pair per family:
 *   GET /check-update<suffix>?current_version=...
 *   GET /download<suffix>?version=...
 * Public endpoints - no authentication
 */
export const createOtaRouter = (families: ArtifactFamily[], services: OtaServices): Router => {
  const router = Router();

  for (const family of families) {
    const controller = new OtaController(
      family,
      services.updateCheckService,
      services.downloadService
    );

    router.get(checkUpdatePath(family), validateQuery(checkUpdateQuerySchema), controller.checkUpdate);
    router.get(downloadPath(family), validateQuery(downloadQuerySchema), controller.download);
  }

  return router;
};
