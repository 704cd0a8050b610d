import path from 'path';
import dotenv from 'dotenv';

import { validateEnv } from './env';

// Load environment variables
dotenv.config();

const env = validateEnv();

export const config = {
  app: {
    env: env.APP_ENV,
    port: parseInt(env.PORT || env.APP_PORT || '8080', 10),
  },
  ota: {
    filesDir: path.resolve(env.OTA_FILES_DIR),
    familiesFile: path.resolve(env.OTA_FAMILIES_FILE),
    // Only used to turn download locators into absolute URLs
    publicBaseUrl: env.PUBLIC_BASE_URL,
    // 0 = rescan the artifact directory on every request
    catalogTtlMs: parseInt(env.CATALOG_CACHE_TTL_MS, 10),
  },
  log: {
    level: env.LOG_LEVEL,
    requestIdHeader: env.REQUEST_ID_HEADER,
  },
};
