import express, { Express } from 'express';
import helmet from 'helmet';

import { config } from './config/index';
import { ArtifactFamily } from './config/families';
import { accessLogMiddleware } from './middleware/accessLog.middleware';
import { errorMiddleware } from './middleware/error.middleware';
import { requestIdMiddleware } from './middleware/requestId.middleware';
import { createOtaRouter } from './routes/ota.routes';
import { ArtifactStore } from './services/artifactStore.service';
import { DownloadService } from './services/download.service';
import { UpdateCheckService } from './services/updateCheck.service';

export interface AppDependencies {
  store: ArtifactStore;
  families: ArtifactFamily[];
  publicBaseUrl?: string;
}

export const createApp = ({ store, families, publicBaseUrl }: AppDependencies): Express => {
  const app = express();

  // Security middleware
  if (config.app.env === 'development') {
    app.use(
      helmet({
        contentSecurityPolicy: false,
        crossOriginEmbedderPolicy: false,
      })
    );
  } else {
    app.use(helmet());
  }

  app.use(requestIdMiddleware);
  app.use(accessLogMiddleware);

  // Health check
  app.get('/health', (_req, res) => {
    res.status(200).json({
      success: true,
      message: 'Server is healthy',
      timestamp: new Date().toISOString(),
    });
  });

  app.use(
    createOtaRouter(families, {
      updateCheckService: new UpdateCheckService(store, { publicBaseUrl }),
      downloadService: new DownloadService(store),
    })
  );

  // 404 handler
  app.use((_req, res) => {
    res.status(404).json({
      success: false,
      message: 'Route not found',
      code: 'NOT_FOUND',
    });
  });

  // Error handling middleware (must be last)
  app.use(errorMiddleware);

  return app;
};
