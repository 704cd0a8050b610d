import fs from 'fs';
import { createServer } from 'http';

import { createApp } from './app';
import { loadFamilies, checkUpdatePath, downloadPath } from './config/families';
import { config } from './config/index';
import { logger } from './config/logger';
import { ArtifactStore } from './services/artifactStore.service';

const startServer = (): void => {
  const families = loadFamilies(config.ota.familiesFile);
  const store = new ArtifactStore({
    rootDir: config.ota.filesDir,
    catalogTtlMs: config.ota.catalogTtlMs,
  });

  if (!fs.existsSync(store.rootDir)) {
    // Not fatal: check requests report 500 until the directory appears
    logger.warn({ filesDir: store.rootDir }, 'Artifact directory does not exist');
  }

  const app = createApp({ store, families, publicBaseUrl: config.ota.publicBaseUrl });
  const server = createServer(app);
  const PORT = config.app.port;

  server.listen(PORT, '0.0.0.0', () => {
    logger.info(
      {
        port: PORT,
        env: config.app.env,
        filesDir: store.rootDir,
        catalogTtlMs: config.ota.catalogTtlMs,
      },
      `OTA server running on port ${PORT}`
    );
    families.forEach((family) => {
      logger.info(
        { family: family.name, check: checkUpdatePath(family), download: downloadPath(family) },
        'Serving artifact family'
      );
    });
  });

  server.on('error', (error: NodeJS.ErrnoException) => {
    if (error.code === 'EADDRINUSE') {
      logger.fatal(`Port ${PORT} is already in use`);
    } else {
      logger.fatal({ error }, 'Failed to start server');
    }
    process.exit(1);
  });

  const shutdown = (signal: string): void => {
    logger.info(`${signal} received, shutting down gracefully`);
    server.close((error) => {
      if (error) {
        logger.error({ error }, 'Error while closing server');
        process.exit(1);
      }
      process.exit(0);
    });
  };

  process.on('SIGTERM', () => shutdown('SIGTERM'));
  process.on('SIGINT', () => shutdown('SIGINT'));
};

// Handle unhandled promise rejections
process.on('unhandledRejection', (error: unknown) => {
  logger.fatal({ error }, 'Unhandled promise rejection');
  process.exit(1);
});

// Handle uncaught exceptions
process.on('uncaughtException', (error: Error) => {
  logger.fatal({ error }, 'Uncaught exception');
  process.exit(1);
});

try {
  startServer();
} catch (error) {
  logger.fatal({ error }, 'Failed to start server');
  process.exit(1);
}
