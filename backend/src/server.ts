import { loadEnv, loadMixSettings } from './config/env';

// Load .env before anything reads process.env (logger level, settings)
loadEnv();

import fs from 'fs';
import { errorMessage, logger } from './config/logger';
import { createApp } from './app';
import { createMixEngine } from './services/mix-engine';

const startServer = async () => {
  const settings = loadMixSettings();
  for (const dir of [settings.paths.workDir, settings.paths.cacheDir, settings.paths.exportsDir]) {
    await fs.promises.mkdir(dir, { recursive: true });
  }

  // Start the export worker (queue mode) and the Express server
  const engine = createMixEngine(settings);
  const app = createApp(engine);

  const server = app.listen(settings.server.port, () => {
    logger.info(`Server running on port ${settings.server.port}`);
    logger.info(`Environment: ${process.env.NODE_ENV || 'development'}`);
  });

  const shutdown = (signal: string) => {
    logger.info(`${signal} received, shutting down`);
    server.close();
    engine.dispatcher
      .close()
      .then(() => process.exit(0))
      .catch((error: unknown) => {
        logger.error('Error during shutdown', { error: errorMessage(error) });
        process.exit(1);
      });
  };

  process.on('SIGINT', () => shutdown('SIGINT'));
  process.on('SIGTERM', () => shutdown('SIGTERM'));
};

startServer().catch((error: unknown) => {
  logger.error('Failed to start server:', { error: errorMessage(error) });
  process.exit(1);
});

// Handle unhandled rejections
process.on('unhandledRejection', (err: unknown) => {
  logger.error('Unhandled Rejection:', { error: errorMessage(err) });
  process.exit(1);
});
