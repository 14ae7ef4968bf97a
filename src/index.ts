import { createServer } from 'http';
import { env, serverConfig, validateEnv } from '@/shared/config';
import { asError, logger } from '@/shared/utils';
import { bridgeConfig, bridgeSessionService } from '@/modules/bridge';
import { upstreamConfig } from '@/modules/upstream';
import { createApp } from '@/modules/http';

// Validate environment variables and module configuration
try {
  validateEnv();
  bridgeConfig.validate();
  upstreamConfig.validate();
} catch (error) {
  logger.error('Configuration validation failed', asError(error));
  process.exit(1);
}

const app = createApp();
const httpServer = createServer(app);

let shuttingDown = false;

// Graceful shutdown handler
async function gracefulShutdown(signal: string): Promise<void> {
  if (shuttingDown) {
    return;
  }
  shuttingDown = true;
  logger.info(`${signal} received, starting graceful shutdown`);

  try {
    // Stop accepting new connections, let open streams finish
    await new Promise<void>((resolve) => {
      const forceTimer = setTimeout(() => {
        logger.warn('HTTP server force closed after timeout', {
          activeSessions: bridgeSessionService.getSessionCount(),
        });
        httpServer.closeAllConnections();
        resolve();
      }, serverConfig.shutdownTimeout);

      httpServer.close(() => {
        clearTimeout(forceTimer);
        logger.info('HTTP server closed');
        resolve();
      });
    });

    bridgeSessionService.shutdown();

    logger.info('Graceful shutdown completed');
    process.exit(0);
  } catch (error) {
    logger.error('Error during graceful shutdown', asError(error));
    process.exit(1);
  }
}

// Register shutdown handlers
process.on('SIGTERM', () => {
  void gracefulShutdown('SIGTERM');
});
process.on('SIGINT', () => {
  void gracefulShutdown('SIGINT');
});

// Handle uncaught errors
process.on('uncaughtException', (error: Error) => {
  logger.error('Uncaught exception', error);
  void gracefulShutdown('UNCAUGHT_EXCEPTION');
});

process.on('unhandledRejection', (reason: unknown) => {
  logger.error('Unhandled rejection', { reason: asError(reason).message });
  void gracefulShutdown('UNHANDLED_REJECTION');
});

// Start server
httpServer.listen(env.PORT, env.HOST, () => {
  logger.info('Channel bridge started', {
    port: env.PORT,
    host: env.HOST,
    environment: env.NODE_ENV,
    upstream: upstreamConfig.baseURL,
    outputFormat: bridgeConfig.outputFormat,
    markers: bridgeConfig.markerVocabulary,
  });
  logger.info('Endpoints', {
    chat: serverConfig.apiPrefixes.map((prefix) => `POST ${prefix}/chat/completions`),
    models: serverConfig.apiPrefixes.map((prefix) => `GET ${prefix}/models`),
    health: 'GET /health',
  });
});
