import express from 'express';
import { createServer } from 'http';
import cors from 'cors';
import { env, validateEnv } from '@/shared/config';
import { logger, parseLogLevel } from '@/shared/utils';
import { engineService, SidecarEngine } from '@/modules/engine';
import { createMonitoringRouter } from '@/modules/monitoring';
import {
  connectionRegistry,
  initializeSocketServer,
  shutdownSocketServer,
} from '@/modules/socket';

// Validate environment variables
try {
  validateEnv();
} catch (error) {
  logger.error('Environment validation failed', error instanceof Error ? error : { error });
  process.exit(1);
}

logger.setLevel(parseLogLevel(env.LOG_LEVEL));

// Create Express app
const app = express();

// Middleware
app.use(cors());
app.use(express.json());

// Create HTTP server
const httpServer = createServer(app);

// Initialize WebSocket server
const wss = initializeSocketServer(httpServer);
connectionRegistry.startReaper();

// Health, availability and connection endpoints
app.use(
  createMonitoringRouter({
    engine: engineService,
    registry: connectionRegistry,
    getTotalConnections: () => wss.clients.size,
  })
);

// Engine loads in the background; requests are rejected until it is ready
engineService
  .initialize(() =>
    SidecarEngine.connect(env.ENGINE_URL, { connectTimeoutMs: env.ENGINE_CONNECT_TIMEOUT_MS })
  )
  .catch((error: unknown) => {
    logger.error('Synthesis engine unavailable; streaming disabled until it recovers', {
      error: error instanceof Error ? error.message : String(error),
    });
  });

let shuttingDown = false;

// Graceful shutdown handler
async function gracefulShutdown(signal: string): Promise<void> {
  if (shuttingDown) return;
  shuttingDown = true;
  logger.info(`${signal} received, starting graceful shutdown`);

  try {
    // Step 1: Stop accepting new connections
    await new Promise<void>((resolve) => {
      const timer = setTimeout(() => {
        logger.warn('HTTP server force closed after timeout');
        resolve();
      }, 5000);

      httpServer.close(() => {
        clearTimeout(timer);
        logger.info('HTTP server closed');
        resolve();
      });
    });

    // Step 2: Cancel active streams and close sessions
    await shutdownSocketServer(wss);

    // Step 3: Release the engine
    await engineService.shutdown();

    logger.info('Graceful shutdown completed');
    process.exit(0);
  } catch (error) {
    logger.error('Error during graceful shutdown', error instanceof Error ? error : { error });
    process.exit(1);
  }
}

// Register shutdown handlers
process.on('SIGTERM', () => void gracefulShutdown('SIGTERM'));
process.on('SIGINT', () => void gracefulShutdown('SIGINT'));

// Handle uncaught errors
process.on('uncaughtException', (error: Error) => {
  logger.error('Uncaught exception', error);
  void gracefulShutdown('UNCAUGHT_EXCEPTION');
});

process.on('unhandledRejection', (reason: unknown) => {
  logger.error('Unhandled rejection', { reason });
  void gracefulShutdown('UNHANDLED_REJECTION');
});

// Start server
httpServer.listen(env.PORT, () => {
  logger.info('Streaming speech server started', {
    port: env.PORT,
    environment: env.NODE_ENV,
    websocketPath: '/ws/stream/audio',
  });
});
