import cors from 'cors';
import express from 'express';

import { AuthConfig, CorsConfig, ExportConfig, ServerConfig, StorageConfig } from './config';
import { requireApiAuth } from './middleware/auth';
import { requestLogger } from './middleware/requestLogger';
import { requestTimeout } from './middleware/requestTimeout';
import ingesterRouter from './routes/ingester';
import workoutsRouter from './routes/workouts';
import { exportWriter, healthStore } from './storage';
import { logger } from './utils/logger';

import type { Server } from 'node:http';

/**
 * Validate required environment variables at startup.
 * Fails fast if critical configuration is missing.
 */
function validateEnv(): void {
  const token = process.env[AuthConfig.tokenEnvVar];
  if (!token) {
    throw new Error(`${AuthConfig.tokenEnvVar} environment variable is required`);
  }
  if (!token.startsWith(AuthConfig.tokenPrefix)) {
    throw new Error(`${AuthConfig.tokenEnvVar} must start with "${AuthConfig.tokenPrefix}"`);
  }
}

const app = express();
app.disable('x-powered-by'); // Prevent version disclosure
let server: Server | undefined;

app.use(
  cors({
    allowedHeaders: [...CorsConfig.allowedHeaders],
    methods: [...CorsConfig.allowedMethods],
    origin: CorsConfig.origins.includes('*') ? '*' : CorsConfig.origins,
  }),
);

app.use(express.json({ limit: ServerConfig.bodyLimit }));

// Request logging first so every later middleware has req.log
app.use(requestLogger);
app.use(requestTimeout);

app.use('/api/data', requireApiAuth, ingesterRouter);
app.use('/api/workouts', requireApiAuth, workoutsRouter);

// Health check endpoint
app.get('/health', (_req: express.Request, res: express.Response) => {
  res.status(200).send('OK');
});

const gracefulShutdown = (signal: string) => {
  logger.info(`Received ${signal}, shutting down gracefully...`);
  if (!server) {
    // eslint-disable-next-line n/no-process-exit, unicorn/no-process-exit -- Nothing to drain
    process.exit(0);
  }

  server.close(() => {
    logger.info('Server closed');
    // eslint-disable-next-line n/no-process-exit, unicorn/no-process-exit -- Intentional server shutdown
    process.exit(0);
  });

  // Force exit after the timeout (unref to not block process exit)
  setTimeout(() => {
    logger.error('Forced shutdown after timeout');
    // eslint-disable-next-line n/no-process-exit, unicorn/no-process-exit -- Intentional forced shutdown
    process.exit(1);
  }, ServerConfig.shutdownTimeoutMs).unref();
};

try {
  validateEnv();

  await healthStore.init();
  await exportWriter.init();

  server = app.listen(ServerConfig.port, ServerConfig.host, () => {
    logger.info('Server started', {
      dataDir: StorageConfig.dataDir,
      exportsDir: ExportConfig.exportsDir,
      host: ServerConfig.host,
      nodeEnv: process.env.NODE_ENV ?? 'development',
      port: ServerConfig.port,
    });
  });

  process.on('SIGTERM', () => {
    gracefulShutdown('SIGTERM');
  });
  process.on('SIGINT', () => {
    gracefulShutdown('SIGINT');
  });
} catch (error) {
  logger.error('Failed to initialize server', error);
  // eslint-disable-next-line n/no-process-exit, unicorn/no-process-exit -- Fatal startup error
  process.exit(1);
}
