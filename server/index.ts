import http from 'http';
import type { Server } from 'http';
import { createApp } from './app';
import { loadConfig } from './core/config';
import { getPoolStatus, pool, queryWithRetry } from './core/db';
import { logger } from './core/logger';
import { LoggingReminderDispatcher } from './core/reminders/reminderDispatcher';
import { createSchedulingServices } from './core/scheduling';
import { createPgSchedulingStore } from './core/scheduling/pgStore';
import { db } from './db';
import { initializeDatabase } from './db-init';
import { initSchedulers, stopSchedulers } from './schedulers';
import { getErrorMessage } from './utils/errorUtils';

let isShuttingDown = false;
let httpServer: Server | null = null;

process.on('uncaughtException', (error) => {
  logger.error('[Process] Uncaught Exception:', { error });
  if (error.message.includes('EADDRINUSE')) {
    process.exit(1);
  }
});

process.on('unhandledRejection', (reason) => {
  logger.error('[Process] Unhandled Rejection:', { extra: { errorMessage: getErrorMessage(reason) } });
});

process.on('SIGTERM', () => {
  logger.info('[Process] Received SIGTERM signal');
  void gracefulShutdown('SIGTERM');
});

process.on('SIGINT', () => {
  logger.info('[Process] Received SIGINT signal');
  void gracefulShutdown('SIGINT');
});

function closeServer(server: Server): Promise<void> {
  return new Promise<void>((resolve) => {
    const timer = setTimeout(resolve, 5000);
    server.close(() => {
      clearTimeout(timer);
      resolve();
    });
  });
}

async function gracefulShutdown(signal: string): Promise<void> {
  if (isShuttingDown) return;
  isShuttingDown = true;
  logger.info(`[Shutdown] Starting graceful shutdown (${signal})...`);

  const shutdownTimeout = setTimeout(() => {
    logger.error('[Shutdown] Timeout exceeded, forcing exit');
    process.exit(1);
  }, 30000);

  try {
    stopSchedulers();

    if (httpServer) {
      await closeServer(httpServer);
    }

    try {
      await pool.end();
    } catch (error: unknown) {
      logger.warn('[Shutdown] Failed to close database pool', { error });
    }

    clearTimeout(shutdownTimeout);
    logger.info('[Shutdown] Complete');
    process.exit(0);
  } catch (error: unknown) {
    logger.error('[Shutdown] Error:', { error });
    clearTimeout(shutdownTimeout);
    process.exit(1);
  }
}

async function start(): Promise<void> {
  const config = loadConfig();

  await initializeDatabase();

  const store = createPgSchedulingStore(db);
  const services = createSchedulingServices(store, config, new LoggingReminderDispatcher());

  const app = createApp({
    services,
    config,
    checkHealth: async () => {
      const result = await queryWithRetry<{ time: Date }>('SELECT NOW() AS time');
      const row = result.rows[0];
      return {
        database: 'connected',
        timestamp: row ? new Date(row.time).toISOString() : undefined,
        pool: getPoolStatus(),
      };
    },
  });

  httpServer = http.createServer(app);
  httpServer.on('error', (err: unknown) => {
    logger.error('[Startup] Server failed to start:', { extra: { errorMessage: getErrorMessage(err) } });
    process.exit(1);
  });

  httpServer.listen(config.port, '0.0.0.0', () => {
    logger.info(`[Startup] HTTP server listening on port ${config.port}`);
    initSchedulers({
      reminderService: services.reminders,
      reminderPollIntervalMs: config.reminderPollIntervalMs,
    });
  });
}

start().catch((error: unknown) => {
  logger.error('[Startup] Initialization failed:', { extra: { errorMessage: getErrorMessage(error) } });
  process.exit(1);
});
