import express, { type Express, type NextFunction, type Request, type Response } from 'express';
import cors from 'cors';
import compression from 'compression';
import type { AppConfig } from './core/config';
import { logAndRespond, logRequest, requestIdMiddleware, respondWithCode } from './core/logger';
import type { SchedulingServices } from './core/scheduling';
import { schedulerTracker } from './core/schedulerTracker';
import { isAdmin } from './middleware/auth';
import { globalRateLimiter } from './middleware/rateLimiting';
import { createAdminBookingsRouter } from './routes/adminBookings';
import { createAvailabilityRouter } from './routes/availability';
import { createBookingsRouter } from './routes/bookings';
import { createScheduleRouter } from './routes/schedule';
import { createSettingsRouter } from './routes/settings';
import { getErrorMessage } from './utils/errorUtils';

export interface HealthReport {
  database: 'connected' | 'disconnected' | 'not_configured';
  timestamp?: string;
  pool?: { total: number; idle: number; waiting: number };
}

export interface AppDependencies {
  services: SchedulingServices;
  config: Pick<AppConfig, 'adminApiToken' | 'bookingWindowDays' | 'isProduction'>;
  checkHealth?: () => Promise<HealthReport>;
}

function hasHttpStatus(error: unknown): error is { status: number; type?: string } {
  return typeof error === 'object' && error !== null && 'status' in error && typeof error.status === 'number';
}

export function createApp(deps: AppDependencies): Express {
  const { services, config } = deps;
  const app = express();
  const requireAdmin = isAdmin(config.adminApiToken);

  app.disable('x-powered-by');
  app.use((req, res, next) => {
    res.setHeader('X-Content-Type-Options', 'nosniff');
    res.setHeader('X-Frame-Options', 'SAMEORIGIN');
    res.setHeader('Referrer-Policy', 'strict-origin-when-cross-origin');
    if (config.isProduction) {
      res.setHeader('Strict-Transport-Security', 'max-age=31536000; includeSubDomains');
    }
    next();
  });

  app.use(requestIdMiddleware);
  app.use(logRequest);
  app.use(cors({
    methods: ['GET', 'POST', 'PUT', 'PATCH', 'DELETE', 'OPTIONS'],
    allowedHeaders: ['Content-Type', 'Authorization', 'X-Client-Id'],
  }));
  app.use(compression());
  app.use(express.json({ limit: '100kb' }));
  app.use(globalRateLimiter);

  app.get('/api/health', async (req, res) => {
    const schedulers = schedulerTracker.getSchedulerStatuses();
    if (!deps.checkHealth) {
      return res.json({ status: 'ok', database: 'not_configured', uptime: process.uptime(), schedulers });
    }
    try {
      const report = await deps.checkHealth();
      res.json({ status: 'ok', ...report, uptime: process.uptime(), schedulers });
    } catch (error: unknown) {
      res.status(500).json({
        status: 'error',
        database: 'disconnected',
        ...(!config.isProduction && { error: getErrorMessage(error) }),
      });
    }
  });

  app.use(createAvailabilityRouter(services, config.bookingWindowDays));
  app.use(createBookingsRouter(services));
  app.use(createAdminBookingsRouter(services, requireAdmin));
  app.use(createSettingsRouter(services, requireAdmin));
  app.use(createScheduleRouter(services, requireAdmin));

  app.use('/api', (req, res) => {
    respondWithCode(req, res, 404, `No route for ${req.method} ${req.originalUrl}`, 'NOT_FOUND');
  });

  app.use((err: unknown, req: Request, res: Response, next: NextFunction) => {
    if (res.headersSent) {
      return next(err);
    }
    if (hasHttpStatus(err) && err.status >= 400 && err.status < 500) {
      const message = err.type === 'entity.parse.failed' ? 'Malformed JSON body' : getErrorMessage(err);
      return respondWithCode(req, res, err.status, message, 'BAD_REQUEST');
    }
    logAndRespond(req, res, 500, 'Internal server error', err, 'INTERNAL_ERROR');
  });

  return app;
}
