import type { Request, Response, NextFunction } from 'express';
import crypto from 'crypto';
import { getErrorCode, getErrorDetail, getErrorProperty } from '../utils/errorUtils';

declare global {
  namespace Express {
    interface Request {
      requestId?: string;
      clientId?: string;
    }
  }
}

export function generateRequestId(): string {
  return crypto.randomBytes(8).toString('hex');
}

export function requestIdMiddleware(req: Request, res: Response, next: NextFunction) {
  req.requestId = generateRequestId();
  res.setHeader('X-Request-Id', req.requestId);
  next();
}

export interface LogContext {
  requestId?: string;
  method?: string;
  path?: string;
  clientId?: string;
  params?: Record<string, unknown>;
  query?: Record<string, unknown>;
  duration?: number;
  statusCode?: number;
  error?: unknown;
  stack?: string;
  extra?: Record<string, unknown>;
  bookingId?: number;
  bookingDate?: string;
  dbErrorCode?: string;
  dbErrorDetail?: string;
  dbErrorTable?: string;
  dbErrorConstraint?: string;
  [key: string]: unknown;
}

const SENSITIVE_KEYS = ['password', 'token', 'secret', 'authorization', 'cookie', 'apikey', 'api_key'];

export function sanitize(obj: Record<string, unknown> | undefined): Record<string, unknown> | undefined {
  if (!obj) return undefined;
  return Object.fromEntries(
    Object.entries(obj).map(([key, value]) => {
      const lower = key.toLowerCase();
      return [key, SENSITIVE_KEYS.some(sk => lower.includes(sk)) ? '[REDACTED]' : value];
    })
  );
}

function describeError(error: unknown): string | undefined {
  if (error === undefined) return undefined;
  if (error instanceof Error) return error.message;
  return typeof error === 'string' ? error : String(error);
}

type LogLevel = 'INFO' | 'WARN' | 'ERROR';

const WRITERS: Record<LogLevel, (line: string) => void> = {
  INFO: line => console.log(line),
  WARN: line => console.warn(line),
  ERROR: line => console.error(line),
};

/** One JSON object per line; params and query are redacted, errors reduced to their message. */
function emit(level: LogLevel, message: string, context?: LogContext): void {
  const entry: Record<string, unknown> = {
    level,
    timestamp: new Date().toISOString(),
    message,
    ...context,
    params: sanitize(context?.params),
    query: sanitize(context?.query),
  };
  if (level !== 'INFO') {
    entry.error = describeError(context?.error);
  }
  if (level === 'ERROR') {
    entry.stack = context?.error instanceof Error ? context.error.stack : context?.stack;
  }
  WRITERS[level](JSON.stringify(entry));
}

export const logger = {
  info: (message: string, context?: LogContext) => emit('INFO', message, context),
  warn: (message: string, context?: LogContext) => emit('WARN', message, context),
  error: (message: string, context?: LogContext) => emit('ERROR', message, context),
};

export function logRequest(req: Request, res: Response, next: NextFunction) {
  const start = Date.now();

  res.on('finish', () => {
    const duration = Date.now() - start;
    const context = {
      requestId: req.requestId,
      method: req.method,
      path: req.path,
      statusCode: res.statusCode,
      duration,
      clientId: req.clientId,
    };
    const message = `${req.method} ${req.path}`;

    if (res.statusCode >= 400) {
      logger.warn(message, context);
    } else {
      logger.info(message, context);
    }
  });

  next();
}

export interface ApiErrorResponse {
  error: string;
  code?: string;
  requestId?: string;
}

export function createErrorResponse(
  req: Request,
  message: string,
  code?: string
): ApiErrorResponse {
  return {
    error: message,
    code,
    requestId: req.requestId,
  };
}

/**
 * Logs a failed request with any database error fields attached and sends the JSON error body.
 */
export function logAndRespond(
  req: Request,
  res: Response,
  statusCode: number,
  message: string,
  error?: unknown,
  code?: string
) {
  const table = getErrorProperty(error, 'table');
  const constraint = getErrorProperty(error, 'constraint');

  logger.error(`[API Error] ${message}`, {
    requestId: req.requestId,
    method: req.method,
    path: req.path,
    params: req.params,
    query: req.query,
    error: error instanceof Error ? error : new Error(String(error)),
    dbErrorCode: getErrorCode(error),
    dbErrorDetail: getErrorDetail(error),
    dbErrorTable: typeof table === 'string' ? table : undefined,
    dbErrorConstraint: typeof constraint === 'string' ? constraint : undefined,
    clientId: req.clientId,
  });

  res.status(statusCode).json(createErrorResponse(req, message, code));
}

/**
 * Sends a business-rule rejection (409, 422, 429...) without logging it as a server error.
 */
export function respondWithCode(
  req: Request,
  res: Response,
  statusCode: number,
  message: string,
  code: string,
  extra?: Record<string, unknown>
) {
  res.status(statusCode).json({ ...createErrorResponse(req, message, code), ...extra });
}
