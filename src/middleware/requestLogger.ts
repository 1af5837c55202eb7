import { randomUUID } from 'node:crypto';

import { AuthConfig } from '../config';
import { logger } from '../utils/logger';

import type { LogContext, Logger } from '../utils/logger';
import type { NextFunction, Request, Response } from 'express';

// Extend Express Request interface to include logging properties
declare global {
  // eslint-disable-next-line @typescript-eslint/no-namespace
  namespace Express {
    interface Request {
      correlationId: string;
      log: Logger;
      startTime: number;
    }
  }
}

/**
 * Mask sensitive header values for safe logging.
 */
function maskSensitiveValue(value: string): string {
  if (value.startsWith(AuthConfig.tokenPrefix) && value.length > 6) {
    return `${AuthConfig.tokenPrefix}****${value.slice(-4)}`;
  }
  return '****';
}

/**
 * Extract safe headers for logging (masks sensitive values).
 */
function getSafeHeaders(req: Request): LogContext {
  const headers: LogContext = {};

  const contentType = req.get('content-type');
  if (contentType) headers.contentType = contentType;

  const contentLength = req.get('content-length');
  if (contentLength) headers.contentLength = contentLength;

  const userAgent = req.get('user-agent');
  if (userAgent) headers.userAgent = userAgent;

  // Log presence of the token but never the value
  const token = req.get(AuthConfig.headerName);
  if (token) {
    headers.hasApiKey = true;
    headers.apiKeyPrefix = maskSensitiveValue(token);
  }

  return headers;
}

/**
 * Request logging middleware.
 * Generates correlation ID, attaches a request-scoped logger, logs request/response.
 */
export function requestLogger(req: Request, res: Response, next: NextFunction): void {
  req.correlationId = `req-${randomUUID()}`;
  req.startTime = Date.now();
  req.log = logger.child({ correlationId: req.correlationId });

  req.log.info('Incoming request', {
    headers: getSafeHeaders(req),
    ip: req.ip ?? req.socket.remoteAddress,
    method: req.method,
    path: req.path,
    query: Object.keys(req.query).length > 0 ? req.query : undefined,
  });

  res.on('finish', () => {
    const durationMs = Date.now() - req.startTime;
    const { statusCode } = res;

    let level: 'error' | 'info' | 'warn' = 'info';
    if (statusCode >= 500) level = 'error';
    else if (statusCode >= 400) level = 'warn';

    const context = {
      contentLength: res.get('content-length'),
      durationMs,
      method: req.method,
      path: req.path,
      statusCode,
    };
    if (level === 'error') {
      req.log.error('Request completed', undefined, context);
    } else {
      req.log[level]('Request completed', context);
    }
  });

  next();
}
