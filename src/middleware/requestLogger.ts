import { logger } from '../utils/logger';

import type { NextFunction, Request, Response } from 'express';
import type { LogContext, Logger } from '../utils/logger';

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
 * Generate a unique correlation ID for request tracing.
 */
export function generateCorrelationId(): string {
  const timestamp = Date.now().toString(36);
  const random = Math.random().toString(36).substring(2, 8);
  return `req-${timestamp}-${random}`;
}

function getSafeHeaders(req: Request): LogContext {
  const headers: LogContext = {};

  if (req.headers['content-type']) {
    headers.contentType = req.headers['content-type'];
  }
  if (req.headers['content-length']) {
    headers.contentLength = req.headers['content-length'];
  }
  if (req.headers['user-agent']) {
    headers.userAgent = req.headers['user-agent'];
  }

  return headers;
}

/**
 * Request logging middleware.
 * Generates correlation ID, attaches logger to request, logs request/response.
 */
export function requestLogger(req: Request, res: Response, next: NextFunction): void {
  req.correlationId = generateCorrelationId();
  req.startTime = Date.now();
  req.log = logger.child(req.correlationId);

  req.log.info('Incoming request', {
    headers: getSafeHeaders(req),
    ip: req.ip ?? req.socket.remoteAddress,
    method: req.method,
    path: req.path,
  });
  req.log.debugLog('REQUEST', 'Raw request body', { body: req.body });

  res.on('finish', () => {
    const statusCode = res.statusCode;
    const logLevel = statusCode >= 500 ? 'error' : statusCode >= 400 ? 'warn' : 'info';

    req.log[logLevel]('Request completed', {
      durationMs: Date.now() - req.startTime,
      method: req.method,
      path: req.path,
      statusCode,
    });
  });

  next();
}
