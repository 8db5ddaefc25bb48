/**
 * HTTP request logging middleware
 * Logs all incoming requests and outgoing responses with performance metrics
 */

import type { Request, Response, NextFunction } from 'express';
import { logger } from '../utils/logger.js';

/**
 * Request id for a response, set by requestLogger
 */
export function getRequestId(res: Response): string {
  const requestId: unknown = res.locals.requestId;
  return typeof requestId === 'string' ? requestId : 'unknown';
}

/**
 * Request logger middleware
 * Logs request details and response status with duration
 */
export function requestLogger(req: Request, res: Response, next: NextFunction) {
  const startTime = Date.now();
  const requestId = generateRequestId();

  // Expose the request id for tracing
  res.locals.requestId = requestId;
  res.setHeader('X-Request-Id', requestId);

  logger.debug({
    category: 'http',
    event: 'request_received',
    requestId,
    method: req.method,
    path: req.path,
    ip: req.ip,
    userAgent: req.get('user-agent'),
  }, `${req.method} ${req.path}`);

  // Log response when finished
  res.on('finish', () => {
    const duration = Date.now() - startTime;
    const level = getLogLevel(res.statusCode);

    logger[level]({
      category: 'http',
      event: 'request_completed',
      requestId,
      method: req.method,
      path: req.path,
      statusCode: res.statusCode,
      duration_ms: duration,
      contentLength: res.get('content-length'),
    }, `${req.method} ${req.path} ${res.statusCode} (${duration}ms)`);
  });

  next();
}

/**
 * Determine log level based on HTTP status code
 */
function getLogLevel(statusCode: number): 'info' | 'warn' | 'error' {
  if (statusCode >= 500) {
    return 'error';
  }
  if (statusCode >= 400) {
    return 'warn';
  }
  return 'info';
}

/**
 * Generate a unique request ID for tracing
 */
function generateRequestId(): string {
  return `req_${Date.now()}_${Math.random().toString(36).slice(2, 11)}`;
}

/**
 * Error logging middleware
 * Logs the error and passes it on to the error handler
 */
export function errorLogger(
  err: Error,
  req: Request,
  res: Response,
  next: NextFunction
) {
  logger.error({
    category: 'http',
    event: 'unhandled_error',
    requestId: getRequestId(res),
    method: req.method,
    path: req.path,
    error: {
      message: err.message,
      stack: err.stack,
      name: err.name,
    },
  }, `Unhandled error: ${err.message}`);

  next(err);
}

/**
 * Log slow requests (> threshold)
 * Use as middleware after requestLogger
 */
export function slowRequestLogger(thresholdMs: number = 1000) {
  return (req: Request, res: Response, next: NextFunction) => {
    const startTime = Date.now();

    res.on('finish', () => {
      const duration = Date.now() - startTime;
      if (duration > thresholdMs) {
        logger.warn({
          category: 'performance',
          event: 'slow_request',
          method: req.method,
          path: req.path,
          duration_ms: duration,
          threshold_ms: thresholdMs,
        }, `Slow request: ${req.method} ${req.path} (${duration}ms)`);
      }
    });

    next();
  };
}
