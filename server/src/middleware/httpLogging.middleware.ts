/**
 * HTTP Logging Middleware
 * One log line per request and one per response, at a level
 * derived from the status code. Uses req.log so lines carry traceId.
 */

import type { Request, Response, NextFunction } from 'express';

export function httpLoggingMiddleware(
  req: Request,
  res: Response,
  next: NextFunction
): void {
  const startTime = Date.now();

  req.log.info({
    event: 'http_request',
    method: req.method,
    path: req.path,
  }, 'HTTP request');

  res.on('finish', () => {
    const level = res.statusCode >= 500 ? 'error'
      : res.statusCode >= 400 ? 'warn'
        : 'info';

    req.log[level]({
      event: 'http_response',
      method: req.method,
      path: req.path,
      statusCode: res.statusCode,
      durationMs: Date.now() - startTime,
    }, 'HTTP response');
  });

  next();
}
