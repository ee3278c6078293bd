/**
 * Request Metrics Middleware
 * Layer: Interfaces (HTTP)
 *
 * MUST be the first middleware so every request, including the ones helmet or
 * the body parser reject, passes through it.
 *
 * On entry the in-flight gauge goes up and a monotonic start time is taken.
 * The gauge comes back down exactly once, on whichever of these happens
 * first:
 *
 *   finish — the response was handed to the socket. Counter and histogram are
 *            recorded with the final status code.
 *   close  — the connection went away before the response finished (client
 *            abort). Only the gauge is released.
 *
 * Recording is fail-open: an exception from prom-client is logged and the
 * response goes out unchanged.
 */
import { logger } from '@core/logger';
import type { HttpMetrics } from '@infrastructure/metrics/HttpMetrics';
import type { NextFunction, Request, RequestHandler, Response } from 'express';

/**
 * The matched route pattern (`/auth/protected`), so ids in a path never
 * multiply label values. Requests that matched no route fall back to the raw
 * path.
 */
export function routeTemplate(req: Request): string {
  const route: unknown = req.route;
  if (typeof route === 'object' && route !== null && 'path' in route && typeof route.path === 'string') {
    return `${req.baseUrl}${route.path}`;
  }
  return req.originalUrl.split('?')[0] || '/';
}

function failOpen(action: () => void): void {
  try {
    action();
  } catch (err) {
    logger.warn({ err }, 'Failed to record request metrics');
  }
}

export function createRequestMetrics(metrics: HttpMetrics): RequestHandler {
  return (req: Request, res: Response, next: NextFunction): void => {
    const start = process.hrtime.bigint();
    let settled = false;

    failOpen(() => metrics.requestStarted());

    const onFinish = (): void => {
      if (settled) return;
      settled = true;
      failOpen(() =>
        metrics.recordCompletion({
          method: req.method,
          endpoint: routeTemplate(req),
          statusCode: res.statusCode,
          durationSeconds: Number(process.hrtime.bigint() - start) / 1e9,
        }),
      );
      failOpen(() => metrics.requestEnded());
    };

    const onClose = (): void => {
      if (settled) return;
      settled = true;
      failOpen(() => metrics.requestEnded());
    };

    res.once('finish', onFinish);
    res.once('close', onClose);
    next();
  };
}
