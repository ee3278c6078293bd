/**
 * HTTP Request Logger Middleware
 * Layer: Interfaces (HTTP)
 *
 * pino-http on the shared logger, so request lines match the rest of the
 * output. Probe and scrape traffic (/health, /ping, /metrics) arrives every
 * few seconds from the kubelet and Prometheus and is left out. Failed
 * requests are raised to warn (4xx) or error (5xx).
 */
import { logger } from '@core/logger';
import { QUIET_PATHS } from '@shared/constants';
import pinoHttp from 'pino-http';

export const requestLogger = pinoHttp({
  logger,
  autoLogging: {
    ignore: (req) => QUIET_PATHS.has((req.url ?? '').split('?')[0] ?? ''),
  },
  customLogLevel: (_req, res, err) => {
    if (err || res.statusCode >= 500) return 'error';
    if (res.statusCode >= 400) return 'warn';
    return 'info';
  },
});
