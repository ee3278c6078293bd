/**
 * Express Application Factory
 * Layer: Interfaces (HTTP)
 * Pattern: Factory Function
 *
 * Returns a fresh Express app each call so integration tests can build their
 * own. Middleware order is an assembly line:
 *
 *   1. requestMetrics — in-flight gauge, latency, completion counter (first,
 *                       so nothing escapes measurement).
 *   2. helmet()       — security headers.
 *   3. cors()         — any origin; the service is called from test pages.
 *   4. compression()  — gzip for larger bodies (the /metrics scrape).
 *   5. express.json() — parses JSON bodies into req.body.
 *   6. requestLogger  — one log line per request, probes excluded.
 *   7. Routes.
 *   8. notFound       — JSON 404 for anything unmatched.
 *   9. errorHandler   — MUST be last.
 *
 * `@core/container` is imported first so the DI registrations run before
 * any router resolves a service at module load.
 */
import { container } from '@core/container';
import { TOKENS } from '@core/types';
import type { HttpMetrics } from '@infrastructure/metrics/HttpMetrics';
import { errorHandler } from '@interfaces/http/middleware/errorHandler';
import { notFound } from '@interfaces/http/middleware/notFound';
import { requestLogger } from '@interfaces/http/middleware/requestLogger';
import { createRequestMetrics } from '@interfaces/http/middleware/requestMetrics';
import { authRoutes } from '@interfaces/http/routes/authRoutes';
import { deploymentRoutes } from '@interfaces/http/routes/deploymentRoutes';
import { errorRoutes } from '@interfaces/http/routes/errorRoutes';
import { healthRoutes } from '@interfaces/http/routes/healthRoutes';
import { loadTestRoutes } from '@interfaces/http/routes/loadTestRoutes';
import { observabilityRoutes } from '@interfaces/http/routes/observabilityRoutes';
import compression from 'compression';
import cors from 'cors';
import express from 'express';
import helmet from 'helmet';

export function createApp(): express.Express {
  const app = express();

  // Request metrics (must be first)
  app.use(createRequestMetrics(container.resolve<HttpMetrics>(TOKENS.HttpMetrics)));

  // Security & compression
  app.use(helmet());
  app.use(cors());
  app.use(compression());

  // Body parsing
  app.use(express.json());

  // Request logging
  app.use(requestLogger);

  // Routes — every router declares full paths and is mounted at the root
  app.use(healthRoutes);
  app.use(authRoutes);
  app.use(deploymentRoutes);
  app.use(loadTestRoutes);
  app.use(observabilityRoutes);
  app.use(errorRoutes);

  app.use(notFound);

  // Global error handler (must be registered last)
  app.use(errorHandler);

  return app;
}
