/**
 * Observability Routes
 *
 *   GET /metrics               →  Prometheus exposition text
 *   GET /observability/logs    →  writes one info, one warn and one error line
 *   GET /observability/trace   →  two short waits and a made-up trace id
 */
import { ObservabilityController } from '@interfaces/http/controllers/ObservabilityController';
import { Router } from 'express';

const router = Router();
const controller = new ObservabilityController();

router.get('/metrics', controller.scrape);
router.get('/observability/logs', controller.logs);
router.get('/observability/trace', controller.trace);

export { router as observabilityRoutes };
