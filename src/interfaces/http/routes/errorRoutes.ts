/**
 * Error Injection Routes
 * Layer: Interfaces (HTTP)
 *
 *   GET /error/500      →  always 500
 *   GET /error/404      →  always 404
 *   GET /error/timeout  →  waits 30 s before answering
 *
 * The timeout route watches the response for `close`: if the client (or an
 * ingress timeout) drops the connection first, the wait is abandoned and no
 * response is attempted.
 */
import { logger } from '@core/logger';
import { isAbortError, sleep } from '@shared/async';
import { TIMEOUT_SIMULATION_MS } from '@shared/constants';
import { AppError } from '@shared/errors/AppError';
import { Router, type Response } from 'express';

const router = Router();

router.get('/error/500', () => {
  throw new AppError('Internal Server Error - Test endpoint', 500);
});

router.get('/error/404', () => {
  throw new AppError('Not Found - Test endpoint', 404);
});

/** Aborts when the connection closes before the response has been written. */
function disconnectSignal(res: Response): AbortSignal {
  const controller = new AbortController();
  res.once('close', () => {
    if (!res.writableFinished) controller.abort();
  });
  return controller.signal;
}

router.get('/error/timeout', async (_req, res) => {
  const signal = disconnectSignal(res);
  try {
    await sleep(TIMEOUT_SIMULATION_MS, signal);
  } catch (err) {
    if (!isAbortError(err)) throw err;
    logger.debug('Client disconnected during timeout simulation');
    return;
  }

  res.status(200).json({ message: 'This should timeout' });
});

export { router as errorRoutes };
