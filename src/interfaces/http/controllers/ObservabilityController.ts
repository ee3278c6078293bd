/**
 * Observability Controller
 * Layer: Interfaces (HTTP)
 *
 * `metrics` serves the Prometheus scrape. `logs` and `trace` exist so a log
 * pipeline or tracing setup has something to pick up on demand; the trace id
 * is fabricated and no spans are exported anywhere.
 */
import { container } from '@core/container';
import type { Logger } from '@core/logger';
import { TOKENS } from '@core/types';
import type { HttpMetrics } from '@infrastructure/metrics/HttpMetrics';
import { nowIso, sleep } from '@shared/async';
import { TRACE_SPAN_DELAYS_MS } from '@shared/constants';
import type { Request, Response } from 'express';

export class ObservabilityController {
  private metrics: HttpMetrics;
  private logger: Logger;

  constructor() {
    this.metrics = container.resolve<HttpMetrics>(TOKENS.HttpMetrics);
    this.logger = container.resolve<Logger>(TOKENS.Logger);
  }

  scrape = async (_req: Request, res: Response): Promise<void> => {
    const body = await this.metrics.snapshot();
    res.status(200).type(this.metrics.contentType).send(body);
  };

  logs = (_req: Request, res: Response): void => {
    this.logger.info('Info log generated via API');
    this.logger.warn('Warning log generated via API');
    this.logger.error('Error log generated via API');

    res.status(200).json({
      message: 'Test logs generated',
      levels: ['info', 'warning', 'error'],
      timestamp: nowIso(),
    });
  };

  trace = async (_req: Request, res: Response): Promise<void> => {
    const traceId = `trace-${Date.now()}`;
    const log = this.logger.child({ traceId });

    for (const delayMs of TRACE_SPAN_DELAYS_MS) {
      await sleep(delayMs);
      log.debug({ delayMs }, 'Simulated span finished');
    }

    res.status(200).json({
      message: 'Trace endpoint completed',
      trace_id: traceId,
      span_count: TRACE_SPAN_DELAYS_MS.length + 1,
      timestamp: nowIso(),
    });
  };
}
