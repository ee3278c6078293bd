/**
 * HTTP Request Metrics
 * Layer: Infrastructure
 *
 * Owns the three request aggregates and registers them on the injected
 * prom-client Registry:
 *
 *   http_requests_total{method,endpoint,status_code}  counter
 *   http_request_duration_seconds                      histogram (one global distribution)
 *   active_connections                                 gauge (in-flight requests)
 *
 * The names are what the cluster's scrape config and dashboards already query,
 * so treat them as a wire contract. Every mutation is a synchronous call on
 * the event loop; no cross-metric consistency is promised, a scrape can see
 * the counter bumped before the histogram.
 */
import { TOKENS } from '@core/types';
import { Counter, Gauge, Histogram, Registry } from 'prom-client';
import { inject, injectable } from 'tsyringe';

type RequestLabel = 'method' | 'endpoint' | 'status_code';

/** Latency boundaries (seconds) the existing dashboards read by `le`. */
export const DURATION_BUCKETS = [0.005, 0.01, 0.025, 0.05, 0.075, 0.1, 0.25, 0.5, 0.75, 1, 2.5, 5, 7.5, 10];

export interface RequestOutcome {
  method: string;
  endpoint: string;
  statusCode: number;
  durationSeconds: number;
}

@injectable()
export class HttpMetrics {
  private readonly requests: Counter<RequestLabel>;
  private readonly duration: Histogram;
  private readonly inFlight: Gauge;

  constructor(@inject(TOKENS.MetricsRegistry) private readonly registry: Registry) {
    this.requests = new Counter({
      name: 'http_requests_total',
      help: 'Total HTTP requests',
      labelNames: ['method', 'endpoint', 'status_code'],
      registers: [registry],
    });
    this.duration = new Histogram({
      name: 'http_request_duration_seconds',
      help: 'HTTP request duration',
      buckets: DURATION_BUCKETS,
      registers: [registry],
    });
    this.inFlight = new Gauge({
      name: 'active_connections',
      help: 'Number of active connections',
      registers: [registry],
    });
  }

  get contentType(): string {
    return this.registry.contentType;
  }

  requestStarted(): void {
    this.inFlight.inc();
  }

  requestEnded(): void {
    this.inFlight.dec();
  }

  recordCompletion(outcome: RequestOutcome): void {
    this.requests.inc({
      method: outcome.method,
      endpoint: outcome.endpoint,
      status_code: String(outcome.statusCode),
    });
    this.duration.observe(outcome.durationSeconds);
  }

  /** Exposition text for every metric on the registry, as of this call. */
  snapshot(): Promise<string> {
    return this.registry.metrics();
  }
}
