/**
 * Load Test Controller
 * Layer: Interfaces (HTTP)
 *
 * Endpoints for watching a load balancer spread traffic and an autoscaler
 * react to it. `cpu` deliberately blocks the event loop for its busy loop;
 * `async` only suspends its own request.
 */
import { container } from '@core/container';
import { TOKENS } from '@core/types';
import type { ISystemStats } from '@domain/interfaces/ISystemStats';
import { elapsedMs, nowIso, sleep } from '@shared/async';
import { ASYNC_TASK_DELAY_MS, CPU_TASK_ITERATIONS } from '@shared/constants';
import type { Request, Response } from 'express';

/** Sum of i² for i in [0, iterations). Exceeds 2^53 at the default size, so it is approximate. */
export function sumOfSquares(iterations: number): number {
  let result = 0;
  for (let i = 0; i < iterations; i++) {
    result += i * i;
  }
  return result;
}

export class LoadTestController {
  private stats: ISystemStats;

  constructor() {
    this.stats = container.resolve<ISystemStats>(TOKENS.SystemStats);
  }

  info = (_req: Request, res: Response): void => {
    res.status(200).json({
      instance_id: this.stats.instanceId(),
      hostname: this.stats.hostname(),
      cpu_percent: this.stats.cpuPercent(),
      memory_percent: this.stats.memory().percent,
      timestamp: nowIso(),
    });
  };

  cpu = (_req: Request, res: Response): void => {
    const start = process.hrtime.bigint();
    const result = sumOfSquares(CPU_TASK_ITERATIONS);

    res.status(200).json({
      message: 'CPU intensive task completed',
      duration: elapsedMs(start) / 1000,
      result,
      instance_id: this.stats.instanceId(),
      timestamp: nowIso(),
    });
  };

  memory = (_req: Request, res: Response): void => {
    res.status(200).json({
      memory: this.stats.memory(),
      instance_id: this.stats.instanceId(),
      timestamp: nowIso(),
    });
  };

  asyncTask = async (_req: Request, res: Response): Promise<void> => {
    const start = process.hrtime.bigint();
    await sleep(ASYNC_TASK_DELAY_MS);

    res.status(200).json({
      message: 'Async task completed',
      duration: elapsedMs(start) / 1000,
      instance_id: this.stats.instanceId(),
      timestamp: nowIso(),
    });
  };
}
