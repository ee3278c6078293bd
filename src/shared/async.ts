import { setTimeout as delay } from 'node:timers/promises';

/**
 * Resolves after `ms`, or rejects with an `AbortError` as soon as `signal`
 * fires. The pending timer is cleared on abort, so an abandoned wait leaves
 * nothing on the event loop.
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return delay(ms, undefined, { signal });
}

export function isAbortError(err: unknown): boolean {
  return err instanceof Error && err.name === 'AbortError';
}

/** Milliseconds elapsed since `start` (a `process.hrtime.bigint()` reading). */
export function elapsedMs(start: bigint): number {
  return Number(process.hrtime.bigint() - start) / 1e6;
}

export function nowIso(): string {
  return new Date().toISOString();
}
