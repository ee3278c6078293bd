import type { UserSeed } from '@domain/entities/User';

/** The directory the service boots with. There is no way to add users at runtime. */
export const SEED_USERS: readonly UserSeed[] = [
  { username: 'testuser', email: 'test@example.com', password: 'testpassword' },
];

/** TTL applied by `TokenService.issueToken` when the caller passes none. */
export const DEFAULT_TOKEN_TTL_MINUTES = 15;

export const TOKEN_TYPE = 'bearer';

/** Blue/green colour swatches served by the deployment routes. */
export const DEPLOYMENT_COLORS = {
  blue: '#0066CC',
  green: '#00CC66',
} as const;

export type DeploymentColor = keyof typeof DEPLOYMENT_COLORS;

/** Iterations of the sum-of-squares busy loop behind /load-test/cpu. */
export const CPU_TASK_ITERATIONS = 1_000_000;

export const ASYNC_TASK_DELAY_MS = 100;

/** Fake span durations for /observability/trace: a "database call" then an "API call". */
export const TRACE_SPAN_DELAYS_MS = [50, 20] as const;

/** How long /error/timeout waits before answering, if the client is still there. */
export const TIMEOUT_SIMULATION_MS = 30_000;

/** Probe and scrape traffic that the request logger does not record. */
export const QUIET_PATHS: ReadonlySet<string> = new Set(['/health', '/ping', '/metrics']);
