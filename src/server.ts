/**
 * Server Entry Point — Listen & Graceful Shutdown
 * Layer: Entry Point (top of the dependency tree)
 *
 * One process per pod: Kubernetes scales replicas, and a single process keeps
 * the Prometheus counters of a replica in one registry.
 *
 * On SIGTERM (pod termination) or SIGINT the server stops accepting
 * connections and waits for in-flight requests. Anything still open after the
 * grace period (a client parked on /error/timeout, say) is cut off and the
 * process exits with code 1.
 */
import { config } from '@core/config';
import { logger } from '@core/logger';
import { createApp } from '@interfaces/http/app';

const app = createApp();

const server = app.listen(config.port, config.host, () => {
  logger.info(
    {
      pid: process.pid,
      host: config.host,
      port: config.port,
      environment: config.app.environment,
      deployment: config.app.deploymentVersion,
    },
    `Listening on ${config.host}:${config.port}`,
  );
});

let shuttingDown = false;

const shutdown = (signal: string): void => {
  if (shuttingDown) return;
  shuttingDown = true;
  logger.info({ pid: process.pid, signal }, 'Graceful shutdown initiated');

  const forceExit = setTimeout(() => {
    logger.warn({ timeoutMs: config.shutdown.timeoutMs }, 'Shutdown timed out — closing open connections');
    server.closeAllConnections();
    process.exit(1);
  }, config.shutdown.timeoutMs);
  forceExit.unref();

  server.close((err) => {
    if (err) {
      logger.error({ err }, 'Error while closing HTTP server');
      process.exit(1);
    }
    process.exit(0);
  });
  server.closeIdleConnections();
};

process.on('SIGTERM', () => shutdown('SIGTERM'));
process.on('SIGINT', () => shutdown('SIGINT'));
