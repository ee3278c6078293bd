/**
 * Health & Info Routes
 * Layer: Interfaces (HTTP)
 *
 *   GET /         →  service banner
 *   GET /ping     →  { message: 'pong' }          (liveness probe)
 *   GET /health   →  status + host facts          (readiness probe)
 *   GET /version  →  version and deployment colour
 *
 * None of these touch a dependency beyond the host itself: the process is
 * healthy if it can answer. Kubernetes hits /ping and /health every few
 * seconds, so the request logger skips them.
 */
import type { AppInfo } from '@core/config';
import { container } from '@core/container';
import { TOKENS } from '@core/types';
import type { ISystemStats } from '@domain/interfaces/ISystemStats';
import { nowIso } from '@shared/async';
import { Router } from 'express';

const router = Router();
const app = container.resolve<AppInfo>(TOKENS.AppInfo);
const stats = container.resolve<ISystemStats>(TOKENS.SystemStats);

router.get('/', (_req, res) => {
  res.status(200).json({
    message: 'Kubernetes Test Application',
    version: app.version,
    environment: app.environment,
    deployment_version: app.deploymentVersion,
    timestamp: nowIso(),
  });
});

router.get('/ping', (_req, res) => {
  res.status(200).json({ message: 'pong', timestamp: nowIso() });
});

router.get('/health', async (_req, res) => {
  const host = await stats.hostInfo();

  res.status(200).json({
    status: 'healthy',
    timestamp: nowIso(),
    version: app.version,
    environment: app.environment,
    deployment_version: app.deploymentVersion,
    system_info: {
      hostname: host.hostname,
      platform: host.platform,
      node_version: host.nodeVersion,
      cpu_count: host.cpuCount,
      memory_total: host.memoryTotal,
      memory_available: host.memoryAvailable,
      disk_usage: host.diskUsage,
    },
  });
});

router.get('/version', (_req, res) => {
  res.status(200).json({
    version: app.version,
    environment: app.environment,
    deployment_version: app.deploymentVersion,
    build_timestamp: nowIso(),
  });
});

export { router as healthRoutes };
