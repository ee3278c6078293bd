/**
 * Blue/Green Deployment Routes
 *
 *   GET /deployment/version  →  which colour this replica belongs to
 *   GET /deployment/blue     →  fixed blue payload
 *   GET /deployment/green    →  fixed green payload
 *
 * The colour routes answer the same on every replica; an ingress rule sends
 * each one to the matching Service, so the payload shows where traffic went.
 */
import type { AppInfo } from '@core/config';
import { container } from '@core/container';
import { TOKENS } from '@core/types';
import { nowIso } from '@shared/async';
import { DEPLOYMENT_COLORS, type DeploymentColor } from '@shared/constants';
import { Router, type Request, type Response } from 'express';

const router = Router();
const app = container.resolve<AppInfo>(TOKENS.AppInfo);

router.get('/deployment/version', (_req, res) => {
  res.status(200).json({
    deployment_version: app.deploymentVersion,
    app_version: app.version,
    environment: app.environment,
    timestamp: nowIso(),
  });
});

function colorHandler(color: DeploymentColor) {
  return (_req: Request, res: Response): void => {
    res.status(200).json({
      deployment: color,
      message: `This is the ${color.toUpperCase()} deployment`,
      version: app.version,
      color: DEPLOYMENT_COLORS[color],
      timestamp: nowIso(),
    });
  };
}

router.get('/deployment/blue', colorHandler('blue'));
router.get('/deployment/green', colorHandler('green'));

export { router as deploymentRoutes };
