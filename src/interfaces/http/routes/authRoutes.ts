/**
 * Auth Routes
 *
 *   POST /auth/login      →  controller.login            (public)
 *   GET  /auth/protected  →  controller.protectedResource (bearer token)
 */
import { AuthController } from '@interfaces/http/controllers/AuthController';
import { requireAuth } from '@interfaces/http/middleware/bearerAuth';
import { validateBody } from '@interfaces/http/middleware/validation';
import { loginSchema } from '@interfaces/http/schemas/authSchemas';
import { Router } from 'express';

const router = Router();
const controller = new AuthController();

router.post('/auth/login', validateBody(loginSchema), controller.login);
router.get('/auth/protected', ...requireAuth(), controller.protectedResource);

export { router as authRoutes };
