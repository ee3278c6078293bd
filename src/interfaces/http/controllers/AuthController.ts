/**
 * Auth Controller — HTTP Boundary for Login and the Protected Resource
 * Layer: Interfaces (HTTP)
 *
 * Thin on purpose: the body is already validated, the bearer guard has
 * already resolved `req.user`. Arrow properties keep `this` bound when
 * Express calls them.
 */
import type { AuthService } from '@application/services/AuthService';
import { container } from '@core/container';
import { TOKENS } from '@core/types';
import { nowIso } from '@shared/async';
import { UnauthorizedError } from '@shared/errors/AppError';
import type { LoginBody } from '@interfaces/http/schemas/authSchemas';
import type { Request, Response } from 'express';

export class AuthController {
  private service: AuthService;

  constructor() {
    this.service = container.resolve<AuthService>(TOKENS.AuthService);
  }

  login = async (req: Request, res: Response): Promise<void> => {
    // Parsed and replaced by validateBody(loginSchema) upstream.
    const { username, password }: LoginBody = req.body;
    const token = await this.service.login(username, password);
    res.status(200).json(token);
  };

  protectedResource = (req: Request, res: Response): void => {
    const user = req.user;
    if (!user) throw new UnauthorizedError();

    res.status(200).json({
      message: `Hello ${user.username}! This is a protected endpoint.`,
      user,
      timestamp: nowIso(),
    });
  };
}
