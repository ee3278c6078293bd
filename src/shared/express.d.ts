/**
 * Express Request Augmentation
 * Layer: Shared (type declarations)
 *
 * The bearer guard runs in two stages: extraction stores the raw token in
 * `bearerToken`, verification resolves it to `user`. Protected handlers read
 * `user`; nothing else should touch these fields.
 */
import type { PublicUser } from '@domain/entities/User';

declare global {
  namespace Express {
    interface Request {
      /** Set by the extraction stage of the bearer guard. */
      bearerToken?: string;
      /** Set by the verification stage of the bearer guard. */
      user?: PublicUser;
    }
  }
}

export {};
