import { timingSafeEqual } from 'node:crypto';
import { Request, Response, NextFunction } from 'express';
import type { AuthService } from '../services/auth-service.js';
import type { AuthenticatedRequest, Engineer } from '../types/index.js';
import { AuthenticationError } from '../utils/errors.js';

export function bearerToken(req: Request): string | null {
  const header = req.get('Authorization');
  if (!header) {
    return null;
  }
  const [scheme, token] = header.split(' ');
  return scheme?.toLowerCase() === 'bearer' && token ? token.trim() : null;
}

/**
 * Resolve `Authorization: Bearer <idToken>` to an engineer.
 */
export function requireEngineer(auth: AuthService) {
  return (req: AuthenticatedRequest, res: Response, next: NextFunction): void => {
    const token = bearerToken(req);
    if (!token) {
      next(new AuthenticationError('Missing bearer token'));
      return;
    }

    auth
      .authenticate(token)
      .then((engineer) => {
        req.engineer = engineer;
        next();
      })
      .catch(next);
  };
}

/**
 * The engineer set by `requireEngineer`.
 */
export function currentEngineer(req: AuthenticatedRequest): Engineer {
  if (!req.engineer) {
    throw new AuthenticationError();
  }
  return req.engineer;
}

function sameKey(provided: string, expected: string): boolean {
  const a = Buffer.from(provided);
  const b = Buffer.from(expected);
  return a.length === b.length && timingSafeEqual(a, b);
}

/**
 * Customer-side intake calls carry a shared key in `X-Intake-Key`. Without a
 * configured key every intake call is refused.
 */
export function requireIntakeKey(expectedKey?: string) {
  return (req: Request, res: Response, next: NextFunction): void => {
    const provided = req.get('X-Intake-Key');
    if (!expectedKey || !provided || !sameKey(provided, expectedKey)) {
      next(new AuthenticationError('Invalid intake key'));
      return;
    }
    next();
  };
}
