import { Router } from 'express';
import type { RateLimiter } from '../../middleware/rate-limiter.js';
import type { AuthService } from '../../services/auth-service.js';
import { readOptionalString } from '../../agents/args.js';
import { requestBody } from '../body.js';
import { asyncRoute, ok } from '../respond.js';

export function createAuthRoutes(auth: AuthService, limiter: RateLimiter): Router {
  const router = Router();
  router.use(limiter.middleware());

  router.post(
    '/sign-in',
    asyncRoute(async (req, res) => {
      const body = requestBody(req);
      const session = await auth.signIn(readOptionalString(body, 'email'), readOptionalString(body, 'password'));
      ok(res, session, 'Signed in');
    })
  );

  router.post(
    '/password-reset',
    asyncRoute(async (req, res) => {
      await auth.sendPasswordReset(readOptionalString(requestBody(req), 'email'));
      ok(res, null, 'Password reset email sent');
    })
  );

  return router;
}
