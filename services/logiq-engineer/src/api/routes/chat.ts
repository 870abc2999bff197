import { Router } from 'express';
import { v4 as uuidv4 } from 'uuid';
import { readOptionalString } from '../../agents/args.js';
import { currentEngineer } from '../../middleware/auth.js';
import type { RateLimiter } from '../../middleware/rate-limiter.js';
import { MODEL_UPSTREAM, type ErrorHandler } from '../../monitoring/error-handler.js';
import type { AgentManager } from '../../services/agent-manager.js';
import { requestBody, routeParam } from '../body.js';
import { asyncRoute, ok } from '../respond.js';

export function createChatRoutes(agentManager: AgentManager, errorHandler: ErrorHandler, limiter: RateLimiter): Router {
  const router = Router();

  /**
   * Send one message to the assistant. A new session id is picked here so a
   * fallback reply can carry it too. While the model's circuit is open the
   * fallback reply is returned without calling it.
   */
  router.post(
    '/',
    limiter.middleware(),
    asyncRoute(async (req, res) => {
      const { engineerId } = currentEngineer(req);
      const body = requestBody(req);
      const sessionId = readOptionalString(body, 'session_id') || uuidv4();
      res.locals.sessionId = sessionId;

      if (errorHandler.isCircuitOpen(MODEL_UPSTREAM)) {
        res.json(errorHandler.chatFallback(sessionId));
        return;
      }

      const response = await agentManager.processMessage(engineerId, readOptionalString(body, 'message'), sessionId);
      errorHandler.recordUpstreamSuccess(MODEL_UPSTREAM);
      ok(res, response);
    })
  );

  router.get(
    '/:sessionId',
    asyncRoute(async (req, res) => {
      const transcript = await agentManager.getTranscript(currentEngineer(req).engineerId, routeParam(req, 'sessionId'));
      ok(res, transcript);
    })
  );

  router.delete(
    '/:sessionId',
    asyncRoute(async (req, res) => {
      const sessionId = routeParam(req, 'sessionId');
      const removed = await agentManager.endSession(currentEngineer(req).engineerId, sessionId);
      ok(res, { session_id: sessionId, removed }, removed ? 'Session ended' : 'Session not found');
    })
  );

  return router;
}
