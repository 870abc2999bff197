import { Router, Request, Response } from 'express';
import type { AgentManager } from '../../services/agent-manager.js';
import type { ISessionStore } from '../../services/session-store.js';
import type { ErrorHandler } from '../../monitoring/error-handler.js';
import type { HealthMonitor } from '../../monitoring/health-monitor.js';
import { asyncRoute, ok } from '../respond.js';

export interface HealthRouteDeps {
  healthMonitor: HealthMonitor;
  errorHandler: ErrorHandler;
  agentManager: AgentManager;
  sessionStore: ISessionStore;
}

/**
 * Create health check routes
 */
export function createHealthRoutes(deps: HealthRouteDeps): Router {
  const router = Router();

  /**
   * Basic health check endpoint
   */
  router.get(
    '/',
    asyncRoute(async (req, res) => {
      const metrics = await deps.healthMonitor.getHealthMetrics();
      res.status(metrics.status === 'unhealthy' ? 503 : 200).json({
        status: metrics.status,
        service: 'LogIQ Engineer',
        version: '1.0.0',
        timestamp: metrics.timestamp,
        uptime: process.uptime(),
        dependencies: metrics.dependencies,
        errors: metrics.errors,
      });
    })
  );

  /**
   * Detailed health check endpoint
   */
  router.get(
    '/detailed',
    asyncRoute(async (req, res) => {
      const metrics = await deps.healthMonitor.getHealthMetrics();
      ok(res, {
        ...metrics,
        environment: {
          nodeVersion: process.version,
          platform: process.platform,
          arch: process.arch,
          pid: process.pid,
        },
        agents: deps.agentManager.getStatus(),
        sessions: await deps.sessionStore.getStats(),
        circuitBreakers: deps.errorHandler.getCircuitBreakers(),
        recommendations: deps.healthMonitor.getResourceRecommendations(metrics),
      });
    })
  );

  /**
   * Readiness probe
   */
  router.get(
    '/ready',
    asyncRoute(async (req, res) => {
      const ready = await deps.healthMonitor.isReady();
      res.status(ready ? 200 : 503).json({
        ready,
        timestamp: new Date().toISOString(),
      });
    })
  );

  /**
   * Liveness probe
   */
  router.get('/live', (req: Request, res: Response) => {
    res.json({
      alive: true,
      timestamp: new Date().toISOString(),
      uptime: process.uptime(),
    });
  });

  router.get('/errors', (req: Request, res: Response) => {
    ok(res, deps.errorHandler.getErrorStats());
  });

  return router;
}
