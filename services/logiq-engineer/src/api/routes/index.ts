import { Application, Request, Response } from 'express';
import { requireEngineer, requireIntakeKey } from '../../middleware/auth.js';
import { RateLimitPresets } from '../../middleware/rate-limiter.js';
import type { ErrorHandler } from '../../monitoring/error-handler.js';
import type { HealthMonitor } from '../../monitoring/health-monitor.js';
import type { ApplianceRepository } from '../../repositories/appliance-repository.js';
import type { EngineerRepository } from '../../repositories/engineer-repository.js';
import type { AgentManager } from '../../services/agent-manager.js';
import type { AuthService } from '../../services/auth-service.js';
import type { ISessionStore } from '../../services/session-store.js';
import type { ServiceRequestWorkflow } from '../../services/service-request-workflow.js';
import { createAuthRoutes } from './auth.js';
import { createCatalogRoutes } from './catalog.js';
import { createChatRoutes } from './chat.js';
import { createEngineerRoutes } from './engineers.js';
import { createHealthRoutes } from './health.js';
import { createIntakeRoutes } from './intake.js';
import { createNavigationRoutes, type NavigationLocation } from './navigation.js';
import { createServiceRequestRoutes } from './service-requests.js';

export interface RouteDependencies {
  auth: AuthService;
  engineers: EngineerRepository;
  appliances: ApplianceRepository;
  workflow: ServiceRequestWorkflow;
  location: NavigationLocation;
  agentManager: AgentManager;
  sessionStore: ISessionStore;
  healthMonitor: HealthMonitor;
  errorHandler: ErrorHandler;
  maxRouteStops: number;
  intakeApiKey?: string;
  chatRateLimit: { windowMs: number; maxRequests: number };
}

/**
 * Setup all API routes for the LogIQ engineer service
 */
export function setupRoutes(app: Application, urlPrefix: string, deps: RouteDependencies): void {
  console.log('Setting up LogIQ API routes...');

  const engineerOnly = requireEngineer(deps.auth);
  const chatLimiter = RateLimitPresets.perEngineer(deps.chatRateLimit.windowMs, deps.chatRateLimit.maxRequests);

  app.use(`${urlPrefix}/health`, createHealthRoutes(deps));
  app.use(`${urlPrefix}/auth`, createAuthRoutes(deps.auth, RateLimitPresets.auth()));
  app.use(`${urlPrefix}/engineers`, engineerOnly, createEngineerRoutes(deps.engineers));
  app.use(`${urlPrefix}/catalog`, engineerOnly, createCatalogRoutes(deps.appliances));
  app.use(`${urlPrefix}/service-requests`, engineerOnly, createServiceRequestRoutes(deps.workflow));
  app.use(`${urlPrefix}/navigation`, engineerOnly, createNavigationRoutes(deps.location, deps.maxRouteStops));
  app.use(`${urlPrefix}/chat`, engineerOnly, createChatRoutes(deps.agentManager, deps.errorHandler, chatLimiter));
  app.use(`${urlPrefix}/intake`, requireIntakeKey(deps.intakeApiKey), createIntakeRoutes(deps.workflow));

  // Root endpoint
  app.get(urlPrefix, (req: Request, res: Response) => {
    res.json({
      service: 'LogIQ Engineer',
      version: '1.0.0',
      status: 'running',
      description: 'Service requests, navigation and the engineer assistant',
      endpoints: {
        health: `${urlPrefix}/health`,
        auth: `${urlPrefix}/auth`,
        engineers: `${urlPrefix}/engineers`,
        catalog: `${urlPrefix}/catalog`,
        serviceRequests: `${urlPrefix}/service-requests`,
        navigation: `${urlPrefix}/navigation`,
        chat: `${urlPrefix}/chat`,
        intake: `${urlPrefix}/intake`,
      },
      timestamp: new Date().toISOString(),
    });
  });

  // 404 handler for undefined routes
  app.use(`${urlPrefix}/*`, (req: Request, res: Response) => {
    res.status(404).json({
      success: false,
      error: 'Not Found',
      message: `Route ${req.method} ${req.originalUrl} not found`,
      timestamp: new Date().toISOString(),
    });
  });

  console.log('All API routes configured successfully');
}
