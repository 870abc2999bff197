import express, { Application } from 'express';
import { setupRoutes, type RouteDependencies } from './api/routes/index.js';
import type { RateLimiter } from './middleware/rate-limiter.js';

export interface AppOptions extends RouteDependencies {
  urlPrefix: string;
  globalRateLimiter?: RateLimiter;
}

/**
 * Express application with middleware, routes and the error handler wired in
 * order. Listening is left to the caller.
 */
export function createApp(options: AppOptions): Application {
  const app = express();

  app.disable('x-powered-by');
  app.set('trust proxy', true);

  // Middleware
  app.use(express.json({ limit: '1mb' }));
  app.use(express.urlencoded({ extended: true, limit: '1mb' }));

  if (options.globalRateLimiter) {
    app.use(options.globalRateLimiter.middleware());
  }

  setupRoutes(app, options.urlPrefix, options);

  // Error handling middleware (must be last)
  app.use(options.errorHandler.middleware());

  return app;
}
