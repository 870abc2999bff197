import { Response, NextFunction, RequestHandler } from 'express';
import type { ApiResponse, AuthenticatedRequest } from '../types/index.js';

export function ok<T>(res: Response, data: T, message?: string, status = 200): void {
  const body: ApiResponse<T> = {
    success: true,
    data,
    message,
    timestamp: new Date().toISOString(),
  };
  res.status(status).json(body);
}

/**
 * Forward rejections of an async handler to the error middleware.
 */
export function asyncRoute(handler: (req: AuthenticatedRequest, res: Response) => Promise<void>): RequestHandler {
  return (req, res, next: NextFunction) => {
    handler(req, res).catch(next);
  };
}
