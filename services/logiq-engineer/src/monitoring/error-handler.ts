import { Request, Response, NextFunction } from 'express';
import { v4 as uuidv4 } from 'uuid';
import type { ApiResponse, AuthenticatedRequest, ChatResponse } from '../types/index.js';
import { ServiceError, UpstreamError } from '../utils/errors.js';

export type ErrorSeverity = 'low' | 'medium' | 'high' | 'critical';

export interface ErrorInfo {
  id: string;
  timestamp: string;
  type: string;
  code?: string;
  message: string;
  details?: Record<string, unknown>;
  stack?: string;
  statusCode: number;
  context: {
    url?: string;
    method?: string;
    userAgent?: string;
    ip?: string;
    engineerId?: string;
    sessionId?: string;
  };
  severity: ErrorSeverity;
  resolved: boolean;
}

export interface CircuitBreakerState {
  failures: number;
  lastFailure: number;
  state: 'closed' | 'open' | 'half-open';
  trialStartedAt?: number;
}

export interface ErrorHandlerOptions {
  exposeStack?: boolean;
  circuitBreakerThreshold?: number;
  circuitBreakerTimeoutMs?: number;
  maxStoredErrors?: number;
  maxErrorAgeMs?: number;
  now?: () => number;
}

/** Upstream whose failures on chat requests degrade to the fallback reply. */
export const MODEL_UPSTREAM = 'genai';

export const FALLBACK_REPLY =
  "I'm sorry, I'm experiencing some technical difficulties right now. Please try again in a moment.";

const STATUS_BY_SEVERITY: Record<ErrorSeverity, number> = {
  critical: 503, // Service Unavailable
  high: 500, // Internal Server Error
  medium: 400, // Bad Request
  low: 422, // Unprocessable Entity
};

const MESSAGE_BY_SEVERITY: Record<ErrorSeverity, string> = {
  critical: 'Service temporarily unavailable. Please try again later.',
  high: 'An error occurred while processing your request. Please try again.',
  medium: 'Invalid request. Please check your input and try again.',
  low: 'Request could not be processed. Please try again.',
};

/** Status carried by errors from express itself, e.g. a malformed JSON body. */
function httpStatusOf(error: unknown): number | null {
  if (typeof error === 'object' && error !== null && 'status' in error && typeof error.status === 'number') {
    return error.status >= 400 && error.status < 500 ? error.status : null;
  }
  return null;
}

/** The chat route records the session id it picked in res.locals. */
function sessionIdOf(req: Request, res: Response): string | undefined {
  const assigned: unknown = res.locals.sessionId;
  if (typeof assigned === 'string') {
    return assigned;
  }
  const body: unknown = req.body;
  if (typeof body === 'object' && body !== null && 'session_id' in body && typeof body.session_id === 'string') {
    return body.session_id;
  }
  return undefined;
}

export function isChatRequest(req: Request): boolean {
  return req.originalUrl.includes('/chat');
}

export class ErrorHandler {
  private errors: Map<string, ErrorInfo> = new Map();
  private circuitBreakers: Map<string, CircuitBreakerState> = new Map();
  private readonly exposeStack: boolean;
  private readonly circuitBreakerThreshold: number;
  private readonly circuitBreakerTimeout: number;
  private readonly maxStoredErrors: number;
  private readonly maxErrorAge: number;
  private readonly now: () => number;
  private readonly pruneTimer: NodeJS.Timeout;

  constructor(options: ErrorHandlerOptions = {}) {
    this.exposeStack = options.exposeStack ?? false;
    this.circuitBreakerThreshold = options.circuitBreakerThreshold ?? 5;
    this.circuitBreakerTimeout = options.circuitBreakerTimeoutMs ?? 60000; // 1 minute
    this.maxStoredErrors = options.maxStoredErrors ?? 1000;
    this.maxErrorAge = options.maxErrorAgeMs ?? 24 * 60 * 60 * 1000;
    this.now = options.now ?? Date.now;

    // Drop stale error records every hour
    this.pruneTimer = setInterval(() => {
      this.clearOldErrors();
    }, 60 * 60 * 1000);
    this.pruneTimer.unref();
  }

  stop(): void {
    clearInterval(this.pruneTimer);
  }

  /**
   * Express error handling middleware
   */
  middleware() {
    return (error: unknown, req: AuthenticatedRequest, res: Response, next: NextFunction): void => {
      if (res.headersSent) {
        next(error);
        return;
      }

      const errorInfo = this.captureError(error, {
        url: req.originalUrl,
        method: req.method,
        userAgent: req.get('User-Agent'),
        ip: req.ip,
        engineerId: req.engineer?.engineerId,
        sessionId: sessionIdOf(req, res),
      });

      if (error instanceof UpstreamError) {
        this.recordUpstreamFailure(error.upstream);
        if (error.upstream === MODEL_UPSTREAM && isChatRequest(req)) {
          res.status(200).json(this.chatFallback(errorInfo.context.sessionId ?? uuidv4()));
          return;
        }
      }

      this.sendErrorResponse(errorInfo, res);
    };
  }

  /**
   * Capture and categorize an error
   */
  captureError(error: unknown, context: ErrorInfo['context'] = {}): ErrorInfo {
    const normalised = error instanceof Error ? error : new Error(String(error));
    const severity = this.determineSeverity(normalised);

    const errorInfo: ErrorInfo = {
      id: this.generateErrorId(),
      timestamp: new Date(this.now()).toISOString(),
      type: normalised.name,
      code: normalised instanceof ServiceError ? normalised.code : undefined,
      message: normalised.message,
      details: normalised instanceof ServiceError ? normalised.details : undefined,
      stack: normalised.stack,
      statusCode: this.getStatusCode(normalised, severity),
      context,
      severity,
      resolved: false,
    };

    this.errors.set(errorInfo.id, errorInfo);
    // Maps iterate in insertion order, so the first key is the oldest record
    for (const id of this.errors.keys()) {
      if (this.errors.size <= this.maxStoredErrors) break;
      this.errors.delete(id);
    }
    this.logError(errorInfo);
    return errorInfo;
  }

  /**
   * Determine error severity
   */
  determineSeverity(error: Error): ErrorSeverity {
    if (error instanceof ServiceError) {
      if (error.statusCode >= 500) return 'high';
      if (error.statusCode === 401 || error.statusCode === 402 || error.statusCode === 403) return 'medium';
      return 'low';
    }

    const message = error.message.toLowerCase();
    if (message.includes('database') || message.includes('connection')) {
      return 'critical';
    }
    if (message.includes('timeout') || message.includes('memory')) {
      return 'high';
    }
    if (message.includes('validation') || message.includes('not found')) {
      return 'medium';
    }
    return 'low';
  }

  /**
   * Service errors keep their own status; anything else maps from severity.
   */
  getStatusCode(error: Error, severity: ErrorSeverity): number {
    if (error instanceof ServiceError) {
      return error.statusCode;
    }
    return httpStatusOf(error) ?? STATUS_BY_SEVERITY[severity];
  }

  private sendErrorResponse(errorInfo: ErrorInfo, res: Response): void {
    const known = errorInfo.code !== undefined;

    res.status(errorInfo.statusCode).json({
      success: false,
      error: errorInfo.code ?? errorInfo.type,
      message: known ? errorInfo.message : MESSAGE_BY_SEVERITY[errorInfo.severity],
      ...(errorInfo.details && { details: errorInfo.details }),
      errorId: errorInfo.id,
      timestamp: errorInfo.timestamp,
      ...(this.exposeStack && {
        stack: errorInfo.stack,
        context: errorInfo.context,
      }),
    });
  }

  // Circuit breakers, keyed by upstream name

  recordUpstreamFailure(upstream: string): void {
    const breaker = this.circuitBreakers.get(upstream) ?? { failures: 0, lastFailure: 0, state: 'closed' };
    breaker.failures++;
    breaker.lastFailure = this.now();
    breaker.trialStartedAt = undefined;
    if (breaker.state === 'half-open' || breaker.failures >= this.circuitBreakerThreshold) {
      if (breaker.state !== 'open') {
        console.warn(`Circuit breaker opened for ${upstream} after ${breaker.failures} failures`);
      }
      breaker.state = 'open';
    }
    this.circuitBreakers.set(upstream, breaker);
  }

  recordUpstreamSuccess(upstream: string): void {
    const breaker = this.circuitBreakers.get(upstream);
    if (breaker && breaker.state !== 'closed') {
      console.log(`Circuit breaker closed for ${upstream}`);
    }
    this.circuitBreakers.delete(upstream);
  }

  /**
   * True while the breaker is open. Once the timeout has passed the breaker
   * turns half-open and lets a single trial through; callers stay blocked
   * until that trial is recorded, or until it has been out for a full timeout.
   */
  isCircuitOpen(upstream: string): boolean {
    const breaker = this.circuitBreakers.get(upstream);
    if (!breaker || breaker.state === 'closed') {
      return false;
    }

    const now = this.now();
    if (breaker.state === 'half-open') {
      if (breaker.trialStartedAt !== undefined && now - breaker.trialStartedAt <= this.circuitBreakerTimeout) {
        return true;
      }
      breaker.trialStartedAt = now;
      return false;
    }

    if (now - breaker.lastFailure > this.circuitBreakerTimeout) {
      breaker.state = 'half-open';
      breaker.trialStartedAt = now;
      return false;
    }
    return true;
  }

  getCircuitBreakers(): Record<string, CircuitBreakerState> {
    return Object.fromEntries(this.circuitBreakers);
  }

  chatFallback(sessionId: string): ApiResponse<ChatResponse> {
    return {
      success: true,
      message: 'Service temporarily unavailable, using fallback response',
      data: {
        session_id: sessionId,
        reply: FALLBACK_REPLY,
        agent: 'fallback',
        mode: 'fallback',
        tool_calls: [],
      },
      timestamp: new Date(this.now()).toISOString(),
    };
  }

  private logError(errorInfo: ErrorInfo): void {
    const logLevel = errorInfo.severity === 'critical' || errorInfo.severity === 'high' ? 'error' : 'warn';
    console[logLevel](`Error ${errorInfo.id}: ${errorInfo.type} - ${errorInfo.message}`, {
      severity: errorInfo.severity,
      statusCode: errorInfo.statusCode,
      context: errorInfo.context,
      timestamp: errorInfo.timestamp,
    });
  }

  private generateErrorId(): string {
    return `err_${this.now()}_${Math.random().toString(36).slice(2, 11)}`;
  }

  /**
   * Get error statistics
   */
  getErrorStats(): {
    total: number;
    bySeverity: Record<string, number>;
    byType: Record<string, number>;
    resolved: number;
    unresolved: number;
  } {
    const bySeverity: Record<string, number> = {};
    const byType: Record<string, number> = {};
    let resolved = 0;

    for (const error of this.errors.values()) {
      bySeverity[error.severity] = (bySeverity[error.severity] || 0) + 1;
      byType[error.type] = (byType[error.type] || 0) + 1;
      if (error.resolved) resolved++;
    }

    return {
      total: this.errors.size,
      bySeverity,
      byType,
      resolved,
      unresolved: this.errors.size - resolved,
    };
  }

  markErrorResolved(errorId: string): boolean {
    const error = this.errors.get(errorId);
    if (error) {
      error.resolved = true;
      return true;
    }
    return false;
  }

  getAllErrors(): ErrorInfo[] {
    return Array.from(this.errors.values());
  }

  /**
   * Clear errors older than the given age, resolved or not
   */
  clearOldErrors(maxAgeMs: number = this.maxErrorAge): number {
    const cutoff = this.now() - maxAgeMs;
    let cleared = 0;

    for (const [id, error] of this.errors.entries()) {
      if (new Date(error.timestamp).getTime() < cutoff) {
        this.errors.delete(id);
        cleared++;
      }
    }

    return cleared;
  }
}
