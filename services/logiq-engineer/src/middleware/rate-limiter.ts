import { Request, Response, NextFunction } from 'express';
import type { AuthenticatedRequest } from '../types/index.js';

export interface RateLimitConfig {
  windowMs: number; // Time window in milliseconds
  maxRequests: number; // Maximum requests per window
  keyGenerator?: (req: AuthenticatedRequest) => string;
}

export interface RateLimitInfo {
  limit: number;
  remaining: number;
  reset: number; // Timestamp when the window resets
  retryAfter?: number; // Seconds until retry is allowed
}

const clientKey = (req: Request): string => req.ip || 'unknown';

export class RateLimiter {
  private requests: Map<string, { count: number; resetTime: number }> = new Map();
  private readonly windowMs: number;
  private readonly maxRequests: number;
  private readonly keyGenerator: (req: AuthenticatedRequest) => string;
  private readonly cleanupTimer: NodeJS.Timeout;

  constructor(config: RateLimitConfig) {
    this.windowMs = config.windowMs;
    this.maxRequests = config.maxRequests;
    this.keyGenerator = config.keyGenerator ?? clientKey;

    // Clean up expired entries every minute
    this.cleanupTimer = setInterval(() => {
      this.cleanupExpiredEntries();
    }, 60000);
    this.cleanupTimer.unref();
  }

  /**
   * Express middleware for rate limiting
   */
  middleware() {
    return (req: AuthenticatedRequest, res: Response, next: NextFunction): void => {
      const key = this.keyGenerator(req);
      const now = Date.now();

      let window = this.requests.get(key);
      if (!window || window.resetTime <= now) {
        window = { count: 0, resetTime: now + this.windowMs };
        this.requests.set(key, window);
      }

      if (window.count >= this.maxRequests) {
        const retryAfter = Math.ceil((window.resetTime - now) / 1000);

        res.set({
          'X-RateLimit-Limit': this.maxRequests.toString(),
          'X-RateLimit-Remaining': '0',
          'X-RateLimit-Reset': new Date(window.resetTime).toISOString(),
          'Retry-After': retryAfter.toString(),
        });

        res.status(429).json({
          success: false,
          error: 'Too Many Requests',
          message: 'Rate limit exceeded',
          retryAfter,
          timestamp: new Date().toISOString(),
        });
        return;
      }

      window.count++;

      res.set({
        'X-RateLimit-Limit': this.maxRequests.toString(),
        'X-RateLimit-Remaining': Math.max(0, this.maxRequests - window.count).toString(),
        'X-RateLimit-Reset': new Date(window.resetTime).toISOString(),
      });

      next();
    };
  }

  /**
   * Get rate limit info for a key
   */
  getInfo(key: string): RateLimitInfo | null {
    const window = this.requests.get(key);
    if (!window) return null;

    const now = Date.now();
    if (window.resetTime <= now) {
      return { limit: this.maxRequests, remaining: this.maxRequests, reset: now + this.windowMs };
    }

    const remaining = Math.max(0, this.maxRequests - window.count);
    return {
      limit: this.maxRequests,
      remaining,
      reset: window.resetTime,
      retryAfter: remaining === 0 ? Math.ceil((window.resetTime - now) / 1000) : undefined,
    };
  }

  /**
   * Reset rate limit for a specific key
   */
  reset(key: string): void {
    this.requests.delete(key);
  }

  getStats(): { totalKeys: number; activeKeys: number; windowMs: number; maxRequests: number } {
    const now = Date.now();
    const activeKeys = Array.from(this.requests.values()).filter((info) => info.resetTime > now).length;

    return {
      totalKeys: this.requests.size,
      activeKeys,
      windowMs: this.windowMs,
      maxRequests: this.maxRequests,
    };
  }

  stop(): void {
    clearInterval(this.cleanupTimer);
  }

  private cleanupExpiredEntries(): void {
    const now = Date.now();
    let removed = 0;

    for (const [key, info] of this.requests.entries()) {
      if (info.resetTime <= now) {
        this.requests.delete(key);
        removed++;
      }
    }

    if (removed > 0) {
      console.log(`Cleaned up ${removed} expired rate limit entries`);
    }
  }
}

/**
 * Pre-configured rate limiters for different use cases
 */
export class RateLimitPresets {
  /**
   * Per-client limit for the whole API
   */
  static global(windowMs: number, maxRequests: number): RateLimiter {
    return new RateLimiter({ windowMs, maxRequests });
  }

  /**
   * Sign-in and password reset: 20 attempts per 15 minutes per client
   */
  static auth(): RateLimiter {
    return new RateLimiter({
      windowMs: 15 * 60 * 1000,
      maxRequests: 20,
    });
  }

  /**
   * Chat messages per engineer; falls back to the client address before
   * authentication has run.
   */
  static perEngineer(windowMs: number, maxRequests: number): RateLimiter {
    return new RateLimiter({
      windowMs,
      maxRequests,
      keyGenerator: (req: AuthenticatedRequest) =>
        req.engineer ? `engineer:${req.engineer.engineerId}` : clientKey(req),
    });
  }
}
