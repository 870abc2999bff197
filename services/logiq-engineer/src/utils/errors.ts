export type ErrorCode =
  | 'VALIDATION_ERROR'
  | 'AUTHENTICATION_ERROR'
  | 'INVALID_OTP'
  | 'OTP_NOT_FOUND'
  | 'FORBIDDEN'
  | 'NOT_FOUND'
  | 'CONFLICT'
  | 'UPSTREAM_ERROR';

/**
 * Base class for errors raised deliberately by the service. Anything else
 * reaching the error middleware is treated as unexpected.
 */
export class ServiceError extends Error {
  readonly code: ErrorCode;
  readonly statusCode: number;
  readonly details?: Record<string, unknown>;

  constructor(message: string, code: ErrorCode, statusCode: number, details?: Record<string, unknown>) {
    super(message);
    this.name = new.target.name;
    this.code = code;
    this.statusCode = statusCode;
    this.details = details;
  }
}

export class ValidationError extends ServiceError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'VALIDATION_ERROR', 400, details);
  }
}

export class AuthenticationError extends ServiceError {
  constructor(message = 'Authentication required') {
    super(message, 'AUTHENTICATION_ERROR', 401);
  }
}

/**
 * 401 when the code does not match, 402 when there is no usable code.
 */
export class OtpError extends ServiceError {
  constructor(reason: 'invalid' | 'not_found') {
    super(
      reason === 'invalid'
        ? 'Invalid OTP provided'
        : 'OTP expired or not found. Request the customer to generate a new OTP',
      reason === 'invalid' ? 'INVALID_OTP' : 'OTP_NOT_FOUND',
      reason === 'invalid' ? 401 : 402
    );
  }
}

export class ForbiddenError extends ServiceError {
  constructor(message = 'Forbidden') {
    super(message, 'FORBIDDEN', 403);
  }
}

export class NotFoundError extends ServiceError {
  constructor(message: string) {
    super(message, 'NOT_FOUND', 404);
  }
}

export class ConflictError extends ServiceError {
  constructor(message: string) {
    super(message, 'CONFLICT', 409);
  }
}

export class UpstreamError extends ServiceError {
  readonly upstream: string;

  constructor(upstream: string, message: string) {
    super(message, 'UPSTREAM_ERROR', 502, { upstream });
    this.upstream = upstream;
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
