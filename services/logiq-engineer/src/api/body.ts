import type { Request } from 'express';
import { ValidationError } from '../utils/errors.js';

export type Body = Record<string, unknown>;

function isRecord(value: unknown): value is Body {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function requestBody(req: Request): Body {
  const body: unknown = req.body;
  return isRecord(body) ? body : {};
}

export function readObject(body: Body, key: string): Body {
  const value = body[key];
  if (!isRecord(value)) {
    throw new ValidationError(`Field '${key}' must be an object`);
  }
  return value;
}

export function readBoolean(body: Body, key: string): boolean {
  const value = body[key];
  if (typeof value !== 'boolean') {
    throw new ValidationError(`Field '${key}' must be a boolean`);
  }
  return value;
}

export function routeParam(req: Request, key: string): string {
  const value = req.params[key];
  if (!value) {
    throw new ValidationError(`Missing path parameter '${key}'`);
  }
  return value;
}
