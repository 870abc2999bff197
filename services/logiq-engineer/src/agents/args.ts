import { ValidationError } from '../utils/errors.js';

export function readString(args: Record<string, unknown>, key: string): string {
  const value = args[key];
  if (typeof value !== 'string' || value.trim() === '') {
    throw new ValidationError(`Argument '${key}' must be a non-empty string`);
  }
  return value.trim();
}

export function readOptionalString(args: Record<string, unknown>, key: string): string {
  const value = args[key];
  return typeof value === 'string' ? value.trim() : '';
}

export function readStringList(args: Record<string, unknown>, key: string): string[] {
  const value = args[key];
  if (!Array.isArray(value)) {
    throw new ValidationError(`Argument '${key}' must be a list of strings`);
  }
  const items: string[] = [];
  for (const item of value) {
    if (typeof item === 'string' && item.trim() !== '') {
      items.push(item.trim());
    }
  }
  return items;
}
