import { CloudAIError } from '../errors.js';

export type JsonObject = Record<string, unknown>;

export function isRecord(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function isStringArray(value: unknown): value is string[] {
  return Array.isArray(value) && value.every((v) => typeof v === 'string');
}

export function isOptionalString(value: unknown): value is string | undefined {
  return value === undefined || typeof value === 'string';
}

export function isNullableString(value: unknown): value is string | null | undefined {
  return value === undefined || value === null || typeof value === 'string';
}

export function isOptionalNumber(value: unknown): value is number | undefined {
  return value === undefined || typeof value === 'number';
}

export function decodeFailure(what: string, detail: string): CloudAIError {
  return new CloudAIError('decode_failure', `Invalid ${what}: ${detail}`);
}

/**
 * Require a string field on a decoded object, naming the path in the error.
 */
export function requireString(obj: JsonObject, key: string, what: string): string {
  const value = obj[key];
  if (typeof value !== 'string') {
    throw decodeFailure(what, `'${key}' must be a string`);
  }
  return value;
}

export function requireNumber(obj: JsonObject, key: string, what: string): number {
  const value = obj[key];
  if (typeof value !== 'number' || !Number.isFinite(value)) {
    throw decodeFailure(what, `'${key}' must be a number`);
  }
  return value;
}

export function requireBoolean(obj: JsonObject, key: string, what: string): boolean {
  const value = obj[key];
  if (typeof value !== 'boolean') {
    throw decodeFailure(what, `'${key}' must be a boolean`);
  }
  return value;
}

export function requireRecord(value: unknown, what: string): JsonObject {
  if (!isRecord(value)) {
    throw decodeFailure(what, 'expected an object');
  }
  return value;
}

export function requireArray(obj: JsonObject, key: string, what: string): unknown[] {
  const value = obj[key];
  if (!Array.isArray(value)) {
    throw decodeFailure(what, `'${key}' must be an array`);
  }
  return value;
}
