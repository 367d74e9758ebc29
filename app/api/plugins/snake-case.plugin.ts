import { Elysia } from 'elysia';

type JsonRecord = Record<string, unknown>;

function isPlainObject(value: unknown): value is JsonRecord {
  if (value === null || typeof value !== 'object') {
    return false;
  }
  const prototype: unknown = Object.getPrototypeOf(value);
  return prototype === Object.prototype || prototype === null;
}

export function toSnakeCaseKey(key: string): string {
  return key
    .replace(/([A-Z])/g, '_$1')
    .toLowerCase()
    .replace(/^_/, '')
    .replace(/_{2,}/g, '_');
}

export function toCamelCaseKey(key: string): string {
  return key.replace(/_([a-z0-9])/g, (_, letter: string) => letter.toUpperCase());
}

function transformKeys(value: unknown, mapKey: (key: string) => string): unknown {
  if (Array.isArray(value)) {
    return value.map(item => transformKeys(item, mapKey));
  }

  if (isPlainObject(value)) {
    const transformed: JsonRecord = {};
    for (const [key, entry] of Object.entries(value)) {
      transformed[mapKey(key)] = transformKeys(entry, mapKey);
    }
    return transformed;
  }

  return value;
}

export function toSnakeCase(value: unknown): unknown {
  return transformKeys(value, toSnakeCaseKey);
}

export function toCamelCase(value: unknown): unknown {
  return transformKeys(value, toCamelCaseKey);
}

/**
 * Rewrites plain-object handler results to snake_case keys. Responses that
 * are not plain objects (Response, strings, streams) pass through untouched.
 */
export class SnakeCasePlugin {
  createPlugin() {
    return new Elysia({ name: 'snake-case' })
      .onAfterHandle({ as: 'global' }, ({ response }) => {
        if (isPlainObject(response) || Array.isArray(response)) {
          return toSnakeCase(response);
        }
      });
  }
}
