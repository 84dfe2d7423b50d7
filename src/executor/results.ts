/**
 * Result normalization.
 *
 * Everything a tool returns is reduced to a JSON value before it leaves the
 * pool: plain JSON passes through and `undefined` becomes `null`. Values with
 * their own `toString` (and bigints, non-finite numbers) use it; Maps, Sets,
 * functions, cyclic structures and objects holding any of these are rendered
 * with `util.inspect`.
 */

import { inspect } from 'node:util';
import { isPlainObject } from '../schema/json-schema.js';
import type { JsonValue } from '../types/common.js';

const NOT_JSON = Symbol('not-json');

/**
 * Copy `value` as JSON, following JSON.stringify for `undefined`
 * (dropped from objects, `null` in arrays).
 */
function toJson(value: unknown, ancestors: Set<object>): JsonValue | typeof NOT_JSON {
  if (value === null || typeof value === 'string' || typeof value === 'boolean') {
    return value;
  }
  if (typeof value === 'number') {
    return Number.isFinite(value) ? value : NOT_JSON;
  }
  if (!Array.isArray(value) && !isPlainObject(value)) {
    return NOT_JSON;
  }
  if (ancestors.has(value)) {
    return NOT_JSON;
  }

  ancestors.add(value);
  try {
    if (Array.isArray(value)) {
      const items: JsonValue[] = [];
      for (const item of value) {
        const converted = item === undefined ? null : toJson(item, ancestors);
        if (converted === NOT_JSON) return NOT_JSON;
        items.push(converted);
      }
      return items;
    }

    const result: { [key: string]: JsonValue } = {};
    for (const [key, item] of Object.entries(value)) {
      if (item === undefined) continue;
      const converted = toJson(item, ancestors);
      if (converted === NOT_JSON) return NOT_JSON;
      Object.defineProperty(result, key, {
        value: converted,
        enumerable: true,
        writable: true,
        configurable: true,
      });
    }
    return result;
  } finally {
    ancestors.delete(value);
  }
}

function hasOwnToString(value: object): boolean {
  if (!('toString' in value) || typeof value.toString !== 'function') {
    return false;
  }
  return value.toString !== Object.prototype.toString && value.toString !== Array.prototype.toString;
}

function describeValue(value: unknown): string {
  if (typeof value === 'object' && value !== null && hasOwnToString(value)) {
    return String(value);
  }
  if (typeof value === 'object' || typeof value === 'function') {
    return inspect(value, { depth: 4, breakLength: Infinity });
  }
  return String(value);
}

export function normalizeResult(value: unknown): JsonValue {
  if (value === undefined) {
    return null;
  }
  const converted = toJson(value, new Set());
  return converted === NOT_JSON ? describeValue(value) : converted;
}
