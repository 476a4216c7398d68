/**
 * Canonical JSON serialization
 *
 * Object keys are sorted at every depth so two records with the same
 * content serialize identically regardless of field order. Used only for
 * equality of attribute snapshots.
 */

import { isRecord } from '../core/type-guards.js';

type JsonValue = null | boolean | number | string | JsonValue[] | { [key: string]: JsonValue };

function normalize(value: unknown): JsonValue | undefined {
  if (value === null) return null;

  switch (typeof value) {
    case 'boolean':
    case 'string':
      return value;
    case 'number':
      return Number.isFinite(value) ? value : null;
    case 'object':
      break;
    default:
      // undefined, functions, symbols and bigints have no JSON form
      return undefined;
  }

  if (Array.isArray(value)) {
    return value.map((item: unknown) => normalize(item) ?? null);
  }

  if (!isRecord(value)) return undefined;

  const result: { [key: string]: JsonValue } = {};
  for (const key of Object.keys(value).sort()) {
    const normalized = normalize(value[key]);
    if (normalized !== undefined) {
      result[key] = normalized;
    }
  }
  return result;
}

export function canonicalJson(value: unknown): string {
  return JSON.stringify(normalize(value) ?? null);
}
