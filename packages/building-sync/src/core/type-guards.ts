/**
 * Type Guards
 *
 * Runtime narrowing for values parsed out of remote JSON. Everything
 * arriving from the source is `unknown` until one of these says otherwise.
 */

/**
 * Plain JSON object (not null, not an array)
 */
export function isRecord(value: unknown): value is Readonly<Record<string, unknown>> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function isUnknownArray(value: unknown): value is readonly unknown[] {
  return Array.isArray(value);
}

/**
 * Non-empty string after trimming
 */
export function isNonEmptyString(value: unknown): value is string {
  return typeof value === 'string' && value.trim().length > 0;
}

/**
 * Finite number, or a string holding one ("12.5" is accepted, "" is not)
 */
export function toFiniteNumber(value: unknown): number | null {
  if (typeof value === 'number') {
    return Number.isFinite(value) ? value : null;
  }
  if (typeof value === 'string' && value.trim() !== '') {
    const parsed = Number(value);
    return Number.isFinite(parsed) ? parsed : null;
  }
  return null;
}

/**
 * First value among the named fields that is a plain object
 */
export function firstRecord(
  source: Readonly<Record<string, unknown>>,
  fields: readonly string[]
): Readonly<Record<string, unknown>> | null {
  for (const field of fields) {
    const value = source[field];
    if (isRecord(value)) return value;
  }
  return null;
}

/**
 * Walk a path of object fields, undefined as soon as a step is not an object
 */
export function getPath(source: unknown, path: readonly string[]): unknown {
  let current: unknown = source;
  for (const segment of path) {
    if (!isRecord(current)) return undefined;
    current = current[segment];
  }
  return current;
}
