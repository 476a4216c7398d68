/**
 * Payload unwrapping
 *
 * The bulk preload endpoint answers with a bare array of records; the
 * refresh endpoint wraps them as `{ "results": [...] }`. Either may arrive
 * still serialized.
 */

import { MalformedPayloadError } from '../core/errors.js';
import { isRecord, isUnknownArray } from '../core/type-guards.js';

function describe(value: unknown): string {
  if (value === null) return 'null';
  if (Array.isArray(value)) return 'array';
  return typeof value;
}

/**
 * Raw record list carried by a payload
 *
 * @throws MalformedPayloadError when the payload is not valid JSON text,
 *   an array, or an object with a `results` array
 */
export function extractRecords(payload: unknown): readonly unknown[] {
  let value = payload;

  if (typeof value === 'string') {
    try {
      value = JSON.parse(value);
    } catch (error) {
      throw new MalformedPayloadError('Payload is not valid JSON', 'string', error);
    }
  }

  if (isUnknownArray(value)) {
    return value;
  }

  if (isRecord(value)) {
    const results = value.results;
    if (isUnknownArray(results)) {
      return results;
    }
    throw new MalformedPayloadError('Payload object has no results array', 'object');
  }

  throw new MalformedPayloadError(`Unsupported payload type: ${describe(value)}`, describe(value));
}
