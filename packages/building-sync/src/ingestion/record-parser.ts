/**
 * Record Parser
 *
 * Extracts one building from a raw source record: keys, canonical
 * attribute snapshot, energy figures, display color and footprint.
 *
 * FIELD LOOKUP:
 * - Energy block: `energy_result`, else `energy_data`, else `result`, else
 *   the record itself
 * - Sides: `begin`/`end`, else `before`/`after`; values under the side's
 *   `result` object or directly on the side
 * - Color: `end.color.energy_demand_specific_color`, else
 *   `end.result.color.energy_demand_specific_color`
 * - Geometry: `geom`, else `coordinates`, else `position`
 *
 * Only a missing primary key makes a record unusable. Bad color or
 * geometry degrades the entity and is reported as a warning.
 */

import type { EnergyFigures, Entity, SyncWarning } from '../core/types.js';
import { MalformedRecordError } from '../core/errors.js';
import { firstRecord, getPath, isNonEmptyString, isRecord, toFiniteNumber } from '../core/type-guards.js';
import { extractRecordFootprint } from '../spatial/footprint-parser.js';
import { canonicalJson } from './canonical-json.js';
import { DEFAULT_COLOR, DEFAULT_COLOR_HEX, parseHexColor } from './color.js';

export const PRIMARY_KEY_FIELD = 'modified_gml_id';
export const SECONDARY_KEY_FIELD = 'gml_id';

type JsonObject = Readonly<Record<string, unknown>>;

export interface ParsedRecord {
  readonly entity: Entity;
  readonly warnings: readonly SyncWarning[];
}

interface EnergySides {
  readonly before: JsonObject | null;
  readonly after: JsonObject | null;
}

function energySides(record: JsonObject): EnergySides {
  const block = firstRecord(record, ['energy_result', 'energy_data', 'result']) ?? record;
  return {
    before: firstRecord(block, ['begin', 'before']),
    after: firstRecord(block, ['end', 'after']),
  };
}

/**
 * Values object of one side: its `result` when present, else the side
 */
function sideValues(side: JsonObject | null): JsonObject | null {
  if (side === null) return null;
  const result = side.result;
  return isRecord(result) ? result : side;
}

function measure(values: JsonObject | null, field: string): number | null {
  return values === null ? null : toFiniteNumber(getPath(values, [field, 'value']));
}

export function extractEnergy(record: JsonObject): EnergyFigures {
  const { before, after } = energySides(record);
  const beforeValues = sideValues(before);
  const afterValues = sideValues(after);

  return {
    co2Before: measure(beforeValues, 'co2_from_energy_demand'),
    co2After: measure(afterValues, 'co2_from_energy_demand'),
    demandSpecificBefore: measure(beforeValues, 'energy_demand_specific'),
    demandSpecificAfter: measure(afterValues, 'energy_demand_specific'),
  };
}

/**
 * Raw color value of a record, undefined when the record carries none
 */
export function extractRawColor(record: JsonObject): unknown {
  const { after } = energySides(record);
  if (after === null) return undefined;

  const direct = getPath(after, ['color', 'energy_demand_specific_color']);
  if (direct !== undefined && direct !== null) return direct;

  const nested = getPath(after, ['result', 'color', 'energy_demand_specific_color']);
  return nested === null ? undefined : nested;
}

/**
 * Parse one record
 *
 * @throws MalformedRecordError when the record is not an object or has no
 *   usable primary key
 */
export function parseRecord(raw: unknown, index: number): ParsedRecord {
  if (!isRecord(raw)) {
    throw new MalformedRecordError(`Record is not an object`, index);
  }

  const primaryKey = raw[PRIMARY_KEY_FIELD];
  if (!isNonEmptyString(primaryKey)) {
    throw new MalformedRecordError(`Record has no ${PRIMARY_KEY_FIELD}`, index);
  }

  const secondaryRaw = raw[SECONDARY_KEY_FIELD];
  const secondaryKey = isNonEmptyString(secondaryRaw) ? secondaryRaw : undefined;

  const warnings: SyncWarning[] = [];

  const energy = extractEnergy(raw);

  const rawColor = extractRawColor(raw);
  const parsedColor = parseHexColor(rawColor);
  if (parsedColor === null && rawColor !== undefined) {
    warnings.push({
      type: 'color_defaulted',
      key: primaryKey,
      value: typeof rawColor === 'string' ? rawColor : canonicalJson(rawColor),
    });
  }

  const { footprint, issue } = extractRecordFootprint(raw);
  if (issue !== undefined) {
    warnings.push({ type: 'geometry_discarded', key: primaryKey, reason: issue });
  }

  const entity: Entity = {
    primaryKey,
    ...(secondaryKey !== undefined ? { secondaryKey } : {}),
    attributesSnapshot: canonicalJson(raw),
    energyValue: energy.demandSpecificAfter,
    energy,
    colorHex: parsedColor?.hex ?? DEFAULT_COLOR_HEX,
    color: parsedColor?.rgb ?? DEFAULT_COLOR,
    footprint,
  };

  return { entity, warnings };
}
