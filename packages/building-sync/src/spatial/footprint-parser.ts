/**
 * Footprint Parser
 *
 * Turns the geometry carried on a building record into footprint rings.
 * Sources nest coordinates anywhere from a flat point list to multipolygon
 * depth, sometimes as a JSON string and sometimes as a bare "x,y,x,y" list,
 * so parsing is a recursive descent that bottoms out at coordinate pairs
 * and skips branches it cannot read.
 */

import type { Footprint, Point2D, Ring } from '../core/types.js';
import { EMPTY_FOOTPRINT } from '../core/types.js';
import { isRecord, isUnknownArray } from '../core/type-guards.js';

export interface FootprintParseResult {
  readonly footprint: Footprint;
  /** Set when geometry was present but unusable */
  readonly issue?: string;
}

const MAX_DEPTH = 8;

function isFiniteNumber(value: unknown): value is number {
  return typeof value === 'number' && Number.isFinite(value);
}

function toPoint(value: unknown): Point2D | null {
  if (!isUnknownArray(value) || value.length < 2) return null;
  const [x, y] = value;
  if (!isFiniteNumber(x) || !isFiniteNumber(y)) return null;
  return { x, y };
}

/**
 * Collect rings from a nested coordinate array. An array holding at least
 * one coordinate pair is a ring; anything else is descended into.
 */
function collectRings(node: readonly unknown[], depth: number, out: Ring[]): void {
  if (depth > MAX_DEPTH) return;

  // [x1, y1, x2, y2, ...]
  if (node.length >= 4 && node.length % 2 === 0 && node.every(isFiniteNumber)) {
    const ring: Point2D[] = [];
    for (let i = 0; i < node.length; i += 2) {
      const x = node[i];
      const y = node[i + 1];
      if (isFiniteNumber(x) && isFiniteNumber(y)) ring.push({ x, y });
    }
    out.push(ring);
    return;
  }

  const single = toPoint(node);
  if (single !== null) {
    out.push([single]);
    return;
  }

  const points: Point2D[] = [];
  for (const child of node) {
    const point = toPoint(child);
    if (point !== null) points.push(point);
  }
  if (points.length > 0) {
    out.push(points);
    return;
  }

  for (const child of node) {
    if (isUnknownArray(child)) collectRings(child, depth + 1, out);
  }
}

/**
 * Fallback for strings that are not JSON: brackets and whitespace are
 * dropped and the remaining comma list is read as x,y pairs.
 */
export function parseFlatCoordinateList(text: string): Ring | null {
  const parts = text
    .replace(/[[\]\s]/g, '')
    .split(',')
    .filter((part) => part.length > 0);

  const values = parts.map(Number);
  if (values.length < 2 || values.some((value) => !Number.isFinite(value))) {
    return null;
  }

  const ring: Point2D[] = [];
  for (let i = 0; i + 1 < values.length; i += 2) {
    ring.push({ x: values[i], y: values[i + 1] });
  }
  return ring;
}

function parseNode(value: unknown, depth: number): FootprintParseResult {
  if (depth > MAX_DEPTH) {
    return { footprint: EMPTY_FOOTPRINT, issue: 'geometry nested too deeply' };
  }

  if (typeof value === 'string') {
    let parsed: unknown;
    try {
      parsed = JSON.parse(value);
    } catch {
      const ring = parseFlatCoordinateList(value);
      return ring === null
        ? { footprint: EMPTY_FOOTPRINT, issue: 'unparseable coordinate string' }
        : { footprint: { rings: [ring] } };
    }
    if (typeof parsed === 'string') {
      return { footprint: EMPTY_FOOTPRINT, issue: 'unparseable coordinate string' };
    }
    return parseNode(parsed, depth + 1);
  }

  if (isRecord(value)) {
    if (!('coordinates' in value)) {
      return { footprint: EMPTY_FOOTPRINT, issue: 'geometry object has no coordinates' };
    }
    return parseNode(value.coordinates, depth + 1);
  }

  if (isUnknownArray(value)) {
    const rings: Ring[] = [];
    collectRings(value, depth, rings);
    if (rings.length === 0) {
      return { footprint: EMPTY_FOOTPRINT, issue: 'no coordinate pairs found' };
    }
    return { footprint: { rings } };
  }

  return { footprint: EMPTY_FOOTPRINT, issue: `unsupported geometry value of type ${typeof value}` };
}

/**
 * Parse a geometry value. `null` and `undefined` mean "no geometry" and
 * produce an empty footprint without an issue.
 */
export function parseFootprint(value: unknown): FootprintParseResult {
  if (value === undefined || value === null) {
    return { footprint: EMPTY_FOOTPRINT };
  }
  return parseNode(value, 0);
}

/**
 * Geometry lookup order on a record: `geom`, then `coordinates`, then
 * `position`. The first field present is used even if unusable.
 */
export function extractRecordFootprint(record: Readonly<Record<string, unknown>>): FootprintParseResult {
  for (const field of ['geom', 'coordinates', 'position'] as const) {
    const value = record[field];
    if (value !== undefined && value !== null) {
      return parseFootprint(value);
    }
  }
  return { footprint: EMPTY_FOOTPRINT };
}

export function vertexCount(footprint: Footprint): number {
  return footprint.rings.reduce((sum, ring) => sum + ring.length, 0);
}
