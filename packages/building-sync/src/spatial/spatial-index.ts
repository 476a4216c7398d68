/**
 * Spatial Index
 *
 * Resolves a pick point from the visualization layer to the building whose
 * footprint contains it, or failing that, whose bounding box is nearest to
 * it within a tolerance.
 *
 * ALGORITHM:
 * 1. Bounding box pre-filter, expanded by the tolerance (open at the
 *    expanded edge: a point exactly `tolerance` outside is rejected)
 * 2. Even-odd ray casting over every ring of each candidate; the first
 *    containing footprint in index order wins
 * 3. No containment: the candidate with the smallest bounding box wins,
 *    ties going to the earlier entry
 *
 * Coordinates are planar meters. Height on the pick point is ignored.
 */

import type { BBox, Footprint, PickPoint, Point2D, Ring } from '../core/types.js';
import { createLogger } from '../core/utils/logger.js';

const log = createLogger({ module: 'spatial-index' });

/** Minimum ring size that can enclose an area */
const MIN_RING_VERTICES = 3;

interface IndexEntry {
  readonly key: string;
  readonly bbox: BBox | null;
  readonly rings: readonly Ring[];
  readonly matchable: boolean;
}

/**
 * Bounding box over every vertex of every ring, null for an empty footprint
 */
export function computeBBox(footprint: Footprint): BBox | null {
  let minX = Infinity;
  let minY = Infinity;
  let maxX = -Infinity;
  let maxY = -Infinity;

  for (const ring of footprint.rings) {
    for (const { x, y } of ring) {
      if (x < minX) minX = x;
      if (y < minY) minY = y;
      if (x > maxX) maxX = x;
      if (y > maxY) maxY = y;
    }
  }

  return minX === Infinity ? null : [minX, minY, maxX, maxY];
}

export function bboxArea(bbox: BBox): number {
  const [minX, minY, maxX, maxY] = bbox;
  return (maxX - minX) * (maxY - minY);
}

export function isPointInBBox(point: Point2D, bbox: BBox): boolean {
  const [minX, minY, maxX, maxY] = bbox;
  return point.x >= minX && point.x <= maxX && point.y >= minY && point.y <= maxY;
}

/**
 * True when the point lies inside the bbox, or strictly less than
 * `tolerance` outside it on both axes
 */
export function isWithinTolerance(point: Point2D, bbox: BBox, tolerance: number): boolean {
  const [minX, minY, maxX, maxY] = bbox;
  const gapX = Math.max(minX - point.x, point.x - maxX);
  const gapY = Math.max(minY - point.y, point.y - maxY);

  if (gapX <= 0 && gapY <= 0) return true;
  return gapX < tolerance && gapY < tolerance;
}

/**
 * Count ray crossings eastward from the point against one ring. The ring
 * wraps from its last vertex back to the first.
 */
function countCrossings(point: Point2D, ring: Ring): number {
  let crossings = 0;

  for (let i = 0, j = ring.length - 1; i < ring.length; j = i++) {
    const vi = ring[i];
    const vj = ring[j];

    if (vi.y > point.y !== vj.y > point.y) {
      const crossX = ((vj.x - vi.x) * (point.y - vi.y)) / (vj.y - vi.y) + vi.x;
      if (point.x < crossX) crossings++;
    }
  }

  return crossings;
}

/**
 * Even-odd containment across all rings, so holes and multipolygon parts
 * need no separate handling. Rings with fewer than 3 vertices are ignored.
 */
export function footprintContains(rings: readonly Ring[], point: Point2D): boolean {
  let crossings = 0;
  for (const ring of rings) {
    if (ring.length < MIN_RING_VERTICES) continue;
    crossings += countCrossings(point, ring);
  }
  return crossings % 2 === 1;
}

export function isMatchable(footprint: Footprint): boolean {
  return footprint.rings.some((ring) => ring.length >= MIN_RING_VERTICES);
}

/**
 * Coordinate-to-key index over building footprints
 */
export class SpatialIndex {
  private readonly entries = new Map<string, IndexEntry>();

  constructor(private readonly defaultTolerance: number = 10) {}

  /**
   * Store or replace a footprint. A replaced key keeps its position in
   * index order.
   */
  index(key: string, footprint: Footprint): void {
    this.entries.set(key, {
      key,
      bbox: computeBBox(footprint),
      rings: footprint.rings,
      matchable: isMatchable(footprint),
    });
  }

  remove(key: string): boolean {
    return this.entries.delete(key);
  }

  has(key: string): boolean {
    return this.entries.has(key);
  }

  bboxOf(key: string): BBox | null {
    return this.entries.get(key)?.bbox ?? null;
  }

  clear(): void {
    this.entries.clear();
  }

  get size(): number {
    return this.entries.size;
  }

  get matchableCount(): number {
    let count = 0;
    for (const entry of this.entries.values()) {
      if (entry.matchable) count++;
    }
    return count;
  }

  /**
   * Resolve a point to a key. Never throws; null means the caller should
   * fall back to identifier lookup.
   */
  resolve(point: PickPoint, tolerance: number = this.defaultTolerance): string | null {
    if (!Number.isFinite(point.x) || !Number.isFinite(point.y)) {
      return null;
    }
    const tol = Number.isFinite(tolerance) && tolerance > 0 ? tolerance : 0;

    let best: IndexEntry | null = null;
    let bestArea = Infinity;

    for (const entry of this.entries.values()) {
      if (!entry.matchable || entry.bbox === null) continue;
      if (!isWithinTolerance(point, entry.bbox, tol)) continue;

      if (footprintContains(entry.rings, point)) {
        log.debug('Point resolved by containment', { key: entry.key, x: point.x, y: point.y });
        return entry.key;
      }

      const area = bboxArea(entry.bbox);
      if (area < bestArea) {
        best = entry;
        bestArea = area;
      }
    }

    if (best !== null) {
      log.debug('Point resolved by nearest bounding box', { key: best.key, x: point.x, y: point.y });
      return best.key;
    }
    return null;
  }
}
