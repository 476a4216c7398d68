/**
 * Entity Cache
 *
 * System of record for renderer and UI reads. Buildings are stored by
 * primary key and reachable by secondary key (through the identity
 * resolver), by pick point (through the spatial index) and by coordinate
 * hash.
 *
 * INVARIANTS:
 * - At most one entity per primary key; upsert replaces the whole entry
 * - After upsert, the primary key and any confirmed secondary key resolve
 *   to the same entity
 * - Only the sync cycle mutates the cache; readers get readonly views
 */

import type { Entity, HexColor, PickPoint, Point2D, SyncWarning } from '../core/types.js';
import { IdentityResolver, deriveSecondary } from '../identity/identity-resolver.js';
import { SpatialIndex, computeBBox } from '../spatial/spatial-index.js';
import { createLogger } from '../core/utils/logger.js';

const log = createLogger({ module: 'entity-cache' });

export interface EntityCacheOptions {
  /** Default pick tolerance in meters */
  readonly toleranceMeters?: number;
}

export interface CacheStats {
  readonly entities: number;
  readonly confirmedMappings: number;
  readonly heuristicMappings: number;
  readonly indexedFootprints: number;
  readonly matchableFootprints: number;
  readonly absentKeys: number;
}

/**
 * Coordinate hash of a point, rounded to whole meters
 */
export function coordinateHash(point: Point2D): string {
  return `${Math.round(point.x)},${Math.round(point.y)}`;
}

export class EntityCache {
  private readonly resolver = new IdentityResolver();
  private readonly spatial: SpatialIndex;
  private readonly byPrimary = new Map<string, Entity>();
  private readonly byCoordinateHash = new Map<string, string>();
  private readonly hashByPrimary = new Map<string, string>();
  private readonly absent = new Set<string>();

  constructor(options: EntityCacheOptions = {}) {
    this.spatial = new SpatialIndex(options.toleranceMeters);
  }

  /**
   * Identity resolver owned by this cache. The differencer borrows it to
   * register keys observed during a cycle.
   */
  get identity(): IdentityResolver {
    return this.resolver;
  }

  get size(): number {
    return this.byPrimary.size;
  }

  /**
   * Insert or replace an entity. Key mappings are reconciled first; the
   * resolver is only touched when its state differs from the entity.
   */
  upsert(entity: Entity): SyncWarning[] {
    const warnings: SyncWarning[] = [];
    const { primaryKey, secondaryKey } = entity;

    if (secondaryKey !== undefined) {
      const mapping = this.resolver.mappingFor(primaryKey);
      if (mapping?.source !== 'confirmed' || mapping.secondaryKey !== secondaryKey) {
        const warning = this.resolver.recordConfirmedMapping(primaryKey, secondaryKey);
        if (warning !== null) warnings.push(warning);
      }
    } else if (this.resolver.resolve(primaryKey) !== primaryKey) {
      const warning = this.resolver.registerPrimary(primaryKey);
      if (warning !== null) warnings.push(warning);
    }

    this.byPrimary.set(primaryKey, entity);
    this.spatial.index(primaryKey, entity.footprint);
    this.indexCoordinateHash(entity);
    this.absent.delete(primaryKey);

    return warnings;
  }

  getByPrimary(primaryKey: string): Entity | null {
    return this.byPrimary.get(primaryKey) ?? null;
  }

  getBySecondary(secondaryKey: string): Entity | null {
    const primaryKey = this.resolver.resolve(secondaryKey);
    return primaryKey === null ? null : this.getByPrimary(primaryKey);
  }

  /**
   * Direct primary key lookup, then through the identity resolver
   */
  getByAnyKey(key: string): Entity | null {
    return this.getByPrimary(key) ?? this.getBySecondary(key);
  }

  /**
   * Building under a pick point, null on a spatial miss
   */
  getByPoint(point: PickPoint, tolerance?: number): Entity | null {
    const key = this.spatial.resolve(point, tolerance);
    return key === null ? null : this.getByPrimary(key);
  }

  getByCoordinateHash(hash: string): Entity | null {
    const key = this.byCoordinateHash.get(hash);
    return key === undefined ? null : this.getByPrimary(key);
  }

  /**
   * Current entries by primary key. A copy: later cycles do not change it.
   */
  snapshotAll(): ReadonlyMap<string, Entity> {
    return new Map(this.byPrimary);
  }

  entities(): Entity[] {
    return Array.from(this.byPrimary.values());
  }

  /**
   * Flag a key that disappeared from the source but is retained
   */
  markAbsent(primaryKey: string): void {
    if (this.byPrimary.has(primaryKey)) {
      this.absent.add(primaryKey);
    }
  }

  isAbsent(primaryKey: string): boolean {
    return this.absent.has(primaryKey);
  }

  absentKeys(): ReadonlySet<string> {
    return new Set(this.absent);
  }

  /**
   * Evict one entity and everything indexing it
   */
  remove(primaryKey: string): boolean {
    if (!this.byPrimary.delete(primaryKey)) return false;

    this.spatial.remove(primaryKey);
    this.resolver.forget(primaryKey);
    this.absent.delete(primaryKey);

    const hash = this.hashByPrimary.get(primaryKey);
    if (hash !== undefined) {
      this.hashByPrimary.delete(primaryKey);
      if (this.byCoordinateHash.get(hash) === primaryKey) {
        this.byCoordinateHash.delete(hash);
      }
    }
    return true;
  }

  clear(): void {
    const count = this.byPrimary.size;
    this.byPrimary.clear();
    this.byCoordinateHash.clear();
    this.hashByPrimary.clear();
    this.absent.clear();
    this.spatial.clear();
    this.resolver.clear();
    log.info('Cache cleared', { entities: count });
  }

  /**
   * Secondary key to display color, the lookup the renderer styles tiles
   * with. Falls back to the derived secondary key when none is mapped.
   */
  colorTable(): Map<string, HexColor> {
    const table = new Map<string, HexColor>();
    for (const entity of this.byPrimary.values()) {
      const secondaryKey =
        this.resolver.secondaryFor(entity.primaryKey) ?? deriveSecondary(entity.primaryKey);
      table.set(secondaryKey, entity.colorHex);
    }
    return table;
  }

  stats(): CacheStats {
    const identity = this.resolver.stats();
    return {
      entities: this.byPrimary.size,
      confirmedMappings: identity.confirmed,
      heuristicMappings: identity.heuristic,
      indexedFootprints: this.spatial.size,
      matchableFootprints: this.spatial.matchableCount,
      absentKeys: this.absent.size,
    };
  }

  logStats(): void {
    log.info('Cache statistics', { ...this.stats() });
  }

  private indexCoordinateHash(entity: Entity): void {
    const previous = this.hashByPrimary.get(entity.primaryKey);
    if (previous !== undefined && this.byCoordinateHash.get(previous) === entity.primaryKey) {
      this.byCoordinateHash.delete(previous);
    }

    const bbox = computeBBox(entity.footprint);
    if (bbox === null) {
      this.hashByPrimary.delete(entity.primaryKey);
      return;
    }

    const [minX, minY, maxX, maxY] = bbox;
    const hash = coordinateHash({ x: (minX + maxX) / 2, y: (minY + maxY) / 2 });
    this.byCoordinateHash.set(hash, entity.primaryKey);
    this.hashByPrimary.set(entity.primaryKey, hash);
  }
}
