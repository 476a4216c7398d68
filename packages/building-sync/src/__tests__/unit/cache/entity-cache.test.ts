/**
 * Entity Cache Tests
 */

import { beforeEach, describe, expect, it } from 'vitest';
import type { Entity } from '../../../core/types.js';
import { EntityCache, coordinateHash } from '../../../cache/entity-cache.js';
import { parseRecord } from '../../../ingestion/record-parser.js';
import { buildingRecord, type BuildingRecordOptions } from '../../fixtures/building-records.js';

function entity(options: BuildingRecordOptions): Entity {
  return parseRecord(buildingRecord(options), 0).entity;
}

describe('coordinateHash', () => {
  it('should round to whole meters', () => {
    expect(coordinateHash({ x: 3512000.4, y: 5404000.6 })).toBe('3512000,5404001');
  });
});

describe('EntityCache', () => {
  let cache: EntityCache;

  beforeEach(() => {
    cache = new EntityCache({ toleranceMeters: 10 });
  });

  describe('key lookup', () => {
    it('should reach an entity by primary and confirmed secondary key', () => {
      const building = entity({ primaryKey: 'DEBW_001', secondaryKey: 'DEBWX001' });

      expect(cache.upsert(building)).toEqual([]);

      expect(cache.getByPrimary('DEBW_001')).toBe(building);
      expect(cache.getBySecondary('DEBWX001')).toBe(building);
      expect(cache.getByAnyKey('DEBWX001')).toBe(building);
      expect(cache.getByAnyKey('DEBW_001')).toBe(building);
    });

    it('should reach an entity without a secondary key by its derived key', () => {
      const building = entity({ primaryKey: 'DEBW_001' });
      cache.upsert(building);

      expect(cache.getByAnyKey('DEBWL001')).toBe(building);
      expect(cache.identity.mappingFor('DEBW_001')?.source).toBe('heuristic');
    });

    it('should return null for unknown keys', () => {
      expect(cache.getByAnyKey('DEBWL999')).toBeNull();
    });

    it('should replace the whole entry on upsert', () => {
      cache.upsert(entity({ primaryKey: 'DEBW_001', color: '#ff0000' }));
      cache.upsert(entity({ primaryKey: 'DEBW_001', color: '#0000ff' }));

      expect(cache.size).toBe(1);
      expect(cache.getByPrimary('DEBW_001')?.colorHex).toBe('#0000ff');
    });

    it('should report a secondary key claimed by two buildings', () => {
      cache.upsert(entity({ primaryKey: 'A_1', secondaryKey: 'SHARED' }));

      const warnings = cache.upsert(entity({ primaryKey: 'B_2', secondaryKey: 'SHARED' }));

      expect(warnings).toHaveLength(1);
      expect(warnings[0]).toMatchObject({ type: 'ambiguous_key_mapping', primaryKey: 'A_1' });
      expect(cache.getBySecondary('SHARED')?.primaryKey).toBe('B_2');
    });
  });

  describe('spatial lookup', () => {
    it('should find the building under a pick point', () => {
      cache.upsert(entity({ primaryKey: 'DEBW_001', origin: [0, 0] }));
      cache.upsert(entity({ primaryKey: 'DEBW_002', origin: [100, 0] }));

      expect(cache.getByPoint({ x: 105, y: 5, z: 12 })?.primaryKey).toBe('DEBW_002');
      expect(cache.getByPoint({ x: 50, y: 50 })).toBeNull();
    });

    it('should index the footprint center by coordinate hash', () => {
      cache.upsert(entity({ primaryKey: 'DEBW_001', origin: [0, 0] }));

      expect(cache.getByCoordinateHash('5,5')?.primaryKey).toBe('DEBW_001');
    });

    it('should move the coordinate hash when the footprint moves', () => {
      cache.upsert(entity({ primaryKey: 'DEBW_001', origin: [0, 0] }));
      cache.upsert(entity({ primaryKey: 'DEBW_001', origin: [20, 0] }));

      expect(cache.getByCoordinateHash('5,5')).toBeNull();
      expect(cache.getByCoordinateHash('25,5')?.primaryKey).toBe('DEBW_001');
    });
  });

  describe('snapshots', () => {
    it('should not reflect later upserts', () => {
      cache.upsert(entity({ primaryKey: 'DEBW_001' }));
      const snapshot = cache.snapshotAll();

      cache.upsert(entity({ primaryKey: 'DEBW_002' }));

      expect(snapshot.size).toBe(1);
      expect(cache.snapshotAll().size).toBe(2);
    });
  });

  describe('absence', () => {
    it('should flag retained keys until they are upserted again', () => {
      const building = entity({ primaryKey: 'DEBW_001' });
      cache.upsert(building);

      cache.markAbsent('DEBW_001');
      cache.markAbsent('UNKNOWN');

      expect(cache.isAbsent('DEBW_001')).toBe(true);
      expect(Array.from(cache.absentKeys())).toEqual(['DEBW_001']);
      expect(cache.getByPrimary('DEBW_001')).toBe(building);

      cache.upsert(building);

      expect(cache.isAbsent('DEBW_001')).toBe(false);
    });
  });

  describe('remove', () => {
    it('should drop every index entry for the building', () => {
      cache.upsert(entity({ primaryKey: 'DEBW_001', secondaryKey: 'DEBWL001' }));

      expect(cache.remove('DEBW_001')).toBe(true);

      expect(cache.getByAnyKey('DEBW_001')).toBeNull();
      expect(cache.getByAnyKey('DEBWL001')).toBeNull();
      expect(cache.getByPoint({ x: 5, y: 5 })).toBeNull();
      expect(cache.getByCoordinateHash('5,5')).toBeNull();
      expect(cache.remove('DEBW_001')).toBe(false);
    });
  });

  it('should build the color table keyed by secondary key', () => {
    cache.upsert(entity({ primaryKey: 'DEBW_001', secondaryKey: 'DEBWX001', color: '#FF0000' }));
    cache.upsert(entity({ primaryKey: 'DEBW_002', color: '#00ff00' }));

    expect(Object.fromEntries(cache.colorTable())).toEqual({
      DEBWX001: '#ff0000',
      DEBWL002: '#00ff00',
    });
  });

  it('should report statistics', () => {
    cache.upsert(entity({ primaryKey: 'DEBW_001', secondaryKey: 'DEBWL001' }));
    cache.upsert(entity({ primaryKey: 'DEBW_002', extra: { geom: null } }));
    cache.markAbsent('DEBW_002');

    expect(cache.stats()).toEqual({
      entities: 2,
      confirmedMappings: 1,
      heuristicMappings: 1,
      indexedFootprints: 2,
      matchableFootprints: 1,
      absentKeys: 1,
    });
  });

  it('should clear everything', () => {
    cache.upsert(entity({ primaryKey: 'DEBW_001' }));
    cache.clear();

    expect(cache.size).toBe(0);
    expect(cache.getByAnyKey('DEBWL001')).toBeNull();
    expect(cache.identity.stats()).toEqual({ primaries: 0, confirmed: 0, heuristic: 0 });
  });
});
