/**
 * Differencer Tests
 */

import { beforeEach, describe, expect, it } from 'vitest';
import type { Entity } from '../../../core/types.js';
import { IdentityResolver } from '../../../identity/identity-resolver.js';
import { Differencer, classifyChange, energyChanged, hasChanges } from '../../../sync/differencer.js';
import { parseRecord } from '../../../ingestion/record-parser.js';
import { buildingRecord } from '../../fixtures/building-records.js';

describe('energyChanged', () => {
  it('should ignore differences within epsilon', () => {
    expect(energyChanged(95.5, 95.505)).toBe(false);
    expect(energyChanged(95.5, 95.52)).toBe(true);
  });

  it('should treat a value appearing or vanishing as a change', () => {
    expect(energyChanged(null, 1)).toBe(true);
    expect(energyChanged(null, null)).toBe(false);
  });
});

describe('classifyChange', () => {
  const base = parseRecord(buildingRecord({ primaryKey: 'DEBW_001' }), 0).entity;

  it('should classify by snapshot, then by color', () => {
    const recolored = parseRecord(buildingRecord({ primaryKey: 'DEBW_001', color: '#ff0000' }), 0).entity;
    const renamed = parseRecord(
      buildingRecord({ primaryKey: 'DEBW_001', extra: { street: 'Hauptstr. 1' } }),
      0
    ).entity;

    expect(classifyChange(base, base)).toBe('UNCHANGED');
    expect(classifyChange(base, recolored)).toBe('COLOR_CHANGED');
    expect(classifyChange(base, renamed)).toBe('ATTRIBUTE_CHANGED');
  });

  it('should report an energy move with an unchanged color as an attribute change', () => {
    const moved = parseRecord(buildingRecord({ primaryKey: 'DEBW_001', demandAfter: 60 }), 0).entity;

    expect(classifyChange(base, moved)).toBe('ATTRIBUTE_CHANGED');
  });
});

describe('Differencer', () => {
  let resolver: IdentityResolver;
  let differencer: Differencer;

  beforeEach(() => {
    resolver = new IdentityResolver();
    differencer = new Differencer(resolver);
  });

  function snapshotOf(records: readonly unknown[]): ReadonlyMap<string, Entity> {
    return new Differencer(new IdentityResolver()).diff(new Map(), records).entities;
  }

  it('should report every building NEW against an empty snapshot', () => {
    const result = differencer.diff(new Map(), [
      buildingRecord({ primaryKey: 'DEBW_001' }),
      buildingRecord({ primaryKey: 'DEBW_002' }),
    ]);

    expect(result.changes).toEqual([
      { key: 'DEBW_001', kind: 'NEW' },
      { key: 'DEBW_002', kind: 'NEW' },
    ]);
    expect(hasChanges(result.changes)).toBe(true);
    expect(result.warnings).toEqual([]);
  });

  it('should report nothing changed for an identical payload', () => {
    const records = [buildingRecord({ primaryKey: 'DEBW_001' }), buildingRecord({ primaryKey: 'DEBW_002' })];
    const previous = snapshotOf(records);

    const result = differencer.diff(previous, records);

    expect(result.changes.map((change) => change.kind)).toEqual(['UNCHANGED', 'UNCHANGED']);
    expect(hasChanges(result.changes)).toBe(false);
  });

  it('should carry the previous snapshot on changed buildings', () => {
    const previous = snapshotOf([buildingRecord({ primaryKey: 'DEBW_001', color: '#00ff00' })]);

    const result = differencer.diff(previous, [buildingRecord({ primaryKey: 'DEBW_001', color: '#ff0000' })]);

    expect(result.changes).toEqual([
      {
        key: 'DEBW_001',
        kind: 'COLOR_CHANGED',
        previousSnapshot: previous.get('DEBW_001')?.attributesSnapshot,
      },
    ]);
  });

  it('should append REMOVED for keys missing from the payload', () => {
    const previous = snapshotOf([
      buildingRecord({ primaryKey: 'DEBW_001' }),
      buildingRecord({ primaryKey: 'DEBW_002' }),
    ]);

    const result = differencer.diff(previous, [buildingRecord({ primaryKey: 'DEBW_002' })]);

    expect(result.changes.map(({ key, kind }) => [key, kind])).toEqual([
      ['DEBW_002', 'UNCHANGED'],
      ['DEBW_001', 'REMOVED'],
    ]);
    expect(result.removed).toEqual(['DEBW_001']);
  });

  it('should not report an already absent key again', () => {
    const previous = snapshotOf([buildingRecord({ primaryKey: 'DEBW_001' })]);

    const result = differencer.diff(previous, [], new Set(['DEBW_001']));

    expect(result.changes).toEqual([]);
    expect(result.removed).toEqual([]);
  });

  it('should skip malformed records without affecting the rest', () => {
    const result = differencer.diff(new Map(), [
      buildingRecord({ primaryKey: 'DEBW_001' }),
      { gml_id: 'DEBWL002' },
      'not a record',
      buildingRecord({ primaryKey: 'DEBW_003' }),
    ]);

    expect(Array.from(result.entities.keys())).toEqual(['DEBW_001', 'DEBW_003']);
    expect(result.skippedRecords).toBe(2);
    expect(result.warnings).toEqual([
      { type: 'record_skipped', index: 1, reason: 'Record has no modified_gml_id' },
      { type: 'record_skipped', index: 2, reason: 'Record is not an object' },
    ]);
  });

  it('should keep the last duplicate at the position of the first', () => {
    const result = differencer.diff(new Map(), [
      buildingRecord({ primaryKey: 'DEBW_001', color: '#ff0000' }),
      buildingRecord({ primaryKey: 'DEBW_002' }),
      buildingRecord({ primaryKey: 'DEBW_001', color: '#0000ff' }),
    ]);

    expect(result.changes.map((change) => change.key)).toEqual(['DEBW_001', 'DEBW_002']);
    expect(result.entities.get('DEBW_001')?.colorHex).toBe('#0000ff');
  });

  it('should register observed keys with the resolver', () => {
    differencer.diff(new Map(), [
      buildingRecord({ primaryKey: 'DEBW_001', secondaryKey: 'DEBWX001' }),
      buildingRecord({ primaryKey: 'DEBW_002' }),
    ]);

    expect(resolver.resolve('DEBWX001')).toBe('DEBW_001');
    expect(resolver.resolve('DEBWL002')).toBe('DEBW_002');
  });

  it('should pass record warnings through', () => {
    const result = differencer.diff(new Map(), [buildingRecord({ primaryKey: 'DEBW_001', color: 'n/a' })]);

    expect(result.warnings).toEqual([{ type: 'color_defaulted', key: 'DEBW_001', value: 'n/a' }]);
    expect(result.changes).toEqual([{ key: 'DEBW_001', kind: 'NEW' }]);
  });
});
