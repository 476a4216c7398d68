/**
 * Differencer - Per-Building Change Classification
 *
 * Compares one fetched record list against the previous cache snapshot and
 * labels every building NEW, UNCHANGED, COLOR_CHANGED, ATTRIBUTE_CHANGED or
 * REMOVED. The previous snapshot is only read; applying the result to the
 * cache is the caller's job.
 *
 * CLASSIFICATION (record present in both):
 * - identical attribute snapshot: UNCHANGED
 * - color token differs: COLOR_CHANGED (also when energy moved)
 * - otherwise: ATTRIBUTE_CHANGED (energy beyond epsilon, or any other field)
 */

import type { ChangeKind, ChangeRecord, Entity, SyncWarning } from '../core/types.js';
import { isMalformedRecordError } from '../core/errors.js';
import type { IdentityResolver } from '../identity/identity-resolver.js';
import { parseRecord } from '../ingestion/record-parser.js';
import { createLogger } from '../core/utils/logger.js';

const log = createLogger({ module: 'differencer' });

/** Energy values closer than this count as equal */
export const ENERGY_EPSILON = 0.01;

export interface DiffResult {
  /** Incoming order, REMOVED appended in previous order */
  readonly changes: readonly ChangeRecord[];
  /** Parsed incoming buildings by primary key (last duplicate wins) */
  readonly entities: ReadonlyMap<string, Entity>;
  /** Keys reported REMOVED this cycle */
  readonly removed: readonly string[];
  readonly warnings: readonly SyncWarning[];
  readonly skippedRecords: number;
}

export function energyChanged(previous: number | null, next: number | null): boolean {
  if (previous === null || next === null) return previous !== next;
  return Math.abs(previous - next) > ENERGY_EPSILON;
}

/**
 * Kind for a building present in both snapshots
 */
export function classifyChange(previous: Entity, next: Entity): ChangeKind {
  if (previous.attributesSnapshot === next.attributesSnapshot) {
    return 'UNCHANGED';
  }
  if (previous.colorHex !== next.colorHex) {
    return 'COLOR_CHANGED';
  }
  return 'ATTRIBUTE_CHANGED';
}

export function hasChanges(changes: readonly ChangeRecord[]): boolean {
  return changes.some((change) => change.kind !== 'UNCHANGED');
}

export class Differencer {
  constructor(private readonly resolver: IdentityResolver) {}

  /**
   * Classify an incoming record list against the previous snapshot
   *
   * @param previous - Cache snapshot before this cycle
   * @param incoming - Raw records, in source order
   * @param alreadyAbsent - Keys reported REMOVED in an earlier cycle and
   *   still missing; not reported again
   */
  diff(
    previous: ReadonlyMap<string, Entity>,
    incoming: readonly unknown[],
    alreadyAbsent: ReadonlySet<string> = new Set()
  ): DiffResult {
    const warnings: SyncWarning[] = [];
    const entities = new Map<string, Entity>();
    let skippedRecords = 0;

    incoming.forEach((raw, index) => {
      try {
        const parsed = parseRecord(raw, index);
        warnings.push(...parsed.warnings);

        const { primaryKey, secondaryKey } = parsed.entity;
        const warning =
          secondaryKey !== undefined
            ? this.resolver.recordConfirmedMapping(primaryKey, secondaryKey)
            : this.resolver.registerPrimary(primaryKey);
        if (warning !== null) warnings.push(warning);

        entities.set(primaryKey, parsed.entity);
      } catch (error) {
        if (!isMalformedRecordError(error)) throw error;
        skippedRecords++;
        warnings.push({ type: 'record_skipped', index: error.index, reason: error.message });
        log.warn('Skipping malformed record', { index: error.index, reason: error.message });
      }
    });

    const changes: ChangeRecord[] = [];
    let energyChanges = 0;
    for (const [key, entity] of entities) {
      const before = previous.get(key);
      if (before === undefined) {
        changes.push({ key, kind: 'NEW' });
        continue;
      }
      const kind = classifyChange(before, entity);
      if (kind !== 'UNCHANGED' && energyChanged(before.energyValue, entity.energyValue)) {
        energyChanges++;
      }
      changes.push(
        kind === 'UNCHANGED'
          ? { key, kind }
          : { key, kind, previousSnapshot: before.attributesSnapshot }
      );
    }

    const removed: string[] = [];
    for (const [key, before] of previous) {
      if (entities.has(key) || alreadyAbsent.has(key)) continue;
      removed.push(key);
      changes.push({ key, kind: 'REMOVED', previousSnapshot: before.attributesSnapshot });
    }

    log.debug('Diff complete', {
      incoming: incoming.length,
      buildings: entities.size,
      changed: changes.filter((change) => change.kind !== 'UNCHANGED').length,
      energyChanges,
      removed: removed.length,
      skipped: skippedRecords,
    });

    return { changes, entities, removed, warnings, skippedRecords };
  }
}
