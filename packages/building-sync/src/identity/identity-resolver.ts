/**
 * Identity Resolver
 *
 * The source names every building twice: the bulk energy feed uses the
 * primary key (`modified_gml_id`, contains `_`) and the per-building
 * attribute endpoint uses the secondary key (`gml_id`). The secondary key
 * is usually the primary with every `_` replaced by `L`, but only a record
 * carrying both keys proves it.
 *
 * INVARIANTS:
 * - Confirmed mappings are written only from source records carrying both
 *   keys and are never replaced by a heuristic guess
 * - A heuristic guess that disagrees with a confirmed mapping is reported,
 *   not applied
 * - A primary that lost a secondary key to a later confirmed claim does not
 *   take it back while the winner still holds it
 * - Keys are case-sensitive
 */

import type { KeyMapping, KeySource, SyncWarning } from '../core/types.js';
import { createLogger } from '../core/utils/logger.js';

const log = createLogger({ module: 'identity-resolver' });

/**
 * Heuristic primary to secondary key derivation
 *
 * @example deriveSecondary('DEBW_001000wrHDD') === 'DEBWL001000wrHDD'
 */
export function deriveSecondary(primaryKey: string): string {
  return primaryKey.replaceAll('_', 'L');
}

interface MappingEntry {
  readonly secondaryKey: string;
  readonly source: KeySource;
}

export interface IdentityResolverStats {
  readonly primaries: number;
  readonly confirmed: number;
  readonly heuristic: number;
}

export class IdentityResolver {
  private readonly primaries = new Set<string>();
  private readonly byPrimary = new Map<string, MappingEntry>();
  private readonly confirmedBySecondary = new Map<string, string>();
  private readonly heuristicBySecondary = new Map<string, string>();
  /** Primary key to the secondary key it lost to a later claim */
  private readonly superseded = new Map<string, string>();

  /**
   * Register a primary key seen without a confirmed partner. Adds a
   * heuristic mapping unless a confirmed one already exists.
   *
   * @returns a warning when an existing confirmed mapping disagrees with
   *   the derived key, otherwise null
   */
  registerPrimary(primaryKey: string): SyncWarning | null {
    this.primaries.add(primaryKey);

    const derived = deriveSecondary(primaryKey);
    const existing = this.byPrimary.get(primaryKey);

    if (existing?.source === 'confirmed') {
      if (existing.secondaryKey !== derived) {
        return this.ambiguity(primaryKey, existing.secondaryKey, derived, 'heuristic');
      }
      return null;
    }

    // Derived key already confirmed for another building
    const confirmedOwner = this.confirmedBySecondary.get(derived);
    if (confirmedOwner !== undefined && confirmedOwner !== primaryKey) {
      return this.ambiguity(confirmedOwner, derived, derived, 'heuristic', primaryKey);
    }

    if (existing === undefined) {
      this.byPrimary.set(primaryKey, { secondaryKey: derived, source: 'heuristic' });
      if (!this.heuristicBySecondary.has(derived)) {
        this.heuristicBySecondary.set(derived, primaryKey);
      }
    }
    return null;
  }

  /**
   * Record a mapping observed in the source. Replaces any heuristic
   * mapping for the primary key; a later confirmed claim on the same
   * secondary key by another primary wins and is reported once. The loser
   * re-observing its old claim is a no-op while the winner holds the key.
   */
  recordConfirmedMapping(primaryKey: string, secondaryKey: string): SyncWarning | null {
    this.primaries.add(primaryKey);

    const previousOwner = this.confirmedBySecondary.get(secondaryKey);
    if (
      previousOwner !== undefined &&
      previousOwner !== primaryKey &&
      this.superseded.get(primaryKey) === secondaryKey
    ) {
      return null;
    }

    let warning: SyncWarning | null = null;
    const previous = this.byPrimary.get(primaryKey);

    if (previous !== undefined) {
      if (previous.source === 'confirmed' && previous.secondaryKey === secondaryKey) {
        return null;
      }
      this.unlinkSecondary(primaryKey, previous);
    }

    if (previousOwner !== undefined && previousOwner !== primaryKey) {
      warning = this.ambiguity(previousOwner, secondaryKey, secondaryKey, 'confirmed', primaryKey);
      this.byPrimary.delete(previousOwner);
      this.superseded.set(previousOwner, secondaryKey);
    }

    this.superseded.delete(primaryKey);
    this.byPrimary.set(primaryKey, { secondaryKey, source: 'confirmed' });
    this.confirmedBySecondary.set(secondaryKey, primaryKey);
    return warning;
  }

  /**
   * Canonical primary key for either key form. Known primaries first, then
   * confirmed mappings, then heuristic ones. Null when unknown.
   */
  resolve(key: string): string | null {
    if (this.primaries.has(key)) return key;
    return this.confirmedBySecondary.get(key) ?? this.heuristicBySecondary.get(key) ?? null;
  }

  secondaryFor(primaryKey: string): string | null {
    return this.byPrimary.get(primaryKey)?.secondaryKey ?? null;
  }

  mappingFor(primaryKey: string): KeyMapping | null {
    const entry = this.byPrimary.get(primaryKey);
    return entry === undefined ? null : { primaryKey, ...entry };
  }

  mappings(): KeyMapping[] {
    return Array.from(this.byPrimary, ([primaryKey, entry]) => ({ primaryKey, ...entry }));
  }

  /**
   * Drop everything known about a primary key
   */
  forget(primaryKey: string): void {
    const entry = this.byPrimary.get(primaryKey);
    if (entry !== undefined) {
      this.unlinkSecondary(primaryKey, entry);
      this.byPrimary.delete(primaryKey);
    }
    this.primaries.delete(primaryKey);
    this.superseded.delete(primaryKey);
  }

  clear(): void {
    this.primaries.clear();
    this.byPrimary.clear();
    this.confirmedBySecondary.clear();
    this.heuristicBySecondary.clear();
    this.superseded.clear();
  }

  stats(): IdentityResolverStats {
    let confirmed = 0;
    let heuristic = 0;
    for (const entry of this.byPrimary.values()) {
      if (entry.source === 'confirmed') confirmed++;
      else heuristic++;
    }
    return { primaries: this.primaries.size, confirmed, heuristic };
  }

  private unlinkSecondary(primaryKey: string, entry: MappingEntry): void {
    const index = entry.source === 'confirmed' ? this.confirmedBySecondary : this.heuristicBySecondary;
    if (index.get(entry.secondaryKey) === primaryKey) {
      index.delete(entry.secondaryKey);
    }
  }

  private ambiguity(
    primaryKey: string,
    confirmedSecondary: string,
    conflictingSecondary: string,
    conflictingSource: KeySource,
    conflictingPrimary?: string
  ): SyncWarning {
    log.warn('Ambiguous key mapping', {
      primaryKey,
      confirmedSecondary,
      conflictingSecondary,
      conflictingSource,
      ...(conflictingPrimary !== undefined ? { conflictingPrimary } : {}),
    });
    return {
      type: 'ambiguous_key_mapping',
      primaryKey,
      confirmedSecondary,
      conflictingSecondary,
      conflictingSource,
      ...(conflictingPrimary !== undefined ? { conflictingPrimary } : {}),
    };
  }
}
