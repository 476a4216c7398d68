/**
 * Building Sync Core Types
 *
 * Shared data model for the sync engine: entities, footprints, change
 * records, notifications and non-fatal cycle warnings.
 *
 * TYPE SAFETY: Everything handed to external readers is readonly. The
 * cache replaces entries wholesale per key, never mutates them in place.
 */

// ============================================================================
// Geometry
// ============================================================================

/**
 * 2D point in the projected footprint coordinate system (meters)
 */
export interface Point2D {
  readonly x: number;
  readonly y: number;
}

/**
 * Pick point from the visualization layer. Height is carried but ignored
 * by spatial resolution.
 */
export interface PickPoint extends Point2D {
  readonly z?: number;
}

/**
 * One closed or open polygon ring. Closure is not required; the
 * containment test wraps the last vertex back to the first.
 */
export type Ring = readonly Point2D[];

/**
 * Building ground outline: one or more rings (outer rings, holes and
 * multipolygon parts flattened together)
 */
export interface Footprint {
  readonly rings: readonly Ring[];
}

/**
 * Axis-aligned bounding box [minX, minY, maxX, maxY]
 */
export type BBox = readonly [number, number, number, number];

export const EMPTY_FOOTPRINT: Footprint = { rings: [] };

// ============================================================================
// Color
// ============================================================================

/**
 * sRGB display color, 0-255 per channel
 */
export interface RGB {
  readonly r: number;
  readonly g: number;
  readonly b: number;
}

/**
 * Canonical lowercase `#rrggbb` color token
 */
export type HexColor = `#${string}`;

// ============================================================================
// Entity
// ============================================================================

/**
 * Energy figures extracted for display. Values are as supplied by the
 * source (CO2 in kg/a, specific demand in kWh/m²a); null when absent.
 */
export interface EnergyFigures {
  readonly co2Before: number | null;
  readonly co2After: number | null;
  readonly demandSpecificBefore: number | null;
  readonly demandSpecificAfter: number | null;
}

/**
 * One physical building as held by the cache
 */
export interface Entity {
  /** Format A identifier (`modified_gml_id`, contains `_`) */
  readonly primaryKey: string;
  /** Format B identifier (`gml_id`) when confirmed by the source */
  readonly secondaryKey?: string;
  /** Canonical JSON of the full source record; equality only */
  readonly attributesSnapshot: string;
  /** Energy field used for change classification */
  readonly energyValue: number | null;
  readonly energy: EnergyFigures;
  readonly colorHex: HexColor;
  readonly color: RGB;
  readonly footprint: Footprint;
}

// ============================================================================
// Identity
// ============================================================================

/**
 * Where a primary/secondary association came from. Confirmed beats
 * heuristic, enforced when the mapping is written.
 */
export type KeySource = 'confirmed' | 'heuristic';

export interface KeyMapping {
  readonly primaryKey: string;
  readonly secondaryKey: string;
  readonly source: KeySource;
}

// ============================================================================
// Change Detection
// ============================================================================

export type ChangeKind =
  | 'NEW'
  | 'ATTRIBUTE_CHANGED'
  | 'COLOR_CHANGED'
  | 'UNCHANGED'
  | 'REMOVED';

export interface ChangeRecord {
  readonly key: string;
  readonly kind: ChangeKind;
  readonly previousSnapshot?: string;
}

/**
 * Pushed to subscribers after every cycle with at least one change
 */
export interface ChangeNotification {
  readonly cycle: number;
  readonly keys: readonly string[];
  readonly kinds: ReadonlyMap<string, ChangeKind>;
}

// ============================================================================
// Warnings
// ============================================================================

/**
 * Non-fatal conditions surfaced on a cycle report. None of these abort
 * the cycle.
 */
export type SyncWarning =
  | {
      readonly type: 'record_skipped';
      readonly index: number;
      readonly reason: string;
    }
  | {
      readonly type: 'color_defaulted';
      readonly key: string;
      readonly value: string;
    }
  | {
      readonly type: 'geometry_discarded';
      readonly key: string;
      readonly reason: string;
    }
  | {
      readonly type: 'ambiguous_key_mapping';
      readonly primaryKey: string;
      readonly confirmedSecondary: string;
      readonly conflictingSecondary: string;
      readonly conflictingSource: KeySource;
      /** Other building claiming the same secondary key */
      readonly conflictingPrimary?: string;
    };

export type SyncWarningType = SyncWarning['type'];
