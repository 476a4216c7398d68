/**
 * Building Sync Engine
 *
 * Facade wiring the fetch, diff, cache update and notify cycle to the
 * adaptive poller. Consumers read buildings through it and subscribe to
 * change notifications; nothing else mutates the cache.
 *
 * CYCLE:
 * 1. Fetch raw payload (TransportFailureError: state untouched)
 * 2. Unwrap records (MalformedPayloadError: cache untouched, quiet cycle)
 * 3. Diff against the cache snapshot, skipping malformed records
 * 4. Apply: upsert changed buildings, retain or evict removed ones
 * 5. Notify subscribers when anything changed
 *
 * @example
 * ```typescript
 * const engine = new BuildingSyncEngine({ fetcher, config: createConfig() });
 * engine.subscribe(({ keys, kinds }) => restyle(keys, kinds));
 * engine.start();
 * ```
 */

import type { EngineConfig } from '../core/config.js';
import { DEFAULT_CONFIG } from '../core/config.js';
import type {
  ChangeRecord,
  Entity,
  HexColor,
  PickPoint,
  SyncWarning,
} from '../core/types.js';
import { errorMessage, isMalformedPayloadError } from '../core/errors.js';
import { createLogger } from '../core/utils/logger.js';
import type { CacheStats } from '../cache/entity-cache.js';
import { EntityCache } from '../cache/entity-cache.js';
import type { BuildingFetcher } from '../fetch/building-fetcher.js';
import { extractRecords } from '../ingestion/payload.js';
import type { ChangeListener } from '../notify/change-notifier.js';
import { ChangeNotifier, buildNotification } from '../notify/change-notifier.js';
import type { CycleContext } from './adaptive-poller.js';
import { AdaptivePoller } from './adaptive-poller.js';
import { Differencer, hasChanges } from './differencer.js';
import type { CycleOutcome, PollingState } from './polling-state.js';

const log = createLogger({ module: 'engine' });

export type CycleStatus = 'applied' | 'malformed_payload' | 'transport_failure' | 'discarded';

export interface CycleReport {
  readonly cycle: number;
  readonly status: CycleStatus;
  readonly outcome: CycleOutcome;
  readonly changes: readonly ChangeRecord[];
  readonly warnings: readonly SyncWarning[];
  readonly error?: string;
  readonly durationMs: number;
}

export interface EngineStatus {
  readonly running: boolean;
  readonly inFlight: boolean;
  readonly adaptive: boolean;
  readonly polling: PollingState;
  readonly cycles: number;
  readonly failedCycles: number;
  readonly lastReport: CycleReport | null;
  readonly lastError: string | null;
  readonly cache: CacheStats;
}

export interface BuildingSyncEngineOptions {
  readonly fetcher: BuildingFetcher;
  readonly config?: EngineConfig;
  /** Clock (default Date.now) */
  readonly now?: () => number;
}

const ALWAYS_CURRENT: Pick<CycleContext, 'isCurrent'> = { isCurrent: () => true };

export class BuildingSyncEngine {
  readonly config: EngineConfig;
  private readonly fetcher: BuildingFetcher;
  private readonly cache: EntityCache;
  private readonly differencer: Differencer;
  private readonly notifier = new ChangeNotifier();
  private readonly poller: AdaptivePoller;
  private readonly now: () => number;

  private busy = false;
  /** Settles when the last queued cycle ends; every cycle chains onto it */
  private idle: Promise<void> = Promise.resolve();
  private abortController: AbortController | null = null;
  private cycleCounter = 0;
  private failedCycles = 0;
  private lastReport: CycleReport | null = null;
  private lastError: string | null = null;

  constructor(options: BuildingSyncEngineOptions) {
    this.config = options.config ?? DEFAULT_CONFIG;
    this.fetcher = options.fetcher;
    this.now = options.now ?? Date.now;
    this.cache = new EntityCache({ toleranceMeters: this.config.spatial.toleranceMeters });
    this.differencer = new Differencer(this.cache.identity);
    this.poller = new AdaptivePoller(
      async (context) => (await this.enqueueCycle(context)).outcome,
      this.config.polling,
      {
        now: this.now,
        onStateChange: (state, outcome) =>
          log.debug('Polling state', { outcome, mode: state.mode, quietCycles: state.consecutiveNoChangeCount }),
      }
    );
  }

  // ==========================================================================
  // Lifecycle
  // ==========================================================================

  start(): void {
    this.poller.start();
  }

  /**
   * Cancel the pending timer and abort an in-flight fetch. Its result, if
   * any, is discarded.
   */
  stop(): void {
    this.poller.stop();
    this.abortController?.abort();
  }

  /**
   * Manual refresh. Deferred until the current cycle ends when one is in
   * flight.
   *
   * @returns true when a cycle was scheduled immediately
   */
  refreshNow(): boolean {
    return this.poller.triggerNow();
  }

  /**
   * Run exactly one cycle outside the poller
   *
   * @throws Error while polling is running or a cycle is in flight
   */
  async runCycle(): Promise<CycleReport> {
    if (this.poller.isRunning || this.busy) {
      throw new Error('runCycle() requires the poller to be stopped; use refreshNow() while polling');
    }
    return this.enqueueCycle(ALWAYS_CURRENT);
  }

  setAdaptivePolling(enabled: boolean): void {
    this.poller.setAdaptive(enabled);
  }

  subscribe(listener: ChangeListener): () => void {
    return this.notifier.subscribe(listener);
  }

  // ==========================================================================
  // Read Accessors
  // ==========================================================================

  getByAnyKey(key: string): Entity | null {
    return this.cache.getByAnyKey(key);
  }

  getByPrimary(primaryKey: string): Entity | null {
    return this.cache.getByPrimary(primaryKey);
  }

  getBySecondary(secondaryKey: string): Entity | null {
    return this.cache.getBySecondary(secondaryKey);
  }

  getByPoint(point: PickPoint, tolerance?: number): Entity | null {
    return this.cache.getByPoint(point, tolerance);
  }

  entities(): Entity[] {
    return this.cache.entities();
  }

  /**
   * Secondary key to hex color, ready for a renderer style expression
   */
  buildColorTable(): Record<string, HexColor> {
    return Object.fromEntries(this.cache.colorTable());
  }

  getStatus(): EngineStatus {
    return {
      running: this.poller.isRunning,
      inFlight: this.busy,
      adaptive: this.poller.isAdaptive,
      polling: this.poller.getState(),
      cycles: this.cycleCounter,
      failedCycles: this.failedCycles,
      lastReport: this.lastReport,
      lastError: this.lastError,
      cache: this.cache.stats(),
    };
  }

  logCacheStatistics(): void {
    this.cache.logStats();
  }

  /**
   * Explicit invalidation; the next cycle reports every building as NEW
   */
  clearCache(): void {
    this.cache.clear();
  }

  // ==========================================================================
  // Cycle
  // ==========================================================================

  /**
   * Run a cycle once every earlier one has settled. Polling cycles and
   * runCycle() share this queue, so at most one fetch is in flight.
   */
  private enqueueCycle(context: Pick<CycleContext, 'isCurrent'>): Promise<CycleReport> {
    const run = this.idle.then(() => this.executeCycle(context));
    // Failures reach the caller through `run`
    this.idle = run.then(
      () => undefined,
      () => undefined
    );
    return run;
  }

  private async executeCycle(context: Pick<CycleContext, 'isCurrent'>): Promise<CycleReport> {
    const cycle = ++this.cycleCounter;
    const startedAt = this.now();
    const controller = new AbortController();
    this.abortController = controller;
    this.busy = true;

    const finish = (report: Omit<CycleReport, 'cycle' | 'durationMs'>): CycleReport => {
      const full: CycleReport = { cycle, durationMs: this.now() - startedAt, ...report };
      if (report.status !== 'discarded') {
        this.lastReport = full;
      }
      return full;
    };

    try {
      if (!context.isCurrent()) {
        log.debug('Skipping cycle queued before stop', { cycle });
        return finish({ status: 'discarded', outcome: 'failed', changes: [], warnings: [] });
      }

      let payload: unknown;
      try {
        payload = await this.fetcher.fetch(controller.signal);
      } catch (error) {
        if (!context.isCurrent()) {
          return finish({ status: 'discarded', outcome: 'failed', changes: [], warnings: [] });
        }
        return finish(this.failedFetch(cycle, error));
      }

      if (!context.isCurrent()) {
        log.debug('Discarding result of stopped cycle', { cycle });
        return finish({ status: 'discarded', outcome: 'failed', changes: [], warnings: [] });
      }

      let records: readonly unknown[];
      try {
        records = extractRecords(payload);
      } catch (error) {
        return finish(this.failedFetch(cycle, error));
      }

      const diff = this.differencer.diff(this.cache.snapshotAll(), records, this.cache.absentKeys());
      const warnings: SyncWarning[] = [...diff.warnings];

      for (const change of diff.changes) {
        const entity = diff.entities.get(change.key);
        switch (change.kind) {
          case 'REMOVED':
            if (this.config.sync.removalPolicy === 'evict') {
              this.cache.remove(change.key);
            } else {
              this.cache.markAbsent(change.key);
            }
            break;
          case 'UNCHANGED':
            // Reappeared after being reported removed
            if (entity !== undefined && this.cache.isAbsent(change.key)) {
              warnings.push(...this.cache.upsert(entity));
            }
            break;
          default:
            if (entity !== undefined) {
              warnings.push(...this.cache.upsert(entity));
            }
        }
      }

      this.lastError = null;
      const notification = buildNotification(cycle, diff.changes);
      if (notification !== null) {
        log.info('Buildings changed', { cycle, changed: notification.keys.length });
        this.notifier.publish(notification);
      }

      return finish({
        status: 'applied',
        outcome: hasChanges(diff.changes) ? 'changed' : 'unchanged',
        changes: diff.changes,
        warnings,
      });
    } finally {
      this.busy = false;
      if (this.abortController === controller) {
        this.abortController = null;
      }
    }
  }

  private failedFetch(cycle: number, error: unknown): Omit<CycleReport, 'cycle' | 'durationMs'> {
    this.failedCycles++;
    this.lastError = errorMessage(error);

    if (isMalformedPayloadError(error)) {
      log.warn('Malformed payload, cache left untouched', { cycle, error: error.message });
      return {
        status: 'malformed_payload',
        outcome: 'unchanged',
        changes: [],
        warnings: [],
        error: error.message,
      };
    }

    log.warn('Fetch failed, keeping last known state', { cycle, error: this.lastError });
    return {
      status: 'transport_failure',
      outcome: 'failed',
      changes: [],
      warnings: [],
      error: this.lastError,
    };
  }
}
