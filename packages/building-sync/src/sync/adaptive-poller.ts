/**
 * Adaptive Poller
 *
 * Single-timer scheduler driving fetch cycles. The next cycle is scheduled
 * only after the previous one completes, so cycles never overlap. A manual
 * trigger arriving while a cycle is in flight is deferred until it ends.
 *
 * STOP SEMANTICS: stop() cancels the pending timer. A cycle already in
 * flight runs to completion, but its context reports `isCurrent() ===
 * false` so the cycle discards its result instead of touching the cache.
 */

import type { PollingConfig } from '../core/config.js';
import { errorMessage } from '../core/errors.js';
import { createLogger } from '../core/utils/logger.js';
import type { CycleOutcome, PollingState } from './polling-state.js';
import { initialPollingState, intervalFor, nextPollingState } from './polling-state.js';

const log = createLogger({ module: 'poller' });

export interface CycleContext {
  /** 1-based cycle number since construction */
  readonly cycle: number;
  /** False once the poller was stopped or restarted after this cycle began */
  isCurrent(): boolean;
}

/**
 * One fetch, diff, update and notify pass
 */
export type CycleRunner = (context: CycleContext) => Promise<CycleOutcome>;

export interface AdaptivePollerOptions {
  /** Clock for lastFetchTimestamp (default Date.now) */
  readonly now?: () => number;
  /** Called after every state transition */
  readonly onStateChange?: (state: PollingState, outcome: CycleOutcome) => void;
}

export class AdaptivePoller {
  private config: PollingConfig;
  private state: PollingState;
  private timer: ReturnType<typeof setTimeout> | null = null;
  private running = false;
  private inFlight = false;
  private pendingTrigger = false;
  private generation = 0;
  private cycleCount = 0;
  private readonly now: () => number;
  private readonly onStateChange?: (state: PollingState, outcome: CycleOutcome) => void;

  constructor(
    private readonly runCycle: CycleRunner,
    config: PollingConfig,
    options: AdaptivePollerOptions = {}
  ) {
    this.config = config;
    this.state = initialPollingState(config);
    this.now = options.now ?? Date.now;
    this.onStateChange = options.onStateChange;
  }

  /**
   * Enter FAST with a zero count and run the first cycle immediately.
   * No-op when already running.
   */
  start(): void {
    if (this.running) return;

    this.running = true;
    this.generation++;
    this.state = initialPollingState(this.config);
    log.info('Polling started', { intervalMs: this.state.intervalMs, adaptive: this.config.adaptive });
    this.schedule(0);
  }

  stop(): void {
    if (!this.running) return;

    this.running = false;
    this.generation++;
    this.pendingTrigger = false;
    this.clearTimer();
    log.info('Polling stopped', { cycles: this.cycleCount });
  }

  /**
   * Run a cycle now instead of waiting for the timer
   *
   * @returns false when stopped or deferred behind an in-flight cycle
   */
  triggerNow(): boolean {
    if (!this.running) return false;

    if (this.inFlight) {
      this.pendingTrigger = true;
      log.debug('Manual refresh deferred, cycle in flight');
      return false;
    }

    this.schedule(0);
    return true;
  }

  /**
   * Toggle adaptive slow-down. Resets the quiet-cycle count and returns to
   * the fast interval; a pending timer is re-armed with it.
   */
  setAdaptive(enabled: boolean): void {
    this.config = { ...this.config, adaptive: enabled };
    this.state = {
      ...this.state,
      mode: 'FAST',
      intervalMs: intervalFor('FAST', this.config),
      consecutiveNoChangeCount: 0,
    };
    if (this.timer !== null) {
      this.schedule(this.state.intervalMs);
    }
    log.info('Adaptive polling toggled', { enabled });
  }

  getState(): PollingState {
    return this.state;
  }

  get isRunning(): boolean {
    return this.running;
  }

  get isInFlight(): boolean {
    return this.inFlight;
  }

  get isAdaptive(): boolean {
    return this.config.adaptive;
  }

  get cycles(): number {
    return this.cycleCount;
  }

  private schedule(delayMs: number): void {
    this.clearTimer();
    this.timer = setTimeout(() => {
      this.timer = null;
      void this.tick();
    }, delayMs);
  }

  private clearTimer(): void {
    if (this.timer !== null) {
      clearTimeout(this.timer);
      this.timer = null;
    }
  }

  private async tick(): Promise<void> {
    if (!this.running) return;
    if (this.inFlight) {
      this.pendingTrigger = true;
      return;
    }

    const generation = this.generation;
    const context: CycleContext = {
      cycle: ++this.cycleCount,
      isCurrent: () => this.running && this.generation === generation,
    };

    this.inFlight = true;
    let outcome: CycleOutcome;
    try {
      outcome = await this.runCycle(context);
    } catch (error) {
      log.error('Cycle failed unexpectedly', { cycle: context.cycle, error: errorMessage(error) });
      outcome = 'failed';
    } finally {
      this.inFlight = false;
    }

    if (!context.isCurrent()) {
      // Restarted while this cycle was in flight
      if (this.running && this.pendingTrigger) {
        this.pendingTrigger = false;
        this.schedule(0);
      }
      return;
    }

    this.state = nextPollingState(this.state, outcome, this.config, this.now());
    this.onStateChange?.(this.state, outcome);

    if (this.pendingTrigger) {
      this.pendingTrigger = false;
      this.schedule(0);
    } else {
      this.schedule(this.state.intervalMs);
    }
  }
}
