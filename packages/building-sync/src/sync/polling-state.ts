/**
 * Adaptive polling state machine
 *
 * Two modes, no terminal state:
 *
 *   FAST --(quiet cycle, count reaches threshold)--> SLOW
 *   SLOW --(cycle with a change)-------------------> FAST
 *
 * A failed fetch leaves the state as it was. With adaptive polling off the
 * fast interval is always used.
 */

import type { PollingConfig } from '../core/config.js';

export type PollingMode = 'FAST' | 'SLOW';

/**
 * What a completed cycle means for the polling rate. A malformed payload
 * counts as `unchanged`; a transport failure is `failed`.
 */
export type CycleOutcome = 'changed' | 'unchanged' | 'failed';

export interface PollingState {
  readonly mode: PollingMode;
  readonly intervalMs: number;
  readonly consecutiveNoChangeCount: number;
  /** Epoch ms of the last completed fetch, null before the first */
  readonly lastFetchTimestamp: number | null;
}

export function intervalFor(mode: PollingMode, config: PollingConfig): number {
  const seconds = mode === 'FAST' ? config.fastIntervalSeconds : config.slowIntervalSeconds;
  return seconds * 1000;
}

export function initialPollingState(config: PollingConfig): PollingState {
  return {
    mode: 'FAST',
    intervalMs: intervalFor('FAST', config),
    consecutiveNoChangeCount: 0,
    lastFetchTimestamp: null,
  };
}

/**
 * Next polling state after a cycle. Pure.
 *
 * @param now - Completion time, recorded for successful and quiet cycles
 */
export function nextPollingState(
  state: PollingState,
  outcome: CycleOutcome,
  config: PollingConfig,
  now: number
): PollingState {
  if (outcome === 'failed') {
    return state;
  }

  if (outcome === 'changed' || !config.adaptive) {
    return {
      mode: 'FAST',
      intervalMs: intervalFor('FAST', config),
      consecutiveNoChangeCount: outcome === 'changed' ? 0 : state.consecutiveNoChangeCount + 1,
      lastFetchTimestamp: now,
    };
  }

  const count = state.consecutiveNoChangeCount + 1;
  const mode: PollingMode = count >= config.quietCyclesBeforeSlowdown ? 'SLOW' : 'FAST';
  return {
    mode,
    intervalMs: intervalFor(mode, config),
    consecutiveNoChangeCount: count,
    lastFetchTimestamp: now,
  };
}
