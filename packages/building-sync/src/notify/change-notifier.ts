/**
 * Change Notifier
 *
 * Publish surface telling consumers which buildings changed in a cycle
 * and how. Listeners run synchronously in subscription order; one that
 * throws is logged and does not stop the others.
 */

import type { ChangeKind, ChangeNotification, ChangeRecord } from '../core/types.js';
import { errorMessage } from '../core/errors.js';
import { createLogger } from '../core/utils/logger.js';

const log = createLogger({ module: 'notifier' });

export type ChangeListener = (notification: ChangeNotification) => void;

/**
 * Notification for a cycle, null when nothing changed
 */
export function buildNotification(
  cycle: number,
  changes: readonly ChangeRecord[]
): ChangeNotification | null {
  const kinds = new Map<string, ChangeKind>();
  for (const change of changes) {
    if (change.kind !== 'UNCHANGED') {
      kinds.set(change.key, change.kind);
    }
  }
  if (kinds.size === 0) return null;
  return { cycle, keys: Array.from(kinds.keys()), kinds };
}

export class ChangeNotifier {
  private readonly listeners: ChangeListener[] = [];

  /**
   * Subscribe to change notifications
   *
   * @returns unsubscribe function
   */
  subscribe(listener: ChangeListener): () => void {
    this.listeners.push(listener);

    return () => {
      const index = this.listeners.indexOf(listener);
      if (index !== -1) {
        this.listeners.splice(index, 1);
      }
    };
  }

  get listenerCount(): number {
    return this.listeners.length;
  }

  publish(notification: ChangeNotification): void {
    // Copy so a listener may unsubscribe while being notified
    for (const listener of [...this.listeners]) {
      try {
        listener(notification);
      } catch (error) {
        log.error('Change listener error', {
          cycle: notification.cycle,
          error: errorMessage(error),
        });
      }
    }
  }
}
