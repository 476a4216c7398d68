import { describe, expect, it, vi } from 'vitest';
import type { ChangeNotification } from '../../../core/types.js';
import { ChangeNotifier, buildNotification } from '../../../notify/change-notifier.js';

const NOTIFICATION: ChangeNotification = {
  cycle: 1,
  keys: ['DEBW_001'],
  kinds: new Map([['DEBW_001', 'NEW']]),
};

describe('buildNotification', () => {
  it('should list changed keys in order with their kinds', () => {
    const notification = buildNotification(3, [
      { key: 'DEBW_002', kind: 'COLOR_CHANGED' },
      { key: 'DEBW_001', kind: 'UNCHANGED' },
      { key: 'DEBW_003', kind: 'REMOVED' },
    ]);

    expect(notification?.cycle).toBe(3);
    expect(notification?.keys).toEqual(['DEBW_002', 'DEBW_003']);
    expect(Array.from(notification?.kinds ?? [])).toEqual([
      ['DEBW_002', 'COLOR_CHANGED'],
      ['DEBW_003', 'REMOVED'],
    ]);
  });

  it('should be null when nothing changed', () => {
    expect(buildNotification(1, [{ key: 'DEBW_001', kind: 'UNCHANGED' }])).toBeNull();
    expect(buildNotification(1, [])).toBeNull();
  });
});

describe('ChangeNotifier', () => {
  it('should deliver to every subscriber in order', () => {
    const notifier = new ChangeNotifier();
    const calls: string[] = [];
    notifier.subscribe(() => calls.push('first'));
    notifier.subscribe(() => calls.push('second'));

    notifier.publish(NOTIFICATION);

    expect(calls).toEqual(['first', 'second']);
  });

  it('should stop delivering after unsubscribe', () => {
    const notifier = new ChangeNotifier();
    const listener = vi.fn();
    const unsubscribe = notifier.subscribe(listener);

    unsubscribe();
    unsubscribe();
    notifier.publish(NOTIFICATION);

    expect(listener).not.toHaveBeenCalled();
    expect(notifier.listenerCount).toBe(0);
  });

  it('should keep notifying after a listener throws', () => {
    const notifier = new ChangeNotifier();
    const after = vi.fn();
    notifier.subscribe(() => {
      throw new Error('listener failed');
    });
    notifier.subscribe(after);

    expect(() => notifier.publish(NOTIFICATION)).not.toThrow();
    expect(after).toHaveBeenCalledWith(NOTIFICATION);
  });

  it('should let a listener unsubscribe itself while being notified', () => {
    const notifier = new ChangeNotifier();
    const second = vi.fn();
    const unsubscribe = notifier.subscribe(() => unsubscribe());
    notifier.subscribe(second);

    notifier.publish(NOTIFICATION);

    expect(second).toHaveBeenCalledTimes(1);
    expect(notifier.listenerCount).toBe(1);
  });
});
