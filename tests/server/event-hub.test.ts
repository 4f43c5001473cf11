/**
 * Tests for Event Hub
 */

import { describe, it, expect, vi } from 'vitest';
import { EventHub } from '../../src/server/event-hub';
import { emptyRollingStats } from '../../src/feeds/stats';

const flush = () => new Promise(resolve => setImmediate(resolve));

describe('EventHub', () => {
  it('should deliver after publish returns', async () => {
    const hub = new EventHub();
    const listener = vi.fn();
    hub.subscribe('stats-update', listener);

    const stats = emptyRollingStats();
    hub.publish('stats-update', stats);

    expect(listener).not.toHaveBeenCalled();
    await flush();
    expect(listener).toHaveBeenCalledWith(stats);
  });

  it('should isolate a throwing listener from the others', async () => {
    const hub = new EventHub();
    const healthy = vi.fn();
    hub.subscribe('stats-update', () => {
      throw new Error('socket closed');
    });
    hub.subscribe('stats-update', async () => {
      throw new Error('async failure');
    });
    hub.subscribe('stats-update', healthy);

    expect(() => hub.publish('stats-update', emptyRollingStats())).not.toThrow();
    await flush();

    expect(healthy).toHaveBeenCalledTimes(1);
  });

  it('should only deliver the subscribed event', async () => {
    const hub = new EventHub();
    const listener = vi.fn();
    hub.subscribe('new-observation', listener);

    hub.publish('stats-update', emptyRollingStats());
    await flush();

    expect(listener).not.toHaveBeenCalled();
  });

  it('should stop delivering after unsubscribe', async () => {
    const hub = new EventHub();
    const listener = vi.fn();
    const unsubscribe = hub.subscribe('stats-update', listener);

    unsubscribe();
    hub.publish('stats-update', emptyRollingStats());
    await flush();

    expect(listener).not.toHaveBeenCalled();
    expect(hub.listenerCount('stats-update')).toBe(0);
  });

  it('should publish with no subscribers', () => {
    const hub = new EventHub();

    expect(() => hub.publish('stats-update', emptyRollingStats())).not.toThrow();
  });
});
