import { describe, expect, test } from 'vitest';

import { EventHub } from './events.js';

describe('webchannel/events', () => {
  test('fires observers sequentially in registration order', async () => {
    const hub = new EventHub<[number]>('test');
    const order: string[] = [];
    hub.addObserver(async (n) => {
      await Promise.resolve();
      order.push(`a${n}`);
    });
    hub.addObserver((n) => {
      order.push(`b${n}`);
    });

    await hub.fire(1);
    expect(order).toEqual(['a1', 'b1']);
  });

  test('a throwing observer does not stop the others', async () => {
    const hub = new EventHub('test');
    const seen: string[] = [];
    hub.addObserver(() => {
      throw new Error('boom');
    });
    hub.addObserver(async () => {
      throw new Error('async boom');
    });
    hub.addObserver(() => {
      seen.push('last');
    });

    await expect(hub.fire()).resolves.toBeUndefined();
    expect(seen).toEqual(['last']);
  });

  test('unsubscribe removes the observer', async () => {
    const hub = new EventHub('test');
    let calls = 0;
    const off = hub.addObserver(() => {
      calls += 1;
    });
    await hub.fire();
    off();
    await hub.fire();
    expect(calls).toBe(1);
    expect(hub.size).toBe(0);
  });
});
