import { setTimeout as delay } from 'node:timers/promises';

export type Sleep = (ms: number, signal?: AbortSignal) => Promise<void>;

/** Resolves after `ms`, or rejects with an `AbortError` once `signal` fires. */
export const abortableSleep: Sleep = async (ms, signal) => {
  await delay(Math.max(0, ms), undefined, signal ? { signal } : {});
};

/** Delay before long-poll retry `retries`: `base ** retries` seconds, no jitter. */
export const channelBackoffMs = (retries: number, base: number): number =>
  Math.round(base ** Math.max(0, retries) * 1000);
