import type { BridgeConfig } from './types.js';

const assertFiniteNumber = (label: string, value: number): void => {
  if (!Number.isFinite(value)) throw new Error(`${label} must be a finite number`);
};

const assertIntInRange = (label: string, value: number, min: number, max: number): void => {
  assertFiniteNumber(label, value);
  if (!Number.isInteger(value)) throw new Error(`${label} must be an integer`);
  if (value < min || value > max) throw new Error(`${label} must be between ${min} and ${max}`);
};

const assertNumInRange = (label: string, value: number, min: number, max: number): void => {
  assertFiniteNumber(label, value);
  if (value < min || value > max) throw new Error(`${label} must be between ${min} and ${max}`);
};

const DAY_MS = 24 * 60 * 60_000;

export const assertConfigNumericBounds = (config: BridgeConfig): void => {
  assertIntInRange('reconnect.maxRetries', config.reconnect.maxRetries, 0, 100);
  assertNumInRange('reconnect.retryBackoffBase', config.reconnect.retryBackoffBase, 1, 10);
  assertIntInRange('reconnect.maxAgeMs', config.reconnect.maxAgeMs, 1, 7 * DAY_MS);
  assertIntInRange('reconnect.pushTimeoutMs', config.reconnect.pushTimeoutMs, 1, 10 * 60_000);
  assertIntInRange('reconnect.maxReadBytes', config.reconnect.maxReadBytes, 1, 64 * 1024 * 1024);
  assertIntInRange('reconnect.restartDelayMs', config.reconnect.restartDelayMs, 0, DAY_MS);

  assertIntInRange('http.requestTimeoutMs', config.http.requestTimeoutMs, 1, 10 * 60_000);

  assertIntInRange('bridge.dedupCapacity', config.bridge.dedupCapacity, 1, 100_000);
};
