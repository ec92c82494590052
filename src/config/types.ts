import type { BridgeConfigFileParsed } from './zod.js';

export type BridgeConfigFile = BridgeConfigFileParsed;

export interface BackendConfig {
  /** Base URL of the webchannel endpoints (`register`, `events_encoded`), with trailing slash. */
  channelUrl: string;
  /** Requests carrying credentials are only sent to hosts ending with this suffix. */
  trustedDomainSuffix: string;
  userAgent: string;
}

export interface ReconnectConfig {
  maxRetries: number;
  /** Sleep before retry n is `retryBackoffBase ** n` seconds. */
  retryBackoffBase: number;
  /** Longest a single listen cycle may run before a forced full restart. */
  maxAgeMs: number;
  /** Read timeout on the long-poll body; the server heartbeats every 15-30s. */
  pushTimeoutMs: number;
  maxReadBytes: number;
  restartDelayMs: number;
}

export interface HttpConfig {
  /** Longest wait for response headers on any backend request. */
  requestTimeoutMs: number;
}

export interface BridgeBehaviorConfig {
  dedupCapacity: number;
  disableBridgeNotices: boolean;
  unimportantBridgeNotices: boolean;
  localIdPrefix: string;
}

export interface BridgeConfig {
  schemaVersion: number;
  backend: BackendConfig;
  reconnect: ReconnectConfig;
  http: HttpConfig;
  bridge: BridgeBehaviorConfig;
}
