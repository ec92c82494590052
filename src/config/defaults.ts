import type {
  BackendConfig,
  BridgeBehaviorConfig,
  BridgeConfig,
  HttpConfig,
  ReconnectConfig,
} from './types.js';

export const DEFAULT_USER_AGENT =
  'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) ' +
  'Chrome/114.0.0.0 Safari/537.36';

export const DEFAULT_BACKEND: BackendConfig = {
  channelUrl: 'https://chat.google.com/webchannel/',
  trustedDomainSuffix: '.google.com',
  userAgent: DEFAULT_USER_AGENT,
};

export const DEFAULT_RECONNECT: ReconnectConfig = {
  maxRetries: 5,
  retryBackoffBase: 2,
  maxAgeMs: 6 * 60 * 60_000,
  pushTimeoutMs: 60_000,
  maxReadBytes: 1024 * 1024,
  restartDelayMs: 5_000,
};

export const DEFAULT_HTTP: HttpConfig = {
  requestTimeoutMs: 30_000,
};

export const DEFAULT_BRIDGE: BridgeBehaviorConfig = {
  dedupCapacity: 100,
  disableBridgeNotices: false,
  unimportantBridgeNotices: true,
  localIdPrefix: 'gchat-bridge',
};

export const createDefaultConfig = (): BridgeConfig => ({
  schemaVersion: 1,
  backend: { ...DEFAULT_BACKEND },
  reconnect: { ...DEFAULT_RECONNECT },
  http: { ...DEFAULT_HTTP },
  bridge: { ...DEFAULT_BRIDGE },
});
