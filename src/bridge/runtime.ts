import type { BridgeConfig } from '../config/types.js';
import type { CredentialProvider } from '../webchannel/auth.js';
import { Client } from '../webchannel/client.js';
import { HttpSession } from '../webchannel/http.js';
import type { Sleep } from '../webchannel/reliability.js';
import type { PortalStores } from './portal.js';
import type { ConversationSink, StatusNotifier } from './ports.js';
import { PortalRegistry } from './registry.js';
import { BridgeUser } from './user.js';

export interface BridgeUserDeps {
  userId: string;
  credentials: CredentialProvider;
  registry: PortalRegistry;
  notifier: StatusNotifier;
  fetchImpl?: typeof fetch | undefined;
  sleep?: Sleep | undefined;
}

export const createPortalRegistry = (
  config: BridgeConfig,
  deps: { sink: ConversationSink; stores: PortalStores },
): PortalRegistry =>
  new PortalRegistry({
    sink: deps.sink,
    stores: deps.stores,
    dedupCapacity: config.bridge.dedupCapacity,
    localIdPrefix: config.bridge.localIdPrefix,
  });

/** Wires an HTTP session, webchannel client and supervisor for one logged-in user. */
export const createBridgeUser = (config: BridgeConfig, deps: BridgeUserDeps): BridgeUser => {
  const { backend, reconnect, http: httpConfig, bridge } = config;
  const http = new HttpSession({
    credentials: deps.credentials,
    trustedDomainSuffix: backend.trustedDomainSuffix,
    userAgent: backend.userAgent,
    requestTimeoutMs: httpConfig.requestTimeoutMs,
    fetchImpl: deps.fetchImpl,
  });
  const client = new Client({
    http,
    channelUrl: backend.channelUrl,
    maxRetries: reconnect.maxRetries,
    retryBackoffBase: reconnect.retryBackoffBase,
    pushTimeoutMs: reconnect.pushTimeoutMs,
    maxReadBytes: reconnect.maxReadBytes,
    sleep: deps.sleep,
  });
  return new BridgeUser({
    userId: deps.userId,
    client,
    registry: deps.registry,
    notifier: deps.notifier,
    maxAgeMs: reconnect.maxAgeMs,
    restartDelayMs: reconnect.restartDelayMs,
    disableBridgeNotices: bridge.disableBridgeNotices,
    unimportantBridgeNotices: bridge.unimportantBridgeNotices,
    sleep: deps.sleep,
  });
};
