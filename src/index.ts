export type {
  BackendConfig,
  BridgeBehaviorConfig,
  BridgeConfig,
  HttpConfig,
  ReconnectConfig,
} from './config/types.js';
export { createDefaultConfig } from './config/defaults.js';
export {
  CONFIG_FILENAME,
  type LoadBridgeConfigOptions,
  type LoadedBridgeConfig,
  loadBridgeConfig,
} from './config/load.js';

export {
  createLogger,
  errorFields,
  type Logger,
  type LogLevel,
  log,
  withLogContext,
} from './util/logger.js';

export type {
  ConversationId,
  LocalId,
  MessageId,
  RoomEventId,
  RoomId,
  UserId,
} from './types/ids.js';
export {
  asConversationId,
  asLocalId,
  asMessageId,
  asRoomEventId,
  asRoomId,
  asUserId,
} from './types/ids.js';

export {
  type AccessToken,
  type CredentialProvider,
  RefreshingTokenSource,
  staticCredentials,
} from './webchannel/auth.js';
export {
  Channel,
  type ChannelOptions,
  type ChannelState,
  type ChannelStats,
  type LongPollEndReason,
  type LongPollOutcome,
  type PendingRequestHandle,
} from './webchannel/channel.js';
export { ChunkParser, encodeChunk } from './webchannel/chunkParser.js';
export { Client, type ClientOptions } from './webchannel/client.js';
export { CookieJar } from './webchannel/cookies.js';
export {
  BridgeError,
  LifetimeExpiredError,
  NetworkError,
  ProtocolDecodeError,
  RegistrationFailedError,
  RequestTimeoutError,
  SessionInvalidError,
  UnexpectedStatusError,
  UntrustedHostError,
} from './webchannel/errors.js';
export { EventHub, type Observer } from './webchannel/events.js';
export { HttpSession, type HttpSessionOptions } from './webchannel/http.js';
export { type RegistrationResult, registerChannel } from './webchannel/registrar.js';
export {
  type BackendEvent,
  type BackendMessage,
  type EventBody,
  formatConversationId,
  fromMicros,
  INITIAL_PING_REQUEST,
  parseConversationId,
  parseDataArray,
  splitEventBodies,
} from './webchannel/streamEvents.js';

export { DedupState, RecentIdBuffer, shouldProcessInbound } from './bridge/dedup.js';
export { BackfillGate, EventDispatcher, SerialQueue } from './bridge/dispatcher.js';
export {
  MemoryMessageStore,
  MemoryPortalStore,
  MemoryReactionStore,
  MemoryUserStore,
} from './bridge/memoryStore.js';
export {
  type LocalMessage,
  type LocalSender,
  Portal,
  type PortalSource,
  type PortalStores,
} from './bridge/portal.js';
export type * from './bridge/ports.js';
export { PortalRegistry, type PortalRegistryOptions } from './bridge/registry.js';
export { type BridgeUserDeps, createBridgeUser, createPortalRegistry } from './bridge/runtime.js';
export { type BridgeClient, BridgeUser, type BridgeUserOptions } from './bridge/user.js';
