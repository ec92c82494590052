import type {
  ConversationId,
  LocalId,
  MessageId,
  RoomEventId,
  RoomId,
  UserId,
} from '../types/ids.js';
import type { BackendMessage } from '../webchannel/streamEvents.js';

export interface CreateRoomRequest {
  name?: string | undefined;
  isDirect: boolean;
  invite: readonly UserId[];
}

export interface RoomMessage {
  text: string;
  replyTo?: RoomEventId | undefined;
  timestampMs: number;
}

/** Room-side operations the bridge needs; the room network itself lives behind this. */
export interface ConversationSink {
  createRoom(conversationId: ConversationId, request: CreateRoomRequest): Promise<RoomId>;
  sendMessage(roomId: RoomId, sender: UserId, message: RoomMessage): Promise<RoomEventId>;
  editMessage(
    roomId: RoomId,
    sender: UserId,
    target: RoomEventId,
    message: RoomMessage,
  ): Promise<RoomEventId>;
  redactMessage(roomId: RoomId, sender: UserId, target: RoomEventId): Promise<void>;
  react(roomId: RoomId, sender: UserId, target: RoomEventId, emoji: string): Promise<RoomEventId>;
  setTyping(roomId: RoomId, user: UserId, typing: boolean): Promise<void>;
  markRead(roomId: RoomId, user: UserId, eventId: RoomEventId): Promise<void>;
  inviteUser(roomId: RoomId, user: UserId): Promise<void>;
}

export interface SentMessage {
  messageId: MessageId;
  createTimeUs: number;
}

/** Backend send path, bound to one logged-in user. */
export interface BackendMessenger {
  sendMessage(
    conversationId: ConversationId,
    text: string,
    options: { localId: LocalId; threadId?: MessageId | undefined },
  ): Promise<SentMessage>;
}

export interface HistorySource {
  /** Most recent `limit` messages, oldest first. */
  listMessages(
    conversationId: ConversationId,
    options: { limit: number },
  ): Promise<readonly BackendMessage[]>;
}

export interface MessageRecord {
  messageId: MessageId;
  conversationId: ConversationId;
  receiver: UserId;
  roomId: RoomId;
  roomEventId: RoomEventId;
  senderId: UserId;
  /** Thread root, when the message is inside a thread. */
  threadId: MessageId | null;
  timestampUs: number;
}

export interface MessageStore {
  getByBackendId(messageId: MessageId, receiver: UserId): Promise<MessageRecord | null>;
  getByRoomEventId(roomEventId: RoomEventId, roomId: RoomId): Promise<MessageRecord | null>;
  /** Newest message that is `threadId` itself or sits inside that thread. */
  getLastInThread(
    threadId: MessageId,
    conversationId: ConversationId,
    receiver: UserId,
  ): Promise<MessageRecord | null>;
  insert(record: MessageRecord): Promise<void>;
  delete(messageId: MessageId, receiver: UserId): Promise<void>;
}

export interface ReactionRecord {
  messageId: MessageId;
  receiver: UserId;
  senderId: UserId;
  emoji: string;
  roomEventId: RoomEventId;
}

export interface ReactionStore {
  get(
    messageId: MessageId,
    receiver: UserId,
    senderId: UserId,
    emoji: string,
  ): Promise<ReactionRecord | null>;
  insert(record: ReactionRecord): Promise<void>;
  delete(messageId: MessageId, receiver: UserId, senderId: UserId, emoji: string): Promise<void>;
}

export interface PortalRecord {
  conversationId: ConversationId;
  receiver: UserId;
  roomId: RoomId | null;
  name: string | null;
  isDirect: boolean;
  revision: number | null;
}

export interface PortalStore {
  get(conversationId: ConversationId, receiver: UserId): Promise<PortalRecord | null>;
  getByRoomId(roomId: RoomId): Promise<PortalRecord | null>;
  upsert(record: PortalRecord): Promise<void>;
  /** Stores `revision` only if it is positive and above the stored one; true when it moved. */
  setRevision(conversationId: ConversationId, receiver: UserId, revision: number): Promise<boolean>;
  delete(conversationId: ConversationId, receiver: UserId): Promise<void>;
}

export interface UserRecord {
  userId: UserId;
  revision: number | null;
}

export interface UserStore {
  get(userId: UserId): Promise<UserRecord | null>;
  /** Same monotonic rule as `PortalStore.setRevision`. */
  setRevision(userId: UserId, revision: number): Promise<boolean>;
}

export type BridgeState = 'CONNECTED' | 'TRANSIENT_DISCONNECT' | 'UNKNOWN_ERROR' | 'LOGGED_OUT';

/** Per-user status channel (notice room + bridge state). */
export interface StatusNotifier {
  sendNotice(text: string, options: { important: boolean }): Promise<void>;
  setState(state: BridgeState, error?: string): Promise<void>;
}
