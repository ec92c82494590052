import type { ConversationId, MessageId, RoomEventId, RoomId, UserId } from '../types/ids.js';
import type {
  MessageRecord,
  MessageStore,
  PortalRecord,
  PortalStore,
  ReactionRecord,
  ReactionStore,
  UserRecord,
  UserStore,
} from './ports.js';

/** Monotonic high-water mark: only positive values above the current one are taken. */
export const advancesRevision = (current: number | null, next: number): boolean =>
  next > 0 && (current === null || next > current);

const key = (...parts: string[]): string => JSON.stringify(parts);

export class MemoryMessageStore implements MessageStore {
  private readonly byBackendId = new Map<string, MessageRecord>();

  public async getByBackendId(
    messageId: MessageId,
    receiver: UserId,
  ): Promise<MessageRecord | null> {
    return this.byBackendId.get(key(messageId, receiver)) ?? null;
  }

  public async getByRoomEventId(
    roomEventId: RoomEventId,
    roomId: RoomId,
  ): Promise<MessageRecord | null> {
    for (const record of this.byBackendId.values()) {
      if (record.roomEventId === roomEventId && record.roomId === roomId) return record;
    }
    return null;
  }

  public async getLastInThread(
    threadId: MessageId,
    conversationId: ConversationId,
    receiver: UserId,
  ): Promise<MessageRecord | null> {
    let last: MessageRecord | null = null;
    for (const record of this.byBackendId.values()) {
      if (record.conversationId !== conversationId || record.receiver !== receiver) continue;
      if (record.threadId !== threadId && record.messageId !== threadId) continue;
      if (!last || record.timestampUs >= last.timestampUs) last = record;
    }
    return last;
  }

  public async insert(record: MessageRecord): Promise<void> {
    this.byBackendId.set(key(record.messageId, record.receiver), { ...record });
  }

  public async delete(messageId: MessageId, receiver: UserId): Promise<void> {
    this.byBackendId.delete(key(messageId, receiver));
  }

  public get size(): number {
    return this.byBackendId.size;
  }
}

export class MemoryReactionStore implements ReactionStore {
  private readonly reactions = new Map<string, ReactionRecord>();

  public async get(
    messageId: MessageId,
    receiver: UserId,
    senderId: UserId,
    emoji: string,
  ): Promise<ReactionRecord | null> {
    return this.reactions.get(key(messageId, receiver, senderId, emoji)) ?? null;
  }

  public async insert(record: ReactionRecord): Promise<void> {
    this.reactions.set(
      key(record.messageId, record.receiver, record.senderId, record.emoji),
      { ...record },
    );
  }

  public async delete(
    messageId: MessageId,
    receiver: UserId,
    senderId: UserId,
    emoji: string,
  ): Promise<void> {
    this.reactions.delete(key(messageId, receiver, senderId, emoji));
  }
}

export class MemoryPortalStore implements PortalStore {
  private readonly portals = new Map<string, PortalRecord>();

  public async get(conversationId: ConversationId, receiver: UserId): Promise<PortalRecord | null> {
    const record = this.portals.get(key(conversationId, receiver));
    return record ? { ...record } : null;
  }

  public async getByRoomId(roomId: RoomId): Promise<PortalRecord | null> {
    for (const record of this.portals.values()) {
      if (record.roomId === roomId) return { ...record };
    }
    return null;
  }

  public async upsert(record: PortalRecord): Promise<void> {
    this.portals.set(key(record.conversationId, record.receiver), { ...record });
  }

  public async setRevision(
    conversationId: ConversationId,
    receiver: UserId,
    revision: number,
  ): Promise<boolean> {
    const record = this.portals.get(key(conversationId, receiver));
    if (!record || !advancesRevision(record.revision, revision)) return false;
    record.revision = revision;
    return true;
  }

  public async delete(conversationId: ConversationId, receiver: UserId): Promise<void> {
    this.portals.delete(key(conversationId, receiver));
  }
}

export class MemoryUserStore implements UserStore {
  private readonly users = new Map<UserId, UserRecord>();

  public async get(userId: UserId): Promise<UserRecord | null> {
    const record = this.users.get(userId);
    return record ? { ...record } : null;
  }

  public async setRevision(userId: UserId, revision: number): Promise<boolean> {
    const record = this.users.get(userId) ?? { userId, revision: null };
    if (!advancesRevision(record.revision, revision)) return false;
    this.users.set(userId, { ...record, revision });
    return true;
  }
}
