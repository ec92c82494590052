import { randomBytes } from 'node:crypto';

import {
  asLocalId,
  asMessageId,
  asUserId,
  type ConversationId,
  type LocalId,
  type MessageId,
  type RoomEventId,
  type RoomId,
  type UserId,
} from '../types/ids.js';
import { type Logger, log } from '../util/logger.js';
import { PerKeyLock } from '../util/lock.js';
import { BridgeError } from '../webchannel/errors.js';
import {
  type BackendEvent,
  type BackendMessage,
  type EventBody,
  fromMicros,
} from '../webchannel/streamEvents.js';
import { DedupState, shouldProcessInbound } from './dedup.js';
import { BackfillGate, EventDispatcher, type EventHandler } from './dispatcher.js';
import type {
  BackendMessenger,
  ConversationSink,
  HistorySource,
  MessageStore,
  PortalRecord,
  PortalStore,
  ReactionStore,
  SentMessage,
  UserStore,
} from './ports.js';

/** The logged-in user whose connection delivered an event. */
export interface PortalSource {
  userId: UserId;
}

export interface LocalSender {
  userId: UserId;
  messenger: BackendMessenger;
}

export interface LocalMessage {
  roomEventId: RoomEventId;
  text: string;
  replyToRoomEventId?: RoomEventId | undefined;
}

export interface PortalStores {
  messages: MessageStore;
  reactions: ReactionStore;
  portals: PortalStore;
  users: UserStore;
}

export interface PortalOptions {
  record: PortalRecord;
  sink: ConversationSink;
  stores: PortalStores;
  dedupCapacity: number;
  localIdPrefix: string;
  onRoomCreated?: ((portal: Portal) => void) | undefined;
  randomHex?: (() => string) | undefined;
}

interface QueuedEvent {
  type: string;
  revision?: number | undefined;
  source: PortalSource;
  event: BackendEvent;
}

const defaultRandomHex = (): string => randomBytes(8).toString('hex');


/**
 * One bridged conversation as seen by one receiver. Inbound events are handled strictly in arrival
 * order; history inserted by `backfill` goes in before any queued live event.
 */
export class Portal {
  public readonly gate = new BackfillGate();
  public readonly dedup: DedupState;

  private readonly logger: Logger;
  private readonly dispatcher: EventDispatcher<QueuedEvent>;
  private readonly sendLocks = new PerKeyLock<UserId>();
  private roomCreation: Promise<RoomId> | undefined;
  private lastRoomEventId: RoomEventId | undefined;

  public constructor(private readonly options: PortalOptions) {
    this.dedup = new DedupState(options.dedupCapacity);
    this.logger = log.child({
      component: 'portal',
      conversationId: options.record.conversationId,
      receiver: options.record.receiver,
    });
    type BodyHandler = (body: EventBody, item: QueuedEvent) => Promise<void>;
    const on =
      (fn: BodyHandler): EventHandler<QueuedEvent> =>
      async (item) => {
        const { body } = item.event;
        if (!body) {
          this.logger.warn('event.missing_body', { type: item.type });
          return;
        }
        await fn(body, item);
      };
    this.dispatcher = new EventDispatcher<QueuedEvent>({
      name: options.record.conversationId,
      gate: this.gate,
      logger: this.logger,
      handlers: {
        MESSAGE_POSTED: on((body, item) => this.onMessagePosted(body, item.source)),
        MESSAGE_UPDATED: on((body) => this.onMessageUpdated(body)),
        MESSAGE_DELETED: on((body) => this.onMessageDeleted(body)),
        MESSAGE_REACTION: on((body) => this.onReaction(body)),
        TYPING_STATE_CHANGED: on((body, item) => this.onTyping(body, item.source)),
        READ_RECEIPT_CHANGED: on((body, item) => this.onReadReceipt(body, item.source)),
      },
      advanceRevision: (revision, item) => this.advanceRevisions(revision, item),
    });
  }

  public get conversationId(): ConversationId {
    return this.options.record.conversationId;
  }

  public get receiver(): UserId {
    return this.options.record.receiver;
  }

  public get roomId(): RoomId | null {
    return this.options.record.roomId;
  }

  public get revision(): number | null {
    return this.options.record.revision;
  }

  public get pending(): number {
    return this.dispatcher.pending;
  }

  /** Queues a stream event for this conversation. Never blocks. */
  public enqueue(source: PortalSource, event: BackendEvent): void {
    this.dispatcher.enqueue({ type: event.type, revision: event.revision, source, event });
  }

  /** Resolves once every queued event has been handled. */
  public async drained(): Promise<void> {
    await this.dispatcher.drained();
  }

  /** Sends a room message to the backend on behalf of `sender`. */
  public async handleLocalMessage(
    sender: LocalSender,
    message: LocalMessage,
  ): Promise<SentMessage> {
    const roomId = this.roomId;
    if (!roomId) throw new BridgeError(`Portal ${this.conversationId} has no room`);
    const { messages } = this.options.stores;

    let threadId: MessageId | undefined;
    if (message.replyToRoomEventId) {
      const replyTo = await messages.getByRoomEventId(message.replyToRoomEventId, roomId);
      if (replyTo) threadId = replyTo.threadId ?? replyTo.messageId;
    }

    const localId = this.newLocalId();
    this.dedup.beginLocalSend(localId);
    let sent: SentMessage;
    try {
      sent = await this.sendLocks.runExclusive(sender.userId, async () => {
        const res = await sender.messenger.sendMessage(this.conversationId, message.text, {
          localId,
          threadId,
        });
        this.dedup.endLocalSend(localId, res.messageId);
        return res;
      });
    } finally {
      this.dedup.endLocalSend(localId);
    }

    await messages.insert({
      messageId: sent.messageId,
      conversationId: this.conversationId,
      receiver: this.receiver,
      roomId,
      roomEventId: message.roomEventId,
      senderId: sender.userId,
      threadId: threadId ?? null,
      timestampUs: sent.createTimeUs,
    });
    this.lastRoomEventId = message.roomEventId;
    this.logger.debug('local_message.sent', { messageId: sent.messageId, localId });
    return sent;
  }

  /**
   * Bridges one backend message into the room. Returns false when the message was dropped as a
   * duplicate or had nothing to bridge.
   */
  public async handleRemoteMessage(
    source: PortalSource,
    message: BackendMessage,
  ): Promise<boolean> {
    const messageId = asMessageId(message.id);
    const senderId = asUserId(message.creatorId);
    const localId = message.localId === undefined ? undefined : asLocalId(message.localId);
    const { messages } = this.options.stores;

    const verdict = await this.sendLocks.runAfterHolders(senderId, () =>
      shouldProcessInbound(
        this.dedup,
        async (id) => (await messages.getByBackendId(id, this.receiver)) !== null,
        messageId,
        localId,
      ),
    );
    if (verdict !== 'admit') {
      this.logger.debug('remote_message.dropped', { messageId, verdict });
      return false;
    }

    const roomId = await this.ensureRoom(source);
    if (!message.text) {
      this.logger.debug('remote_message.unhandled', { messageId });
      return false;
    }

    const threadId = message.threadId === undefined ? null : asMessageId(message.threadId);
    let replyTo: RoomEventId | undefined;
    if (threadId) {
      const last = await messages.getLastInThread(threadId, this.conversationId, this.receiver);
      replyTo = last?.roomEventId;
    }

    const roomEventId = await this.options.sink.sendMessage(roomId, senderId, {
      text: message.text,
      replyTo,
      timestampMs: fromMicros(message.createTimeUs).getTime(),
    });
    await messages.insert({
      messageId,
      conversationId: this.conversationId,
      receiver: this.receiver,
      roomId,
      roomEventId,
      senderId,
      threadId,
      timestampUs: message.createTimeUs,
    });
    this.lastRoomEventId = roomEventId;
    this.logger.debug('remote_message.bridged', { messageId, roomEventId });
    return true;
  }

  /**
   * Replays messages newer than the newest already-bridged one, holding live events back until
   * done. Returns the number of messages bridged.
   */
  public async backfill(
    source: PortalSource,
    history: HistorySource,
    options: { limit: number },
  ): Promise<number> {
    if (options.limit <= 0) return 0;
    return await this.gate.runHeld(async () => {
      const recent = await history.listMessages(this.conversationId, { limit: options.limit });
      const missing: BackendMessage[] = [];
      for (let i = recent.length - 1; i >= 0; i -= 1) {
        const message = recent[i];
        if (!message) continue;
        const known = await this.options.stores.messages.getByBackendId(
          asMessageId(message.id),
          this.receiver,
        );
        if (known) break;
        missing.push(message);
      }
      missing.reverse();

      let bridged = 0;
      for (const message of missing) {
        if (await this.handleRemoteMessage(source, message)) bridged += 1;
      }
      this.logger.info('backfill.done', { fetched: recent.length, bridged });
      return bridged;
    });
  }

  private newLocalId(): LocalId {
    const hex = (this.options.randomHex ?? defaultRandomHex)();
    return asLocalId(`${this.options.localIdPrefix}%${hex}`);
  }

  private async ensureRoom(source: PortalSource): Promise<RoomId> {
    const existing = this.roomId;
    if (existing) return existing;
    this.roomCreation ??= this.createRoom(source).finally(() => {
      this.roomCreation = undefined;
    });
    return await this.roomCreation;
  }

  private async createRoom(source: PortalSource): Promise<RoomId> {
    const { record } = this.options;
    const roomId = await this.options.sink.createRoom(this.conversationId, {
      name: record.name ?? undefined,
      isDirect: record.isDirect,
      invite: [source.userId],
    });
    record.roomId = roomId;
    await this.options.stores.portals.upsert({ ...record });
    this.logger.info('room.created', { roomId });
    this.options.onRoomCreated?.(this);
    return roomId;
  }

  private async onMessagePosted(body: EventBody, source: PortalSource): Promise<void> {
    if (!body.message) {
      this.logger.warn('message_posted.missing_message');
      return;
    }
    await this.handleRemoteMessage(source, body.message);
  }

  private async onMessageUpdated(body: EventBody): Promise<void> {
    const message = body.message;
    if (!message) return;
    const messageId = asMessageId(message.id);
    const editTimeUs = message.lastEditTimeUs ?? message.createTimeUs;
    if (!this.dedup.claimEdit(messageId, editTimeUs)) {
      this.logger.debug('edit.dropped', { messageId, editTimeUs });
      return;
    }
    const target = await this.options.stores.messages.getByBackendId(messageId, this.receiver);
    if (!target) {
      this.logger.debug('edit.unknown_target', { messageId });
      return;
    }
    const senderId = asUserId(message.creatorId);
    await this.options.sink.editMessage(target.roomId, senderId, target.roomEventId, {
      text: message.text,
      timestampMs: fromMicros(editTimeUs).getTime(),
    });
  }

  private async onMessageDeleted(body: EventBody): Promise<void> {
    if (!body.messageDeleted) return;
    const messageId = asMessageId(body.messageDeleted.messageId);
    const { messages } = this.options.stores;
    const target = await messages.getByBackendId(messageId, this.receiver);
    if (!target) {
      this.logger.debug('delete.unknown_target', { messageId });
      return;
    }
    await this.options.sink.redactMessage(target.roomId, target.senderId, target.roomEventId);
    await messages.delete(messageId, this.receiver);
  }

  private async onReaction(body: EventBody): Promise<void> {
    const reaction = body.reaction;
    if (!reaction) return;
    const messageId = asMessageId(reaction.messageId);
    const senderId = asUserId(reaction.userId);
    const { messages, reactions } = this.options.stores;
    const target = await messages.getByBackendId(messageId, this.receiver);
    if (!target) {
      this.logger.debug('reaction.unknown_target', { messageId });
      return;
    }
    const existing = await reactions.get(messageId, this.receiver, senderId, reaction.emoji);

    if (reaction.action === 'ADD') {
      if (existing) return;
      const roomEventId = await this.options.sink.react(
        target.roomId,
        senderId,
        target.roomEventId,
        reaction.emoji,
      );
      await reactions.insert({
        messageId,
        receiver: this.receiver,
        senderId,
        emoji: reaction.emoji,
        roomEventId,
      });
      return;
    }
    if (!existing) return;
    await this.options.sink.redactMessage(target.roomId, senderId, existing.roomEventId);
    await reactions.delete(messageId, this.receiver, senderId, reaction.emoji);
  }

  private async onTyping(body: EventBody, source: PortalSource): Promise<void> {
    const typing = body.typing;
    const roomId = this.roomId;
    if (!typing || !roomId) return;
    const userId = asUserId(typing.userId);
    // Own typing is already visible in the room.
    if (userId === source.userId) return;
    await this.options.sink.setTyping(roomId, userId, typing.state === 'TYPING');
  }

  private async onReadReceipt(body: EventBody, source: PortalSource): Promise<void> {
    const receipt = body.readReceipt;
    const roomId = this.roomId;
    const eventId = this.lastRoomEventId;
    if (!receipt || !roomId || !eventId) return;
    const userId = asUserId(receipt.userId);
    if (userId === source.userId) return;
    await this.options.sink.markRead(roomId, userId, eventId);
  }

  private async advanceRevisions(revision: number, item: QueuedEvent): Promise<void> {
    const { portals, users } = this.options.stores;
    if (await portals.setRevision(this.conversationId, this.receiver, revision)) {
      this.options.record.revision = revision;
    }
    const userRevision = item.event.userRevision;
    if (userRevision !== undefined) await users.setRevision(item.source.userId, userRevision);
  }
}
