import type { LocalId, MessageId } from '../types/ids.js';

/** Fixed-capacity set of recent ids; the oldest id is evicted first. */
export class RecentIdBuffer<T> {
  private readonly order: T[] = [];
  private readonly members = new Set<T>();

  public constructor(public readonly capacity: number) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new Error(`RecentIdBuffer capacity must be a positive integer, got ${capacity}`);
    }
  }

  public get size(): number {
    return this.order.length;
  }

  public has(id: T): boolean {
    return this.members.has(id);
  }

  public push(id: T): void {
    if (this.members.has(id)) return;
    this.order.unshift(id);
    this.members.add(id);
    while (this.order.length > this.capacity) {
      const evicted = this.order.pop();
      if (evicted !== undefined) this.members.delete(evicted);
    }
  }

  /** Most recent first. */
  public toArray(): T[] {
    return [...this.order];
  }
}

export type InboundVerdict = 'admit' | 'local_echo' | 'recent' | 'stored';

/**
 * Duplicate suppression for one conversation: local ids of in-flight sends, recently delivered
 * backend ids, and the newest applied edit time per message.
 */
export class DedupState {
  public readonly recent: RecentIdBuffer<MessageId>;
  private readonly localEcho = new Set<LocalId>();
  // Insertion order doubles as recency: a claimed edit re-inserts its message.
  private readonly lastEditUs = new Map<MessageId, number>();
  private readonly editCapacity: number;

  public constructor(capacity = 100) {
    this.recent = new RecentIdBuffer<MessageId>(capacity);
    this.editCapacity = capacity;
  }

  public beginLocalSend(localId: LocalId): void {
    this.localEcho.add(localId);
  }

  public isLocalSend(localId: LocalId): boolean {
    return this.localEcho.has(localId);
  }

  /** Ends an in-flight send; `messageId` is the id the backend assigned, if it succeeded. */
  public endLocalSend(localId: LocalId, messageId?: MessageId): void {
    if (messageId !== undefined) this.recent.push(messageId);
    this.localEcho.delete(localId);
  }

  /**
   * Synchronous part of the inbound check. An admitted id is recorded before this returns, so a
   * second delivery of the same id that races this one is rejected.
   */
  public claimInbound(messageId: MessageId, localId?: LocalId): InboundVerdict {
    if (localId !== undefined && this.localEcho.has(localId)) return 'local_echo';
    if (this.recent.has(messageId)) return 'recent';
    this.recent.push(messageId);
    return 'admit';
  }

  /**
   * Accepts an edit only if it is newer than the last one applied to the message. Only the
   * `capacity` most recently edited messages are remembered.
   */
  public claimEdit(messageId: MessageId, editTimeUs: number): boolean {
    const last = this.lastEditUs.get(messageId);
    if (last !== undefined && last >= editTimeUs) return false;
    this.lastEditUs.delete(messageId);
    this.lastEditUs.set(messageId, editTimeUs);
    for (const oldest of this.lastEditUs.keys()) {
      if (this.lastEditUs.size <= this.editCapacity) break;
      this.lastEditUs.delete(oldest);
    }
    return true;
  }

  public get trackedEdits(): number {
    return this.lastEditUs.size;
  }
}

/**
 * Full inbound check: local echo, recent buffer, then the durable store. The id is claimed in
 * the recent buffer before the store lookup awaits.
 */
export const shouldProcessInbound = async (
  state: DedupState,
  isStored: (messageId: MessageId) => Promise<boolean>,
  messageId: MessageId,
  localId?: LocalId,
): Promise<InboundVerdict> => {
  const verdict = state.claimInbound(messageId, localId);
  if (verdict !== 'admit') return verdict;
  return (await isStored(messageId)) ? 'stored' : 'admit';
};
