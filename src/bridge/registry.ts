import type { ConversationId, RoomId, UserId } from '../types/ids.js';
import { log } from '../util/logger.js';
import { PerKeyLock } from '../util/lock.js';
import { parseConversationId } from '../webchannel/streamEvents.js';
import { Portal, type PortalStores } from './portal.js';
import type { ConversationSink, PortalRecord } from './ports.js';

export interface PortalRegistryOptions {
  sink: ConversationSink;
  stores: PortalStores;
  dedupCapacity: number;
  localIdPrefix: string;
  randomHex?: (() => string) | undefined;
}

const portalKey = (conversationId: ConversationId, receiver: UserId): string =>
  JSON.stringify([conversationId, receiver]);

/** Live portals indexed by conversation and by room. */
export class PortalRegistry {
  private readonly logger = log.child({ component: 'portal_registry' });
  private readonly byConversation = new Map<string, Portal>();
  private readonly byRoom = new Map<RoomId, Portal>();
  private readonly loading = new PerKeyLock<string>();

  public constructor(private readonly options: PortalRegistryOptions) {}

  public get size(): number {
    return this.byConversation.size;
  }

  /** Returns the cached portal, else loads it from the store, else creates and stores it. */
  public async getByConversation(
    conversationId: ConversationId,
    receiver: UserId,
  ): Promise<Portal> {
    const key = portalKey(conversationId, receiver);
    const cached = this.byConversation.get(key);
    if (cached) return cached;

    return await this.loading.runExclusive(key, async () => {
      const raced = this.byConversation.get(key);
      if (raced) return raced;

      const { portals } = this.options.stores;
      let record = await portals.get(conversationId, receiver);
      if (!record) {
        record = {
          conversationId,
          receiver,
          roomId: null,
          name: null,
          isDirect: parseConversationId(conversationId).kind === 'dm',
          revision: null,
        };
        await portals.upsert(record);
        this.logger.debug('portal.created', { conversationId, receiver });
      }
      return this.add(record);
    });
  }

  public async getByRoomId(roomId: RoomId): Promise<Portal | null> {
    const cached = this.byRoom.get(roomId);
    if (cached) return cached;
    const record = await this.options.stores.portals.getByRoomId(roomId);
    if (!record) return null;
    return await this.getByConversation(record.conversationId, record.receiver);
  }

  /** Indexes a portal under its room once the room exists. */
  public registerRoom(portal: Portal): void {
    if (portal.roomId) this.byRoom.set(portal.roomId, portal);
  }

  /** Evicts the portal from both indexes and deletes its stored record. */
  public async remove(portal: Portal): Promise<void> {
    this.byConversation.delete(portalKey(portal.conversationId, portal.receiver));
    if (portal.roomId) this.byRoom.delete(portal.roomId);
    await this.options.stores.portals.delete(portal.conversationId, portal.receiver);
  }

  public all(): Portal[] {
    return [...this.byConversation.values()];
  }

  private add(record: PortalRecord): Portal {
    const portal = new Portal({
      record,
      sink: this.options.sink,
      stores: this.options.stores,
      dedupCapacity: this.options.dedupCapacity,
      localIdPrefix: this.options.localIdPrefix,
      randomHex: this.options.randomHex,
      onRoomCreated: (p) => this.registerRoom(p),
    });
    this.byConversation.set(portalKey(record.conversationId, record.receiver), portal);
    this.registerRoom(portal);
    return portal;
  }
}
