import { describe, expect, test } from 'vitest';

import { backendMessage, FakeMessenger, memoryStores, RecordingSink } from '../testing/bridge.js';
import { deferred, flushMicrotasks } from '../testing/deferred.js';
import {
  asConversationId,
  asLocalId,
  asMessageId,
  asRoomEventId,
  asUserId,
} from '../types/ids.js';
import type { BackendEvent, BackendMessage, EventBody } from '../webchannel/streamEvents.js';
import { Portal } from './portal.js';
import type { PortalRecord, SentMessage } from './ports.js';

const me = asUserId('u-me');
const conversationId = asConversationId('space:AAA');
const source = { userId: me };

const setup = async () => {
  const stores = memoryStores();
  const sink = new RecordingSink();
  const record: PortalRecord = {
    conversationId,
    receiver: me,
    roomId: null,
    name: 'Team',
    isDirect: false,
    revision: null,
  };
  await stores.portals.upsert(record);
  let n = 0;
  const makePortal = async (): Promise<Portal> => {
    const stored = await stores.portals.get(conversationId, me);
    return new Portal({
      record: stored ?? { ...record },
      sink,
      stores,
      dedupCapacity: 100,
      localIdPrefix: 'gchat-bridge',
      randomHex: () => {
        n += 1;
        return String(n).padStart(16, '0');
      },
    });
  };
  const portal = await makePortal();
  return { stores, sink, portal, makePortal };
};

type Revisions = { revision?: number; userRevision?: number };

const event = (type: string, body: Partial<EventBody>, extra: Revisions = {}): BackendEvent => ({
  groupId: conversationId,
  type,
  ...extra,
  body: { ...body, eventType: type },
});

const posted = (message: BackendMessage, extra: Revisions = {}): BackendEvent =>
  event('MESSAGE_POSTED', { message }, extra);

describe('bridge/portal', () => {
  test('remote timestamps are whole milliseconds of the backend microseconds', async () => {
    const { sink, portal } = await setup();

    portal.enqueue(
      source,
      posted(backendMessage('m1', { createTimeUs: 1_700_000_000_123_456 })),
    );
    await portal.drained();

    const sent = sink.calls.find((c) => c.op === 'sendMessage');
    expect(sent).toMatchObject({ message: { timestampMs: 1_700_000_000_123 } });
  });

  test('a remote message creates the room on demand and is recorded', async () => {
    const { stores, sink, portal } = await setup();

    portal.enqueue(source, posted(backendMessage('m1')));
    await portal.drained();

    expect(sink.calls).toEqual([
      {
        op: 'createRoom',
        conversationId,
        request: { name: 'Team', isDirect: false, invite: [me] },
      },
      {
        op: 'sendMessage',
        roomId: '!room1',
        sender: 'u-alice',
        message: { text: 'text of m1', replyTo: undefined, timestampMs: 1000 },
      },
    ]);
    expect(portal.roomId).toBe('!room1');
    expect((await stores.portals.get(conversationId, me))?.roomId).toBe('!room1');
    expect(await stores.messages.getByBackendId(asMessageId('m1'), me)).toEqual({
      messageId: 'm1',
      conversationId,
      receiver: me,
      roomId: '!room1',
      roomEventId: '$ev1',
      senderId: 'u-alice',
      threadId: null,
      timestampUs: 1_000_000,
    });
  });

  test('the same message id is bridged once, also across portal restarts', async () => {
    const { sink, portal, makePortal } = await setup();

    portal.enqueue(source, posted(backendMessage('m1')));
    portal.enqueue(source, posted(backendMessage('m1')));
    await portal.drained();

    const restarted = await makePortal();
    expect(await restarted.handleRemoteMessage(source, backendMessage('m1'))).toBe(false);

    expect(sink.ops()).toEqual(['createRoom', 'sendMessage']);
  });

  test('thread messages reply to the newest message in the thread', async () => {
    const { sink, portal } = await setup();

    portal.enqueue(source, posted(backendMessage('m1')));
    for (const [id, createTimeUs] of [
      ['m2', 2_000_000],
      ['m3', 3_000_000],
    ] as const) {
      portal.enqueue(source, posted(backendMessage(id, { threadId: 'm1', createTimeUs })));
    }
    await portal.drained();

    const replies = sink.calls.flatMap((c) =>
      c.op === 'sendMessage' ? [c.message.replyTo] : [],
    );
    expect(replies).toEqual([undefined, '$ev1', '$ev2']);
  });

  test('a local message is sent in the replied-to thread and its echo is dropped', async () => {
    const { stores, sink, portal } = await setup();
    const messenger = new FakeMessenger();
    await portal.handleRemoteMessage(source, backendMessage('m1'));

    const sent = await portal.handleLocalMessage(
      { userId: me, messenger },
      {
        roomEventId: asRoomEventId('$local1'),
        text: 'hi',
        replyToRoomEventId: asRoomEventId('$ev1'),
      },
    );

    const localId = asLocalId('gchat-bridge%0000000000000001');
    expect(messenger.calls).toEqual([{ conversationId, text: 'hi', localId, threadId: 'm1' }]);
    expect(sent).toEqual({ messageId: 'sent-1', createTimeUs: 1_700_000_000_001 });
    expect(portal.dedup.isLocalSend(localId)).toBe(false);
    expect(await stores.messages.getByBackendId(asMessageId('sent-1'), me)).toMatchObject({
      roomEventId: '$local1',
      senderId: me,
      threadId: 'm1',
    });

    portal.enqueue(source, posted(backendMessage('sent-1', { creatorId: 'u-me', localId })));
    await portal.drained();
    expect(sink.ops()).toEqual(['createRoom', 'sendMessage']);
  });

  test('an echo delivered while the send is still in flight is dropped', async () => {
    const { sink, portal } = await setup();
    await portal.handleRemoteMessage(source, backendMessage('m1'));
    const messenger = new FakeMessenger();
    const reply = deferred<SentMessage>();
    messenger.send = () => reply.promise;

    const sending = portal.handleLocalMessage(
      { userId: me, messenger },
      { roomEventId: asRoomEventId('$local1'), text: 'hi' },
    );
    portal.enqueue(
      source,
      posted(
        backendMessage('sent-x', { creatorId: 'u-me', localId: 'gchat-bridge%0000000000000001' }),
      ),
    );
    await flushMicrotasks();
    reply.resolve({ messageId: asMessageId('sent-x'), createTimeUs: 5 });
    await sending;
    await portal.drained();

    expect(sink.ops()).toEqual(['createRoom', 'sendMessage']);
  });

  test('a failed local send releases its local id and rethrows', async () => {
    const { stores, portal } = await setup();
    await portal.handleRemoteMessage(source, backendMessage('m1'));
    const messenger = new FakeMessenger();
    messenger.send = async () => {
      throw new Error('send failed');
    };

    await expect(
      portal.handleLocalMessage(
        { userId: me, messenger },
        { roomEventId: asRoomEventId('$local1'), text: 'hi' },
      ),
    ).rejects.toThrow('send failed');
    expect(portal.dedup.isLocalSend(asLocalId('gchat-bridge%0000000000000001'))).toBe(false);
    expect(stores.messages.size).toBe(1);
  });

  test('a local message needs a room', async () => {
    const { portal } = await setup();
    await expect(
      portal.handleLocalMessage(
        { userId: me, messenger: new FakeMessenger() },
        { roomEventId: asRoomEventId('$local1'), text: 'hi' },
      ),
    ).rejects.toThrow('Portal space:AAA has no room');
  });

  test('only edits newer than the last applied one reach the room', async () => {
    const { sink, portal } = await setup();
    const edit = (us: number) =>
      event('MESSAGE_UPDATED', {
        message: backendMessage('m1', { text: `edit at ${us}`, lastEditTimeUs: us }),
      });

    portal.enqueue(source, posted(backendMessage('m1')));
    portal.enqueue(source, edit(5_000_000));
    portal.enqueue(source, edit(5_000_000));
    portal.enqueue(source, edit(4_000_000));
    await portal.drained();

    const edits = sink.calls.filter((c) => c.op === 'editMessage');
    expect(edits).toEqual([
      {
        op: 'editMessage',
        roomId: '!room1',
        sender: 'u-alice',
        target: '$ev1',
        message: { text: 'edit at 5000000', timestampMs: 5000 },
      },
    ]);
  });

  test('a deleted message is redacted and forgotten', async () => {
    const { stores, sink, portal } = await setup();

    portal.enqueue(source, posted(backendMessage('m1')));
    portal.enqueue(source, event('MESSAGE_DELETED', { messageDeleted: { messageId: 'm1' } }));
    portal.enqueue(source, event('MESSAGE_DELETED', { messageDeleted: { messageId: 'unknown' } }));
    await portal.drained();

    expect(sink.calls.at(-1)).toEqual({
      op: 'redactMessage',
      roomId: '!room1',
      sender: 'u-alice',
      target: '$ev1',
    });
    expect(sink.ops()).toEqual(['createRoom', 'sendMessage', 'redactMessage']);
    expect(await stores.messages.getByBackendId(asMessageId('m1'), me)).toBeNull();
  });

  test('reactions are added once and removed by redaction', async () => {
    const { stores, sink, portal } = await setup();
    const reaction = (action: 'ADD' | 'REMOVE') =>
      event('MESSAGE_REACTION', {
        reaction: { messageId: 'm1', userId: 'u-bob', emoji: '👍', action },
      });

    portal.enqueue(source, posted(backendMessage('m1')));
    portal.enqueue(source, reaction('ADD'));
    portal.enqueue(source, reaction('ADD'));
    await portal.drained();
    expect(
      await stores.reactions.get(asMessageId('m1'), me, asUserId('u-bob'), '👍'),
    ).toMatchObject({ roomEventId: '$ev2' });

    portal.enqueue(source, reaction('REMOVE'));
    await portal.drained();

    expect(sink.ops()).toEqual(['createRoom', 'sendMessage', 'react', 'redactMessage']);
    expect(sink.calls[2]).toEqual({
      op: 'react',
      roomId: '!room1',
      sender: 'u-bob',
      target: '$ev1',
      emoji: '👍',
    });
    expect(sink.calls[3]).toEqual({
      op: 'redactMessage',
      roomId: '!room1',
      sender: 'u-bob',
      target: '$ev2',
    });
    expect(await stores.reactions.get(asMessageId('m1'), me, asUserId('u-bob'), '👍')).toBeNull();
  });

  test('typing and read receipts from other users reach the room', async () => {
    const { sink, portal } = await setup();

    portal.enqueue(source, posted(backendMessage('m1')));
    const typing = (userId: string) =>
      event('TYPING_STATE_CHANGED', { typing: { userId, state: 'TYPING' } });
    portal.enqueue(source, typing('u-bob'));
    portal.enqueue(source, typing('u-me'));
    portal.enqueue(
      source,
      event('READ_RECEIPT_CHANGED', { readReceipt: { userId: 'u-bob', readTimeUs: 9 } }),
    );
    await portal.drained();

    expect(sink.calls.slice(2)).toEqual([
      { op: 'setTyping', roomId: '!room1', user: 'u-bob', typing: true },
      { op: 'markRead', roomId: '!room1', user: 'u-bob', eventId: '$ev1' },
    ]);
  });

  test('portal and user revisions only move forward', async () => {
    const { stores, portal } = await setup();

    portal.enqueue(source, posted(backendMessage('m1'), { revision: 10, userRevision: 7 }));
    portal.enqueue(source, posted(backendMessage('m2'), { revision: 30, userRevision: 5 }));
    portal.enqueue(source, posted(backendMessage('m3'), { revision: 20 }));
    await portal.drained();

    expect(portal.revision).toBe(30);
    expect((await stores.portals.get(conversationId, me))?.revision).toBe(30);
    expect((await stores.users.get(me))?.revision).toBe(7);
  });

  test('backfill bridges only unseen history before queued live events', async () => {
    const { sink, portal } = await setup();
    await portal.handleRemoteMessage(source, backendMessage('m1'));
    const historyReady = deferred();
    const history = {
      listMessages: async () => {
        await historyReady.promise;
        return ['m0', 'm1', 'm2', 'm3'].map((id) => backendMessage(id));
      },
    };

    const backfill = portal.backfill(source, history, { limit: 50 });
    portal.enqueue(source, posted(backendMessage('m4')));
    await flushMicrotasks();
    expect(sink.ops()).toEqual(['createRoom', 'sendMessage']);

    historyReady.resolve();
    expect(await backfill).toBe(2);
    await portal.drained();

    const texts = sink.calls.flatMap((c) => (c.op === 'sendMessage' ? [c.message.text] : []));
    expect(texts).toEqual(['text of m1', 'text of m2', 'text of m3', 'text of m4']);
    expect(await portal.backfill(source, history, { limit: 0 })).toBe(0);
  });
});
