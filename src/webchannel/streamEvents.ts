import { z } from 'zod';

import { asConversationId, type ConversationId } from '../types/ids.js';

/** Stream-events request sent once per new SID to mark the client as present. */
export const INITIAL_PING_REQUEST = {
  pingEvent: {
    state: 'ACTIVE',
    applicationFocusState: 'FOCUS_STATE_FOREGROUND',
    clientInteractiveState: 'INTERACTIVE',
    clientNotificationsEnabled: true,
  },
} as const;

export const BackendMessageSchema = z
  .object({
    id: z.string().min(1),
    creatorId: z.string().min(1),
    text: z.string().default(''),
    createTimeUs: z.number().int(),
    lastEditTimeUs: z.number().int().optional(),
    localId: z.string().optional(),
    /** Id of the thread's first message, absent for top-level messages. */
    threadId: z.string().optional(),
  })
  .passthrough();

export type BackendMessage = z.infer<typeof BackendMessageSchema>;

export const EventBodySchema = z
  .object({
    eventType: z.string().min(1),
    message: BackendMessageSchema.optional(),
    messageDeleted: z.object({ messageId: z.string().min(1) }).passthrough().optional(),
    reaction: z
      .object({
        messageId: z.string().min(1),
        userId: z.string().min(1),
        emoji: z.string().min(1),
        action: z.enum(['ADD', 'REMOVE']),
      })
      .passthrough()
      .optional(),
    typing: z
      .object({ userId: z.string().min(1), state: z.enum(['TYPING', 'STOPPED']) })
      .passthrough()
      .optional(),
    readReceipt: z
      .object({ userId: z.string().min(1), readTimeUs: z.number().int() })
      .passthrough()
      .optional(),
  })
  .passthrough();

export type EventBody = z.infer<typeof EventBodySchema>;

export const BackendEventSchema = z
  .object({
    groupId: z.string().min(1),
    type: z.string().min(1),
    /** Conversation revision (microseconds) after this event. */
    revision: z.number().int().optional(),
    /** Per-user revision (microseconds) after this event. */
    userRevision: z.number().int().optional(),
    body: EventBodySchema.optional(),
    bodies: z.array(EventBodySchema).optional(),
  })
  .passthrough();

export type BackendEvent = z.infer<typeof BackendEventSchema>;

const StreamEventsResponseSchema = z.object({ event: BackendEventSchema }).passthrough();

export type ParsedDataArray =
  | { kind: 'noop' }
  | { kind: 'event'; event: BackendEvent }
  | { kind: 'invalid'; error: string };

/** Interprets one data array from the backward channel. */
export const parseDataArray = (array: unknown): ParsedDataArray => {
  if (!Array.isArray(array) || array.length === 0) {
    return { kind: 'invalid', error: 'expected a non-empty array' };
  }
  const head: unknown = array[0];
  if (head === 'noop') return { kind: 'noop' };
  const res = StreamEventsResponseSchema.safeParse(head);
  if (!res.success) return { kind: 'invalid', error: res.error.message };
  return { kind: 'event', event: res.data.event };
};

/**
 * Flattens an event carrying several bodies into one event per body. The top-level body (if any)
 * comes first; each embedded body becomes the `body` of a copy whose `type` is the body's type.
 */
export function* splitEventBodies(event: BackendEvent): Generator<BackendEvent, void, void> {
  const { bodies, ...rest } = event;
  if (rest.body) yield rest;
  for (const body of bodies ?? []) {
    yield { ...rest, body, type: body.eventType };
  }
}

export type ConversationRef = { kind: 'dm'; id: string } | { kind: 'space'; id: string };

export const parseConversationId = (value: string): ConversationRef => {
  if (value.startsWith('dm:') && value.length > 3) return { kind: 'dm', id: value.slice(3) };
  if (value.startsWith('space:') && value.length > 6) return { kind: 'space', id: value.slice(6) };
  throw new Error(`Invalid conversation id: ${JSON.stringify(value)}`);
};

export const formatConversationId = (ref: ConversationRef): ConversationId =>
  asConversationId(`${ref.kind}:${ref.id}`);

/** Backend timestamps are microseconds since the epoch; sub-millisecond digits are dropped. */
export const fromMicros = (us: number): Date => new Date(Math.floor(us / 1000));
