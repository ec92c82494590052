declare const conversationIdBrand: unique symbol;
declare const messageIdBrand: unique symbol;
declare const localIdBrand: unique symbol;
declare const userIdBrand: unique symbol;
declare const roomIdBrand: unique symbol;
declare const roomEventIdBrand: unique symbol;

/** Backend conversation id in `dm:<id>` or `space:<id>` form. */
export type ConversationId = string & { readonly [conversationIdBrand]: true };
export type MessageId = string & { readonly [messageIdBrand]: true };
/** Client-generated idempotency token attached to an outgoing message. */
export type LocalId = string & { readonly [localIdBrand]: true };
/** Backend user id. */
export type UserId = string & { readonly [userIdBrand]: true };
/** Matrix room id. */
export type RoomId = string & { readonly [roomIdBrand]: true };
/** Matrix event id. */
export type RoomEventId = string & { readonly [roomEventIdBrand]: true };

export const asConversationId = (value: string): ConversationId => value as ConversationId;
export const asMessageId = (value: string): MessageId => value as MessageId;
export const asLocalId = (value: string): LocalId => value as LocalId;
export const asUserId = (value: string): UserId => value as UserId;
export const asRoomId = (value: string): RoomId => value as RoomId;
export const asRoomEventId = (value: string): RoomEventId => value as RoomEventId;
