import type { InsertChatResult } from "../../../db/src/queries/chats";
import type { EventRecord } from "../../../db/src/types";
import { isEventOpen } from "../events/event-eligibility";
import { logEvent } from "../observability/logger";
import { MembershipError } from "./errors";

/**
 * Data operations the reconciler needs. Two instances are handed in: one
 * that acts as the calling user (row policies apply) and one that acts with
 * the service role.
 */
export type MembershipStore = {
  findEvent: (eventId: number) => Promise<EventRecord | null>;
  findChatIdByEventId: (eventId: number) => Promise<string | null>;
  insertEventChat: (input: {
    eventId: number;
    createdBy: string;
    title?: string | null;
  }) => Promise<InsertChatResult>;
  upsertParticipation: (input: {
    eventId: number;
    userId: string;
    joinedAt: Date;
  }) => Promise<void>;
  upsertMemberships: (
    members: ReadonlyArray<{ chat_id: string; user_id: string }>,
  ) => Promise<void>;
  deleteMembership: (chatId: string, userId: string) => Promise<void>;
  deleteParticipation: (eventId: number, userId: string) => Promise<void>;
  findDirectChatId: (userId: string, peerId: string) => Promise<string | null>;
  insertDirectChat: (createdBy: string) => Promise<string>;
};

export type MembershipStores = {
  scoped: MembershipStore;
  elevated: MembershipStore;
  now?: () => Date;
};

export type JoinEventResult = {
  event_id: number;
  chat_id: string;
  event: EventRecord;
};

/**
 * Return the id of the event's group chat, creating it when missing.
 *
 * Creation is tried as the acting user first and with the service role when
 * row policies deny it. A unique violation on `evento_id` means a concurrent
 * caller created the chat, so the chat is re-read instead.
 */
export async function ensureEventChat(
  eventId: number,
  actorUserId: string,
  stores: MembershipStores,
  options: { title?: string | null } = {},
): Promise<string> {
  const existing = await stores.elevated.findChatIdByEventId(eventId);
  if (existing) {
    return existing;
  }

  const insert = { eventId, createdBy: actorUserId, title: options.title ?? null };
  const scopedResult = await stores.scoped.insertEventChat(insert);
  if (scopedResult.status === "created") {
    logChatCreated(eventId, actorUserId, scopedResult.chat_id, "scoped");
    return scopedResult.chat_id;
  }
  if (scopedResult.status === "conflict") {
    return rereadEventChat(eventId, actorUserId, stores, "scoped_conflict");
  }

  let elevatedFailure: unknown;
  try {
    const elevatedResult = await stores.elevated.insertEventChat(insert);
    if (elevatedResult.status === "created") {
      logChatCreated(eventId, actorUserId, elevatedResult.chat_id, "elevated");
      return elevatedResult.chat_id;
    }
    if (elevatedResult.status === "conflict") {
      return rereadEventChat(eventId, actorUserId, stores, "elevated_conflict");
    }
  } catch (error) {
    elevatedFailure = error;
    logEvent({
      level: "warn",
      event: "membership.chat_insert_failed",
      user_id: actorUserId,
      payload: {
        event_id: eventId,
        mode: "elevated",
        error_name: error instanceof Error ? error.name : "Error",
        error_message: error instanceof Error ? error.message : String(error),
      },
    });
  }

  return rereadEventChat(eventId, actorUserId, stores, "elevated_failure", elevatedFailure);
}

/**
 * Join an event: check it exists and is open, make sure its chat exists,
 * then record participation and chat membership. Repeating a join changes
 * nothing and returns the same chat id.
 */
export async function joinEvent(
  eventId: number,
  userId: string,
  stores: MembershipStores,
): Promise<JoinEventResult> {
  const now = stores.now?.() ?? new Date();
  const event = await stores.scoped.findEvent(eventId);
  if (!event) {
    throw new MembershipError("EVENT_NOT_FOUND", "Event not found.");
  }
  if (!isEventOpen(event, now)) {
    throw new MembershipError(
      "EVENT_NOT_JOINABLE",
      "Event is cancelled or has already started.",
    );
  }

  const chatId = await ensureEventChat(eventId, userId, stores, { title: event.title });
  await stores.scoped.upsertParticipation({ eventId, userId, joinedAt: now });
  await stores.scoped.upsertMemberships([{ chat_id: chatId, user_id: userId }]);

  logEvent({
    event: "membership.event_joined",
    user_id: userId,
    payload: { event_id: eventId, chat_id: chatId },
  });

  return { event_id: eventId, chat_id: chatId, event };
}

/** Leave an event. Missing chat, membership or participation rows are fine. */
export async function leaveEvent(
  eventId: number,
  userId: string,
  stores: MembershipStores,
): Promise<void> {
  const chatId = await stores.elevated.findChatIdByEventId(eventId);
  if (chatId) {
    await stores.scoped.deleteMembership(chatId, userId);
  }
  await stores.scoped.deleteParticipation(eventId, userId);

  logEvent({
    event: "membership.event_left",
    user_id: userId,
    payload: { event_id: eventId, chat_id: chatId },
  });
}

/** Return the direct chat shared by two users, creating it when there is none. */
export async function ensureDirectChat(
  userId: string,
  peerId: string,
  stores: MembershipStores,
): Promise<string> {
  const existing = await stores.elevated.findDirectChatId(userId, peerId);
  const chatId = existing ?? (await stores.elevated.insertDirectChat(userId));

  await stores.elevated.upsertMemberships([
    { chat_id: chatId, user_id: userId },
    { chat_id: chatId, user_id: peerId },
  ]);

  logEvent({
    event: "membership.direct_chat_ensured",
    user_id: userId,
    payload: { chat_id: chatId, peer_user_id: peerId, created: existing === null },
  });

  return chatId;
}

/** Open a direct chat between the caller and the creator of an event. */
export async function matchEventCreator(
  eventId: number,
  userId: string,
  stores: MembershipStores,
): Promise<{ chat_id: string; peer_user_id: string }> {
  const event = await stores.scoped.findEvent(eventId);
  if (!event?.creator_id) {
    throw new MembershipError("EVENT_NOT_FOUND", "Event not found.");
  }
  if (event.creator_id === userId) {
    throw new MembershipError(
      "CANNOT_MATCH_OWN_EVENT",
      "You cannot match with your own event.",
    );
  }

  const chatId = await ensureDirectChat(userId, event.creator_id, stores);
  return { chat_id: chatId, peer_user_id: event.creator_id };
}

async function rereadEventChat(
  eventId: number,
  actorUserId: string,
  stores: MembershipStores,
  reason: "scoped_conflict" | "elevated_conflict" | "elevated_failure",
  cause?: unknown,
): Promise<string> {
  const chatId = await stores.elevated.findChatIdByEventId(eventId);
  if (chatId) {
    logEvent({
      event: "membership.chat_recovered",
      user_id: actorUserId,
      payload: { event_id: eventId, chat_id: chatId, reason },
    });
    return chatId;
  }

  throw new MembershipError(
    "CHAT_UNAVAILABLE",
    "Unable to create or locate the event chat.",
    { cause },
  );
}

function logChatCreated(
  eventId: number,
  actorUserId: string,
  chatId: string,
  mode: "scoped" | "elevated",
): void {
  logEvent({
    event: "membership.chat_created",
    user_id: actorUserId,
    payload: { event_id: eventId, chat_id: chatId, mode },
  });
}
