import {
  classifyPostgrestFailure,
  DB_ERROR_CODES,
  DbError,
  toDbError,
} from "../errors";
import { executeQuery } from "../query";
import { withUpstreamRetry } from "../retry";
import { readRequiredString, readString, toOptionalRow, toRows } from "../rows";
import type { DbClient } from "../types";

const CHATS = "chats";
const MEMBERS = "chat_members";

export type InsertChatResult =
  | { status: "created"; chat_id: string }
  | { status: "conflict" }
  | { status: "denied" };

export async function findChatIdByEventId(
  db: DbClient,
  eventId: number,
): Promise<string | null> {
  const data = await executeQuery({
    message: "Unable to look up event chat.",
    context: { table: CHATS, event_id: eventId },
    run: () => db.from(CHATS).select("id").eq("evento_id", eventId).limit(1),
  });

  const [row] = toRows(data, CHATS);
  return row ? readString(row, "id") : null;
}

/**
 * Insert the group chat for an event. Unique violations and row-policy
 * denials are reported as results; every other failure throws.
 */
export async function insertEventChat(
  db: DbClient,
  input: { eventId: number; createdBy: string; title?: string | null },
): Promise<InsertChatResult> {
  return withUpstreamRetry(async () => {
    const { data, error, status } = await db
      .from(CHATS)
      .insert({
        evento_id: input.eventId,
        is_group: true,
        created_by: input.createdBy,
        title: input.title ?? null,
      })
      .select("id")
      .single();

    if (error) {
      const kind = classifyPostgrestFailure(error, status);
      if (kind === "conflict" || kind === "denied") {
        return { status: kind };
      }
      throw toDbError({
        message: "Unable to create event chat.",
        error,
        status,
        context: { table: CHATS, event_id: input.eventId },
      });
    }

    const row = toOptionalRow(data, CHATS);
    if (!row) {
      throw new DbError(DB_ERROR_CODES.UNEXPECTED_RESPONSE, "Chat insert returned no row.", {
        status: 500,
        context: { table: CHATS, event_id: input.eventId },
      });
    }
    return { status: "created", chat_id: readRequiredString(row, "id", CHATS) };
  });
}

/** Create or retitle the group chat of an event, keyed on `evento_id`. */
export async function upsertEventChatTitle(
  db: DbClient,
  input: { eventId: number; createdBy: string; title: string },
): Promise<void> {
  await executeQuery({
    message: "Unable to upsert event chat title.",
    context: { table: CHATS, event_id: input.eventId },
    run: () =>
      db.from(CHATS).upsert(
        {
          evento_id: input.eventId,
          is_group: true,
          created_by: input.createdBy,
          title: input.title,
        },
        { onConflict: "evento_id" },
      ),
  });
}

/** Insert a direct (non-group) chat with no event. */
export async function insertDirectChat(db: DbClient, createdBy: string): Promise<string> {
  const data = await executeQuery({
    message: "Unable to create direct chat.",
    context: { table: CHATS, created_by: createdBy },
    run: () =>
      db
        .from(CHATS)
        .insert({ evento_id: null, is_group: false, created_by: createdBy, title: null })
        .select("id")
        .single(),
  });

  const row = toOptionalRow(data, CHATS);
  if (!row) {
    throw new DbError(DB_ERROR_CODES.UNEXPECTED_RESPONSE, "Chat insert returned no row.", {
      status: 500,
      context: { table: CHATS },
    });
  }
  return readRequiredString(row, "id", CHATS);
}

/** A non-group chat both users belong to, if one exists. */
export async function findDirectChatId(
  db: DbClient,
  userId: string,
  peerId: string,
): Promise<string | null> {
  const ownChatIds = await listChatIdsForUser(db, userId);
  if (ownChatIds.length === 0) {
    return null;
  }

  const sharedData = await executeQuery({
    message: "Unable to list shared chats.",
    context: { table: MEMBERS, user_id: peerId },
    run: () =>
      db.from(MEMBERS).select("chat_id").eq("user_id", peerId).in("chat_id", ownChatIds),
  });
  const sharedIds = collectIds(toRows(sharedData, MEMBERS), "chat_id");
  if (sharedIds.length === 0) {
    return null;
  }

  const data = await executeQuery({
    message: "Unable to look up direct chat.",
    context: { table: CHATS },
    run: () =>
      db.from(CHATS).select("id").in("id", sharedIds).eq("is_group", false).limit(1),
  });
  const [row] = toRows(data, CHATS);
  return row ? readString(row, "id") : null;
}

export async function listChatIdsForUser(db: DbClient, userId: string): Promise<string[]> {
  const data = await executeQuery({
    message: "Unable to list chat memberships.",
    context: { table: MEMBERS, user_id: userId },
    run: () => db.from(MEMBERS).select("chat_id").eq("user_id", userId),
  });
  return collectIds(toRows(data, MEMBERS), "chat_id");
}

/** Add members, leaving existing `(chat_id, user_id)` rows untouched. */
export async function upsertChatMembers(
  db: DbClient,
  members: ReadonlyArray<{ chat_id: string; user_id: string }>,
): Promise<void> {
  if (members.length === 0) {
    return;
  }
  await executeQuery({
    message: "Unable to upsert chat membership.",
    context: { table: MEMBERS, chat_id: members[0]?.chat_id ?? null },
    run: () =>
      db.from(MEMBERS).upsert(
        members.map((member) => ({ chat_id: member.chat_id, user_id: member.user_id })),
        { onConflict: "chat_id,user_id", ignoreDuplicates: true },
      ),
  });
}

export async function deleteChatMember(
  db: DbClient,
  chatId: string,
  userId: string,
): Promise<void> {
  await executeQuery({
    message: "Unable to delete chat membership.",
    context: { table: MEMBERS, chat_id: chatId, user_id: userId },
    run: () => db.from(MEMBERS).delete().eq("chat_id", chatId).eq("user_id", userId),
  });
}

function collectIds(rows: ReadonlyArray<Record<string, unknown>>, key: string): string[] {
  const ids: string[] = [];
  for (const row of rows) {
    const value = readString(row, key);
    if (value && !ids.includes(value)) {
      ids.push(value);
    }
  }
  return ids;
}
