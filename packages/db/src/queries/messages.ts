import { DB_ERROR_CODES, DbError } from "../errors";
import { executeQuery } from "../query";
import {
  readBoolean,
  readInteger,
  readRequiredString,
  readString,
  toOptionalRow,
  toRows,
  type Row,
} from "../rows";
import type { ChatMessageRecord, ChatSummaryRecord, DbClient } from "../types";

const SUMMARIES = "v_chat_summaries";
const MESSAGES = "chat_messages";
const SUMMARY_COLUMNS = "chat_id,user_id,title,is_group,evento_id,last_message_content,last_message_at";
const MESSAGE_COLUMNS = "id,chat_id,user_id,content,created_at";

/** Chats the user is a member of, most recently active first. */
export async function listChatSummaries(
  db: DbClient,
  userId: string,
): Promise<ChatSummaryRecord[]> {
  const data = await executeQuery({
    message: "Unable to list chats.",
    context: { table: SUMMARIES, user_id: userId },
    run: () =>
      db
        .from(SUMMARIES)
        .select(SUMMARY_COLUMNS)
        .eq("user_id", userId)
        .order("last_message_at", { ascending: false, nullsFirst: false }),
  });

  return toRows(data, SUMMARIES).map((row) => ({
    id: readRequiredString(row, "chat_id", SUMMARIES),
    title: readString(row, "title"),
    is_group: readBoolean(row, "is_group", false),
    event_id: readInteger(row, "evento_id"),
    last_message: readString(row, "last_message_content"),
    last_message_at: readString(row, "last_message_at"),
  }));
}

/**
 * A page of messages, newest first. `before` pages backwards from an
 * earlier page's oldest `created_at`.
 */
export async function listChatMessages(
  db: DbClient,
  chatId: string,
  params: { limit: number; before: string | null },
): Promise<ChatMessageRecord[]> {
  const data = await executeQuery({
    message: "Unable to list chat messages.",
    context: { table: MESSAGES, chat_id: chatId },
    run: () => {
      const query = db.from(MESSAGES).select(MESSAGE_COLUMNS).eq("chat_id", chatId);
      return (params.before ? query.lt("created_at", params.before) : query)
        .order("created_at", { ascending: false })
        .limit(params.limit);
    },
  });

  return toRows(data, MESSAGES).map(parseMessageRow);
}

export async function insertChatMessage(
  db: DbClient,
  input: { chatId: string; userId: string; content: string; createdAt: Date },
): Promise<ChatMessageRecord> {
  const data = await executeQuery({
    message: "Unable to send chat message.",
    context: { table: MESSAGES, chat_id: input.chatId, user_id: input.userId },
    run: () =>
      db
        .from(MESSAGES)
        .insert({
          chat_id: input.chatId,
          user_id: input.userId,
          content: input.content,
          created_at: input.createdAt.toISOString(),
        })
        .select(MESSAGE_COLUMNS)
        .single(),
  });

  const row = toOptionalRow(data, MESSAGES);
  if (!row) {
    throw new DbError(DB_ERROR_CODES.UNEXPECTED_RESPONSE, "Message insert returned no row.", {
      status: 500,
      context: { table: MESSAGES, chat_id: input.chatId },
    });
  }
  return parseMessageRow(row);
}

function parseMessageRow(row: Row): ChatMessageRecord {
  return {
    id: readRequiredString(row, "id", MESSAGES),
    chat_id: readRequiredString(row, "chat_id", MESSAGES),
    user_id: readRequiredString(row, "user_id", MESSAGES),
    content: readString(row, "content") ?? "",
    created_at: readString(row, "created_at"),
  };
}
