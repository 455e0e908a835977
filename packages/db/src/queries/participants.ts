import { executeQuery } from "../query";
import { readString, toRows } from "../rows";
import type { DbClient } from "../types";

const TABLE = "event_participants";

/** Record an active participation; an existing row is left as it is. */
export async function upsertParticipation(
  db: DbClient,
  input: { eventId: number; userId: string; joinedAt: Date },
): Promise<void> {
  await executeQuery({
    message: "Unable to upsert event participation.",
    context: { table: TABLE, event_id: input.eventId, user_id: input.userId },
    run: () =>
      db.from(TABLE).upsert(
        {
          evento_id: input.eventId,
          user_id: input.userId,
          status: "active",
          joined_at: input.joinedAt.toISOString(),
        },
        { onConflict: "evento_id,user_id", ignoreDuplicates: true },
      ),
  });
}

export async function deleteParticipation(
  db: DbClient,
  eventId: number,
  userId: string,
): Promise<void> {
  await executeQuery({
    message: "Unable to delete event participation.",
    context: { table: TABLE, event_id: eventId, user_id: userId },
    run: () => db.from(TABLE).delete().eq("evento_id", eventId).eq("user_id", userId),
  });
}

export async function listActiveParticipantIds(
  db: DbClient,
  eventId: number,
): Promise<string[]> {
  const data = await executeQuery({
    message: "Unable to list event participants.",
    context: { table: TABLE, event_id: eventId },
    run: () =>
      db.from(TABLE).select("user_id").eq("evento_id", eventId).eq("status", "active"),
  });

  const ids: string[] = [];
  for (const row of toRows(data, TABLE)) {
    const userId = readString(row, "user_id");
    if (userId) {
      ids.push(userId);
    }
  }
  return ids;
}
