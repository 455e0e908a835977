import { executeQuery } from "../query";
import {
  readIntegerList,
  readInteger,
  readRequiredString,
  readString,
  toOptionalRow,
  toRows,
  type Row,
} from "../rows";
import type { ChatUserRecord, DbClient, ProfileRecord } from "../types";

const TABLE = "usuarios";
export const PROFILE_COLUMNS = "id,nombre,biografia,foto_url,municipio,intereses,nivel_habilidad";

/** Load one profile by user id; `null` when the row does not exist or is hidden. */
export async function loadProfileById(
  db: DbClient,
  userId: string,
): Promise<ProfileRecord | null> {
  const data = await executeQuery({
    message: "Unable to load profile.",
    context: { table: TABLE, user_id: userId },
    run: () => db.from(TABLE).select(PROFILE_COLUMNS).eq("id", userId).maybeSingle(),
  });

  const row = toOptionalRow(data, TABLE);
  return row ? parseProfileRow(row) : null;
}

/** Every profile except the given user's, ordered by name. */
export async function listProfilesExcept(
  db: DbClient,
  userId: string,
): Promise<ProfileRecord[]> {
  const data = await executeQuery({
    message: "Unable to list profiles.",
    context: { table: TABLE, excluded_user_id: userId },
    run: () =>
      db
        .from(TABLE)
        .select(PROFILE_COLUMNS)
        .neq("id", userId)
        .order("nombre", { ascending: true }),
  });

  return toRows(data, TABLE).map(parseProfileRow);
}

/** Name and photo for each id that has a visible profile. */
export async function listChatUsers(
  db: DbClient,
  userIds: ReadonlyArray<string>,
): Promise<ChatUserRecord[]> {
  if (userIds.length === 0) {
    return [];
  }
  const data = await executeQuery({
    message: "Unable to load chat users.",
    context: { table: TABLE, count: userIds.length },
    run: () => db.from(TABLE).select("id,nombre,foto_url").in("id", [...userIds]),
  });

  return toRows(data, TABLE).map((row) => ({
    id: readRequiredString(row, "id", TABLE),
    name: readString(row, "nombre"),
    photo_url: readString(row, "foto_url"),
  }));
}

export function parseProfileRow(row: Row): ProfileRecord {
  const skill = readInteger(row, "nivel_habilidad");
  return {
    id: readRequiredString(row, "id", TABLE),
    name: readString(row, "nombre"),
    bio: readString(row, "biografia"),
    photo_url: readString(row, "foto_url"),
    locality: readString(row, "municipio"),
    interest_ids: readIntegerList(row, "intereses"),
    skill_level: skill !== null && skill >= 1 && skill <= 5 ? skill : null,
  };
}

export type ProfilePatch = Partial<{
  name: string | null;
  bio: string | null;
  photo_url: string | null;
  locality: string | null;
  interest_ids: number[];
  skill_level: number | null;
}>;

const COLUMN_BY_FIELD: Readonly<Record<string, string | undefined>> = {
  name: "nombre",
  bio: "biografia",
  photo_url: "foto_url",
  locality: "municipio",
  interest_ids: "intereses",
  skill_level: "nivel_habilidad",
};

/** Apply a partial update; `null` when no profile row matched. */
export async function updateProfile(
  db: DbClient,
  userId: string,
  patch: ProfilePatch,
): Promise<ProfileRecord | null> {
  const update: Record<string, unknown> = {};
  for (const [field, value] of Object.entries(patch)) {
    const column = COLUMN_BY_FIELD[field];
    if (column && value !== undefined) {
      update[column] = value;
    }
  }
  if (Object.keys(update).length === 0) {
    return loadProfileById(db, userId);
  }

  const data = await executeQuery({
    message: "Unable to update profile.",
    context: { table: TABLE, user_id: userId, fields: Object.keys(update) },
    run: () =>
      db.from(TABLE).update(update).eq("id", userId).select(PROFILE_COLUMNS).maybeSingle(),
  });

  const row = toOptionalRow(data, TABLE);
  return row ? parseProfileRow(row) : null;
}
