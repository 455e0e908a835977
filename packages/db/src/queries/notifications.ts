import { DB_ERROR_CODES, DbError } from "../errors";
import { executeQuery } from "../query";
import {
  readBoolean,
  readRequiredString,
  readString,
  toOptionalRow,
  toRows,
  type Row,
} from "../rows";
import type { DbClient, NotificationPreferencesRecord, NotificationRecord } from "../types";

const NOTIFICATIONS = "notificaciones";
const PREFERENCES = "preferencias_notificaciones";
const NOTIFICATION_COLUMNS = "id,usuario_id,titulo,mensaje,tipo,leida,fecha,dedupe_key";
const PREFERENCE_COLUMNS = "usuario_id,notificar_entrenos,notificar_match,notificar_sistema";

export type NotificationInsert = {
  user_id: string;
  title: string;
  message: string;
  kind: string;
  dedupe_key?: string | null;
};

/**
 * Insert notifications, skipping any whose `(usuario_id, dedupe_key)`
 * already exists. Returns how many rows were actually written.
 */
export async function insertNotifications(
  db: DbClient,
  notifications: ReadonlyArray<NotificationInsert>,
): Promise<number> {
  if (notifications.length === 0) {
    return 0;
  }

  const data = await executeQuery({
    message: "Unable to insert notifications.",
    context: { table: NOTIFICATIONS, count: notifications.length },
    run: () =>
      db
        .from(NOTIFICATIONS)
        .upsert(
          notifications.map((notification) => ({
            usuario_id: notification.user_id,
            titulo: notification.title,
            mensaje: notification.message,
            tipo: notification.kind,
            leida: false,
            dedupe_key: notification.dedupe_key ?? null,
          })),
          { onConflict: "usuario_id,dedupe_key", ignoreDuplicates: true },
        )
        .select("id"),
  });

  return toRows(data, NOTIFICATIONS).length;
}

export async function listNotificationsForUser(
  db: DbClient,
  userId: string,
  params: { limit: number },
): Promise<NotificationRecord[]> {
  const data = await executeQuery({
    message: "Unable to list notifications.",
    context: { table: NOTIFICATIONS, user_id: userId },
    run: () =>
      db
        .from(NOTIFICATIONS)
        .select(NOTIFICATION_COLUMNS)
        .eq("usuario_id", userId)
        .order("fecha", { ascending: false })
        .limit(params.limit),
  });

  return toRows(data, NOTIFICATIONS).map(parseNotificationRow);
}

/** Mark one of the user's notifications read; `false` when it is not theirs or missing. */
export async function markNotificationRead(
  db: DbClient,
  userId: string,
  notificationId: string,
): Promise<boolean> {
  const data = await executeQuery({
    message: "Unable to mark notification read.",
    context: { table: NOTIFICATIONS, user_id: userId, notification_id: notificationId },
    run: () =>
      db
        .from(NOTIFICATIONS)
        .update({ leida: true })
        .eq("id", notificationId)
        .eq("usuario_id", userId)
        .select("id"),
  });

  return toRows(data, NOTIFICATIONS).length > 0;
}

export async function loadNotificationPreferences(
  db: DbClient,
  userId: string,
): Promise<NotificationPreferencesRecord | null> {
  const data = await executeQuery({
    message: "Unable to load notification preferences.",
    context: { table: PREFERENCES, user_id: userId },
    run: () =>
      db.from(PREFERENCES).select(PREFERENCE_COLUMNS).eq("usuario_id", userId).maybeSingle(),
  });

  const row = toOptionalRow(data, PREFERENCES);
  return row ? parsePreferencesRow(row) : null;
}

export async function listNotificationPreferences(
  db: DbClient,
  userIds: ReadonlyArray<string>,
): Promise<NotificationPreferencesRecord[]> {
  if (userIds.length === 0) {
    return [];
  }
  const data = await executeQuery({
    message: "Unable to list notification preferences.",
    context: { table: PREFERENCES, count: userIds.length },
    run: () => db.from(PREFERENCES).select(PREFERENCE_COLUMNS).in("usuario_id", [...userIds]),
  });

  return toRows(data, PREFERENCES).map(parsePreferencesRow);
}

export async function upsertNotificationPreferences(
  db: DbClient,
  preferences: NotificationPreferencesRecord,
): Promise<NotificationPreferencesRecord> {
  const data = await executeQuery({
    message: "Unable to save notification preferences.",
    context: { table: PREFERENCES, user_id: preferences.user_id },
    run: () =>
      db
        .from(PREFERENCES)
        .upsert(
          {
            usuario_id: preferences.user_id,
            notificar_entrenos: preferences.notify_training,
            notificar_match: preferences.notify_match,
            notificar_sistema: preferences.notify_system,
          },
          { onConflict: "usuario_id" },
        )
        .select(PREFERENCE_COLUMNS)
        .single(),
  });

  const row = toOptionalRow(data, PREFERENCES);
  if (!row) {
    throw new DbError(DB_ERROR_CODES.UNEXPECTED_RESPONSE, "Preferences upsert returned no row.", {
      status: 500,
      context: { table: PREFERENCES },
    });
  }
  return parsePreferencesRow(row);
}

export function parseNotificationRow(row: Row): NotificationRecord {
  return {
    id: readRequiredString(row, "id", NOTIFICATIONS),
    user_id: readRequiredString(row, "usuario_id", NOTIFICATIONS),
    title: readString(row, "titulo") ?? "",
    message: readString(row, "mensaje") ?? "",
    kind: readString(row, "tipo") ?? "sistema",
    read: readBoolean(row, "leida", false),
    created_at: readString(row, "fecha"),
    dedupe_key: readString(row, "dedupe_key"),
  };
}

/** Missing flags default to enabled. */
export function parsePreferencesRow(row: Row): NotificationPreferencesRecord {
  return {
    user_id: readRequiredString(row, "usuario_id", PREFERENCES),
    notify_training: readBoolean(row, "notificar_entrenos", true),
    notify_match: readBoolean(row, "notificar_match", true),
    notify_system: readBoolean(row, "notificar_sistema", true),
  };
}
