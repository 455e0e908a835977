import {
  insertNotifications,
  listNotificationPreferences,
  loadNotificationPreferences,
  upsertNotificationPreferences,
  type NotificationInsert,
} from "../../../db/src/queries/notifications";
import type { DbClient, NotificationPreferencesRecord } from "../../../db/src/types";
import { logEvent } from "../observability/logger";

export type NotificationKind = "recordatorio" | "participacion" | "match" | "sistema";

export type PreferenceFlag = "notify_training" | "notify_match" | "notify_system";

const FLAG_BY_KIND: Record<NotificationKind, PreferenceFlag> = {
  recordatorio: "notify_training",
  participacion: "notify_training",
  match: "notify_match",
  sistema: "notify_system",
};

export function defaultPreferences(userId: string): NotificationPreferencesRecord {
  return {
    user_id: userId,
    notify_training: true,
    notify_match: true,
    notify_system: true,
  };
}

export function preferenceFlagFor(kind: NotificationKind): PreferenceFlag {
  return FLAG_BY_KIND[kind];
}

/**
 * Split recipients into those whose preferences allow `kind` and those who
 * opted out. Users without a preferences row are allowed.
 */
export function partitionRecipients(
  userIds: ReadonlyArray<string>,
  preferences: ReadonlyArray<NotificationPreferencesRecord>,
  kind: NotificationKind,
): { allowed: string[]; optedOut: string[] } {
  const flag = preferenceFlagFor(kind);
  const byUser = new Map(preferences.map((entry) => [entry.user_id, entry]));
  const allowed: string[] = [];
  const optedOut: string[] = [];
  for (const userId of new Set(userIds)) {
    if (byUser.get(userId)?.[flag] === false) {
      optedOut.push(userId);
    } else {
      allowed.push(userId);
    }
  }
  return { allowed, optedOut };
}

/** Preferences for a user, written with every flag on when none exist yet. */
export async function getOrCreatePreferences(
  db: DbClient,
  userId: string,
): Promise<NotificationPreferencesRecord> {
  const existing = await loadNotificationPreferences(db, userId);
  if (existing) {
    return existing;
  }
  return upsertNotificationPreferences(db, defaultPreferences(userId));
}

export type PreferencesPatch = Partial<Omit<NotificationPreferencesRecord, "user_id">>;

export async function updatePreferences(
  db: DbClient,
  userId: string,
  patch: PreferencesPatch,
): Promise<NotificationPreferencesRecord> {
  const current = (await loadNotificationPreferences(db, userId)) ?? defaultPreferences(userId);
  const next: NotificationPreferencesRecord = {
    user_id: userId,
    notify_training: patch.notify_training ?? current.notify_training,
    notify_match: patch.notify_match ?? current.notify_match,
    notify_system: patch.notify_system ?? current.notify_system,
  };
  const saved = await upsertNotificationPreferences(db, next);

  logEvent({
    event: "notifications.preferences_updated",
    user_id: userId,
    payload: {
      notify_training: saved.notify_training,
      notify_match: saved.notify_match,
      notify_system: saved.notify_system,
    },
  });
  return saved;
}

/**
 * Send one notification if the recipient allows its kind. Failures are
 * logged and swallowed: callers use this after their own write succeeded.
 */
export async function notifyBestEffort(
  db: DbClient,
  notification: NotificationInsert & { kind: NotificationKind },
  step: string,
): Promise<boolean> {
  try {
    const preferences = await listNotificationPreferences(db, [notification.user_id]);
    const { allowed } = partitionRecipients([notification.user_id], preferences, notification.kind);
    if (allowed.length === 0) {
      return false;
    }
    return (await insertNotifications(db, [notification])) > 0;
  } catch (error) {
    logEvent({
      level: "warn",
      event: "notifications.best_effort_failed",
      user_id: notification.user_id,
      payload: {
        step,
        error_name: error instanceof Error ? error.name : "Error",
        error_message: error instanceof Error ? error.message : String(error),
      },
    });
    return false;
  }
}
