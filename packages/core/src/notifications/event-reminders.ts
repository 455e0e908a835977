import {
  insertNotifications,
  listActiveParticipantIds,
  listEventsStartingBetween,
  listNotificationPreferences,
  type NotificationInsert,
} from "../../../db/src/queries";
import type {
  DbClient,
  EventRecord,
  NotificationPreferencesRecord,
} from "../../../db/src/types";
import { logEvent } from "../observability/logger";
import { partitionRecipients } from "./notification-service";

export const DEFAULT_REMINDER_WINDOWS_MINUTES: readonly number[] = [60, 15];

const WINDOW_WIDTH_MS = 60_000;

export type ReminderStore = {
  listEventsStartingBetween: (from: Date, to: Date) => Promise<EventRecord[]>;
  listActiveParticipantIds: (eventId: number) => Promise<string[]>;
  listPreferences: (userIds: ReadonlyArray<string>) => Promise<NotificationPreferencesRecord[]>;
  insertNotifications: (notifications: ReadonlyArray<NotificationInsert>) => Promise<number>;
};

export type ReminderWindowResult = {
  window_minutes: number;
  events: number;
  sent: number;
  skipped: number;
};

export type ReminderRunResult = {
  events: number;
  sent: number;
  skipped: number;
  windows: ReminderWindowResult[];
};

export function reminderDedupeKey(eventId: number, windowMinutes: number): string {
  return `event:${eventId}:reminder:${windowMinutes}`;
}

/**
 * Notify the creator and active participants of every event that starts
 * `m` minutes from `now` (within a one-minute window) for each `m`.
 * Recipients who turned off training notifications are skipped, and a
 * reminder already sent for the same event and window is never sent again.
 */
export async function runEventReminders(params: {
  store: ReminderStore;
  now?: Date;
  windowsMinutes?: ReadonlyArray<number>;
}): Promise<ReminderRunResult> {
  const now = params.now ?? new Date();
  const windows = params.windowsMinutes ?? DEFAULT_REMINDER_WINDOWS_MINUTES;
  const results: ReminderWindowResult[] = [];

  for (const windowMinutes of windows) {
    results.push(await processWindow(params.store, now, windowMinutes));
  }

  const totals = results.reduce(
    (sum, window) => ({
      events: sum.events + window.events,
      sent: sum.sent + window.sent,
      skipped: sum.skipped + window.skipped,
    }),
    { events: 0, sent: 0, skipped: 0 },
  );

  logEvent({
    event: "reminders.run_completed",
    payload: { ...totals, windows: results.length },
  });

  return { ...totals, windows: results };
}

async function processWindow(
  store: ReminderStore,
  now: Date,
  windowMinutes: number,
): Promise<ReminderWindowResult> {
  const from = new Date(now.getTime() + windowMinutes * 60_000);
  const to = new Date(from.getTime() + WINDOW_WIDTH_MS);
  const events = await store.listEventsStartingBetween(from, to);

  let sent = 0;
  let skipped = 0;
  for (const event of events) {
    const participants = await store.listActiveParticipantIds(event.id);
    const recipients = event.creator_id ? [event.creator_id, ...participants] : participants;
    const preferences = await store.listPreferences([...new Set(recipients)]);
    const { allowed, optedOut } = partitionRecipients(recipients, preferences, "recordatorio");

    const notifications = allowed.map((userId) => buildReminder(event, userId, windowMinutes));
    const inserted = await store.insertNotifications(notifications);
    sent += inserted;
    skipped += optedOut.length + (notifications.length - inserted);
  }

  const result = { window_minutes: windowMinutes, events: events.length, sent, skipped };
  logEvent({ event: "reminders.window_processed", payload: result });
  return result;
}

function buildReminder(
  event: EventRecord,
  userId: string,
  windowMinutes: number,
): NotificationInsert {
  const name = event.title?.trim() || event.description?.trim() || "Entrenamiento";
  return {
    user_id: userId,
    title: `Recordatorio: entrenamiento en ${windowMinutes} min`,
    message: `Tu entrenamiento '${name}' comienza en ${windowMinutes} minutos.`,
    kind: "recordatorio",
    dedupe_key: reminderDedupeKey(event.id, windowMinutes),
  };
}

export function createSupabaseReminderStore(db: DbClient): ReminderStore {
  return {
    listEventsStartingBetween: (from, to) => listEventsStartingBetween(db, { from, to }),
    listActiveParticipantIds: (eventId) => listActiveParticipantIds(db, eventId),
    listPreferences: (userIds) => listNotificationPreferences(db, userIds),
    insertNotifications: (notifications) => insertNotifications(db, notifications),
  };
}
