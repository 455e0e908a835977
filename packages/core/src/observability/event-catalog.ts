export type EventCategory =
  | "system"
  | "auth"
  | "membership"
  | "chats"
  | "suggestions"
  | "events"
  | "notifications"
  | "reminders"
  | "profile";

export type EventCatalogEntry = {
  event_name: string;
  category: EventCategory;
  required_fields: readonly string[];
  description: string;
};

export const EVENT_CATALOG = [
  {
    event_name: "system.unhandled_error",
    category: "system",
    required_fields: ["phase", "error_name", "error_message"],
    description: "An error escaped a route handler or job and became a 500.",
  },
  {
    event_name: "system.request_completed",
    category: "system",
    required_fields: ["method", "route", "status_code", "duration_ms"],
    description: "One HTTP request finished.",
  },
  {
    event_name: "system.server_started",
    category: "system",
    required_fields: ["host", "port"],
    description: "The HTTP server is listening.",
  },
  {
    event_name: "system.upstream_retry",
    category: "system",
    required_fields: ["attempt", "delay_ms"],
    description: "A data call failed as unavailable and will be retried.",
  },
  {
    event_name: "auth.member_rejected",
    category: "auth",
    required_fields: ["reason"],
    description: "A request to a member route had no usable bearer token.",
  },
  {
    event_name: "auth.cron_rejected",
    category: "auth",
    required_fields: ["route"],
    description: "A cron route was called without the shared secret.",
  },
  {
    event_name: "membership.chat_created",
    category: "membership",
    required_fields: ["event_id", "chat_id", "mode"],
    description: "The group chat for an event was inserted.",
  },
  {
    event_name: "membership.chat_recovered",
    category: "membership",
    required_fields: ["event_id", "chat_id", "reason"],
    description: "Chat creation lost a race or failed and the existing chat was re-read.",
  },
  {
    event_name: "membership.chat_insert_failed",
    category: "membership",
    required_fields: ["event_id", "mode"],
    description: "A chat insert failed for a reason other than a conflict.",
  },
  {
    event_name: "membership.event_joined",
    category: "membership",
    required_fields: ["event_id", "chat_id"],
    description: "A user joined an event and its chat.",
  },
  {
    event_name: "membership.event_left",
    category: "membership",
    required_fields: ["event_id"],
    description: "A user left an event.",
  },
  {
    event_name: "membership.direct_chat_ensured",
    category: "membership",
    required_fields: ["chat_id", "peer_user_id"],
    description: "A direct chat between two users was found or created.",
  },
  {
    event_name: "suggestions.served",
    category: "suggestions",
    required_fields: ["kind", "count"],
    description: "Ranked suggestions were returned to a member.",
  },
  {
    event_name: "events.created",
    category: "events",
    required_fields: ["event_id"],
    description: "A member created an event.",
  },
  {
    event_name: "events.best_effort_failed",
    category: "events",
    required_fields: ["event_id", "step"],
    description: "A non-critical step after an event write failed.",
  },
  {
    event_name: "notifications.best_effort_failed",
    category: "notifications",
    required_fields: ["step"],
    description: "A notification could not be written; the request carried on.",
  },
  {
    event_name: "notifications.preferences_updated",
    category: "notifications",
    required_fields: ["notify_training", "notify_match", "notify_system"],
    description: "A member changed notification preferences.",
  },
  {
    event_name: "reminders.window_processed",
    category: "reminders",
    required_fields: ["window_minutes", "events", "sent", "skipped"],
    description: "One reminder window was scanned.",
  },
  {
    event_name: "reminders.run_completed",
    category: "reminders",
    required_fields: ["events", "sent", "skipped"],
    description: "A reminder run finished.",
  },
  {
    event_name: "chats.message_sent",
    category: "chats",
    required_fields: ["chat_id", "message_id"],
    description: "A member posted a message to a chat.",
  },
  {
    event_name: "profile.updated",
    category: "profile",
    required_fields: ["fields"],
    description: "A member updated their profile.",
  },
] as const satisfies readonly EventCatalogEntry[];

export type CanonicalEventName = (typeof EVENT_CATALOG)[number]["event_name"];

export const EVENT_CATALOG_BY_NAME: Readonly<Record<string, EventCatalogEntry | undefined>> =
  Object.fromEntries(EVENT_CATALOG.map((entry) => [entry.event_name, entry]));
