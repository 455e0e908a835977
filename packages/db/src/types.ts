import type { SupabaseClient } from "@supabase/supabase-js";

/**
 * Row shapes come back untyped from PostgREST; every query module narrows
 * them through the readers in `rows.ts` before handing records out.
 */
export type DbClient = SupabaseClient;

export type EventStatus = "active" | "confirmed" | "cancelled";

export type EventLevel = "Principiante" | "Intermedio" | "Avanzado";

export type ProfileRecord = {
  id: string;
  name: string | null;
  bio: string | null;
  photo_url: string | null;
  locality: string | null;
  interest_ids: number[];
  skill_level: number | null;
};

export type EventRecord = {
  id: number;
  title: string | null;
  description: string | null;
  locality: string | null;
  category_id: number | null;
  level: string | null;
  start_time: string | null;
  status: EventStatus;
  creator_id: string | null;
};

/** One row per chat the user belongs to, with its latest message. */
export type ChatSummaryRecord = {
  id: string;
  title: string | null;
  is_group: boolean;
  event_id: number | null;
  last_message: string | null;
  last_message_at: string | null;
};

export type ChatMessageRecord = {
  id: string;
  chat_id: string;
  user_id: string;
  content: string;
  created_at: string | null;
};

/** The slice of a profile shown beside a chat message. */
export type ChatUserRecord = {
  id: string;
  name: string | null;
  photo_url: string | null;
};

export type NotificationRecord = {
  id: string;
  user_id: string;
  title: string;
  message: string;
  kind: string;
  read: boolean;
  created_at: string | null;
  dedupe_key: string | null;
};

export type NotificationPreferencesRecord = {
  user_id: string;
  notify_training: boolean;
  notify_match: boolean;
  notify_system: boolean;
};

export type CategoryRecord = {
  id: number;
  name: string;
  icon: string;
};

export type SkillLevelRecord = {
  id: number;
  name: string;
};
