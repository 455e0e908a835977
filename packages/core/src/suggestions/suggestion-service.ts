import {
  listProfilesExcept,
  listUpcomingEvents,
  loadProfileById,
} from "../../../db/src/queries";
import type { DbClient, EventRecord, ProfileRecord } from "../../../db/src/types";
import { isEventOpen } from "../events/event-eligibility";
import {
  recommendEvents,
  recommendUsers,
  type EventSuggestionReason,
  type Suggestion,
  type UserSuggestionReason,
} from "./recommend";

export type SuggestionRepository = {
  loadProfile: (userId: string) => Promise<ProfileRecord | null>;
  listUpcomingEvents: (now: Date) => Promise<EventRecord[]>;
  listOtherProfiles: (userId: string) => Promise<ProfileRecord[]>;
};

export type SuggestionErrorCode = "PROFILE_NOT_FOUND";

export class SuggestionError extends Error {
  readonly code: SuggestionErrorCode;
  readonly status: number;

  constructor(code: SuggestionErrorCode, message: string, status: number) {
    super(message);
    this.name = "SuggestionError";
    this.code = code;
    this.status = status;
  }
}

type SuggestionOptions = {
  repository: SuggestionRepository;
  now?: Date;
};

export async function suggestEventsForUser(
  userId: string,
  options: SuggestionOptions,
): Promise<Suggestion<EventRecord, EventSuggestionReason>[]> {
  const now = options.now ?? new Date();
  const subject = await requireProfile(options.repository, userId);
  if (!subject.locality?.trim() && subject.interest_ids.length === 0) {
    return [];
  }

  const pool = await options.repository.listUpcomingEvents(now);
  return recommendEvents(
    subject,
    pool.filter((event) => isEventOpen(event, now)),
  );
}

export async function suggestUsersForUser(
  userId: string,
  options: SuggestionOptions,
): Promise<Suggestion<ProfileRecord, UserSuggestionReason>[]> {
  const subject = await requireProfile(options.repository, userId);
  if (
    !subject.locality?.trim() &&
    subject.interest_ids.length === 0 &&
    subject.skill_level === null
  ) {
    return [];
  }

  const pool = await options.repository.listOtherProfiles(userId);
  return recommendUsers(subject, pool);
}

export function createSupabaseSuggestionRepository(db: DbClient): SuggestionRepository {
  return {
    loadProfile: (userId) => loadProfileById(db, userId),
    listUpcomingEvents: (now) => listUpcomingEvents(db, { now }),
    listOtherProfiles: (userId) => listProfilesExcept(db, userId),
  };
}

async function requireProfile(
  repository: SuggestionRepository,
  userId: string,
): Promise<ProfileRecord> {
  const profile = await repository.loadProfile(userId);
  if (!profile) {
    throw new SuggestionError("PROFILE_NOT_FOUND", "User profile not found.", 404);
  }
  return profile;
}
