export type EventSuggestionReason = "locality_and_category" | "locality" | "category";

export type UserSuggestionReason =
  | "locality_and_skill"
  | "locality_and_category"
  | "locality"
  | "category"
  | "skill";

export type SuggestionReason = EventSuggestionReason | UserSuggestionReason;

export type SuggestionKind = "events" | "users";

export type Suggestion<T, R extends SuggestionReason = SuggestionReason> = {
  candidate: T;
  suggestion_reason: R;
};

export type SubjectProfile = {
  id?: string | null;
  locality: string | null;
  interest_ids: ReadonlyArray<number>;
  skill_level: number | null;
};

export type CandidateId = string | number;

export type EventCandidate = {
  id: CandidateId;
  locality?: string | null;
  category_id?: number | null;
};

export type UserCandidate = {
  id: CandidateId;
  locality?: string | null;
  interest_ids?: ReadonlyArray<number> | null;
  skill_level?: number | null;
};

/**
 * One priority bucket. `classify` returns the reason a candidate lands in
 * this bucket, or null to leave it for a later one.
 */
type Tier<T, R extends SuggestionReason> = {
  enabled: boolean;
  classify: (candidate: T) => R | null;
};

export function recommend<T extends EventCandidate>(
  subject: SubjectProfile,
  pool: ReadonlyArray<T>,
  kind: "events",
): Suggestion<T, EventSuggestionReason>[];
export function recommend<T extends UserCandidate>(
  subject: SubjectProfile,
  pool: ReadonlyArray<T>,
  kind: "users",
): Suggestion<T, UserSuggestionReason>[];
export function recommend(
  subject: SubjectProfile,
  pool: ReadonlyArray<EventCandidate> | ReadonlyArray<UserCandidate>,
  kind: SuggestionKind,
): Suggestion<EventCandidate | UserCandidate>[] {
  return kind === "events" ? recommendEvents(subject, pool) : recommendUsers(subject, pool);
}

/**
 * Rank upcoming events for a subject:
 * same locality and an interesting category, then same locality, then an
 * interesting category anywhere.
 */
export function recommendEvents<T extends EventCandidate>(
  subject: SubjectProfile,
  pool: ReadonlyArray<T>,
): Suggestion<T, EventSuggestionReason>[] {
  const locality = normalizeLocality(subject.locality);
  const interests = new Set(subject.interest_ids);
  if (!locality && interests.size === 0) {
    return [];
  }

  const sameLocality = (event: T) => locality !== null && normalizeLocality(event.locality) === locality;
  const interesting = (event: T) => {
    const category = event.category_id;
    return typeof category === "number" && interests.has(category);
  };

  return placeInTiers(pool, [
    {
      enabled: locality !== null && interests.size > 0,
      classify: (event) => (sameLocality(event) && interesting(event) ? "locality_and_category" : null),
    },
    {
      enabled: locality !== null,
      classify: (event) => (sameLocality(event) ? "locality" : null),
    },
    {
      enabled: interests.size > 0,
      classify: (event) => (interesting(event) ? "category" : null),
    },
  ]);
}

/**
 * Rank other users for a subject. The last tier takes anyone left who shares
 * an interest (`category`) or, failing that, the exact skill level (`skill`).
 */
export function recommendUsers<T extends UserCandidate>(
  subject: SubjectProfile,
  pool: ReadonlyArray<T>,
): Suggestion<T, UserSuggestionReason>[] {
  const locality = normalizeLocality(subject.locality);
  const interests = new Set(subject.interest_ids);
  const skill = subject.skill_level;
  if (!locality && interests.size === 0 && skill === null) {
    return [];
  }

  const sameLocality = (user: T) => locality !== null && normalizeLocality(user.locality) === locality;
  const sameSkill = (user: T) => skill !== null && user.skill_level === skill;
  const sharesInterest = (user: T) => (user.interest_ids ?? []).some((id) => interests.has(id));

  const others = subject.id ? pool.filter((user) => user.id !== subject.id) : pool;

  return placeInTiers(others, [
    {
      enabled: locality !== null && skill !== null,
      classify: (user) => (sameLocality(user) && sameSkill(user) ? "locality_and_skill" : null),
    },
    {
      enabled: locality !== null && interests.size > 0,
      classify: (user) => (sameLocality(user) && sharesInterest(user) ? "locality_and_category" : null),
    },
    {
      enabled: locality !== null,
      classify: (user) => (sameLocality(user) ? "locality" : null),
    },
    {
      enabled: interests.size > 0 || skill !== null,
      classify: (user) => {
        if (sharesInterest(user)) {
          return "category";
        }
        return sameSkill(user) ? "skill" : null;
      },
    },
  ]);
}

/** Trimmed locality, or null when missing or blank. Null never matches anything. */
export function normalizeLocality(value: string | null | undefined): string | null {
  if (typeof value !== "string") {
    return null;
  }
  const trimmed = value.trim();
  return trimmed.length > 0 ? trimmed : null;
}

function placeInTiers<T extends { id: CandidateId }, R extends SuggestionReason>(
  pool: ReadonlyArray<T>,
  tiers: ReadonlyArray<Tier<T, R>>,
): Suggestion<T, R>[] {
  const placed = new Set<CandidateId>();
  const ranked: Suggestion<T, R>[] = [];

  for (const tier of tiers) {
    if (!tier.enabled) {
      continue;
    }
    for (const candidate of pool) {
      if (placed.has(candidate.id)) {
        continue;
      }
      const reason = tier.classify(candidate);
      if (reason === null) {
        continue;
      }
      placed.add(candidate.id);
      ranked.push({ candidate, suggestion_reason: reason });
    }
  }

  return ranked;
}
