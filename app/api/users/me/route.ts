import { logEvent } from "../../../../packages/core/src/observability/logger";
import {
  loadProfileById,
  updateProfile,
  type ProfilePatch,
} from "../../../../packages/db/src/queries/profiles";
import { createUserScopedDbClient } from "../../../lib/db-clients";
import { jsonResponse, readJsonObject, RequestValidationError } from "../../../lib/http";
import { requireMember } from "../../../lib/member-auth";
import { resolveRequestId } from "../../../lib/observability";
import { toErrorResponse } from "../../../lib/route-errors";

const PROFILE_NOT_FOUND = { code: "PROFILE_NOT_FOUND", message: "User profile not found." };

export async function GET(request: Request): Promise<Response> {
  const requestId = resolveRequestId(request);
  let userId: string | null = null;
  try {
    const member = await requireMember(request);
    userId = member.userId;

    const profile = await loadProfileById(
      createUserScopedDbClient(member.authorization),
      member.userId,
    );
    if (!profile) {
      return jsonResponse(PROFILE_NOT_FOUND, 404, requestId);
    }
    return jsonResponse({ ...profile, email: member.email }, 200, requestId);
  } catch (error) {
    return toErrorResponse(error, { phase: "users_me_get_route", userId, requestId });
  }
}

export async function PUT(request: Request): Promise<Response> {
  const requestId = resolveRequestId(request);
  let userId: string | null = null;
  try {
    const member = await requireMember(request);
    userId = member.userId;
    const patch = parseProfilePatch(await readJsonObject(request));

    const profile = await updateProfile(
      createUserScopedDbClient(member.authorization),
      member.userId,
      patch,
    );
    if (!profile) {
      return jsonResponse(PROFILE_NOT_FOUND, 404, requestId);
    }

    logEvent({
      event: "profile.updated",
      user_id: member.userId,
      correlation_id: requestId,
      payload: { fields: Object.keys(patch) },
    });
    return jsonResponse({ ...profile, email: member.email }, 200, requestId);
  } catch (error) {
    return toErrorResponse(error, { phase: "users_me_put_route", userId, requestId });
  }
}

/** Only the listed fields are read; unknown keys are ignored. */
export function parseProfilePatch(body: Record<string, unknown>): ProfilePatch {
  const patch: ProfilePatch = {};

  for (const field of ["name", "bio", "photo_url", "locality"] as const) {
    if (!(field in body)) {
      continue;
    }
    const value = body[field];
    if (value === null) {
      patch[field] = null;
    } else if (typeof value === "string" && value.length <= 2000) {
      patch[field] = value.trim() || null;
    } else {
      throw new RequestValidationError(`Expected ${field} to be text or null.`);
    }
  }

  if ("interest_ids" in body) {
    const value = body.interest_ids;
    if (!Array.isArray(value) || !value.every(isPositiveInteger)) {
      throw new RequestValidationError("Expected interest_ids to be a list of positive integers.");
    }
    patch.interest_ids = [...new Set(value)];
  }

  if ("skill_level" in body) {
    const value = body.skill_level;
    if (value === null) {
      patch.skill_level = null;
    } else if (isPositiveInteger(value) && value <= 5) {
      patch.skill_level = value;
    } else {
      throw new RequestValidationError("Expected skill_level between 1 and 5, or null.");
    }
  }

  if (Object.keys(patch).length === 0) {
    throw new RequestValidationError("No updatable profile fields were provided.");
  }
  return patch;
}

function isPositiveInteger(value: unknown): value is number {
  return typeof value === "number" && Number.isSafeInteger(value) && value > 0;
}
