import {
  getOrCreatePreferences,
  updatePreferences,
  type PreferencesPatch,
} from "../../../../packages/core/src/notifications/notification-service";
import { createUserScopedDbClient } from "../../../lib/db-clients";
import { jsonResponse, readJsonObject, RequestValidationError } from "../../../lib/http";
import { requireMember } from "../../../lib/member-auth";
import { resolveRequestId } from "../../../lib/observability";
import { toErrorResponse } from "../../../lib/route-errors";

const FLAGS = ["notify_training", "notify_match", "notify_system"] as const;

export async function GET(request: Request): Promise<Response> {
  const requestId = resolveRequestId(request);
  let userId: string | null = null;
  try {
    const member = await requireMember(request);
    userId = member.userId;

    const preferences = await getOrCreatePreferences(
      createUserScopedDbClient(member.authorization),
      member.userId,
    );
    return jsonResponse(preferences, 200, requestId);
  } catch (error) {
    return toErrorResponse(error, { phase: "preferences_get_route", userId, requestId });
  }
}

export async function PUT(request: Request): Promise<Response> {
  const requestId = resolveRequestId(request);
  let userId: string | null = null;
  try {
    const member = await requireMember(request);
    userId = member.userId;
    const body = await readJsonObject(request);

    const patch: PreferencesPatch = {};
    for (const flag of FLAGS) {
      const value = body[flag];
      if (value === undefined) {
        continue;
      }
      if (typeof value !== "boolean") {
        throw new RequestValidationError(`Expected ${flag} to be a boolean.`);
      }
      patch[flag] = value;
    }
    if (Object.keys(patch).length === 0) {
      throw new RequestValidationError(`Expected at least one of ${FLAGS.join(", ")}.`);
    }

    const preferences = await updatePreferences(
      createUserScopedDbClient(member.authorization),
      member.userId,
      patch,
    );
    return jsonResponse(preferences, 200, requestId);
  } catch (error) {
    return toErrorResponse(error, { phase: "preferences_put_route", userId, requestId });
  }
}
