import { logEvent } from "../../../../packages/core/src/observability/logger";
import {
  createSupabaseSuggestionRepository,
  suggestUsersForUser,
} from "../../../../packages/core/src/suggestions/suggestion-service";
import { getServiceRoleDbClient } from "../../../lib/db-clients";
import { jsonResponse } from "../../../lib/http";
import { requireMember } from "../../../lib/member-auth";
import { resolveRequestId } from "../../../lib/observability";
import { toErrorResponse } from "../../../lib/route-errors";

export async function GET(request: Request): Promise<Response> {
  const requestId = resolveRequestId(request);
  let userId: string | null = null;
  try {
    const member = await requireMember(request);
    userId = member.userId;

    const suggestions = await suggestUsersForUser(member.userId, {
      repository: createSupabaseSuggestionRepository(getServiceRoleDbClient()),
    });

    logEvent({
      event: "suggestions.served",
      user_id: member.userId,
      correlation_id: requestId,
      payload: { kind: "users", count: suggestions.length },
    });
    return jsonResponse(suggestions, 200, requestId);
  } catch (error) {
    return toErrorResponse(error, { phase: "users_suggestions_route", userId, requestId });
  }
}
