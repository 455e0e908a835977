import { listNotificationsForUser } from "../../../packages/db/src/queries/notifications";
import { createUserScopedDbClient } from "../../lib/db-clients";
import { jsonResponse, parseLimitParam } from "../../lib/http";
import { requireMember } from "../../lib/member-auth";
import { resolveRequestId } from "../../lib/observability";
import { toErrorResponse } from "../../lib/route-errors";

export async function GET(request: Request): Promise<Response> {
  const requestId = resolveRequestId(request);
  let userId: string | null = null;
  try {
    const member = await requireMember(request);
    userId = member.userId;
    const limit = parseLimitParam(new URL(request.url), { min: 1, max: 100, fallback: 50 });

    const notifications = await listNotificationsForUser(
      createUserScopedDbClient(member.authorization),
      member.userId,
      { limit },
    );
    return jsonResponse(notifications, 200, requestId);
  } catch (error) {
    return toErrorResponse(error, { phase: "notifications_list_route", userId, requestId });
  }
}
