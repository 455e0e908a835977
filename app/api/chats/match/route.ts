import { matchEventCreator } from "../../../../packages/core/src/membership/membership-reconciler";
import { createSupabaseMembershipStores } from "../../../../packages/core/src/membership/supabase-membership-store";
import { notifyBestEffort } from "../../../../packages/core/src/notifications/notification-service";
import { createUserScopedDbClient, getServiceRoleDbClient } from "../../../lib/db-clients";
import { jsonResponse, readJsonObject, RequestValidationError } from "../../../lib/http";
import { requireMember } from "../../../lib/member-auth";
import { resolveRequestId } from "../../../lib/observability";
import { toErrorResponse } from "../../../lib/route-errors";

export async function POST(request: Request): Promise<Response> {
  const requestId = resolveRequestId(request);
  let userId: string | null = null;
  try {
    const member = await requireMember(request);
    userId = member.userId;
    const body = await readJsonObject(request);
    const eventId = body.event_id;
    if (typeof eventId !== "number" || !Number.isSafeInteger(eventId) || eventId <= 0) {
      throw new RequestValidationError("Expected event_id (positive integer).");
    }

    const elevated = getServiceRoleDbClient();
    const match = await matchEventCreator(
      eventId,
      member.userId,
      createSupabaseMembershipStores({
        scoped: createUserScopedDbClient(member.authorization),
        elevated,
      }),
    );

    await notifyBestEffort(
      elevated,
      {
        user_id: match.peer_user_id,
        title: "Nuevo match",
        message: "Alguien quiere entrenar contigo. Revisa tus chats.",
        kind: "match",
        dedupe_key: `chat:${match.chat_id}:match:${member.userId}`,
      },
      "match_creator_notification",
    );

    return jsonResponse({ ok: true, chat_id: match.chat_id }, 200, requestId);
  } catch (error) {
    return toErrorResponse(error, { phase: "chat_match_route", userId, requestId });
  }
}
