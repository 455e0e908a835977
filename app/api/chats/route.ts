import { listChatSummaries } from "../../../packages/db/src/queries/messages";
import { createUserScopedDbClient } from "../../lib/db-clients";
import { jsonResponse } from "../../lib/http";
import { requireMember } from "../../lib/member-auth";
import { resolveRequestId } from "../../lib/observability";
import { toErrorResponse } from "../../lib/route-errors";

export async function GET(request: Request): Promise<Response> {
  const requestId = resolveRequestId(request);
  let userId: string | null = null;
  try {
    const member = await requireMember(request);
    userId = member.userId;

    const chats = await listChatSummaries(
      createUserScopedDbClient(member.authorization),
      member.userId,
    );
    return jsonResponse(chats, 200, requestId);
  } catch (error) {
    return toErrorResponse(error, { phase: "chats_list_route", userId, requestId });
  }
}
