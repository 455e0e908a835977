import { logEvent } from "../../../packages/core/src/observability/logger";
import { findChatIdByEventId, upsertChatMembers, upsertEventChatTitle } from "../../../packages/db/src/queries/chats";
import { insertEvent, listEvents } from "../../../packages/db/src/queries/events";
import type { DbClient, EventRecord } from "../../../packages/db/src/types";
import { createUserScopedDbClient, getServiceRoleDbClient } from "../../lib/db-clients";
import { jsonResponse, parseLimitParam, readJsonObject } from "../../lib/http";
import { requireMember } from "../../lib/member-auth";
import { resolveRequestId } from "../../lib/observability";
import { toErrorResponse } from "../../lib/route-errors";
import { parseEventCreateBody, parseEventStatusFilter } from "./event-input";

export async function GET(request: Request): Promise<Response> {
  const requestId = resolveRequestId(request);
  try {
    const url = new URL(request.url);
    const limit = parseLimitParam(url, { min: 1, max: 200, fallback: 50 });
    const status = parseEventStatusFilter(url.searchParams.get("status"));

    const events = await listEvents(getServiceRoleDbClient(), { limit, status });
    return jsonResponse(events, 200, requestId);
  } catch (error) {
    return toErrorResponse(error, { phase: "events_list_route", requestId });
  }
}

export async function POST(request: Request): Promise<Response> {
  const requestId = resolveRequestId(request);
  let userId: string | null = null;
  try {
    const member = await requireMember(request);
    userId = member.userId;
    const body = await readJsonObject(request);
    const input = parseEventCreateBody(body, { creatorId: member.userId, now: new Date() });

    const event = await insertEvent(createUserScopedDbClient(member.authorization), input);
    logEvent({
      event: "events.created",
      user_id: member.userId,
      correlation_id: requestId,
      payload: { event_id: event.id, category_id: event.category_id },
    });

    await prepareEventChatBestEffort(getServiceRoleDbClient(), event, member.userId);

    return jsonResponse(event, 201, requestId);
  } catch (error) {
    return toErrorResponse(error, { phase: "events_create_route", userId, requestId });
  }
}

/** Title the event's group chat and add the creator to it; failures are only logged. */
async function prepareEventChatBestEffort(
  db: DbClient,
  event: EventRecord,
  creatorId: string,
): Promise<void> {
  try {
    await upsertEventChatTitle(db, {
      eventId: event.id,
      createdBy: creatorId,
      title: event.title ?? "Entrenamiento",
    });
    const chatId = await findChatIdByEventId(db, event.id);
    if (chatId) {
      await upsertChatMembers(db, [{ chat_id: chatId, user_id: creatorId }]);
    }
  } catch (error) {
    logEvent({
      level: "warn",
      event: "events.best_effort_failed",
      user_id: creatorId,
      payload: {
        event_id: event.id,
        step: "chat_title_upsert",
        error_name: error instanceof Error ? error.name : "Error",
        error_message: error instanceof Error ? error.message : String(error),
      },
    });
  }
}
