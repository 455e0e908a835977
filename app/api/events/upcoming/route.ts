import { listUpcomingEvents } from "../../../../packages/db/src/queries/events";
import { getServiceRoleDbClient } from "../../../lib/db-clients";
import { jsonResponse, parseLimitParam } from "../../../lib/http";
import { resolveRequestId } from "../../../lib/observability";
import { toErrorResponse } from "../../../lib/route-errors";

export async function GET(request: Request): Promise<Response> {
  const requestId = resolveRequestId(request);
  try {
    const limit = parseLimitParam(new URL(request.url), { min: 1, max: 100, fallback: 20 });
    const events = await listUpcomingEvents(getServiceRoleDbClient(), { now: new Date(), limit });
    return jsonResponse(events, 200, requestId);
  } catch (error) {
    return toErrorResponse(error, { phase: "events_upcoming_route", requestId });
  }
}
