import { loadAppStats } from "../../../packages/db/src/queries/stats";
import { getServiceRoleDbClient } from "../../lib/db-clients";
import { jsonResponse } from "../../lib/http";
import { resolveRequestId } from "../../lib/observability";
import { toErrorResponse } from "../../lib/route-errors";

export async function GET(request: Request): Promise<Response> {
  const requestId = resolveRequestId(request);
  try {
    const stats = await loadAppStats(getServiceRoleDbClient(), new Date());
    return jsonResponse(stats, 200, requestId);
  } catch (error) {
    return toErrorResponse(error, { phase: "stats_route", requestId });
  }
}
