import { listSkillLevels } from "../../../../packages/db/src/queries/categories";
import { getServiceRoleDbClient } from "../../../lib/db-clients";
import { jsonResponse } from "../../../lib/http";
import { resolveRequestId } from "../../../lib/observability";
import { toErrorResponse } from "../../../lib/route-errors";

export async function GET(request: Request): Promise<Response> {
  const requestId = resolveRequestId(request);
  try {
    const levels = await listSkillLevels(getServiceRoleDbClient());
    return jsonResponse({ data: levels }, 200, requestId);
  } catch (error) {
    return toErrorResponse(error, { phase: "skill_levels_route", requestId });
  }
}
