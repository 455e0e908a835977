import { listCategories } from "../../../packages/db/src/queries/categories";
import { getServiceRoleDbClient } from "../../lib/db-clients";
import { jsonResponse } from "../../lib/http";
import { resolveRequestId } from "../../lib/observability";
import { toErrorResponse } from "../../lib/route-errors";

export async function GET(request: Request): Promise<Response> {
  const requestId = resolveRequestId(request);
  try {
    const categories = await listCategories(getServiceRoleDbClient());
    return jsonResponse({ data: categories }, 200, requestId);
  } catch (error) {
    return toErrorResponse(error, { phase: "categories_route", requestId });
  }
}
