import { MembershipError } from "../../packages/core/src/membership/errors";
import { SuggestionError } from "../../packages/core/src/suggestions/suggestion-service";
import { DB_ERROR_CODES, isDbError } from "../../packages/db/src/errors";
import { jsonResponse, RequestValidationError } from "./http";
import { MemberAuthError } from "./member-auth";
import { logUnhandledError } from "./observability";

/**
 * Map an error thrown by a route handler to the `{ code, message }` body.
 * Anything unrecognised is logged and returned as a 500 carrying its message.
 */
export function toErrorResponse(
  error: unknown,
  params: { phase: string; userId?: string | null; requestId?: string },
): Response {
  if (
    error instanceof MemberAuthError ||
    error instanceof MembershipError ||
    error instanceof SuggestionError ||
    error instanceof RequestValidationError
  ) {
    return jsonResponse({ code: error.code, message: error.message }, error.status, params.requestId);
  }

  if (isDbError(error, DB_ERROR_CODES.UPSTREAM_UNAVAILABLE)) {
    logUnhandledError({ ...params, error });
    return jsonResponse(
      { code: "UPSTREAM_UNAVAILABLE", message: "The data service is unavailable. Try again shortly." },
      503,
      params.requestId,
    );
  }

  logUnhandledError({ ...params, error });
  const message = error instanceof Error ? error.message : "Internal server error.";
  return jsonResponse({ code: "INTERNAL_ERROR", message }, 500, params.requestId);
}
