import crypto from "node:crypto";
import { logEvent } from "../../packages/core/src/observability/logger";

export function generateRequestId(): string {
  return crypto.randomUUID();
}

export function resolveRequestId(request: Request): string {
  return request.headers.get("x-request-id")?.trim() || generateRequestId();
}

export function logUnhandledError(params: {
  phase: string;
  error: unknown;
  userId?: string | null;
  requestId?: string | null;
}): void {
  logEvent({
    level: "error",
    event: "system.unhandled_error",
    user_id: params.userId ?? null,
    correlation_id: params.requestId ?? null,
    payload: {
      phase: params.phase,
      error_name: params.error instanceof Error ? params.error.name : "Error",
      error_message: params.error instanceof Error ? params.error.message : String(params.error),
    },
  });
}
