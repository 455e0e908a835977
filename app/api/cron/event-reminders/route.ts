import { logEvent } from "../../../../packages/core/src/observability/logger";
import {
  createSupabaseReminderStore,
  runEventReminders,
} from "../../../../packages/core/src/notifications/event-reminders";
import { resolveServerConfig } from "../../../lib/config";
import { isAuthorizedCronRequest } from "../../../lib/cron-auth";
import { getServiceRoleDbClient } from "../../../lib/db-clients";
import { jsonResponse } from "../../../lib/http";
import { resolveRequestId } from "../../../lib/observability";
import { toErrorResponse } from "../../../lib/route-errors";

const ROUTE = "api/cron/event-reminders";

export async function POST(request: Request): Promise<Response> {
  const requestId = resolveRequestId(request);
  try {
    const config = resolveServerConfig();
    if (!config.cronSecret) {
      return jsonResponse(
        { code: "CRON_SECRET_MISSING", message: "CRON_SECRET is not configured." },
        500,
        requestId,
      );
    }
    if (!isAuthorizedCronRequest(request, config.cronSecret)) {
      logEvent({
        level: "warn",
        event: "auth.cron_rejected",
        correlation_id: requestId,
        payload: { route: ROUTE },
      });
      return jsonResponse({ code: "UNAUTHORIZED", message: "Unauthorized." }, 401, requestId);
    }

    const result = await runEventReminders({
      store: createSupabaseReminderStore(getServiceRoleDbClient()),
      windowsMinutes: config.reminderWindowsMinutes,
    });
    return jsonResponse(
      { ok: true, events: result.events, sent: result.sent, skipped: result.skipped },
      200,
      requestId,
    );
  } catch (error) {
    return toErrorResponse(error, { phase: "cron_event_reminders_route", requestId });
  }
}
