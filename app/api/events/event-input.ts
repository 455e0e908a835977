import type { EventInsert } from "../../../packages/db/src/queries/events";
import type { EventLevel, EventStatus } from "../../../packages/db/src/types";
import { RequestValidationError } from "../../lib/http";

const EVENT_LEVELS: readonly EventLevel[] = ["Principiante", "Intermedio", "Avanzado"];
const EVENT_STATUSES: readonly EventStatus[] = ["active", "confirmed", "cancelled"];

const DATE_PATTERN = /^\d{4}-\d{2}-\d{2}$/;
const TIME_PATTERN = /^([01]\d|2[0-3]):[0-5]\d$/;

/**
 * Validate a create-event body. `date` and `time` are combined into a UTC
 * start time that must lie in the future.
 */
export function parseEventCreateBody(
  body: Record<string, unknown>,
  params: { creatorId: string; now: Date },
): EventInsert {
  const title = readText(body.title, "title", { max: 120 });
  const description = body.description === undefined || body.description === null
    ? ""
    : readText(body.description, "description", { max: 2000, allowEmpty: true });
  const locality = readText(body.locality, "locality", { max: 120 });

  const categoryId = body.category_id;
  if (typeof categoryId !== "number" || !Number.isSafeInteger(categoryId) || categoryId <= 0) {
    throw new RequestValidationError("Expected category_id (positive integer).");
  }

  const level = EVENT_LEVELS.find((candidate) => candidate === body.level);
  if (!level) {
    throw new RequestValidationError(`Expected level (${EVENT_LEVELS.join("|")}).`);
  }

  const date = typeof body.date === "string" ? body.date.trim() : "";
  const time = typeof body.time === "string" ? body.time.trim() : "";
  if (!DATE_PATTERN.test(date) || !TIME_PATTERN.test(time)) {
    throw new RequestValidationError("Expected date (YYYY-MM-DD) and time (HH:MM).");
  }
  const startsAt = new Date(`${date}T${time}:00.000Z`);
  if (Number.isNaN(startsAt.getTime()) || startsAt.toISOString().slice(0, 10) !== date) {
    throw new RequestValidationError("Expected a valid calendar date.");
  }
  if (startsAt.getTime() <= params.now.getTime()) {
    throw new RequestValidationError("Event must start in the future.");
  }

  return {
    title,
    description,
    locality,
    category_id: categoryId,
    level,
    start_time: startsAt.toISOString(),
    creator_id: params.creatorId,
  };
}

export function parseEventStatusFilter(value: string | null): EventStatus | null {
  if (value === null || value.trim() === "") {
    return null;
  }
  const status = EVENT_STATUSES.find((candidate) => candidate === value.trim().toLowerCase());
  if (!status) {
    throw new RequestValidationError(`Query parameter 'status' must be one of ${EVENT_STATUSES.join("|")}.`);
  }
  return status;
}

function readText(
  value: unknown,
  field: string,
  options: { max: number; allowEmpty?: boolean },
): string {
  const text = typeof value === "string" ? value.trim() : "";
  if ((!text && !options.allowEmpty) || typeof value !== "string" || text.length > options.max) {
    throw new RequestValidationError(`Expected ${field} (text up to ${options.max} characters).`);
  }
  return text;
}
