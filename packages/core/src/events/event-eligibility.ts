import type { EventRecord } from "../../../db/src/types";

/**
 * An event can be suggested or joined while it is not cancelled and has not
 * started. Events without a parseable start time are never open.
 */
export function isEventOpen(
  event: Pick<EventRecord, "status" | "start_time">,
  now: Date,
): boolean {
  if (event.status === "cancelled") {
    return false;
  }
  if (!event.start_time) {
    return false;
  }
  const startsAt = Date.parse(event.start_time);
  return Number.isFinite(startsAt) && startsAt >= now.getTime();
}
