import { DB_ERROR_CODES, DbError } from "../errors";
import { executeQuery } from "../query";
import {
  readEventStatus,
  readInteger,
  readRequiredInteger,
  readString,
  toEstado,
  toOptionalRow,
  toRows,
  type Row,
} from "../rows";
import type { DbClient, EventLevel, EventRecord, EventStatus } from "../types";

const TABLE = "eventos";
export const EVENT_COLUMNS =
  "id,nombre_evento,descripcion,municipio,categoria,nivel,inicio,estado,creador_id";

export async function loadEventById(
  db: DbClient,
  eventId: number,
): Promise<EventRecord | null> {
  const data = await executeQuery({
    message: "Unable to load event.",
    context: { table: TABLE, event_id: eventId },
    run: () => db.from(TABLE).select(EVENT_COLUMNS).eq("id", eventId).maybeSingle(),
  });

  const row = toOptionalRow(data, TABLE);
  return row ? parseEventRow(row) : null;
}

export async function listEvents(
  db: DbClient,
  params: { limit: number; status?: EventStatus | null },
): Promise<EventRecord[]> {
  const data = await executeQuery({
    message: "Unable to list events.",
    context: { table: TABLE, status: params.status ?? null },
    run: () => {
      let query = db.from(TABLE).select(EVENT_COLUMNS);
      if (params.status) {
        query = query.eq("estado", toEstado(params.status));
      }
      return query.order("inicio", { ascending: true }).limit(params.limit);
    },
  });

  return toRows(data, TABLE).map(parseEventRow);
}

/**
 * Events that are not cancelled and start at or after `now`, soonest first.
 * This is the candidate pool for event suggestions.
 */
export async function listUpcomingEvents(
  db: DbClient,
  params: { now: Date; limit?: number | null },
): Promise<EventRecord[]> {
  const data = await executeQuery({
    message: "Unable to list upcoming events.",
    context: { table: TABLE },
    run: () => {
      const query = db
        .from(TABLE)
        .select(EVENT_COLUMNS)
        .neq("estado", toEstado("cancelled"))
        .gte("inicio", params.now.toISOString())
        .order("inicio", { ascending: true });
      return params.limit ? query.limit(params.limit) : query;
    },
  });

  return toRows(data, TABLE).map(parseEventRow);
}

/** Non-cancelled events starting in `[from, to)`. */
export async function listEventsStartingBetween(
  db: DbClient,
  params: { from: Date; to: Date },
): Promise<EventRecord[]> {
  const data = await executeQuery({
    message: "Unable to list events in reminder window.",
    context: { table: TABLE, from: params.from.toISOString(), to: params.to.toISOString() },
    run: () =>
      db
        .from(TABLE)
        .select(EVENT_COLUMNS)
        .neq("estado", toEstado("cancelled"))
        .gte("inicio", params.from.toISOString())
        .lt("inicio", params.to.toISOString())
        .order("inicio", { ascending: true }),
  });

  return toRows(data, TABLE).map(parseEventRow);
}

export type EventInsert = {
  title: string;
  description: string;
  locality: string;
  category_id: number;
  level: EventLevel;
  start_time: string;
  creator_id: string;
};

export async function insertEvent(db: DbClient, input: EventInsert): Promise<EventRecord> {
  const data = await executeQuery({
    message: "Unable to create event.",
    context: { table: TABLE, creator_id: input.creator_id },
    run: () =>
      db
        .from(TABLE)
        .insert({
          nombre_evento: input.title,
          descripcion: input.description,
          municipio: input.locality,
          categoria: input.category_id,
          nivel: input.level,
          inicio: input.start_time,
          estado: toEstado("active"),
          creador_id: input.creator_id,
        })
        .select(EVENT_COLUMNS)
        .single(),
  });

  const row = toOptionalRow(data, TABLE);
  if (!row) {
    throw new DbError(DB_ERROR_CODES.UNEXPECTED_RESPONSE, "Event insert returned no row.", {
      status: 500,
      context: { table: TABLE },
    });
  }
  return parseEventRow(row);
}

export function parseEventRow(row: Row): EventRecord {
  return {
    id: readRequiredInteger(row, "id", TABLE),
    title: readString(row, "nombre_evento"),
    description: readString(row, "descripcion"),
    locality: readString(row, "municipio"),
    category_id: readInteger(row, "categoria"),
    level: readString(row, "nivel"),
    start_time: readString(row, "inicio"),
    status: readEventStatus(row),
    creator_id: readString(row, "creador_id"),
  };
}
