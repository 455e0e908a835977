import { DB_ERROR_CODES, DbError } from "./errors";
import type { EventStatus } from "./types";

export type Row = Record<string, unknown>;

export function isRow(value: unknown): value is Row {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function toRows(data: unknown, table: string): Row[] {
  if (data === null || data === undefined) {
    return [];
  }
  if (!Array.isArray(data) || !data.every(isRow)) {
    throw unexpected(table, "Expected a list of rows.");
  }
  return data;
}

export function toOptionalRow(data: unknown, table: string): Row | null {
  if (data === null || data === undefined) {
    return null;
  }
  if (!isRow(data)) {
    throw unexpected(table, "Expected a single row.");
  }
  return data;
}

export function readString(row: Row, key: string): string | null {
  const value = row[key];
  if (typeof value === "string") {
    return value;
  }
  if (typeof value === "number" && Number.isFinite(value)) {
    return String(value);
  }
  return null;
}

export function readRequiredString(row: Row, key: string, table: string): string {
  const value = readString(row, key);
  if (value === null || value.trim() === "") {
    throw unexpected(table, `Missing column '${key}'.`);
  }
  return value;
}

export function readInteger(row: Row, key: string): number | null {
  const value = row[key];
  if (typeof value === "number" && Number.isInteger(value)) {
    return value;
  }
  if (typeof value === "string" && /^-?\d+$/.test(value.trim())) {
    return Number.parseInt(value, 10);
  }
  return null;
}

export function readRequiredInteger(row: Row, key: string, table: string): number {
  const value = readInteger(row, key);
  if (value === null) {
    throw unexpected(table, `Missing integer column '${key}'.`);
  }
  return value;
}

export function readBoolean(row: Row, key: string, fallback: boolean): boolean {
  const value = row[key];
  return typeof value === "boolean" ? value : fallback;
}

/** Integer array column; non-integer entries are dropped. */
export function readIntegerList(row: Row, key: string): number[] {
  const value = row[key];
  if (!Array.isArray(value)) {
    return [];
  }
  const output: number[] = [];
  for (const entry of value) {
    if (typeof entry === "number" && Number.isInteger(entry)) {
      output.push(entry);
    } else if (typeof entry === "string" && /^-?\d+$/.test(entry.trim())) {
      output.push(Number.parseInt(entry, 10));
    }
  }
  return output;
}

const STATUS_BY_ESTADO: Record<string, EventStatus> = {
  activo: "active",
  confirmado: "confirmed",
  cancelado: "cancelled",
};

const ESTADO_BY_STATUS: Record<EventStatus, string> = {
  active: "activo",
  confirmed: "confirmado",
  cancelled: "cancelado",
};

/** Unknown or missing `estado` values read as active. */
export function readEventStatus(row: Row): EventStatus {
  const raw = readString(row, "estado");
  return (raw && STATUS_BY_ESTADO[raw.trim().toLowerCase()]) || "active";
}

export function toEstado(status: EventStatus): string {
  return ESTADO_BY_STATUS[status];
}

function unexpected(table: string, message: string): DbError {
  return new DbError(DB_ERROR_CODES.UNEXPECTED_RESPONSE, message, {
    status: 500,
    context: { table },
  });
}
