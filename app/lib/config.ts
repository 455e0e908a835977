import { DEFAULT_REMINDER_WINDOWS_MINUTES } from "../../packages/core/src/notifications/event-reminders";

export type ServerConfig = {
  host: string;
  port: number;
  corsOrigins: string[];
  cronSecret: string | undefined;
  reminderWindowsMinutes: number[];
};

const DEFAULT_PORT = 8000;
const DEFAULT_HOST = "0.0.0.0";
const DEFAULT_CORS_ORIGINS = ["http://localhost:5173", "http://127.0.0.1:5173"];

export function resolveServerConfig(
  env: Record<string, string | undefined> = process.env,
): ServerConfig {
  return {
    host: env.HOST?.trim() || DEFAULT_HOST,
    port: parsePort(env.PORT),
    corsOrigins: parseList(env.CORS_ORIGIN) ?? DEFAULT_CORS_ORIGINS,
    cronSecret: env.CRON_SECRET?.trim() || undefined,
    reminderWindowsMinutes: parseWindows(env.REMINDER_WINDOWS_MINUTES),
  };
}

function parsePort(value: string | undefined): number {
  const parsed = Number(value);
  if (!value || !Number.isInteger(parsed) || parsed <= 0 || parsed > 65535) {
    return DEFAULT_PORT;
  }
  return parsed;
}

function parseList(value: string | undefined): string[] | null {
  const entries = (value ?? "")
    .split(",")
    .map((entry) => entry.trim())
    .filter(Boolean);
  return entries.length > 0 ? entries : null;
}

/** Positive integer minutes; falls back to the defaults when nothing valid is given. */
function parseWindows(value: string | undefined): number[] {
  const windows = (parseList(value) ?? [])
    .map(Number)
    .filter((minutes) => Number.isInteger(minutes) && minutes > 0);
  return windows.length > 0 ? [...new Set(windows)] : [...DEFAULT_REMINDER_WINDOWS_MINUTES];
}
