export type SentryEnvironment = "local" | "staging" | "production";

export type SentryRuntimeEnv = Record<string, string | undefined>;

export type SentryRuntimeConfig = {
  dsn: string | null;
  environment: SentryEnvironment;
  release: string | null;
  enabled: boolean;
  tracesSampleRate: number;
};

const DEFAULT_TRACES_SAMPLE_RATE: Record<SentryEnvironment, number> = {
  local: 0,
  staging: 1.0,
  production: 0.2,
};

/**
 * Resolve Sentry options from the process environment. Reporting stays off
 * without a DSN and in `local`; `SENTRY_TRACES_SAMPLE_RATE` overrides the
 * per-environment trace rate when it parses to a number in [0, 1].
 */
export function resolveSentryRuntimeConfig(env: SentryRuntimeEnv): SentryRuntimeConfig {
  const dsn = normalizeString(env.SENTRY_DSN);
  const environment = normalizeSentryEnvironment(
    env.SENTRY_ENVIRONMENT ?? env.APP_ENV ?? env.NODE_ENV,
  );

  return {
    dsn,
    environment,
    release: normalizeString(env.SENTRY_RELEASE),
    enabled: dsn !== null && environment !== "local",
    tracesSampleRate:
      parseSampleRate(env.SENTRY_TRACES_SAMPLE_RATE) ?? DEFAULT_TRACES_SAMPLE_RATE[environment],
  };
}

export function normalizeSentryEnvironment(value: string | null | undefined): SentryEnvironment {
  const normalized = (value ?? "").trim().toLowerCase();
  if (normalized === "staging") {
    return "staging";
  }
  if (normalized === "production" || normalized === "prod") {
    return "production";
  }
  return "local";
}

function parseSampleRate(value: string | undefined): number | null {
  const raw = normalizeString(value);
  if (raw === null) {
    return null;
  }
  const parsed = Number(raw);
  return Number.isFinite(parsed) && parsed >= 0 && parsed <= 1 ? parsed : null;
}

function normalizeString(value: string | null | undefined): string | null {
  if (typeof value !== "string") {
    return null;
  }
  const trimmed = value.trim();
  return trimmed.length > 0 ? trimmed : null;
}
