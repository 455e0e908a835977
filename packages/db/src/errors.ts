export const DB_ERROR_CODES = {
  MISSING_ENV: "DB_MISSING_ENV",
  INVALID_ENV: "DB_INVALID_ENV",
  CLIENT_INIT_FAILED: "DB_CLIENT_INIT_FAILED",
  QUERY_FAILED: "DB_QUERY_FAILED",
  UNEXPECTED_RESPONSE: "DB_UNEXPECTED_RESPONSE",
  UNIQUE_VIOLATION: "DB_UNIQUE_VIOLATION",
  PERMISSION_DENIED: "DB_PERMISSION_DENIED",
  UPSTREAM_UNAVAILABLE: "DB_UPSTREAM_UNAVAILABLE",
} as const;

export type DbErrorCode = (typeof DB_ERROR_CODES)[keyof typeof DB_ERROR_CODES];

/** Postgres SQLSTATE codes PostgREST forwards in `error.code`. */
export const PG_UNIQUE_VIOLATION = "23505";
export const PG_INSUFFICIENT_PRIVILEGE = "42501";

const SECRET_KEY_PATTERN =
  /(secret|token|password|authorization|apikey|api_key|service_role|supabase_url|cookie|jwt)/i;
const REDACTED = "[REDACTED]";

/** Deep-copy a value, replacing anything under a secret-looking key. */
export function sanitizeForError(value: unknown): unknown {
  return sanitizeValue(value, new WeakSet<object>());
}

function sanitizeValue(value: unknown, seen: WeakSet<object>): unknown {
  if (value === null || typeof value !== "object") {
    return value;
  }
  if (seen.has(value)) {
    return "[Circular]";
  }
  seen.add(value);

  if (Array.isArray(value)) {
    return value.map((entry) => sanitizeValue(entry, seen));
  }

  const output: Record<string, unknown> = {};
  for (const [key, entry] of Object.entries(value)) {
    output[key] = SECRET_KEY_PATTERN.test(key) ? REDACTED : sanitizeValue(entry, seen);
  }
  return output;
}

export class DbError extends Error {
  code: DbErrorCode;
  status: number;
  context: unknown;

  constructor(
    code: DbErrorCode,
    message: string,
    options?: {
      status?: number;
      context?: unknown;
      cause?: unknown;
    },
  ) {
    super(message, options?.cause === undefined ? undefined : { cause: options.cause });
    this.name = "DbError";
    this.code = code;
    this.status = options?.status ?? 500;
    this.context = sanitizeForError(options?.context ?? null);
  }

  toJSON(): {
    name: string;
    code: DbErrorCode;
    message: string;
    status: number;
    context: unknown;
  } {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      status: this.status,
      context: this.context,
    };
  }

  static fromUnknown(params: {
    code: DbErrorCode;
    message: string;
    error: unknown;
    status?: number;
    context?: unknown;
  }): DbError {
    if (params.error instanceof DbError) {
      return params.error;
    }
    return new DbError(params.code, params.message, {
      status: params.status,
      context: params.context,
      cause: params.error,
    });
  }
}

export function assertRequiredEnv(name: string, value: string | undefined | null): string {
  const trimmed = typeof value === "string" ? value.trim() : "";
  if (!trimmed) {
    throw new DbError(DB_ERROR_CODES.MISSING_ENV, `Missing required env var: ${name}`, {
      status: 500,
      context: { env_var: name },
    });
  }
  return trimmed;
}

/** Shape of the `error` PostgREST and the Supabase client hand back. */
export type PostgrestErrorLike = {
  message: string;
  code?: string | null;
  details?: string | null;
  hint?: string | null;
};

export type PostgrestFailureKind = "conflict" | "denied" | "unavailable" | "failed";

/**
 * Classify a failed PostgREST call from its structured fields. Messages are
 * never inspected: they vary across Postgres and PostgREST versions.
 */
export function classifyPostgrestFailure(
  error: PostgrestErrorLike,
  status?: number | null,
): PostgrestFailureKind {
  if (error.code === PG_UNIQUE_VIOLATION) {
    return "conflict";
  }
  if (error.code === PG_INSUFFICIENT_PRIVILEGE || status === 401 || status === 403) {
    return "denied";
  }
  if (status === 0 || status === 502 || status === 503 || status === 504) {
    return "unavailable";
  }
  return "failed";
}

const FAILURE_CODES: Record<PostgrestFailureKind, DbErrorCode> = {
  conflict: DB_ERROR_CODES.UNIQUE_VIOLATION,
  denied: DB_ERROR_CODES.PERMISSION_DENIED,
  unavailable: DB_ERROR_CODES.UPSTREAM_UNAVAILABLE,
  failed: DB_ERROR_CODES.QUERY_FAILED,
};

const FAILURE_STATUS: Record<PostgrestFailureKind, number> = {
  conflict: 409,
  denied: 403,
  unavailable: 503,
  failed: 500,
};

/** Wrap a PostgREST failure in a DbError whose code reflects its classification. */
export function toDbError(params: {
  message: string;
  error: PostgrestErrorLike;
  status?: number | null;
  context?: Record<string, unknown>;
}): DbError {
  const kind = classifyPostgrestFailure(params.error, params.status);
  return new DbError(FAILURE_CODES[kind], params.message, {
    status: FAILURE_STATUS[kind],
    cause: params.error,
    context: {
      ...params.context,
      pg_code: params.error.code ?? null,
      upstream_status: params.status ?? null,
    },
  });
}

export function isDbError(error: unknown, code?: DbErrorCode): error is DbError {
  if (!(error instanceof DbError)) {
    return false;
  }
  return code === undefined || error.code === code;
}
