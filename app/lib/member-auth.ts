import { isAuthRetryableFetchError } from "@supabase/supabase-js";
import { DB_ERROR_CODES, DbError } from "../../packages/db/src/errors";
import { logEvent } from "../../packages/core/src/observability/logger";
import { createPublicDbClient } from "./db-clients";

export type MemberAuthErrorCode = "UNAUTHORIZED" | "INVALID_TOKEN";

export class MemberAuthError extends Error {
  readonly status: 401;
  readonly code: MemberAuthErrorCode;

  constructor(code: MemberAuthErrorCode, message: string) {
    super(message);
    this.name = "MemberAuthError";
    this.status = 401;
    this.code = code;
  }
}

/** The authenticated caller, resolved once at the request boundary. */
export type MemberPrincipal = {
  userId: string;
  email: string | null;
  authorization: string;
};

export type VerifiedUser = { id: string; email: string | null };

export type AccessTokenVerifier = (accessToken: string) => Promise<VerifiedUser | null>;

const BEARER_PATTERN = /^Bearer\s+(\S+)$/i;

export async function requireMember(
  request: Request,
  options: { verifyAccessToken?: AccessTokenVerifier } = {},
): Promise<MemberPrincipal> {
  const header = request.headers.get("authorization")?.trim() ?? "";
  const match = BEARER_PATTERN.exec(header);
  const accessToken = match?.[1];
  if (!accessToken) {
    logEvent({ level: "warn", event: "auth.member_rejected", payload: { reason: "missing_token" } });
    throw new MemberAuthError("UNAUTHORIZED", "Missing bearer token.");
  }

  const verify = options.verifyAccessToken ?? verifyWithSupabaseAuth;
  const user = await verify(accessToken);
  if (!user) {
    logEvent({ level: "warn", event: "auth.member_rejected", payload: { reason: "invalid_token" } });
    throw new MemberAuthError("INVALID_TOKEN", "Invalid or expired token.");
  }

  return {
    userId: user.id,
    email: user.email,
    authorization: `Bearer ${accessToken}`,
  };
}

/** Ask Supabase Auth who owns the token; `null` when it is rejected. */
export async function verifyWithSupabaseAuth(accessToken: string): Promise<VerifiedUser | null> {
  const { data, error } = await createPublicDbClient().auth.getUser(accessToken);
  if (error) {
    if (isAuthRetryableFetchError(error)) {
      throw new DbError(DB_ERROR_CODES.UPSTREAM_UNAVAILABLE, "Auth service unavailable.", {
        status: 503,
        cause: error,
        context: { service: "auth" },
      });
    }
    return null;
  }
  if (!data.user?.id) {
    return null;
  }
  return { id: data.user.id, email: data.user.email ?? null };
}
