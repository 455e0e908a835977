import {
  createClient,
  type SupabaseClient,
  type SupabaseClientOptions,
} from "@supabase/supabase-js";
import { assertRequiredEnv, DB_ERROR_CODES, DbError } from "./errors";

export type DbClientRole = "service" | "anon";

export type DbEnv = Record<string, string | undefined>;

export type DbCreateClientImpl = (
  supabaseUrl: string,
  supabaseKey: string,
  options: SupabaseClientOptions<"public">,
) => SupabaseClient;

export type CreateDbClientParams = {
  role?: DbClientRole;
  env?: DbEnv;
  authorization?: string | null;
  clientOptions?: SupabaseClientOptions<"public">;
  createClientImpl?: DbCreateClientImpl;
};

const KEY_ENV_BY_ROLE: Record<DbClientRole, string> = {
  service: "SUPABASE_SERVICE_ROLE_KEY",
  anon: "SUPABASE_ANON_KEY",
};

/**
 * Build a Supabase client. `service` bypasses row policies; `anon` combined
 * with a caller's `authorization` header runs every query as that caller.
 */
export function createDbClient(params: CreateDbClientParams = {}): SupabaseClient {
  const role = params.role ?? "service";
  const env = params.env ?? process.env;

  const supabaseUrl = assertRequiredEnv("SUPABASE_URL", env.SUPABASE_URL);
  const supabaseKey = assertRequiredEnv(KEY_ENV_BY_ROLE[role], env[KEY_ENV_BY_ROLE[role]]);
  assertHttpUrl(supabaseUrl);

  const authorization = params.authorization?.trim() || null;
  const options: SupabaseClientOptions<"public"> = {
    ...params.clientOptions,
    auth: {
      autoRefreshToken: false,
      persistSession: false,
      detectSessionInUrl: false,
      ...params.clientOptions?.auth,
    },
    global: {
      ...params.clientOptions?.global,
      headers: {
        ...params.clientOptions?.global?.headers,
        ...(authorization ? { Authorization: authorization } : {}),
      },
    },
  };

  const impl = params.createClientImpl ?? defaultCreateClient;
  try {
    return impl(supabaseUrl, supabaseKey, options);
  } catch (error) {
    throw DbError.fromUnknown({
      code: DB_ERROR_CODES.CLIENT_INIT_FAILED,
      message: "Unable to initialise Supabase client.",
      error,
      context: { role },
    });
  }
}

export function createServiceRoleDbClient(
  params: Omit<CreateDbClientParams, "role"> = {},
): SupabaseClient {
  return createDbClient({ ...params, role: "service" });
}

export function createAnonDbClient(
  params: Omit<CreateDbClientParams, "role"> = {},
): SupabaseClient {
  return createDbClient({ ...params, role: "anon" });
}

function defaultCreateClient(
  supabaseUrl: string,
  supabaseKey: string,
  options: SupabaseClientOptions<"public">,
): SupabaseClient {
  return createClient(supabaseUrl, supabaseKey, options);
}

function assertHttpUrl(value: string): void {
  let parsed: URL;
  try {
    parsed = new URL(value);
  } catch {
    throw new DbError(DB_ERROR_CODES.INVALID_ENV, "SUPABASE_URL must be a valid absolute URL.", {
      status: 500,
      context: { env_var: "SUPABASE_URL" },
    });
  }
  if (parsed.protocol !== "https:" && parsed.protocol !== "http:") {
    throw new DbError(DB_ERROR_CODES.INVALID_ENV, "SUPABASE_URL must use http or https.", {
      status: 500,
      context: { env_var: "SUPABASE_URL" },
    });
  }
}
