import { describe, expect, it, vi } from "vitest";

import { createAnonDbClient, createDbClient } from "../../packages/db/src/client";
import { DbError } from "../../packages/db/src/errors";

describe("packages/db client factory", () => {
  it("fails fast when SUPABASE_URL is missing", () => {
    expect(() =>
      createDbClient({
        role: "service",
        env: {
          SUPABASE_SERVICE_ROLE_KEY: "test-secret",
        },
      }),
    ).toThrowError(DbError);

    expect(() =>
      createDbClient({
        role: "service",
        env: {
          SUPABASE_SERVICE_ROLE_KEY: "test-secret",
        },
      }),
    ).toThrowError("Missing required env var: SUPABASE_URL");
  });

  it("fails fast when SUPABASE_SERVICE_ROLE_KEY is missing", () => {
    expect(() =>
      createDbClient({
        role: "service",
        env: {
          SUPABASE_URL: "https://example.supabase.co",
        },
      }),
    ).toThrowError("Missing required env var: SUPABASE_SERVICE_ROLE_KEY");
  });

  it("requires the anon key for anon clients", () => {
    expect(() =>
      createAnonDbClient({
        env: {
          SUPABASE_URL: "https://example.supabase.co",
          SUPABASE_SERVICE_ROLE_KEY: "test-secret",
        },
      }),
    ).toThrowError("Missing required env var: SUPABASE_ANON_KEY");
  });

  it("rejects a non-http SUPABASE_URL", () => {
    try {
      createDbClient({
        env: { SUPABASE_URL: "ftp://example.supabase.co", SUPABASE_SERVICE_ROLE_KEY: "test-secret" },
      });
      expect.unreachable("createDbClient should have thrown");
    } catch (error) {
      expect(error).toBeInstanceOf(DbError);
      expect(error).toMatchObject({ code: "DB_INVALID_ENV" });
    }
  });

  it("disables session persistence and forwards the caller's authorization", () => {
    const createClientImpl = vi.fn(() => ({}) as never);

    createAnonDbClient({
      env: { SUPABASE_URL: " https://example.supabase.co ", SUPABASE_ANON_KEY: "test-anon-key" },
      authorization: "Bearer test-token",
      createClientImpl,
    });

    expect(createClientImpl).toHaveBeenCalledWith("https://example.supabase.co", "test-anon-key", {
      auth: { autoRefreshToken: false, persistSession: false, detectSessionInUrl: false },
      global: { headers: { Authorization: "Bearer test-token" } },
    });
  });

  it("wraps client construction failures", () => {
    try {
      createDbClient({
        env: { SUPABASE_URL: "https://example.supabase.co", SUPABASE_SERVICE_ROLE_KEY: "test-secret" },
        createClientImpl: () => {
          throw new Error("boom");
        },
      });
      expect.unreachable("createDbClient should have thrown");
    } catch (error) {
      expect(error).toBeInstanceOf(DbError);
      expect(error).toMatchObject({ code: "DB_CLIENT_INIT_FAILED", context: { role: "service" } });
    }
  });
});
