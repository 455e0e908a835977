import { describe, expect, it } from "vitest";

import { resolveServerConfig } from "../../app/lib/config";

describe("resolveServerConfig", () => {
  it("falls back to local development defaults", () => {
    expect(resolveServerConfig({})).toEqual({
      host: "0.0.0.0",
      port: 8000,
      corsOrigins: ["http://localhost:5173", "http://127.0.0.1:5173"],
      cronSecret: undefined,
      reminderWindowsMinutes: [60, 15],
    });
  });

  it("reads overrides and ignores invalid values", () => {
    expect(
      resolveServerConfig({
        HOST: "127.0.0.1",
        PORT: "70000",
        CORS_ORIGIN: "https://fitlink.example.com, https://admin.example.com ,",
        CRON_SECRET: " test-secret ",
        REMINDER_WINDOWS_MINUTES: "30,abc,30,-5,5",
      }),
    ).toEqual({
      host: "127.0.0.1",
      port: 8000,
      corsOrigins: ["https://fitlink.example.com", "https://admin.example.com"],
      cronSecret: "test-secret",
      reminderWindowsMinutes: [30, 5],
    });
  });

  it("accepts a valid port", () => {
    expect(resolveServerConfig({ PORT: "3001" }).port).toBe(3001);
  });
});
