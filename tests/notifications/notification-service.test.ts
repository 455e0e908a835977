import { beforeEach, describe, expect, it, vi } from "vitest";
import {
  getOrCreatePreferences,
  notifyBestEffort,
  partitionRecipients,
  updatePreferences,
} from "../../packages/core/src/notifications/notification-service";
import { createFitLinkDb } from "../support/fitlink-db";

const optedOutOfMatches = {
  usuario_id: "u1",
  notificar_entrenos: true,
  notificar_match: false,
  notificar_sistema: true,
};

describe("partitionRecipients", () => {
  it("allows users without preferences and dedupes recipients", () => {
    const preferences = [
      { user_id: "u1", notify_training: false, notify_match: true, notify_system: true },
    ];

    expect(partitionRecipients(["u1", "u2", "u2"], preferences, "recordatorio")).toEqual({
      allowed: ["u2"],
      optedOut: ["u1"],
    });
    expect(partitionRecipients(["u1"], preferences, "match")).toEqual({
      allowed: ["u1"],
      optedOut: [],
    });
  });
});

describe("notification preferences", () => {
  beforeEach(() => {
    vi.spyOn(console, "info").mockImplementation(() => undefined);
  });

  it("creates all-enabled preferences on first read", async () => {
    const db = createFitLinkDb();

    await expect(getOrCreatePreferences(db as never, "u1")).resolves.toEqual({
      user_id: "u1",
      notify_training: true,
      notify_match: true,
      notify_system: true,
    });
    expect(db.rows("preferencias_notificaciones")).toHaveLength(1);
  });

  it("merges a partial update over the stored flags", async () => {
    const db = createFitLinkDb({ preferencias_notificaciones: [{ ...optedOutOfMatches }] });

    const saved = await updatePreferences(db as never, "u1", { notify_system: false });

    expect(saved).toEqual({
      user_id: "u1",
      notify_training: true,
      notify_match: false,
      notify_system: false,
    });
    expect(db.rows("preferencias_notificaciones")).toHaveLength(1);
  });
});

describe("notifyBestEffort", () => {
  beforeEach(() => {
    vi.spyOn(console, "info").mockImplementation(() => undefined);
  });

  const match = {
    user_id: "u1",
    title: "Nuevo match",
    message: "Alguien quiere entrenar contigo.",
    kind: "match" as const,
    dedupe_key: "chat:c1:match:u2",
  };

  it("skips recipients who opted out of the kind", async () => {
    const db = createFitLinkDb({ preferencias_notificaciones: [{ ...optedOutOfMatches }] });

    await expect(notifyBestEffort(db as never, match, "match_notification")).resolves.toBe(false);
    expect(db.rows("notificaciones")).toEqual([]);
  });

  it("inserts once per dedupe key", async () => {
    const db = createFitLinkDb();

    await expect(notifyBestEffort(db as never, match, "match_notification")).resolves.toBe(true);
    await expect(notifyBestEffort(db as never, match, "match_notification")).resolves.toBe(false);
    expect(db.rows("notificaciones")).toHaveLength(1);
  });

  it("logs and swallows failures", async () => {
    const infoSpy = vi.spyOn(console, "info").mockImplementation(() => undefined);
    const db = createFitLinkDb();
    db.failNext("notificaciones", "upsert", { error: { message: "boom" }, status: 500 });

    await expect(notifyBestEffort(db as never, match, "match_notification")).resolves.toBe(false);

    const lines = infoSpy.mock.calls.map(([line]) => JSON.parse(String(line)) as { event: string; level: string; payload: Record<string, unknown> });
    expect(lines).toContainEqual(
      expect.objectContaining({
        event: "notifications.best_effort_failed",
        level: "warn",
        payload: expect.objectContaining({ step: "match_notification", error_message: "Unable to insert notifications." }),
      }),
    );
  });
});
