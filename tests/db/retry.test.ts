import { describe, expect, it, vi } from "vitest";

import { DB_ERROR_CODES, DbError } from "../../packages/db/src/errors";
import { registerUpstreamRetryObserver, withUpstreamRetry } from "../../packages/db/src/retry";

const unavailable = () => new DbError(DB_ERROR_CODES.UPSTREAM_UNAVAILABLE, "down", { status: 503 });

describe("withUpstreamRetry", () => {
  it("retries upstream failures with doubling delays", async () => {
    const sleep = vi.fn(async () => undefined);
    const onRetry = vi.fn();
    const operation = vi
      .fn<() => Promise<string>>()
      .mockRejectedValueOnce(unavailable())
      .mockRejectedValueOnce(unavailable())
      .mockResolvedValueOnce("ok");

    await expect(withUpstreamRetry(operation, { sleep, onRetry, baseDelayMs: 50 })).resolves.toBe("ok");

    expect(operation).toHaveBeenCalledTimes(3);
    expect(sleep.mock.calls).toEqual([[50], [100]]);
    expect(onRetry.mock.calls.map(([input]) => [input.attempt, input.delay_ms])).toEqual([
      [1, 50],
      [2, 100],
    ]);
  });

  it("gives up after the configured attempts", async () => {
    const sleep = vi.fn(async () => undefined);
    const operation = vi.fn(async () => {
      throw unavailable();
    });

    await expect(withUpstreamRetry(operation, { sleep, attempts: 2 })).rejects.toMatchObject({
      code: "DB_UPSTREAM_UNAVAILABLE",
    });
    expect(operation).toHaveBeenCalledTimes(2);
  });

  it("does not retry other failures", async () => {
    const sleep = vi.fn(async () => undefined);
    const operation = vi.fn(async () => {
      throw new DbError(DB_ERROR_CODES.UNIQUE_VIOLATION, "duplicate", { status: 409 });
    });

    await expect(withUpstreamRetry(operation, { sleep })).rejects.toMatchObject({
      code: "DB_UNIQUE_VIOLATION",
    });
    expect(operation).toHaveBeenCalledTimes(1);
    expect(sleep).not.toHaveBeenCalled();
  });

  it("tells the registered observer about each retry", async () => {
    const observer = vi.fn();
    registerUpstreamRetryObserver(observer);
    try {
      const operation = vi
        .fn<() => Promise<number>>()
        .mockRejectedValueOnce(unavailable())
        .mockResolvedValueOnce(1);

      await withUpstreamRetry(operation, { sleep: async () => undefined });

      expect(observer).toHaveBeenCalledTimes(1);
      expect(observer).toHaveBeenCalledWith(expect.objectContaining({ attempt: 1, delay_ms: 100 }));
    } finally {
      registerUpstreamRetryObserver(null);
    }
  });
});
