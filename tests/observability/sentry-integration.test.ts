import { afterEach, describe, expect, it, vi } from "vitest";
import { buildSentryInitOptions, scrubSentryEvent } from "../../app/lib/sentry";
import { logEvent } from "../../packages/core/src/observability/logger";
import { resolveSentryRuntimeConfig } from "../../packages/core/src/observability/sentry-config";
import {
  registerSentryBridge,
  startSentrySpan,
  withSentryContext,
  type SentryBridge,
  type SentryCaptureInput,
  type SentryContext,
  type SentrySpanOptions,
} from "../../packages/core/src/observability/sentry";

function createRecordingBridge(overrides: Partial<SentryBridge> = {}) {
  const captureException = vi.fn();
  const captureMessage = vi.fn();
  const spans: Array<{ name: string; attributes?: Record<string, unknown> }> = [];
  const bridge: SentryBridge = {
    captureException(error: unknown, input?: SentryCaptureInput) {
      captureException(error, input);
    },
    captureMessage(message: string, input?: SentryCaptureInput) {
      captureMessage(message, input);
    },
    startSpan<T>(options: SentrySpanOptions, callback: () => T): T {
      spans.push({ name: options.name, attributes: options.attributes });
      return callback();
    },
    withScope<T>(_context: SentryContext, callback: () => T): T {
      return callback();
    },
    ...overrides,
  };
  return { bridge, captureException, captureMessage, spans };
}

describe("sentry integration", () => {
  afterEach(() => {
    registerSentryBridge(null);
    vi.restoreAllMocks();
  });

  it("redacts credentials and contact details and drops request bodies", () => {
    const event = {
      request: {
        headers: { authorization: "Bearer test-token" },
        data: JSON.stringify({ content: "nos vemos a las 6" }),
      },
      extra: {
        correo: "alex@example.com",
        notes: "call me at +58 412 555 1212 or backup@example.com",
      },
    };

    expect(scrubSentryEvent(event)).toEqual({
      request: {
        headers: { authorization: "[REDACTED_SECRET]" },
      },
      extra: {
        correo: "[REDACTED_CONTACT]",
        notes: "call me at [REDACTED_PHONE] or [REDACTED_EMAIL]",
      },
    });
  });

  it("forwards error-level structured logs to Sentry capture", () => {
    const { bridge, captureException, captureMessage } = createRecordingBridge();
    registerSentryBridge(bridge);

    vi.spyOn(console, "info").mockImplementation(() => undefined);
    logEvent({
      level: "error",
      event: "system.unhandled_error",
      correlation_id: "corr_123",
      payload: {
        phase: "test",
        error_name: "RuntimeError",
        error_message: "failed to process",
      },
    });

    expect(captureException).toHaveBeenCalledTimes(1);
    const [error] = captureException.mock.calls[0] ?? [];
    expect(error).toBeInstanceOf(Error);
    expect(error).toMatchObject({ name: "RuntimeError", message: "failed to process" });
    expect(captureMessage).toHaveBeenCalledTimes(0);
  });

  it("does not forward info-level logs", () => {
    const { bridge, captureException, captureMessage } = createRecordingBridge();
    registerSentryBridge(bridge);

    vi.spyOn(console, "info").mockImplementation(() => undefined);
    logEvent({ event: "suggestions.served", payload: { kind: "users", count: 0 } });

    expect(captureException).not.toHaveBeenCalled();
    expect(captureMessage).not.toHaveBeenCalled();
  });

  it("records spans and falls back to the callback when the bridge breaks", () => {
    const { bridge, spans } = createRecordingBridge();
    registerSentryBridge(bridge);

    expect(startSentrySpan({ name: "api.route", attributes: { route: "/api/events" } }, () => "ok")).toBe("ok");
    expect(spans).toEqual([{ name: "api.route", attributes: { route: "/api/events" } }]);

    const warning = vi.spyOn(process, "emitWarning").mockImplementation(() => undefined);
    registerSentryBridge(
      createRecordingBridge({
        withScope() {
          throw new Error("scope unavailable");
        },
      }).bridge,
    );

    expect(withSentryContext({ user_id: "u1" }, () => 7)).toBe(7);
    expect(warning).toHaveBeenCalledWith(
      "Sentry bridge withScope failed: scope unavailable",
      "SentryBridgeWarning",
    );
  });

  it("disables Sentry without a DSN or in local", () => {
    const noDsn = resolveSentryRuntimeConfig({
      SENTRY_DSN: "",
      SENTRY_ENVIRONMENT: "staging",
    });
    const local = resolveSentryRuntimeConfig({
      SENTRY_DSN: "https://public@sentry.example.com/1",
      APP_ENV: "local",
    });

    expect(noDsn.enabled).toBe(false);
    expect(local.enabled).toBe(false);
  });

  it("picks trace rates per environment unless overridden", () => {
    expect(
      resolveSentryRuntimeConfig({ SENTRY_DSN: "https://public@sentry.example.com/1", NODE_ENV: "prod" }),
    ).toEqual({
      dsn: "https://public@sentry.example.com/1",
      environment: "production",
      release: null,
      enabled: true,
      tracesSampleRate: 0.2,
    });
    expect(
      resolveSentryRuntimeConfig({ SENTRY_ENVIRONMENT: "staging", SENTRY_TRACES_SAMPLE_RATE: "0.5" })
        .tracesSampleRate,
    ).toBe(0.5);
    expect(
      resolveSentryRuntimeConfig({ SENTRY_ENVIRONMENT: "staging", SENTRY_TRACES_SAMPLE_RATE: "2" })
        .tracesSampleRate,
    ).toBe(1);
  });

  it("builds node init options from the environment", () => {
    const options = buildSentryInitOptions({
      SENTRY_DSN: "https://public@sentry.example.com/1",
      SENTRY_ENVIRONMENT: "staging",
      SENTRY_RELEASE: "fitlink@1.0.0",
    });

    expect(options).toMatchObject({
      dsn: "https://public@sentry.example.com/1",
      environment: "staging",
      release: "fitlink@1.0.0",
      enabled: true,
      tracesSampleRate: 1,
      sendDefaultPii: false,
    });
  });
});
