import * as Sentry from "@sentry/node";
import { resolveSentryRuntimeConfig } from "../../packages/core/src/observability/sentry-config";
import { redactPII } from "../../packages/core/src/observability/redaction";
import {
  registerSentryBridge,
  type SentryBridge,
  type SentryCaptureInput,
  type SentryContext,
  type SentrySpanOptions,
} from "../../packages/core/src/observability/sentry";

type SentrySeverity = "debug" | "info" | "warning" | "error" | "fatal";

let bridgeInstalled = false;

export function buildSentryInitOptions(
  env: Record<string, string | undefined> = process.env,
): Sentry.NodeOptions {
  const config = resolveSentryRuntimeConfig(env);

  return {
    dsn: config.dsn ?? undefined,
    environment: config.environment,
    release: config.release ?? undefined,
    tracesSampleRate: config.tracesSampleRate,
    enabled: config.enabled,
    beforeSend: (event) => scrubSentryEvent(event),
    sendDefaultPii: false,
  };
}

/**
 * Redact credentials and contact details, and drop request bodies outright:
 * they carry profile bios and chat messages.
 */
export function scrubSentryEvent<T extends { request?: { data?: unknown } }>(event: T): T {
  const scrubbed = redactPII(event);
  if (scrubbed.request && scrubbed.request.data !== undefined) {
    delete scrubbed.request.data;
  }
  return scrubbed;
}

/** Initialise Sentry once and route core captures through it. */
export function initSentry(env: Record<string, string | undefined> = process.env): void {
  if (bridgeInstalled) {
    return;
  }
  Sentry.init(buildSentryInitOptions(env));
  registerSentryBridge(createNodeSentryBridge());
  bridgeInstalled = true;
}

export function createNodeSentryBridge(): SentryBridge {
  return {
    captureException(error, input) {
      Sentry.withScope((scope) => {
        applyCaptureInput(scope, input);
        Sentry.captureException(error instanceof Error ? error : new Error(String(error)));
      });
    },
    captureMessage(message, input) {
      Sentry.withScope((scope) => {
        applyCaptureInput(scope, input);
        Sentry.captureMessage(message, toSeverity(input?.level));
      });
    },
    startSpan<T>(options: SentrySpanOptions, callback: () => T): T {
      return Sentry.startSpan(
        {
          name: options.name,
          op: options.op ?? options.name,
          attributes: toSpanAttributes(options.attributes),
        },
        callback,
      );
    },
    withScope<T>(context: SentryContext, callback: () => T): T {
      return Sentry.withScope((scope) => {
        applyContext(scope, context);
        return callback();
      });
    },
  };
}

function applyCaptureInput(scope: Sentry.Scope, input?: SentryCaptureInput): void {
  if (!input) {
    return;
  }
  applyContext(scope, input.context);
  const severity = toSeverity(input.level);
  if (severity) {
    scope.setLevel(severity);
  }
  if (input.event) {
    scope.setTag("event", input.event);
  }
  if (input.payload) {
    scope.setContext("payload", toContextPayload(input.payload));
  }
}

function applyContext(scope: Sentry.Scope, context?: SentryContext): void {
  if (!context) {
    return;
  }
  if (context.category) {
    scope.setTag("category", context.category);
  }
  if (context.correlation_id) {
    scope.setTag("correlation_id", context.correlation_id);
  }
  if (context.user_id) {
    scope.setUser({ id: context.user_id });
  }
  for (const [key, value] of Object.entries(context.tags ?? {})) {
    if (value !== null && value !== undefined) {
      scope.setTag(key, String(value));
    }
  }
}

function toContextPayload(
  payload: Record<string, unknown>,
): Record<string, string | number | boolean | null> {
  const normalized: Record<string, string | number | boolean | null> = {};
  for (const [key, value] of Object.entries(payload)) {
    if (typeof value === "string" || typeof value === "number" || typeof value === "boolean") {
      normalized[key] = value;
    } else {
      normalized[key] = value === null || value === undefined ? null : JSON.stringify(value);
    }
  }
  return normalized;
}

function toSpanAttributes(
  attributes: Record<string, unknown> | undefined,
): Record<string, string | number | boolean> | undefined {
  if (!attributes) {
    return undefined;
  }
  const normalized: Record<string, string | number | boolean> = {};
  for (const [key, value] of Object.entries(attributes)) {
    if (typeof value === "string" || typeof value === "number" || typeof value === "boolean") {
      normalized[key] = value;
    } else if (value !== null && value !== undefined) {
      normalized[key] = JSON.stringify(value);
    }
  }
  return normalized;
}

function toSeverity(level: string | undefined): SentrySeverity | undefined {
  if (level === "warn") {
    return "warning";
  }
  if (level === "debug" || level === "info" || level === "error" || level === "fatal") {
    return level;
  }
  return undefined;
}
