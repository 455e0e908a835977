import type { LogLevel } from "./logger";

export type SentryContext = {
  correlation_id?: string | null;
  user_id?: string | null;
  category?: string | null;
  tags?: Record<string, string | number | boolean | null | undefined>;
};

export type SentryCaptureInput = {
  level?: LogLevel;
  event?: string;
  context?: SentryContext;
  payload?: Record<string, unknown>;
};

export type SentrySpanOptions = {
  name: string;
  op?: string;
  attributes?: Record<string, unknown>;
};

/**
 * What core code may ask of Sentry. The host process registers an
 * implementation at start-up; until then every call is a no-op.
 */
export type SentryBridge = {
  captureException: (error: unknown, input?: SentryCaptureInput) => void;
  captureMessage: (message: string, input?: SentryCaptureInput) => void;
  startSpan: <T>(options: SentrySpanOptions, callback: () => T) => T;
  withScope: <T>(context: SentryContext, callback: () => T) => T;
};

let activeBridge: SentryBridge | null = null;

export function registerSentryBridge(bridge: SentryBridge | null): void {
  activeBridge = bridge;
}

export function withSentryContext<T>(
  context: SentryContext,
  callback: () => T,
): T {
  const bridge = activeBridge;
  if (!bridge) {
    return callback();
  }

  let entered = false;
  try {
    return bridge.withScope(context, () => {
      entered = true;
      return callback();
    });
  } catch (error) {
    if (entered) {
      throw error;
    }
    reportBridgeFailure("withScope", error);
    return callback();
  }
}

export function startSentrySpan<T>(
  options: SentrySpanOptions,
  callback: () => T,
): T {
  const bridge = activeBridge;
  if (!bridge) {
    return callback();
  }

  let entered = false;
  try {
    return bridge.startSpan(options, () => {
      entered = true;
      return callback();
    });
  } catch (error) {
    if (entered) {
      throw error;
    }
    reportBridgeFailure("startSpan", error);
    return callback();
  }
}

export function captureSentryException(
  error: unknown,
  input?: SentryCaptureInput,
): void {
  try {
    activeBridge?.captureException(error, input);
  } catch (bridgeError) {
    reportBridgeFailure("captureException", bridgeError);
  }
}

export function captureSentryMessage(
  message: string,
  input?: SentryCaptureInput,
): void {
  try {
    activeBridge?.captureMessage(message, input);
  } catch (bridgeError) {
    reportBridgeFailure("captureMessage", bridgeError);
  }
}

/** Forward `error` and `fatal` structured log lines to Sentry. */
export function captureSentryFromStructuredLog(logEvent: {
  level: LogLevel;
  event: string;
  category: string;
  correlation_id: string | null;
  user_id: string | null;
  payload: Record<string, unknown>;
}): void {
  if (logEvent.level !== "error" && logEvent.level !== "fatal") {
    return;
  }

  const input: SentryCaptureInput = {
    level: logEvent.level,
    event: logEvent.event,
    context: {
      category: logEvent.category,
      correlation_id: logEvent.correlation_id,
      user_id: logEvent.user_id,
    },
    payload: logEvent.payload,
  };

  const payloadError = logEvent.payload.error;
  if (payloadError instanceof Error) {
    captureSentryException(payloadError, input);
    return;
  }

  const errorMessage = readString(logEvent.payload.error_message);
  if (errorMessage) {
    const syntheticError = new Error(errorMessage);
    syntheticError.name = readString(logEvent.payload.error_name) ?? "StructuredLogError";
    captureSentryException(syntheticError, input);
    return;
  }

  captureSentryMessage(`structured_log.${logEvent.event}`, input);
}

function reportBridgeFailure(operation: string, error: unknown): void {
  const message = error instanceof Error ? error.message : String(error);
  process.emitWarning(`Sentry bridge ${operation} failed: ${message}`, "SentryBridgeWarning");
}

function readString(value: unknown): string | null {
  if (typeof value !== "string") {
    return null;
  }
  const trimmed = value.trim();
  return trimmed.length > 0 ? trimmed : null;
}
