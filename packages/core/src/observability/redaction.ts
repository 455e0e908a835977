const EMAIL_PATTERN = /\b[A-Z0-9._%+-]+@[A-Z0-9.-]+\.[A-Z]{2,}\b/gi;
const PHONE_PATTERN = /(?:\+?\d[\d().\-\s]{8,}\d)/g;
const BEARER_PATTERN = /\bBearer\s+[A-Za-z0-9\-._~+/]+=*/gi;

const SECRET_KEY_PATTERN =
  /(^|[_-])(authorization|password|secret|token|access_token|refresh_token|api_?key|jwt|cookie|service_role_key|cron_secret)$/i;
const CONTACT_KEY_PATTERN = /^(email|correo|telefono|phone|phone_e164|cedula|carnet)$/i;

export const REDACTED_SECRET = "[REDACTED_SECRET]";
export const REDACTED_CONTACT = "[REDACTED_CONTACT]";

/**
 * Deep-copy a log payload or Sentry event with credentials, contact fields
 * and contact-looking substrings replaced.
 */
export function redactPII<T>(input: T): T {
  const seen = new WeakSet<object>();
  return redactValue(input, "", seen) as T;
}

function redactValue(input: unknown, keyName: string, seen: WeakSet<object>): unknown {
  if (input === null || input === undefined) {
    return input;
  }

  if (SECRET_KEY_PATTERN.test(keyName)) {
    return REDACTED_SECRET;
  }
  if (CONTACT_KEY_PATTERN.test(keyName)) {
    return REDACTED_CONTACT;
  }

  if (typeof input === "string") {
    return redactString(input);
  }

  if (typeof input !== "object" || input instanceof Error) {
    return input;
  }

  if (seen.has(input)) {
    return "[Circular]";
  }
  seen.add(input);

  if (Array.isArray(input)) {
    return input.map((value) => redactValue(value, keyName, seen));
  }

  const output: Record<string, unknown> = {};
  for (const [childKey, childValue] of Object.entries(input)) {
    output[childKey] = redactValue(childValue, childKey, seen);
  }
  return output;
}

function redactString(input: string): string {
  let redacted = input.replace(BEARER_PATTERN, "Bearer [REDACTED]");
  redacted = redacted.replace(EMAIL_PATTERN, "[REDACTED_EMAIL]");
  redacted = redacted.replace(PHONE_PATTERN, (candidate) => {
    const digits = candidate.replace(/\D/g, "");
    if (digits.length < 10 || digits.length > 15) {
      return candidate;
    }
    return "[REDACTED_PHONE]";
  });
  return redacted;
}
