export type RouteContext = {
  params: Record<string, string | undefined>;
};

export type RouteHandler = (request: Request, context: RouteContext) => Promise<Response>;

export class RequestValidationError extends Error {
  readonly status = 400;
  readonly code = "INVALID_REQUEST";

  constructor(message: string) {
    super(message);
    this.name = "RequestValidationError";
  }
}

export function jsonResponse(body: unknown, status = 200, requestId?: string): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: {
      "content-type": "application/json; charset=utf-8",
      "cache-control": "no-store",
      ...(requestId ? { "x-request-id": requestId } : {}),
    },
  });
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/** Parse a JSON object body; anything else is a 400. */
export async function readJsonObject(request: Request): Promise<Record<string, unknown>> {
  let body: unknown;
  try {
    body = await request.json();
  } catch {
    throw new RequestValidationError("Request body must be valid JSON.");
  }
  if (!isRecord(body)) {
    throw new RequestValidationError("Request body must be a JSON object.");
  }
  return body;
}

export function parseIdParam(context: RouteContext, name = "id"): number {
  const raw = context.params[name]?.trim() ?? "";
  if (!/^\d+$/.test(raw)) {
    throw new RequestValidationError(`Path parameter '${name}' must be a positive integer.`);
  }
  const value = Number.parseInt(raw, 10);
  if (!Number.isSafeInteger(value) || value <= 0) {
    throw new RequestValidationError(`Path parameter '${name}' must be a positive integer.`);
  }
  return value;
}

const UUID_PATTERN = /^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/i;

export function parseUuidParam(context: RouteContext, name = "id"): string {
  const raw = context.params[name]?.trim() ?? "";
  if (!UUID_PATTERN.test(raw)) {
    throw new RequestValidationError(`Path parameter '${name}' must be a UUID.`);
  }
  return raw.toLowerCase();
}

/** Integer query parameter within `[min, max]`, or `fallback` when absent. */
export function parseLimitParam(
  url: URL,
  bounds: { min: number; max: number; fallback: number },
): number {
  const raw = url.searchParams.get("limit");
  if (raw === null || raw.trim() === "") {
    return bounds.fallback;
  }
  const value = Number(raw);
  if (!Number.isInteger(value) || value < bounds.min || value > bounds.max) {
    throw new RequestValidationError(
      `Query parameter 'limit' must be an integer between ${bounds.min} and ${bounds.max}.`,
    );
  }
  return value;
}
