import cors from "@fastify/cors";
import Fastify, { type FastifyInstance, type FastifyReply, type FastifyRequest } from "fastify";
import { logEvent } from "../packages/core/src/observability/logger";
import { startSentrySpan } from "../packages/core/src/observability/sentry";
import { registerUpstreamRetryObserver } from "../packages/db/src/retry";
import { resolveServerConfig, type ServerConfig } from "./lib/config";
import { getServiceRoleDbClient } from "./lib/db-clients";
import { isRecord, jsonResponse, type RouteContext } from "./lib/http";
import { generateRequestId } from "./lib/observability";
import { toErrorResponse } from "./lib/route-errors";
import { API_ROUTES, type ApiRoute } from "./routes";

const BODYLESS_METHODS = new Set(["GET", "HEAD"]);
const HOP_BY_HOP_HEADERS = new Set(["host", "connection", "content-length", "transfer-encoding"]);

/**
 * Mount the fetch-style route handlers on Fastify. Bodies reach handlers
 * as raw text so each handler parses and validates its own JSON.
 */
export async function buildServer(
  options: { config?: ServerConfig; routes?: readonly ApiRoute[] } = {},
): Promise<FastifyInstance> {
  const config = options.config ?? resolveServerConfig();
  const server = Fastify({ logger: false });

  await server.register(cors, {
    origin: config.corsOrigins,
    credentials: true,
    allowedHeaders: ["Authorization", "Content-Type", "Accept", "X-Request-Id"],
    methods: ["GET", "POST", "PUT", "OPTIONS"],
  });

  server.removeAllContentTypeParsers();
  server.addContentTypeParser("*", { parseAs: "string" }, (_request, body, done) => {
    done(null, body);
  });

  for (const route of options.routes ?? API_ROUTES) {
    server.route({
      method: route.method,
      url: route.url,
      handler: (request, reply) => dispatch(route, request, reply),
    });
  }

  server.setNotFoundHandler((request, reply) =>
    writeResponse(
      reply,
      jsonResponse({ code: "NOT_FOUND", message: `No route for ${request.method} ${request.url}.` }, 404),
    ),
  );

  return server;
}

export async function startServer(config: ServerConfig = resolveServerConfig()): Promise<FastifyInstance> {
  getServiceRoleDbClient();
  registerUpstreamRetryObserver(({ attempt, delay_ms, error }) => {
    logEvent({
      level: "warn",
      event: "system.upstream_retry",
      payload: {
        attempt,
        delay_ms,
        error_message: error instanceof Error ? error.message : String(error),
      },
    });
  });
  const server = await buildServer({ config });
  await server.listen({ host: config.host, port: config.port });
  logEvent({ event: "system.server_started", payload: { host: config.host, port: config.port } });
  return server;
}

async function dispatch(
  route: ApiRoute,
  request: FastifyRequest,
  reply: FastifyReply,
): Promise<FastifyReply> {
  const startedAt = Date.now();
  const requestId = readHeader(request.headers["x-request-id"]) ?? generateRequestId();
  const webRequest = toWebRequest(request, requestId);
  const context: RouteContext = { params: readParams(request.params) };

  let response: Response;
  try {
    response = await startSentrySpan(
      { name: "api.route", op: "http.server", attributes: { route: route.url, method: route.method } },
      () => route.handler(webRequest, context),
    );
  } catch (error) {
    response = toErrorResponse(error, { phase: "route_dispatch", requestId });
  }

  logEvent({
    event: "system.request_completed",
    correlation_id: requestId,
    payload: {
      method: route.method,
      route: route.url,
      status_code: response.status,
      duration_ms: Date.now() - startedAt,
    },
  });

  if (!response.headers.has("x-request-id")) {
    reply.header("x-request-id", requestId);
  }
  return writeResponse(reply, response);
}

function toWebRequest(request: FastifyRequest, requestId: string): Request {
  const headers = new Headers();
  for (const [name, value] of Object.entries(request.headers)) {
    if (HOP_BY_HOP_HEADERS.has(name)) {
      continue;
    }
    if (Array.isArray(value)) {
      for (const entry of value) {
        headers.append(name, entry);
      }
    } else if (typeof value === "string") {
      headers.set(name, value);
    }
  }
  headers.set("x-request-id", requestId);

  const body =
    !BODYLESS_METHODS.has(request.method) && typeof request.body === "string" && request.body.length > 0
      ? request.body
      : undefined;

  return new Request(new URL(request.url, "http://localhost"), {
    method: request.method,
    headers,
    body,
  });
}

async function writeResponse(reply: FastifyReply, response: Response): Promise<FastifyReply> {
  reply.status(response.status);
  response.headers.forEach((value, name) => {
    reply.header(name, value);
  });
  return reply.send(await response.text());
}

function readParams(params: unknown): Record<string, string | undefined> {
  const output: Record<string, string | undefined> = {};
  if (!isRecord(params)) {
    return output;
  }
  for (const [key, value] of Object.entries(params)) {
    if (typeof value === "string") {
      output[key] = value;
    }
  }
  return output;
}

function readHeader(value: string | string[] | undefined): string | null {
  const first = Array.isArray(value) ? value[0] : value;
  const trimmed = first?.trim();
  return trimmed ? trimmed : null;
}
