import { pathToFileURL } from "node:url";
import { askRequestSchema } from "../packages/shared-types/src/schemas.ts";
import { loadConfig, loadEnvFile } from "./config.ts";
import { UpstreamError, UpstreamProtocolError, ValidationError } from "./errors.ts";
import { createGeminiClient } from "./gemini_client.ts";
import { createLogger, describeError } from "./logger.ts";
import { createRelay, SERVICE_NAME, SERVICE_VERSION } from "./relay.ts";
import { serve } from "./serve.ts";
import type {
  ApiError,
  AskResponse,
  HealthResponse,
  ServiceInfoResponse,
  TopicListResponse,
} from "../packages/shared-types/src/contracts.ts";
import type { Logger } from "./logger.ts";
import type { Relay } from "./relay.ts";
import type { FetchHandler } from "./serve.ts";
import type { AppConfig } from "./types.ts";

/**
 * HTTP API for the study assistant relay.
 *
 * Routes:
 * - `GET /health`, `GET /api/health`: liveness, never touches the generation API
 * - `GET /api/topics`: static topic catalog
 * - `POST /api/ask`: one question in, one generated answer out
 * - `GET /`: service info
 *
 * The Next.js UI reaches these routes through its own `/api/*` proxy, so the browser never
 * sees the Gemini key.
 */
export interface HandlerDeps {
  config: AppConfig;
  logger: Logger;
  relay: Relay;
}

function jsonResponse<T>(data: T, status = 200): Response {
  // Pretty-printed so curl output stays readable; `T` pins each route to its contract type.
  return new Response(JSON.stringify(data, null, 2), {
    status,
    headers: { "content-type": "application/json" },
  });
}

function resolveCorsOrigin(requestOrigin: string | null, allowed: string): string | null {
  // API_CORS_ORIGIN is either:
  // - "*": every origin (the default; the browser normally calls through the Next.js proxy)
  // - a comma-separated allowlist, where only an exact match is echoed back
  if (allowed === "*") return "*";
  if (!requestOrigin) return null;
  const allowList = allowed.split(",").map((value) => value.trim()).filter(Boolean);
  return allowList.includes(requestOrigin) ? requestOrigin : null;
}

function withCors(response: Response, origin: string | null): Response {
  // Applied as a wrapper around every route, preflight included.
  if (!origin) return response;
  const headers = new Headers(response.headers);
  headers.set("access-control-allow-origin", origin);
  // The relay only exposes GET reads and the JSON `POST /api/ask`.
  headers.set("access-control-allow-methods", "GET,POST,OPTIONS");
  headers.set("access-control-allow-headers", "content-type");
  headers.set("access-control-max-age", "86400");
  return new Response(response.body, {
    status: response.status,
    headers,
  });
}

async function parseJson(request: Request): Promise<unknown> {
  try {
    return await request.json();
  } catch {
    // Any parse failure is the caller's fault, so it becomes a 400 like a bad shape.
    throw new ValidationError("Invalid JSON payload");
  }
}

async function handleAsk(request: Request, relay: Relay, logger: Logger): Promise<Response> {
  // Same schema as the Next.js proxy route; the relay does not trust its caller to have checked.
  try {
    const parsed = askRequestSchema.safeParse(await parseJson(request));
    if (!parsed.success) {
      const detail = parsed.error.issues.map((issue) => issue.message).join("; ");
      throw new ValidationError(detail);
    }
    const answer = await relay.ask(parsed.data);
    return jsonResponse<AskResponse>(answer);
  } catch (error) {
    if (error instanceof ValidationError) {
      return jsonResponse<ApiError>({ error: "Invalid question", detail: error.message }, 400);
    }
    if (error instanceof UpstreamError) {
      // Upstream detail (status, body) stays in the server log; the caller gets a fixed message.
      logger.error("Failed to answer question", {
        kind: error.name,
        error: error.message,
        ...(error instanceof UpstreamProtocolError
          ? { status: error.status, body: error.body }
          : {}),
      });
      return jsonResponse<ApiError>({ error: "Failed to process question" }, 500);
    }
    // Anything else is a bug and falls through to the handler's 500.
    throw error;
  }
}

export function createRequestHandler({ config, logger, relay }: HandlerDeps): FetchHandler {
  return async (request) => {
    const url = new URL(request.url);
    const origin = resolveCorsOrigin(request.headers.get("origin"), config.apiCorsOrigin);

    // Preflight: answered for any path, with no body.
    if (request.method === "OPTIONS") {
      return withCors(new Response(null, { status: 204 }), origin);
    }

    try {
      // Liveness only: reports the process is up without calling the generation API.
      if (request.method === "GET" && (url.pathname === "/health" || url.pathname === "/api/health")) {
        return withCors(jsonResponse<HealthResponse>(relay.health()), origin);
      }

      // Static catalog; the UI falls back to its own short list when this is unreachable.
      if (request.method === "GET" && url.pathname === "/api/topics") {
        return withCors(jsonResponse<TopicListResponse>(relay.listTopics()), origin);
      }

      // One question, one upstream call.
      if (request.method === "POST" && url.pathname === "/api/ask") {
        return withCors(await handleAsk(request, relay, logger), origin);
      }

      // Service info for anyone poking at the root URL.
      if (request.method === "GET" && url.pathname === "/") {
        return withCors(
          jsonResponse<ServiceInfoResponse>({
            message: "Cloud study assistant relay",
            health: "/health",
            topics: "/api/topics",
            version: SERVICE_VERSION,
          }),
          origin,
        );
      }

      return withCors(jsonResponse<ApiError>({ error: "Not found" }, 404), origin);
    } catch (error) {
      // Last resort: log the detail, never leak it.
      logger.error("Unhandled API error", { error: describeError(error) });
      return withCors(jsonResponse<ApiError>({ error: "Internal server error" }, 500), origin);
    }
  };
}

async function main() {
  // `.env` first, so a local file can supply GEMINI_API_KEY.
  loadEnvFile();
  const config = loadConfig(process.env);
  const logger = createLogger(config.logLevel);
  const client = createGeminiClient(config.gemini, logger);
  const relay = createRelay({ config, logger, client });

  logger.info("Starting relay", {
    service: SERVICE_NAME,
    version: SERVICE_VERSION,
    model: config.gemini.model,
  });
  // A port that cannot be bound rejects here and ends in the fatal-error path below.
  await serve(createRequestHandler({ config, logger, relay }), {
    hostname: config.apiHost,
    port: config.apiPort,
  }, logger);
}

const entryPoint = process.argv[1];
if (entryPoint && import.meta.url === pathToFileURL(entryPoint).href) {
  // Missing credentials or an unusable port end the process before it accepts connections.
  main().catch((error: unknown) => {
    createLogger("error").error("Fatal relay error", { error: describeError(error) });
    process.exit(1);
  });
}
