import { afterEach, describe, expect, it, vi } from "vitest";
import { EmptyResultError, UpstreamProtocolError, UpstreamTransportError } from "../src/errors.ts";
import { createRequestHandler } from "../src/http_server.ts";
import { createRelay } from "../src/relay.ts";
import { quietLogger, testConfig } from "./fixtures.ts";
import type { GenerationClient } from "../src/gemini_client.ts";

/**
 * The handler is a plain `(Request) => Promise<Response>`, so routes are exercised without
 * opening a socket.
 */
function setup(generate: GenerationClient["generate"], env: Record<string, string> = {}) {
  const config = testConfig(env);
  const logger = quietLogger();
  const generateSpy = vi.fn(generate);
  const relay = createRelay({ config, logger, client: { generate: generateSpy } });
  return { handler: createRequestHandler({ config, logger, relay }), generate: generateSpy };
}

function ask(body: string, headers: Record<string, string> = {}) {
  return new Request("http://relay.test/api/ask", {
    method: "POST",
    headers: { "content-type": "application/json", ...headers },
    body,
  });
}

describe("createRequestHandler", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it.each(["/health", "/api/health"])("serves health at %s", async (path) => {
    const { handler, generate } = setup(async () => "unused");

    const response = await handler(new Request(`http://relay.test${path}`));

    expect(response.status).toBe(200);
    expect(response.headers.get("content-type")).toBe("application/json");
    const body = await response.json();
    expect(body.status).toBe("healthy");
    expect(body.service).toBe("cloud-study-assistant");
    expect(body.version).toBe("1.0.0");
    expect(typeof body.time).toBe("string");
    expect(generate).not.toHaveBeenCalled();
  });

  it("lists topics", async () => {
    const { handler } = setup(async () => "unused");

    const response = await handler(new Request("http://relay.test/api/topics"));

    expect(response.status).toBe(200);
    const body = await response.json();
    expect(body.topics).toHaveLength(8);
    expect(body.topics[0]).toEqual({
      id: "docker",
      name: "Docker and Containers",
      description: "Containers, images, volumes and networks",
    });
  });

  it("answers a question", async () => {
    const { handler, generate } = setup(async () => "Paris is the capital of France.");

    const response = await handler(ask(JSON.stringify({ question: "What is the capital of France?" })));

    expect(response.status).toBe(200);
    const body = await response.json();
    expect(body.answer).toBe("Paris is the capital of France.");
    expect(body.topic).toBe("");
    expect(generate).toHaveBeenCalledTimes(1);
  });

  it("echoes the topic", async () => {
    const { handler } = setup(async () => "Terraform keeps state.");

    const response = await handler(
      ask(JSON.stringify({ question: "What is state?", topic: "Terraform and IaC" })),
    );

    const body = await response.json();
    expect(body.topic).toBe("Terraform and IaC");
  });

  it.each([
    ["an empty question", JSON.stringify({ question: "" })],
    ["a missing question", JSON.stringify({ topic: "Kubernetes" })],
    ["a non-string question", JSON.stringify({ question: 42 })],
  ])("returns 400 for %s without calling upstream", async (_label, body) => {
    const { handler, generate } = setup(async () => "unused");

    const response = await handler(ask(body));

    expect(response.status).toBe(400);
    const payload = await response.json();
    expect(payload.error).toBe("Invalid question");
    expect(generate).not.toHaveBeenCalled();
  });

  it("returns 400 for a body that is not JSON", async () => {
    const { handler } = setup(async () => "unused");

    const response = await handler(ask("question=hello"));

    expect(response.status).toBe(400);
    expect(await response.json()).toEqual({
      error: "Invalid question",
      detail: "Invalid JSON payload",
    });
  });

  it.each([
    ["transport", new UpstreamTransportError("connect ECONNREFUSED")],
    ["protocol", new UpstreamProtocolError("status 503", { status: 503, body: "internal upstream detail" })],
    ["empty result", new EmptyResultError("no candidates")],
  ])("hides %s failures behind a generic 500", async (_label, failure) => {
    const { handler } = setup(async () => {
      throw failure;
    });

    const response = await handler(ask(JSON.stringify({ question: "What is Lambda?" })));

    expect(response.status).toBe(500);
    expect(await response.json()).toEqual({ error: "Failed to process question" });
  });

  it("logs upstream detail server-side", async () => {
    const { handler } = setup(async () => {
      throw new UpstreamProtocolError("status 503", { status: 503, body: "backend overloaded" });
    });

    await handler(ask(JSON.stringify({ question: "What is Lambda?" })));

    const errorSpy = vi.mocked(console.error);
    expect(errorSpy).toHaveBeenCalledTimes(1);
    const line = String(errorSpy.mock.calls[0][0]);
    expect(line).toContain("ERROR Failed to answer question");
    expect(line).toContain('"body":"backend overloaded"');
  });

  it("turns unexpected errors into an internal server error", async () => {
    const { handler } = setup(async () => {
      throw new RangeError("boom");
    });

    const response = await handler(ask(JSON.stringify({ question: "What is Lambda?" })));

    expect(response.status).toBe(500);
    expect(await response.json()).toEqual({ error: "Internal server error" });
  });

  it("returns 404 for unknown routes", async () => {
    const { handler } = setup(async () => "unused");

    const response = await handler(new Request("http://relay.test/api/unknown"));

    expect(response.status).toBe(404);
    expect(await response.json()).toEqual({ error: "Not found" });
  });

  it("describes the service at the root", async () => {
    const { handler } = setup(async () => "unused");

    const response = await handler(new Request("http://relay.test/"));

    expect(await response.json()).toEqual({
      message: "Cloud study assistant relay",
      health: "/health",
      topics: "/api/topics",
      version: "1.0.0",
    });
  });

  it("answers CORS preflight with 204 and allow headers", async () => {
    const { handler } = setup(async () => "unused");

    const response = await handler(
      new Request("http://relay.test/api/ask", {
        method: "OPTIONS",
        headers: { origin: "http://ui.test" },
      }),
    );

    expect(response.status).toBe(204);
    expect(response.headers.get("access-control-allow-origin")).toBe("*");
    expect(response.headers.get("access-control-allow-methods")).toBe("GET,POST,OPTIONS");
  });

  it("only echoes allowlisted origins", async () => {
    const { handler } = setup(async () => "unused", {
      API_CORS_ORIGIN: "http://ui.test, http://admin.test",
    });

    const allowed = await handler(
      new Request("http://relay.test/health", { headers: { origin: "http://admin.test" } }),
    );
    const denied = await handler(
      new Request("http://relay.test/health", { headers: { origin: "http://evil.test" } }),
    );

    expect(allowed.headers.get("access-control-allow-origin")).toBe("http://admin.test");
    expect(denied.headers.get("access-control-allow-origin")).toBeNull();
  });
});
