import { vi } from "vitest";
import { loadConfig } from "../src/config.ts";
import { Logger } from "../src/logger.ts";
import type { AppConfig } from "../src/types.ts";

/**
 * Shared test fixtures: a config built through the real loader and a logger whose output is
 * captured instead of printed.
 */
export function testConfig(overrides: Record<string, string> = {}): AppConfig {
  return loadConfig({
    GEMINI_API_KEY: "test-secret",
    GEMINI_BASE_URL: "https://gemini.test/v1beta",
    ...overrides,
  });
}

export function quietLogger(): Logger {
  vi.spyOn(console, "log").mockImplementation(() => undefined);
  vi.spyOn(console, "warn").mockImplementation(() => undefined);
  vi.spyOn(console, "error").mockImplementation(() => undefined);
  return new Logger("debug");
}

export function geminiPayload(text: string): unknown {
  return { candidates: [{ content: { parts: [{ text }], role: "model" }, finishReason: "STOP" }] };
}

export function jsonReply(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { "content-type": "application/json" },
  });
}
