/**
 * Core types for the relay service.
 *
 * `AppConfig` is built once at startup by `src/config.ts`, frozen, and handed to the factories
 * in `src/relay.ts`, `src/gemini_client.ts` and `src/http_server.ts`. Nothing reads the
 * environment after that point.
 */
export type LogLevel = "debug" | "info" | "warn" | "error";

export interface GeminiConfig {
  // Required secret, sent as the `key` query parameter. Never exposed to the UI.
  readonly apiKey: string;
  // Model name placed in the request path (`models/{model}:generateContent`).
  readonly model: string;
  // API root without trailing slash.
  readonly baseUrl: string;
}

export interface AppConfig {
  readonly gemini: GeminiConfig;
  readonly apiHost: string;
  readonly apiPort: number;
  // "*" or a comma-separated allowlist of origins.
  readonly apiCorsOrigin: string;
  readonly logLevel: LogLevel;
}
