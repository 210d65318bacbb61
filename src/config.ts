import { config as loadDotenv } from "dotenv";
import { ConfigError } from "./errors.ts";
import { isLogLevel } from "./logger.ts";
import type { AppConfig } from "./types.ts";

/**
 * Environment-driven configuration for the relay.
 *
 * `loadEnvFile()` merges a local `.env` into `process.env` (a missing file is fine).
 * `loadConfig()` takes the environment as an argument so tests can pass a plain object.
 */
const DEFAULT_GEMINI_BASE_URL = "https://generativelanguage.googleapis.com/v1beta";
const DEFAULT_GEMINI_MODEL = "gemini-pro";
const DEFAULT_PORT = 8080;

type Env = Record<string, string | undefined>;

export function loadEnvFile(path?: string): void {
  const result = loadDotenv(path ? { path } : undefined);
  if (result.error && !isMissingFile(result.error)) {
    throw result.error;
  }
}

export function loadConfig(env: Env = process.env): AppConfig {
  const apiKey = requireEnv(env, "GEMINI_API_KEY");
  const logLevel = env.LOG_LEVEL ?? "info";

  return Object.freeze({
    gemini: Object.freeze({
      apiKey,
      model: env.GEMINI_MODEL?.trim() || DEFAULT_GEMINI_MODEL,
      baseUrl: (env.GEMINI_BASE_URL?.trim() || DEFAULT_GEMINI_BASE_URL).replace(/\/+$/, ""),
    }),
    apiHost: env.API_HOST ?? "0.0.0.0",
    apiPort: parsePort(env.PORT, DEFAULT_PORT),
    apiCorsOrigin: env.API_CORS_ORIGIN ?? "*",
    logLevel: isLogLevel(logLevel) ? logLevel : "info",
  });
}

function requireEnv(env: Env, key: string): string {
  const value = env[key]?.trim();
  if (!value) {
    throw new ConfigError(`Missing required environment variable: ${key}`);
  }
  return value;
}

function parsePort(value: string | undefined, fallback: number): number {
  if (!value) return fallback;
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed <= 0 || parsed > 65535) return fallback;
  return parsed;
}

function isMissingFile(error: Error): boolean {
  return "code" in error && error.code === "ENOENT";
}
