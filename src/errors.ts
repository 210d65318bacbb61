/**
 * Error taxonomy for the relay.
 *
 * - `ValidationError` is the only error whose message reaches the caller (as a 400).
 * - Every `UpstreamError` becomes a generic 500; its detail stays in server logs.
 * - `ConfigError` only occurs at startup and stops the process.
 */
export class ValidationError extends Error {
  override name = "ValidationError";
}

export class ConfigError extends Error {
  override name = "ConfigError";
}

export abstract class UpstreamError extends Error {}

/** Network, DNS or socket failure while talking to the generation API. */
export class UpstreamTransportError extends UpstreamError {
  override name = "UpstreamTransportError";
}

/** Non-success status, or a body that is not the expected JSON shape. */
export class UpstreamProtocolError extends UpstreamError {
  override name = "UpstreamProtocolError";
  readonly status?: number;
  readonly body?: string;

  constructor(message: string, details: { status?: number; body?: string; cause?: unknown } = {}) {
    super(message, { cause: details.cause });
    this.status = details.status;
    this.body = details.body;
  }
}

/** Well-formed response that carries no usable text. */
export class EmptyResultError extends UpstreamError {
  override name = "EmptyResultError";
}
