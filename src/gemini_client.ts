import { z } from "zod";
import { describeError } from "./logger.ts";
import {
  EmptyResultError,
  UpstreamProtocolError,
  UpstreamTransportError,
} from "./errors.ts";
import type { GeminiConfig } from "./types.ts";
import type { Logger } from "./logger.ts";

/**
 * Client for the Gemini `generateContent` REST endpoint.
 *
 * One `generate()` call is one POST; there is no retry and no timeout beyond what `fetch`
 * applies. `fetchImpl` is injectable so tests can stand in for the network.
 */
export interface GenerationClient {
  generate(prompt: string): Promise<string>;
}

export type FetchLike = (input: string, init: RequestInit) => Promise<Response>;

// Only the path we read is described; everything else in the payload is ignored.
const geminiResponseSchema = z.object({
  candidates: z
    .array(
      z.object({
        content: z
          .object({
            parts: z.array(z.object({ text: z.string().optional() })).optional(),
          })
          .optional(),
      }),
    )
    .optional(),
});

export type GeminiResponse = z.infer<typeof geminiResponseSchema>;

export function buildGenerateUrl(config: GeminiConfig): string {
  const query = new URLSearchParams({ key: config.apiKey });
  return `${config.baseUrl}/models/${encodeURIComponent(config.model)}:generateContent?${query}`;
}

export function extractAnswer(payload: GeminiResponse): string {
  const candidate = payload.candidates?.[0];
  if (!candidate) {
    throw new EmptyResultError("Generation API returned no candidates");
  }
  const part = candidate.content?.parts?.[0];
  if (!part) {
    throw new EmptyResultError("Generation API returned a candidate without parts");
  }
  if (!part.text) {
    throw new EmptyResultError("Generation API returned an empty text part");
  }
  return part.text;
}

export function createGeminiClient(
  config: GeminiConfig,
  logger: Logger,
  fetchImpl: FetchLike = fetch,
): GenerationClient {
  const url = buildGenerateUrl(config);

  return {
    async generate(prompt: string): Promise<string> {
      logger.debug("Calling generation API", { model: config.model, promptLength: prompt.length });

      let response: Response;
      let body: string;
      try {
        response = await fetchImpl(url, {
          method: "POST",
          headers: { "content-type": "application/json" },
          body: JSON.stringify({ contents: [{ parts: [{ text: prompt }] }] }),
        });
        body = await response.text();
      } catch (error) {
        throw new UpstreamTransportError(
          `Failed to reach generation API: ${describeError(error)}`,
          { cause: error },
        );
      }

      if (!response.ok) {
        throw new UpstreamProtocolError(
          `Generation API responded with status ${response.status}`,
          { status: response.status, body },
        );
      }

      let decoded: unknown;
      try {
        decoded = JSON.parse(body);
      } catch (error) {
        throw new UpstreamProtocolError("Generation API returned a non-JSON body", {
          status: response.status,
          body,
          cause: error,
        });
      }

      const parsed = geminiResponseSchema.safeParse(decoded);
      if (!parsed.success) {
        throw new UpstreamProtocolError("Generation API returned an unexpected payload shape", {
          status: response.status,
          body,
          cause: parsed.error,
        });
      }

      return extractAnswer(parsed.data);
    },
  };
}
