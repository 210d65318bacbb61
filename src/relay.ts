import { TOPIC_CATALOG } from "../packages/shared-types/src/topics.ts";
import { ValidationError } from "./errors.ts";
import { buildPrompt } from "./prompt.ts";
import type {
  AskRequest,
  AskResponse,
  HealthResponse,
  TopicListResponse,
} from "../packages/shared-types/src/contracts.ts";
import type { GenerationClient } from "./gemini_client.ts";
import type { Logger } from "./logger.ts";
import type { AppConfig } from "./types.ts";

/**
 * The study assistant relay: validate, build the prompt, make one upstream call, map the result.
 *
 * Stateless between calls. Identical questions are not deduplicated or cached.
 */
export const SERVICE_NAME = "cloud-study-assistant";
export const SERVICE_VERSION = "1.0.0";

export interface RelayDeps {
  config: AppConfig;
  logger: Logger;
  client: GenerationClient;
  now?: () => Date;
}

export interface Relay {
  health(): HealthResponse;
  listTopics(): TopicListResponse;
  ask(request: Partial<AskRequest>): Promise<AskResponse>;
}

export function createRelay({ config, logger, client, now = () => new Date() }: RelayDeps): Relay {
  logger.debug("Relay created", { model: config.gemini.model });

  return {
    health() {
      return {
        status: "healthy",
        service: SERVICE_NAME,
        version: SERVICE_VERSION,
        time: now().toISOString(),
      };
    },

    listTopics() {
      return { topics: TOPIC_CATALOG.map((topic) => ({ ...topic })) };
    },

    async ask({ question, topic, conversationId }) {
      if (typeof question !== "string" || question.trim().length === 0) {
        throw new ValidationError("Question must not be empty");
      }

      logger.info("Question received", {
        topic: topic || "general",
        length: question.length,
      });

      const prompt = await buildPrompt(question, topic);
      const answer = await client.generate(prompt);
      logger.info("Answer generated", { length: answer.length });

      const answeredAt = now();
      return {
        answer,
        topic: topic ?? "",
        timestamp: answeredAt.toISOString(),
        conversationId: conversationId ?? `conv_${Math.floor(answeredAt.getTime() / 1000)}`,
      };
    },
  };
}
