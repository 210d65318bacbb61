import { z } from "zod";

/**
 * Runtime validation schemas for shared API payloads.
 *
 * How these schemas are used:
 * - The Next.js proxy route validates browser payloads before forwarding to the relay.
 * - The relay validates the same payload again at its own boundary.
 * - The browser client validates relay answers before rendering them.
 */
export const askRequestSchema = z.object({
  // Whitespace-only questions count as empty; the value itself is passed on untouched.
  question: z
    .string({ required_error: "Question is required" })
    .refine((value) => value.trim().length > 0, "Question must not be empty"),
  topic: z.string().optional(),
  conversationId: z.string().min(1).optional(),
});

export const askResponseSchema = z.object({
  answer: z.string(),
  topic: z.string(),
  timestamp: z.string().min(1),
  conversationId: z.string().min(1),
});

export const topicSchema = z.object({
  id: z.string().min(1),
  name: z.string().min(1),
  description: z.string(),
});

export const topicListResponseSchema = z.object({
  topics: z.array(topicSchema),
});

export const healthResponseSchema = z.object({
  status: z.literal("healthy"),
  service: z.string().min(1),
  version: z.string().min(1),
  time: z.string().min(1),
});
