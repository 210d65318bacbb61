/**
 * Shared API contracts for the chat UI ↔ relay boundary.
 *
 * The UI (Next.js) and the relay (Node HTTP server) are deployed separately, so request and
 * response shapes live here and both sides compile against them. Runtime validation of the
 * same payloads lives in `schemas.ts`.
 */
export interface AskRequest {
  // Required: the student's question, forwarded verbatim into the prompt.
  question: string;
  // Optional topic label; an empty string means "no topic".
  topic?: string;
  // Optional caller-supplied id, echoed back on the answer.
  conversationId?: string;
}

export interface AskResponse {
  answer: string;
  // Echo of the request topic ("" when none was sent).
  topic: string;
  // ISO-8601 generation time.
  timestamp: string;
  conversationId: string;
}

export interface Topic {
  id: string;
  name: string;
  description: string;
}

export interface TopicListResponse {
  topics: Topic[];
}

export interface HealthResponse {
  status: "healthy";
  service: string;
  version: string;
  time: string;
}

export interface ServiceInfoResponse {
  message: string;
  health: string;
  topics: string;
  version: string;
}

export interface ApiError {
  // Human-readable, UI-displayable error summary.
  error: string;
  // Optional detail for validation failures. Never carries upstream detail.
  detail?: string;
}
