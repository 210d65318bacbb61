import {
  askResponseSchema,
  healthResponseSchema,
  topicListResponseSchema,
} from "@cloud-study/shared-types/schemas";
import { FALLBACK_TOPICS } from "@cloud-study/shared-types/topics";
import type { AskRequest, AskResponse, Topic } from "@cloud-study/shared-types/contracts";

/**
 * Browser-side calls to the Next.js proxy routes (`/api/*`), which forward to the relay.
 *
 * The UI does not tell failure kinds apart: anything other than a valid 2xx answer is a
 * `RequestFailure`.
 */
export class RequestFailure extends Error {
  override name = "RequestFailure";
}

export type ApiStatus = "checking" | "connected" | "offline";

// "connected" only when the proxy returned the relay's own health payload, not just any 2xx.
export async function checkHealth(): Promise<Exclude<ApiStatus, "checking">> {
  try {
    const response = await fetch("/api/health");
    if (!response.ok) return "offline";
    return healthResponseSchema.safeParse(await response.json()).success ? "connected" : "offline";
  } catch {
    return "offline";
  }
}

export async function loadTopics(): Promise<Topic[]> {
  try {
    const response = await fetch("/api/topics");
    if (!response.ok) {
      throw new RequestFailure(`Topic request failed with status ${response.status}`);
    }
    const parsed = topicListResponseSchema.safeParse(await response.json());
    if (!parsed.success) {
      throw new RequestFailure("Topic list has an unexpected shape");
    }
    return parsed.data.topics;
  } catch {
    return FALLBACK_TOPICS.map((topic) => ({ ...topic }));
  }
}

export async function askQuestion(request: AskRequest): Promise<AskResponse> {
  let response: Response;
  try {
    response = await fetch("/api/ask", {
      method: "POST",
      headers: { "content-type": "application/json" },
      body: JSON.stringify(request),
    });
  } catch (error) {
    throw new RequestFailure("Relay unreachable", { cause: error });
  }

  if (!response.ok) {
    throw new RequestFailure(`Ask request failed with status ${response.status}`);
  }

  let payload: unknown;
  try {
    payload = await response.json();
  } catch (error) {
    throw new RequestFailure("Answer was not valid JSON", { cause: error });
  }
  const parsed = askResponseSchema.safeParse(payload);
  if (!parsed.success) {
    throw new RequestFailure("Answer has an unexpected shape");
  }
  return parsed.data;
}
