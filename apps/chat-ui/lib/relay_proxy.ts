import type { ApiError } from "@cloud-study/shared-types/contracts";

/**
 * Server-side forwarding from Next.js route handlers to the relay.
 *
 * Status and body are passed through as-is. If the relay cannot be reached the browser gets a
 * 502 with a short message and nothing else.
 */
export function relayUrl(): string {
  return (process.env.RELAY_URL ?? "http://localhost:8080").replace(/\/+$/, "");
}

export interface ForwardInit {
  method?: "GET" | "POST";
  body?: string;
}

export async function forwardToRelay(path: string, init: ForwardInit = {}): Promise<Response> {
  try {
    const upstream = await fetch(`${relayUrl()}${path}`, {
      method: init.method ?? "GET",
      headers: { "content-type": "application/json" },
      body: init.body,
    });

    // Read as text so error bodies pass through without guessing their shape.
    const text = await upstream.text();
    const contentType = upstream.headers.get("content-type") ?? "application/json";

    return new Response(text, {
      status: upstream.status,
      headers: { "content-type": contentType },
    });
  } catch {
    const body: ApiError = { error: "Failed to reach relay service" };
    return Response.json(body, { status: 502 });
  }
}
