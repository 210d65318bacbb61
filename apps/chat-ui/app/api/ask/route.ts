import { askRequestSchema } from "@cloud-study/shared-types/schemas";
import { forwardToRelay } from "../../../lib/relay_proxy";
import type { ApiError } from "@cloud-study/shared-types/contracts";

/**
 * Next.js API Route: `POST /api/ask`
 *
 * Validates the browser payload with the shared schema, then forwards it to the relay's
 * `POST /api/ask`.
 */
export async function POST(request: Request) {
  let payload: unknown;
  try {
    payload = await request.json();
  } catch {
    const body: ApiError = { error: "Invalid JSON payload" };
    return Response.json(body, { status: 400 });
  }

  const parsed = askRequestSchema.safeParse(payload);
  if (!parsed.success) {
    const body: ApiError = {
      error: "Invalid question",
      detail: parsed.error.issues.map((issue) => issue.message).join("; "),
    };
    return Response.json(body, { status: 400 });
  }

  return forwardToRelay("/api/ask", {
    method: "POST",
    body: JSON.stringify(parsed.data),
  });
}
