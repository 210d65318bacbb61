import { forwardToRelay } from "../../../lib/relay_proxy";

/**
 * Next.js API Route: `GET /api/topics`, a transparent proxy to the relay's topic catalog.
 */
export const dynamic = "force-dynamic";

export async function GET() {
  return forwardToRelay("/api/topics");
}
