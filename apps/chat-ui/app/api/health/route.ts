import { forwardToRelay } from "../../../lib/relay_proxy";

// Liveness of the relay as seen from the UI server.
export const dynamic = "force-dynamic";

export async function GET() {
  return forwardToRelay("/api/health");
}
