import { createServer } from "node:http";
import type { IncomingMessage, Server, ServerResponse } from "node:http";
import { describeError } from "./logger.ts";
import type { Logger } from "./logger.ts";

/**
 * Bridges a web-standard `(Request) => Promise<Response>` handler onto `node:http`.
 *
 * Handlers stay testable with plain `new Request(...)` objects; only this file knows about
 * Node's stream-based request and response types.
 */
export type FetchHandler = (request: Request) => Promise<Response>;

export interface ServeOptions {
  hostname: string;
  port: number;
}

export async function toWebRequest(incoming: IncomingMessage): Promise<Request> {
  const url = new URL(incoming.url ?? "/", `http://${incoming.headers.host ?? "localhost"}`);
  const headers = new Headers();
  for (const [name, value] of Object.entries(incoming.headers)) {
    if (Array.isArray(value)) {
      for (const item of value) headers.append(name, item);
    } else if (value !== undefined) {
      headers.set(name, value);
    }
  }

  // GET/HEAD cannot carry a body in a web Request.
  const method = incoming.method ?? "GET";
  if (method === "GET" || method === "HEAD") {
    return new Request(url, { method, headers });
  }

  // Decode once after concatenating, so a multi-byte character split across chunks survives.
  const chunks: Buffer[] = [];
  for await (const chunk of incoming) {
    chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk)));
  }
  return new Request(url, { method, headers, body: Buffer.concat(chunks).toString("utf8") });
}

async function writeWebResponse(response: Response, outgoing: ServerResponse): Promise<void> {
  const headers: Record<string, string> = {};
  response.headers.forEach((value, name) => {
    headers[name] = value;
  });
  outgoing.writeHead(response.status, headers);
  outgoing.end(await response.text());
}

/**
 * Starts listening and resolves once the socket is bound.
 *
 * A startup failure (EADDRINUSE, EACCES) rejects, so the entry point reaches its fatal-error
 * path instead of dying on an unhandled `'error'` event.
 */
export function serve(handler: FetchHandler, options: ServeOptions, logger: Logger): Promise<Server> {
  const server = createServer((incoming, outgoing) => {
    toWebRequest(incoming)
      .then((request) => handler(request))
      .then((response) => writeWebResponse(response, outgoing))
      .catch((error: unknown) => {
        // Handlers map their own errors; reaching here means the bridge or handler itself broke.
        logger.error("Failed to bridge HTTP request", { error: describeError(error) });
        if (!outgoing.headersSent) {
          outgoing.writeHead(500, { "content-type": "application/json" });
        }
        outgoing.end(JSON.stringify({ error: "Internal server error" }));
      });
  });

  return new Promise((resolve, reject) => {
    const onStartupError = (error: Error) => {
      reject(error);
    };
    server.once("error", onStartupError);

    server.listen(options.port, options.hostname, () => {
      server.off("error", onStartupError);
      // Errors after startup are logged; the server keeps serving other connections.
      server.on("error", (error) => {
        logger.error("Relay server error", { error: describeError(error) });
      });
      const address = server.address();
      logger.info("Relay listening", {
        host: options.hostname,
        port: typeof address === "object" && address ? address.port : options.port,
      });
      resolve(server);
    });
  });
}
