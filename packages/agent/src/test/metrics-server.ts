/**
 * In-process HTTP servers standing in for scrape targets in tests.
 */

import {
  createServer,
  type IncomingHttpHeaders,
  type IncomingMessage,
  type ServerResponse,
} from "node:http";

export interface RecordedRequest {
  url: string;
  headers: IncomingHttpHeaders;
}

export interface MetricsServer {
  /** Base URL (`http://127.0.0.1:<port>`), empty when listening on a socket */
  url: string;
  requests: RecordedRequest[];
  close(): Promise<void>;
}

export type Handler = (req: IncomingMessage, res: ServerResponse) => void;

/** Serve `body` as the text exposition format */
export function textResponse(body: string, status = 200): Handler {
  return (_req, res) => {
    res.writeHead(status, { "Content-Type": "text/plain; version=0.0.4" });
    res.end(body);
  };
}

/**
 * Start a server on 127.0.0.1 with an ephemeral port, or on a Unix socket
 * when `socketPath` is given.
 */
export async function startMetricsServer(
  handler: Handler,
  socketPath?: string,
): Promise<MetricsServer> {
  const requests: RecordedRequest[] = [];
  const server = createServer((req, res) => {
    requests.push({ url: req.url ?? "", headers: req.headers });
    handler(req, res);
  });

  await new Promise<void>((resolve) => {
    if (socketPath) server.listen(socketPath, resolve);
    else server.listen(0, "127.0.0.1", resolve);
  });

  const address = server.address();
  const url = address && typeof address === "object" ? `http://127.0.0.1:${address.port}` : "";

  return {
    url,
    requests,
    close: () =>
      new Promise<void>((resolve, reject) => {
        server.closeAllConnections();
        server.close((err) => (err ? reject(err) : resolve()));
      }),
  };
}

/** Poll until a condition is met */
export async function waitFor(fn: () => void, timeout = 1_000): Promise<void> {
  const start = Date.now();
  while (true) {
    try {
      fn();
      return;
    } catch {
      if (Date.now() - start > timeout) throw new Error("waitFor timed out");
      await new Promise((r) => setTimeout(r, 20));
    }
  }
}
