/**
 * Transport Builder — HTTP clients for scraping.
 *
 * One shared client (TLS, no keep-alive, fixed response timeout) serves every
 * network target. Unix-socket targets get their own client, derived from the
 * shared one for each scrape.
 */

import { readFile } from "node:fs/promises";
import { Agent, fetch, type Response } from "undici";
import type { TlsConfig } from "../config.js";
import { ConfigurationError, describeError } from "../errors.js";

/** Settings shared by every client of one scraper */
export interface ClientConfig {
  tls: TlsConfig;
  responseTimeoutMs: number;
  bearerTokenPath?: string;
}

/** TLS material handed to undici's connector */
export interface TlsConnectOptions {
  ca?: string;
  cert?: string;
  key?: string;
  rejectUnauthorized: boolean;
}

async function readTlsFile(kind: string, path: string | undefined): Promise<string | undefined> {
  if (!path) return undefined;
  try {
    return await readFile(path, "utf8");
  } catch (err) {
    throw new ConfigurationError(`Could not read TLS ${kind} ${path}: ${describeError(err)}`, {
      cause: err,
    });
  }
}

/** Load CA, certificate and key files into connect options */
export async function buildTlsOptions(tls: TlsConfig): Promise<TlsConnectOptions> {
  if (Boolean(tls.certPath) !== Boolean(tls.keyPath)) {
    throw new ConfigurationError("TLS certificate and key must be configured together");
  }

  const [ca, cert, key] = await Promise.all([
    readTlsFile("CA", tls.caPath),
    readTlsFile("certificate", tls.certPath),
    readTlsFile("key", tls.keyPath),
  ]);

  return { ca, cert, key, rejectUnauthorized: !tls.insecureSkipVerify };
}

// ---------------------------------------------------------------------------
// HttpClient
// ---------------------------------------------------------------------------

export class HttpClient {
  private agent: Agent;
  private tls: TlsConnectOptions;
  private timeoutMs: number;

  constructor(tls: TlsConnectOptions, timeoutMs: number, socketPath?: string) {
    this.tls = tls;
    this.timeoutMs = timeoutMs;
    this.agent = new Agent({
      // pipelining 0 disables keep-alive: every scrape opens a fresh connection
      pipelining: 0,
      connect: socketPath ? { ...tls, socketPath } : { ...tls },
    });
  }

  get responseTimeoutMs(): number {
    return this.timeoutMs;
  }

  /**
   * A separate client with the same TLS and timeout whose connections all go
   * to `socketPath`, whatever host the request names. Close it after use.
   */
  forSocket(socketPath: string): HttpClient {
    return new HttpClient(this.tls, this.timeoutMs, socketPath);
  }

  /** GET a URL; the timeout covers the response and reading its body */
  get(url: string, headers: Record<string, string>): Promise<Response> {
    return fetch(url, {
      method: "GET",
      headers,
      dispatcher: this.agent,
      signal: AbortSignal.timeout(this.timeoutMs),
    });
  }

  async close(): Promise<void> {
    await this.agent.close();
  }
}

/** Build the reusable client; unusable TLS material is a ConfigurationError */
export async function createHttpClient(config: ClientConfig): Promise<HttpClient> {
  const tls = await buildTlsOptions(config.tls);
  return new HttpClient(tls, config.responseTimeoutMs);
}
