/**
 * Scrape Executor — fetches and parses one target.
 *
 * Every failure becomes a ScrapeError naming the target, so the fan-out can
 * report it without affecting any other target. Credentials in a target URL
 * are sent as Basic auth, unless a bearer token is configured.
 */

import { readFile } from "node:fs/promises";
import type { Response } from "undici";
import type { ParsedMetric, ScrapeTarget } from "@scrapeline/shared";
import type { ExpositionParser } from "../parser/text-parser.js";
import type { HttpClient } from "./transport.js";
import { stripCredentials } from "./tags.js";
import { ScrapeError, describeError } from "../errors.js";

/**
 * Content negotiation sent with every scrape: the versioned text format is
 * preferred, the delimited protobuf encoding accepted at a lower weight.
 */
export const ACCEPT_HEADER =
  "text/plain;version=0.0.4;q=0.7," +
  "application/vnd.google.protobuf;proto=io.prometheus.client.MetricFamily;encoding=delimited;q=0.3";

export const DEFAULT_METRICS_PATH = "/metrics";

export interface ScrapeContext {
  /** Shared client for network targets */
  client: HttpClient;
  parser: ExpositionParser;
  bearerTokenPath?: string;
}

/** Where a request goes: the URL to send, and the socket to send it over */
export interface RequestPlan {
  /** Never carries userinfo; fetch refuses URLs with credentials */
  requestUrl: string;
  socketPath?: string;
  /** Userinfo taken off the target URL, decoded */
  basicAuth?: { username: string; password: string };
}

/**
 * Work out the request for a target. `unix:` URLs carry the socket path as
 * their pathname and the HTTP path in the `path` query parameter.
 */
export function planRequest(url: URL): RequestPlan {
  if (url.protocol === "unix:") {
    const path = url.searchParams.get("path") || DEFAULT_METRICS_PATH;
    return { requestUrl: `http://localhost${path}`, socketPath: url.pathname };
  }

  const effective = stripCredentials(url);
  if (effective.pathname === "" || effective.pathname === "/") {
    effective.pathname = DEFAULT_METRICS_PATH;
  }
  const plan: RequestPlan = { requestUrl: effective.href };
  if (url.username || url.password) {
    plan.basicAuth = {
      username: decodeURIComponent(url.username),
      password: decodeURIComponent(url.password),
    };
  }
  return plan;
}

function basicAuthorization(auth: { username: string; password: string }): string {
  const { username, password } = auth;
  return `Basic ${Buffer.from(`${username}:${password}`).toString("base64")}`;
}

async function readBearerToken(path: string): Promise<string> {
  const token = await readFile(path, "utf8");
  return token.replace(/[\r\n]+$/, "");
}

/** Release a response body that will not be read */
async function discardBody(response: Response): Promise<void> {
  if (response.body && !response.bodyUsed) {
    await response.body.cancel();
  }
}

export async function scrapeTarget(
  target: ScrapeTarget,
  context: ScrapeContext,
): Promise<ParsedMetric[]> {
  const label = stripCredentials(target.url).toString();
  const plan = planRequest(target.url);

  const headers: Record<string, string> = { Accept: ACCEPT_HEADER };
  if (context.bearerTokenPath) {
    try {
      headers.Authorization = `Bearer ${await readBearerToken(context.bearerTokenPath)}`;
    } catch (err) {
      throw new ScrapeError(
        label,
        `error reading bearer token for ${label}: ${describeError(err)}`,
        { cause: err },
      );
    }
  } else if (plan.basicAuth) {
    headers.Authorization = basicAuthorization(plan.basicAuth);
  }

  const client = plan.socketPath ? context.client.forSocket(plan.socketPath) : context.client;

  try {
    let response: Response;
    try {
      response = await client.get(plan.requestUrl, headers);
    } catch (err) {
      throw new ScrapeError(
        label,
        `error making HTTP request to ${label}: ${describeRequestError(err, client.responseTimeoutMs)}`,
        { cause: err },
      );
    }

    if (!response.ok) {
      await discardBody(response);
      const status = `${response.status} ${response.statusText}`.trim();
      throw new ScrapeError(label, `${label} returned HTTP status ${status}`);
    }

    let body: Uint8Array;
    try {
      body = new Uint8Array(await response.arrayBuffer());
    } catch (err) {
      await discardBody(response);
      throw new ScrapeError(
        label,
        `error reading body from ${label}: ${describeRequestError(err, client.responseTimeoutMs)}`,
        { cause: err },
      );
    }

    try {
      return context.parser.parse(body, response.headers);
    } catch (err) {
      throw new ScrapeError(label, `error reading metrics for ${label}: ${describeError(err)}`, {
        cause: err,
      });
    }
  } finally {
    if (client !== context.client) {
      await client.close();
    }
  }
}

function describeRequestError(err: unknown, timeoutMs: number): string {
  if (err instanceof Error && (err.name === "TimeoutError" || err.name === "AbortError")) {
    return `timed out after ${timeoutMs}ms`;
  }
  return describeError(err);
}
