/**
 * Agent configuration.
 *
 * Read from environment variables and validated against a TypeBox schema, so
 * the agent refuses to start with a value it cannot use.
 */

import { Type, type Static } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";
import { ConfigurationError } from "./errors.js";

// ---------------------------------------------------------------------------
// Schema
// ---------------------------------------------------------------------------

const LogLevel = Type.Union([
  Type.Literal("fatal"),
  Type.Literal("error"),
  Type.Literal("warn"),
  Type.Literal("info"),
  Type.Literal("debug"),
  Type.Literal("trace"),
  Type.Literal("silent"),
]);

export const TlsConfigSchema = Type.Object({
  caPath: Type.Optional(Type.String({ minLength: 1 })),
  certPath: Type.Optional(Type.String({ minLength: 1 })),
  keyPath: Type.Optional(Type.String({ minLength: 1 })),
  insecureSkipVerify: Type.Boolean(),
});

export type TlsConfig = Static<typeof TlsConfigSchema>;

export const AgentConfigSchema = Type.Object({
  /** Static URLs to scrape */
  urls: Type.Array(Type.String({ minLength: 1 })),
  /** Service URLs whose hostname is expanded through DNS */
  services: Type.Array(Type.String({ minLength: 1 })),
  /** Discover targets from labelled Docker containers */
  monitorContainers: Type.Boolean(),
  bearerTokenPath: Type.Optional(Type.String({ minLength: 1 })),
  responseTimeoutMs: Type.Integer({ minimum: 1 }),
  /** Scheduler interval between collection cycles */
  intervalMs: Type.Integer({ minimum: 100 }),
  tls: TlsConfigSchema,
  discovery: Type.Object({
    dockerSocketPath: Type.String({ minLength: 1 }),
    intervalMs: Type.Integer({ minimum: 100 }),
  }),
  server: Type.Object({
    port: Type.Integer({ minimum: 0, maximum: 65535 }),
    host: Type.String({ minLength: 1 }),
  }),
  logLevel: LogLevel,
});

export type AgentConfig = Static<typeof AgentConfigSchema>;

// ---------------------------------------------------------------------------
// Defaults
// ---------------------------------------------------------------------------

export const DEFAULT_RESPONSE_TIMEOUT_MS = 3_000;
export const DEFAULT_INTERVAL_MS = 10_000;
export const DEFAULT_DISCOVERY_INTERVAL_MS = 30_000;
export const DEFAULT_DOCKER_SOCKET = "/var/run/docker.sock";

/** Schema path → environment variable, for error messages */
const ENV_NAMES: Record<string, string> = {
  "/urls": "SCRAPE_URLS",
  "/services": "SCRAPE_SERVICES",
  "/monitorContainers": "SCRAPE_MONITOR_CONTAINERS",
  "/bearerTokenPath": "SCRAPE_BEARER_TOKEN_FILE",
  "/responseTimeoutMs": "SCRAPE_RESPONSE_TIMEOUT_MS",
  "/intervalMs": "SCRAPE_INTERVAL_MS",
  "/tls/caPath": "SCRAPE_TLS_CA",
  "/tls/certPath": "SCRAPE_TLS_CERT",
  "/tls/keyPath": "SCRAPE_TLS_KEY",
  "/tls/insecureSkipVerify": "SCRAPE_TLS_INSECURE_SKIP_VERIFY",
  "/discovery/dockerSocketPath": "DOCKER_SOCKET_PATH",
  "/discovery/intervalMs": "DISCOVERY_INTERVAL_MS",
  "/server/port": "PORT",
  "/server/host": "HOST",
  "/logLevel": "LOG_LEVEL",
};

// ---------------------------------------------------------------------------
// Loading
// ---------------------------------------------------------------------------

type Env = Record<string, string | undefined>;

/** Read a variable, treating empty strings as unset */
function read(env: Env, name: string): string | undefined {
  const value = env[name]?.trim();
  return value ? value : undefined;
}

function readList(env: Env, name: string): string[] {
  const value = read(env, name);
  if (!value) return [];
  return value
    .split(",")
    .map((s) => s.trim())
    .filter(Boolean);
}

/** Numbers and booleans that do not parse are left as strings for the schema to reject */
function readNumber(env: Env, name: string, fallback: number): number | string {
  const value = read(env, name);
  if (value === undefined) return fallback;
  const n = Number(value);
  return Number.isNaN(n) ? value : n;
}

function readBoolean(env: Env, name: string, fallback: boolean): boolean | string {
  const value = read(env, name);
  if (value === undefined) return fallback;
  switch (value.toLowerCase()) {
    case "true":
    case "1":
      return true;
    case "false":
    case "0":
      return false;
    default:
      return value;
  }
}

/**
 * Build the agent configuration from environment variables.
 * Throws a ConfigurationError naming every invalid variable.
 */
export function loadConfig(env: Env = process.env): AgentConfig {
  const raw = {
    urls: readList(env, "SCRAPE_URLS"),
    services: readList(env, "SCRAPE_SERVICES"),
    monitorContainers: readBoolean(env, "SCRAPE_MONITOR_CONTAINERS", false),
    bearerTokenPath: read(env, "SCRAPE_BEARER_TOKEN_FILE"),
    responseTimeoutMs: readNumber(env, "SCRAPE_RESPONSE_TIMEOUT_MS", DEFAULT_RESPONSE_TIMEOUT_MS),
    intervalMs: readNumber(env, "SCRAPE_INTERVAL_MS", DEFAULT_INTERVAL_MS),
    tls: {
      caPath: read(env, "SCRAPE_TLS_CA"),
      certPath: read(env, "SCRAPE_TLS_CERT"),
      keyPath: read(env, "SCRAPE_TLS_KEY"),
      insecureSkipVerify: readBoolean(env, "SCRAPE_TLS_INSECURE_SKIP_VERIFY", false),
    },
    discovery: {
      dockerSocketPath: read(env, "DOCKER_SOCKET_PATH") ?? DEFAULT_DOCKER_SOCKET,
      intervalMs: readNumber(env, "DISCOVERY_INTERVAL_MS", DEFAULT_DISCOVERY_INTERVAL_MS),
    },
    server: {
      port: readNumber(env, "PORT", 3000),
      host: read(env, "HOST") ?? "0.0.0.0",
    },
    logLevel: read(env, "LOG_LEVEL") ?? "info",
  };

  if (Value.Check(AgentConfigSchema, raw)) {
    return raw;
  }

  const problems = [...Value.Errors(AgentConfigSchema, raw)].map((e) => {
    const name = ENV_NAMES[e.path] ?? e.path;
    return `${name}: ${e.message}`;
  });
  throw new ConfigurationError(`Invalid configuration: ${problems.join("; ")}`);
}
