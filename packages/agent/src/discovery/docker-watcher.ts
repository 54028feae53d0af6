/**
 * Docker discovery — finds scrape targets among running containers.
 *
 * A container opts in with labels:
 *  - prometheus.io/scrape=true   required
 *  - prometheus.io/scheme        default "http"
 *  - prometheus.io/port          default 9102
 *  - prometheus.io/path          default "/metrics"
 *
 * The watcher polls Docker until its signal aborts and replaces the whole
 * DynamicTargetSet after every successful poll.
 */

import Docker from "dockerode";
import { setTimeout as delay } from "node:timers/promises";
import type { ScrapeTarget } from "@scrapeline/shared";
import type { DynamicTargetSet } from "../scraper/dynamic-targets.js";
import type { DiscoveryWatcher } from "../scraper/scraper.js";
import { withoutReservedTags } from "../scraper/tags.js";
import { describeError } from "../errors.js";
import { logger as defaultLogger, type Logger } from "../logger.js";

const LABEL_PREFIX = "prometheus.io/";
const SCRAPE_LABEL = `${LABEL_PREFIX}scrape`;
const SCHEME_LABEL = `${LABEL_PREFIX}scheme`;
const PORT_LABEL = `${LABEL_PREFIX}port`;
const PATH_LABEL = `${LABEL_PREFIX}path`;

const DEFAULT_PORT = "9102";
const DEFAULT_INTERVAL_MS = 30_000;

/** The part of the Docker API discovery needs */
export interface ContainerSource {
  listContainers(options: {
    filters: Record<string, string[]>;
    abortSignal?: AbortSignal;
  }): Promise<Docker.ContainerInfo[]>;
}

export interface DockerTargetWatcherOptions {
  /** Docker daemon socket (default: /var/run/docker.sock) */
  socketPath?: string;
  /** Poll interval in ms (default: 30000) */
  intervalMs?: number;
  /** Override the Docker client (for testing) */
  docker?: ContainerSource;
  logger?: Logger;
}

/** First IP address among the container's networks */
function containerAddress(info: Docker.ContainerInfo): string | undefined {
  const networks = info.NetworkSettings?.Networks ?? {};
  for (const network of Object.values(networks)) {
    if (network.IPAddress) return network.IPAddress;
    if (network.GlobalIPv6Address) return network.GlobalIPv6Address;
  }
  return undefined;
}

/** Build the scrape target a labelled container announces, if it has an address */
export function containerTarget(info: Docker.ContainerInfo): ScrapeTarget | undefined {
  const address = containerAddress(info);
  if (!address) return undefined;

  const labels = info.Labels ?? {};
  const scheme = labels[SCHEME_LABEL] || "http";
  const port = labels[PORT_LABEL] || DEFAULT_PORT;
  const rawPath = labels[PATH_LABEL] || "/metrics";
  const path = rawPath.startsWith("/") ? rawPath : `/${rawPath}`;
  const host = address.includes(":") ? `[${address}]` : address;

  const url = new URL(`${scheme}://${host}:${port}${path}`);

  const tags: Record<string, string> = {};
  const name = info.Names?.[0]?.replace(/^\//, "");
  if (name) tags.container_name = name;
  if (info.Image) tags.container_image = info.Image;
  for (const [key, value] of Object.entries(labels)) {
    if (!key.startsWith(LABEL_PREFIX)) tags[key] = value;
  }

  return {
    originalUrl: url,
    url: new URL(url.href),
    address,
    tags: withoutReservedTags(tags),
    source: "discovered",
  };
}

export class DockerTargetWatcher implements DiscoveryWatcher {
  private docker: ContainerSource;
  private intervalMs: number;
  private log: Logger;

  constructor(options?: DockerTargetWatcherOptions) {
    this.docker =
      options?.docker ??
      new Docker({ socketPath: options?.socketPath || "/var/run/docker.sock" });
    this.intervalMs = options?.intervalMs ?? DEFAULT_INTERVAL_MS;
    this.log = options?.logger ?? defaultLogger;
  }

  async run(signal: AbortSignal, targets: DynamicTargetSet): Promise<void> {
    while (!signal.aborted) {
      await this.poll(signal, targets);
      try {
        await delay(this.intervalMs, undefined, { signal });
      } catch (err) {
        if (signal.aborted) return;
        throw err;
      }
    }
  }

  /** List labelled containers once and replace the target set */
  async poll(signal: AbortSignal, targets: DynamicTargetSet): Promise<void> {
    let containers: Docker.ContainerInfo[];
    try {
      containers = await this.docker.listContainers({
        filters: { label: [`${SCRAPE_LABEL}=true`], status: ["running"] },
        abortSignal: signal,
      });
    } catch (err) {
      if (signal.aborted) return;
      // Docker may be temporarily unreachable; keep the previous targets
      this.log.warn({ err: describeError(err) }, "Could not list containers for discovery");
      return;
    }
    if (signal.aborted) return;

    const next = new Map<string, ScrapeTarget>();
    for (const info of containers) {
      try {
        const target = containerTarget(info);
        if (target) next.set(info.Id, target);
      } catch (err) {
        this.log.warn(
          { container: info.Id, err: describeError(err) },
          `Invalid scrape labels on container ${info.Id.slice(0, 12)}, skipping it`,
        );
      }
    }

    targets.replaceAll(next);
    this.log.debug({ targets: next.size }, "Discovered container targets");
  }
}
