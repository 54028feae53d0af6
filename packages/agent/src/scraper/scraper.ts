/**
 * Scraper — resolves targets, scrapes them all concurrently and routes every
 * parsed metric to an accumulator.
 *
 * A failing target is reported through `acc.addError` and never stops its
 * siblings; `gather` itself only rejects when the target list cannot be built
 * or the shared client cannot be configured.
 *
 * Optionally runs a discovery watcher in the background (start/stop) that
 * keeps the DynamicTargetSet current.
 */

import type { Accumulator, ParsedMetric, ScrapeTarget } from "@scrapeline/shared";
import { DynamicTargetSet } from "./dynamic-targets.js";
import { resolveTargets, type LookupHost } from "./target-resolver.js";
import { createHttpClient, type ClientConfig, type HttpClient } from "./transport.js";
import { scrapeTarget } from "./scrape-target.js";
import { normalizeTags } from "./tags.js";
import { TextParser, type ExpositionParser } from "../parser/text-parser.js";
import { describeError } from "../errors.js";
import { logger as defaultLogger, type Logger } from "../logger.js";

/** Keeps a DynamicTargetSet current until `signal` aborts */
export interface DiscoveryWatcher {
  run(signal: AbortSignal, targets: DynamicTargetSet): Promise<void>;
}

export interface ScraperOptions extends ClientConfig {
  /** Static URLs */
  urls?: string[];
  /** Service URLs expanded through DNS */
  services?: string[];
  /** Background discovery; discovery is disabled when absent */
  discovery?: DiscoveryWatcher;
  parser?: ExpositionParser;
  lookupHost?: LookupHost;
  logger?: Logger;
}

/** Deliver a metric to the sink matching its kind */
export function routeMetric(acc: Accumulator, metric: ParsedMetric): void {
  const { name, fields, tags, timestamp } = metric;
  switch (metric.kind) {
    case "counter":
      acc.addCounter(name, fields, tags, timestamp);
      return;
    case "gauge":
      acc.addGauge(name, fields, tags, timestamp);
      return;
    case "summary":
      acc.addSummary(name, fields, tags, timestamp);
      return;
    case "histogram":
      acc.addHistogram(name, fields, tags, timestamp);
      return;
    case "untyped":
      acc.addFields(name, fields, tags, timestamp);
      return;
    default: {
      // Exhaustive over MetricKind; a kind from outside it still reaches the generic sink
      const unknownKind: never = metric.kind;
      acc.addFields(name, fields, tags, timestamp);
      return unknownKind;
    }
  }
}

export class Scraper {
  private urls: string[];
  private services: string[];
  private clientConfig: ClientConfig;
  private parser: ExpositionParser;
  private lookupHost?: LookupHost;
  private discovery?: DiscoveryWatcher;
  private log: Logger;

  /** Built on the first gather and reused afterwards */
  private client: Promise<HttpClient> | null = null;

  /** Discovery-sourced targets, owned here and written only by the watcher */
  private dynamicTargets = new DynamicTargetSet();

  private abortController: AbortController | null = null;
  private watcherDone: Promise<void> | null = null;

  constructor(options: ScraperOptions) {
    this.urls = options.urls ?? [];
    this.services = options.services ?? [];
    this.clientConfig = {
      tls: options.tls,
      responseTimeoutMs: options.responseTimeoutMs,
      bearerTokenPath: options.bearerTokenPath,
    };
    this.parser = options.parser ?? new TextParser();
    this.lookupHost = options.lookupHost;
    this.discovery = options.discovery;
    this.log = options.logger ?? defaultLogger;
  }

  /** Whether the discovery watcher is running */
  get isDiscovering(): boolean {
    return this.abortController !== null;
  }

  /** Number of discovery-sourced targets right now */
  get discoveredTargets(): number {
    return this.dynamicTargets.size;
  }

  /** Resolve the full target list for one cycle */
  resolveTargets(): Promise<ScrapeTarget[]> {
    return resolveTargets({
      urls: this.urls,
      services: this.services,
      dynamicTargets: this.dynamicTargets,
      lookupHost: this.lookupHost,
      logger: this.log,
    });
  }

  /**
   * Run one collection cycle into `acc`. Resolves once every target has been
   * scraped; returns the number of targets.
   */
  async gather(acc: Accumulator): Promise<number> {
    const client = await this.getClient();
    const targets = await this.resolveTargets();

    const context = {
      client,
      parser: this.parser,
      bearerTokenPath: this.clientConfig.bearerTokenPath,
    };

    // Every task is started before any is awaited; none of them rejects
    const tasks = targets.map(async (target) => {
      try {
        const metrics = await scrapeTarget(target, context);
        for (const metric of metrics) {
          routeMetric(acc, normalizeTags(metric, target));
        }
      } catch (err) {
        acc.addError(err);
      }
    });

    await Promise.all(tasks);
    return targets.length;
  }

  /** Start background discovery, when configured */
  start(): void {
    if (!this.discovery || this.abortController) return;

    const controller = new AbortController();
    this.abortController = controller;
    this.watcherDone = this.discovery
      .run(controller.signal, this.dynamicTargets)
      .catch((err: unknown) => {
        this.log.error({ err: describeError(err) }, "Discovery watcher failed");
      });
    this.log.info("Target discovery started");
  }

  /** Stop background discovery and wait for the watcher to exit */
  async stop(): Promise<void> {
    const controller = this.abortController;
    if (!controller) return;

    controller.abort();
    await this.watcherDone;
    this.dynamicTargets.clear();
    this.abortController = null;
    this.watcherDone = null;
    this.log.info("Target discovery stopped");
  }

  /** Stop discovery and release the shared client */
  async close(): Promise<void> {
    await this.stop();
    const client = this.client;
    this.client = null;
    if (client) {
      await (await client).close();
    }
  }

  private getClient(): Promise<HttpClient> {
    if (!this.client) {
      const pending = createHttpClient(this.clientConfig);
      this.client = pending;
      // A failed build is not cached: the next cycle tries again
      pending.catch(() => {
        if (this.client === pending) this.client = null;
      });
    }
    return this.client;
  }
}
