/**
 * Scraper Module
 *
 * Resolves scrape targets, scrapes them concurrently and routes the parsed
 * metrics to an accumulator.
 *
 * IMPORTANT: This module must NOT import from or depend on the web framework
 * (Fastify, routes, plugins). The API reads it; it never calls back into the
 * API.
 */

export { Scraper, routeMetric } from "./scraper.js";
export type { ScraperOptions, DiscoveryWatcher } from "./scraper.js";
export { DynamicTargetSet } from "./dynamic-targets.js";
export { resolveTargets, addressToUrl, lookupHost } from "./target-resolver.js";
export type { LookupHost, ResolveTargetsOptions } from "./target-resolver.js";
export { createHttpClient, buildTlsOptions, HttpClient } from "./transport.js";
export type { ClientConfig, TlsConnectOptions } from "./transport.js";
export { scrapeTarget, planRequest, ACCEPT_HEADER, DEFAULT_METRICS_PATH } from "./scrape-target.js";
export { normalizeTags, stripCredentials, isReservedTag } from "./tags.js";
export { TextParser } from "../parser/text-parser.js";
export type { ExpositionParser } from "../parser/text-parser.js";
export { DockerTargetWatcher, containerTarget } from "../discovery/docker-watcher.js";
export { MemoryAccumulator } from "../metrics/memory-accumulator.js";
