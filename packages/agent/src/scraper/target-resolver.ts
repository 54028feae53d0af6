/**
 * Target Resolver — builds the target list for one collection cycle.
 *
 * Merges three sources:
 *  - static URLs (unparsable ones are logged and skipped)
 *  - service URLs, one target per address their hostname resolves to
 *  - a snapshot of the discovery-sourced DynamicTargetSet
 *
 * Targets are not de-duplicated: a URL listed both statically and by
 * discovery is scraped twice, once per source.
 */

import { lookup } from "node:dns/promises";
import type { ScrapeTarget } from "@scrapeline/shared";
import type { DynamicTargetSet } from "./dynamic-targets.js";
import { ResolutionError, describeError } from "../errors.js";
import { logger as defaultLogger, type Logger } from "../logger.js";

/** Resolve a hostname to every address it has */
export type LookupHost = (hostname: string) => Promise<string[]>;

export const lookupHost: LookupHost = async (hostname) => {
  const results = await lookup(hostname, { all: true });
  return results.map((r) => r.address);
};

export interface ResolveTargetsOptions {
  urls: readonly string[];
  services: readonly string[];
  dynamicTargets?: DynamicTargetSet;
  lookupHost?: LookupHost;
  logger?: Logger;
}

/** Substitute `address` for the URL's host, keeping scheme, credentials, port, path and query */
export function addressToUrl(url: URL, address: string): URL {
  const copy = new URL(url.href);
  copy.hostname = address.includes(":") ? `[${address}]` : address;
  return copy;
}

/** Hostname without the brackets an IPv6 literal carries in a URL */
function bareHostname(url: URL): string {
  return url.hostname.replace(/^\[(.*)\]$/, "$1");
}

export async function resolveTargets(options: ResolveTargetsOptions): Promise<ScrapeTarget[]> {
  const log = options.logger ?? defaultLogger;
  const resolve = options.lookupHost ?? lookupHost;
  const targets: ScrapeTarget[] = [];

  // 1. Static URLs
  for (const raw of options.urls) {
    let url: URL;
    try {
      url = new URL(raw);
    } catch (err) {
      log.warn({ url: raw, err: describeError(err) }, `Could not parse ${raw}, skipping it`);
      continue;
    }
    targets.push({ originalUrl: url, url: new URL(url.href), tags: {}, source: "static" });
  }

  // 2. Discovered targets, copied before any network call
  if (options.dynamicTargets) {
    targets.push(...options.dynamicTargets.snapshot());
  }

  // 3. Service URLs (a malformed one fails the whole resolution)
  const services = options.services.map((raw) => {
    try {
      return new URL(raw);
    } catch (err) {
      throw new ResolutionError(`Could not parse service URL ${raw}`, { cause: err });
    }
  });

  const expanded = await Promise.all(
    services.map(async (service): Promise<ScrapeTarget[]> => {
      let addresses: string[];
      try {
        addresses = await resolve(bareHostname(service));
      } catch (err) {
        log.warn(
          { service: service.host, err: describeError(err) },
          `Could not resolve ${service.host}, skipping it`,
        );
        return [];
      }
      return addresses.map((address): ScrapeTarget => ({
        originalUrl: service,
        url: addressToUrl(service, address),
        address,
        tags: {},
        source: "service",
      }));
    }),
  );

  for (const group of expanded) {
    targets.push(...group);
  }

  return targets;
}
