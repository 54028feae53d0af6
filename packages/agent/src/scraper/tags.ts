/**
 * Tag handling for scraped metrics.
 */

import {
  RESERVED_TAGS,
  type ParsedMetric,
  type ReservedTag,
  type ScrapeTarget,
} from "@scrapeline/shared";

const reserved = new Set<string>(RESERVED_TAGS);

/** Whether the scraper sets this tag key itself */
export function isReservedTag(key: string): key is ReservedTag {
  return reserved.has(key);
}

/** Copy of `url` without its username and password */
export function stripCredentials(url: URL): URL {
  const copy = new URL(url.href);
  copy.username = "";
  copy.password = "";
  return copy;
}

/** Drop tag keys the scraper sets itself, so the scraper's values win */
export function withoutReservedTags(tags: Record<string, string>): Record<string, string> {
  const result: Record<string, string> = {};
  for (const [key, value] of Object.entries(tags)) {
    if (!isReservedTag(key)) result[key] = value;
  }
  return result;
}

/**
 * Stamp a metric with its target's identity, in place:
 * `url` (credentials stripped), then `address`, then the target's own tags.
 */
export function normalizeTags(metric: ParsedMetric, target: ScrapeTarget): ParsedMetric {
  const tags = metric.tags;
  tags.url = stripCredentials(target.originalUrl).toString();
  if (target.address) {
    tags.address = target.address;
  }
  for (const [key, value] of Object.entries(target.tags)) {
    tags[key] = value;
  }
  return metric;
}
