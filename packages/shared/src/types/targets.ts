/**
 * Scrape target shapes shared by the resolver, the discovery watcher and the
 * targets API.
 */

/** Where a target came from */
export type TargetSource = "static" | "service" | "discovered";

/** Tag names the scraper sets itself */
export const RESERVED_TAGS = ["url", "address"] as const;

export type ReservedTag = (typeof RESERVED_TAGS)[number];

/** One endpoint to scrape during a collection cycle */
export interface ScrapeTarget {
  /** URL as configured or announced; used for the `url` tag */
  originalUrl: URL;
  /** URL actually dialled (a resolved address may replace the host) */
  url: URL;
  /** Resolved address, set for service and discovered targets */
  address?: string;
  /** Extra tags overlaid on every metric of this target */
  tags: Record<string, string>;
  source: TargetSource;
}

/** JSON-safe view of a target, as served by `GET /api/targets` */
export interface TargetSummary {
  url: string;
  address?: string;
  tags: Record<string, string>;
  source: TargetSource;
}
