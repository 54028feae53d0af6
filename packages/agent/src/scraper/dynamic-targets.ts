/**
 * DynamicTargetSet — the discovery-sourced targets of the current moment.
 *
 * Written by a discovery watcher, read by the target resolver. Every method
 * runs to completion without yielding to the event loop, so a reader never
 * observes a half-applied update and no lock is held across network I/O.
 */

import type { ScrapeTarget } from "@scrapeline/shared";

export class DynamicTargetSet {
  /** Targets keyed by their source id (e.g. container id) */
  private targets = new Map<string, ScrapeTarget>();

  /** Point-in-time copy of every known target */
  snapshot(): ScrapeTarget[] {
    return Array.from(this.targets.values(), cloneTarget);
  }

  /** Add or update one target */
  set(id: string, target: ScrapeTarget): void {
    this.targets.set(id, target);
  }

  /** Remove one target; returns whether it was known */
  delete(id: string): boolean {
    return this.targets.delete(id);
  }

  /** Swap the whole set for a freshly discovered one */
  replaceAll(next: Map<string, ScrapeTarget>): void {
    this.targets = new Map(next);
  }

  clear(): void {
    this.targets.clear();
  }

  get size(): number {
    return this.targets.size;
  }
}

/** Copy a target so callers may not reach back into the set */
export function cloneTarget(target: ScrapeTarget): ScrapeTarget {
  return {
    originalUrl: new URL(target.originalUrl.href),
    url: new URL(target.url.href),
    address: target.address,
    tags: { ...target.tags },
    source: target.source,
  };
}
