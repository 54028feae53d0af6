import type { AccumulatedRecord, CycleError } from "./metrics.js";

/** Outcome of one collection cycle */
export interface CycleReport {
  /** ISO 8601 timestamp */
  startedAt: string;
  /** ISO 8601 timestamp */
  finishedAt: string;
  /** Number of targets scraped */
  targets: number;
  records: AccumulatedRecord[];
  errors: CycleError[];
}
