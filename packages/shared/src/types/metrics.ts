/**
 * Types for parsed exposition samples and the records an accumulator keeps.
 *
 * These describe the shapes produced by the exposition parser, routed by the
 * scraper, and returned by the metrics API endpoints.
 */

// ---------------------------------------------------------------------------
// Parsed metrics
// ---------------------------------------------------------------------------

/** Metric kinds declared by a `# TYPE` line (untyped when none is declared) */
export type MetricKind = "counter" | "gauge" | "summary" | "histogram" | "untyped";

export const METRIC_KINDS: readonly MetricKind[] = [
  "counter",
  "gauge",
  "summary",
  "histogram",
  "untyped",
];

/** One typed metric as produced by the exposition parser */
export interface ParsedMetric {
  name: string;
  kind: MetricKind;
  /** Numeric fields, e.g. `{ counter: 42 }` or `{ count, sum, "0.5": ... }` */
  fields: Record<string, number>;
  tags: Record<string, string>;
  timestamp: Date;
}

// ---------------------------------------------------------------------------
// Accumulated records
// ---------------------------------------------------------------------------

/** Sink a record was delivered to; "fields" is the generic (untyped) sink */
export type RecordKind = Exclude<MetricKind, "untyped"> | "fields";

export interface AccumulatedRecord {
  kind: RecordKind;
  name: string;
  fields: Record<string, number>;
  tags: Record<string, string>;
  timestamp: Date;
}

/** An error reported for one target (or for the whole cycle) */
export interface CycleError {
  /** Target URL with credentials stripped, absent for cycle-level failures */
  target?: string;
  message: string;
}

/**
 * Receives the typed records of a collection cycle.
 * All methods may be called concurrently from every scrape task.
 */
export interface Accumulator {
  addCounter(name: string, fields: Record<string, number>, tags: Record<string, string>, timestamp: Date): void;
  addGauge(name: string, fields: Record<string, number>, tags: Record<string, string>, timestamp: Date): void;
  addSummary(name: string, fields: Record<string, number>, tags: Record<string, string>, timestamp: Date): void;
  addHistogram(name: string, fields: Record<string, number>, tags: Record<string, string>, timestamp: Date): void;
  addFields(name: string, fields: Record<string, number>, tags: Record<string, string>, timestamp: Date): void;
  addError(error: unknown): void;
}
