export { METRIC_KINDS } from "./types/metrics.js";
export type {
  MetricKind,
  ParsedMetric,
  RecordKind,
  AccumulatedRecord,
  CycleError,
  Accumulator,
} from "./types/metrics.js";

export { RESERVED_TAGS } from "./types/targets.js";
export type {
  TargetSource,
  ReservedTag,
  ScrapeTarget,
  TargetSummary,
} from "./types/targets.js";

export type { CycleReport } from "./types/cycle.js";
