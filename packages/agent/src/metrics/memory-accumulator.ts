/**
 * MemoryAccumulator — records one collection cycle in memory, in arrival order.
 */

import type {
  Accumulator,
  AccumulatedRecord,
  CycleError,
  RecordKind,
} from "@scrapeline/shared";
import { ScrapeError, describeError } from "../errors.js";

export class MemoryAccumulator implements Accumulator {
  private records: AccumulatedRecord[] = [];
  private errors: CycleError[] = [];

  addCounter(name: string, fields: Record<string, number>, tags: Record<string, string>, timestamp: Date): void {
    this.add("counter", name, fields, tags, timestamp);
  }

  addGauge(name: string, fields: Record<string, number>, tags: Record<string, string>, timestamp: Date): void {
    this.add("gauge", name, fields, tags, timestamp);
  }

  addSummary(name: string, fields: Record<string, number>, tags: Record<string, string>, timestamp: Date): void {
    this.add("summary", name, fields, tags, timestamp);
  }

  addHistogram(name: string, fields: Record<string, number>, tags: Record<string, string>, timestamp: Date): void {
    this.add("histogram", name, fields, tags, timestamp);
  }

  addFields(name: string, fields: Record<string, number>, tags: Record<string, string>, timestamp: Date): void {
    this.add("fields", name, fields, tags, timestamp);
  }

  addError(error: unknown): void {
    this.errors.push(
      error instanceof ScrapeError
        ? { target: error.target, message: error.message }
        : { message: describeError(error) },
    );
  }

  getRecords(): AccumulatedRecord[] {
    return this.records.map((r) => ({ ...r, fields: { ...r.fields }, tags: { ...r.tags } }));
  }

  getErrors(): CycleError[] {
    return this.errors.map((e) => ({ ...e }));
  }

  private add(
    kind: RecordKind,
    name: string,
    fields: Record<string, number>,
    tags: Record<string, string>,
    timestamp: Date,
  ): void {
    this.records.push({ kind, name, fields: { ...fields }, tags: { ...tags }, timestamp });
  }
}
