/**
 * Scrape Scheduler — runs a collection cycle on a fixed interval and keeps the
 * latest CycleReport for the API.
 *
 * IMPORTANT: Like the scraper, this is independent of the web framework. It
 * receives its dependencies via constructor injection.
 */

import type { Accumulator, CycleReport } from "@scrapeline/shared";
import { MemoryAccumulator } from "./memory-accumulator.js";
import { describeError } from "../errors.js";
import { logger as defaultLogger, type Logger } from "../logger.js";

const DEFAULT_INTERVAL_MS = 10_000;

/** What the scheduler needs from a scraper */
export interface Gatherer {
  gather(acc: Accumulator): Promise<number>;
}

export interface ScrapeSchedulerOptions {
  /** Collection interval in ms (default: 10000 = 10s) */
  intervalMs?: number;
  logger?: Logger;
}

export class ScrapeScheduler {
  private scraper: Gatherer;
  private intervalMs: number;
  private log: Logger;
  private timer: ReturnType<typeof setInterval> | null = null;

  /** Cycle currently in flight, if any */
  private running: Promise<CycleReport> | null = null;

  private lastReport: CycleReport | null = null;

  constructor(scraper: Gatherer, options?: ScrapeSchedulerOptions) {
    this.scraper = scraper;
    this.intervalMs = options?.intervalMs ?? DEFAULT_INTERVAL_MS;
    this.log = options?.logger ?? defaultLogger;
  }

  /** Start the collection loop */
  start(): void {
    if (this.timer) return;
    this.timer = setInterval(() => this.tick(), this.intervalMs);
    // Run an initial collection immediately
    this.tick();
  }

  /** Stop the collection loop; a cycle in flight still completes */
  stop(): void {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
  }

  /** Whether the scheduler is running */
  get isRunning(): boolean {
    return this.timer !== null;
  }

  /** Report of the most recent completed cycle */
  getLastReport(): CycleReport | null {
    return this.lastReport;
  }

  /** Run a cycle now, or join the one already in flight */
  collectNow(): Promise<CycleReport> {
    if (!this.running) {
      this.running = this.collect().finally(() => {
        this.running = null;
      });
    }
    return this.running;
  }

  /** Wait for the cycle in flight, if any */
  async drain(): Promise<void> {
    if (this.running) await this.running;
  }

  // -----------------------------------------------------------------------
  // Internal
  // -----------------------------------------------------------------------

  private tick(): void {
    if (this.running) {
      this.log.debug("Previous collection cycle still running, skipping tick");
      return;
    }
    void this.collectNow();
  }

  /** Run a single collection cycle; never rejects */
  private async collect(): Promise<CycleReport> {
    const startedAt = new Date().toISOString();
    const acc = new MemoryAccumulator();
    let targets = 0;

    try {
      targets = await this.scraper.gather(acc);
    } catch (err) {
      this.log.error({ err: describeError(err) }, "Collection cycle failed");
      acc.addError(err);
    }

    const report: CycleReport = {
      startedAt,
      finishedAt: new Date().toISOString(),
      targets,
      records: acc.getRecords(),
      errors: acc.getErrors(),
    };

    for (const error of report.errors) {
      if (error.target) {
        this.log.warn({ target: error.target }, error.message);
      }
    }
    this.log.debug(
      { targets, records: report.records.length, errors: report.errors.length },
      "Collection cycle finished",
    );

    this.lastReport = report;
    return report;
  }
}
