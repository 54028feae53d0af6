import { describe, it, expect, vi, afterEach } from "vitest";
import type { Accumulator } from "@scrapeline/shared";
import { ScrapeScheduler, type Gatherer } from "./index.js";
import { ResolutionError, ScrapeError } from "../errors.js";
import type { Logger } from "../logger.js";
import { waitFor } from "../test/metrics-server.js";

// ---------------------------------------------------------------------------
// Mock factories
// ---------------------------------------------------------------------------

const TS = new Date("2026-01-01T00:00:00Z");

function createMockLogger() {
  const warn = vi.fn();
  const error = vi.fn();
  const logger = { debug: vi.fn(), info: vi.fn(), warn, error } as unknown as Logger;
  return { logger, warn, error };
}

/** A gatherer that reports one gauge and one failing target per cycle */
function createMockGatherer() {
  return {
    gather: vi.fn(async (acc: Accumulator) => {
      acc.addGauge("up", { gauge: 1 }, { url: "http://a:9100/metrics" }, TS);
      acc.addError(
        new ScrapeError(
          "http://b:9100/metrics",
          "http://b:9100/metrics returned HTTP status 503 Service Unavailable",
        ),
      );
      return 2;
    }),
  } satisfies Gatherer;
}

/** A gatherer whose cycles stay in flight until released */
function createBlockingGatherer() {
  const releases: (() => void)[] = [];
  const gatherer = {
    gather: vi.fn(
      () =>
        new Promise<number>((resolve) => {
          releases.push(() => resolve(0));
        }),
    ),
  } satisfies Gatherer;
  return { gatherer, release: () => releases.shift()?.() };
}

let scheduler: ScrapeScheduler | undefined;

afterEach(() => {
  scheduler?.stop();
  scheduler = undefined;
});

// ---------------------------------------------------------------------------
// Tests
// ---------------------------------------------------------------------------

describe("ScrapeScheduler", () => {
  it("has no report before the first cycle", () => {
    scheduler = new ScrapeScheduler(createMockGatherer(), { logger: createMockLogger().logger });
    expect(scheduler.getLastReport()).toBeNull();
    expect(scheduler.isRunning).toBe(false);
  });

  it("collects immediately on start and on every interval", async () => {
    const gatherer = createMockGatherer();
    scheduler = new ScrapeScheduler(gatherer, {
      intervalMs: 50,
      logger: createMockLogger().logger,
    });

    scheduler.start();
    expect(scheduler.isRunning).toBe(true);
    expect(gatherer.gather).toHaveBeenCalledTimes(1);

    await waitFor(() => expect(gatherer.gather).toHaveBeenCalledTimes(3));
  });

  it("does not start twice", () => {
    const gatherer = createMockGatherer();
    scheduler = new ScrapeScheduler(gatherer, {
      intervalMs: 60_000,
      logger: createMockLogger().logger,
    });

    scheduler.start();
    scheduler.start();

    expect(gatherer.gather).toHaveBeenCalledTimes(1);
  });

  it("stops scheduling new cycles", async () => {
    const gatherer = createMockGatherer();
    scheduler = new ScrapeScheduler(gatherer, {
      intervalMs: 30,
      logger: createMockLogger().logger,
    });

    scheduler.start();
    scheduler.stop();
    await new Promise((r) => setTimeout(r, 100));

    expect(scheduler.isRunning).toBe(false);
    expect(gatherer.gather).toHaveBeenCalledTimes(1);
  });

  it("keeps the records and errors of the latest cycle", async () => {
    const { logger, warn } = createMockLogger();
    scheduler = new ScrapeScheduler(createMockGatherer(), { logger });

    const report = await scheduler.collectNow();

    expect(report.targets).toBe(2);
    expect(report.records).toEqual([
      {
        kind: "gauge",
        name: "up",
        fields: { gauge: 1 },
        tags: { url: "http://a:9100/metrics" },
        timestamp: TS,
      },
    ]);
    expect(report.errors).toEqual([
      {
        target: "http://b:9100/metrics",
        message: "http://b:9100/metrics returned HTTP status 503 Service Unavailable",
      },
    ]);
    expect(scheduler.getLastReport()).toBe(report);
    expect(warn).toHaveBeenCalledWith(
      { target: "http://b:9100/metrics" },
      "http://b:9100/metrics returned HTTP status 503 Service Unavailable",
    );
  });

  it("records a failed cycle instead of rejecting", async () => {
    const { logger, error } = createMockLogger();
    const gatherer: Gatherer = {
      gather: vi.fn().mockRejectedValue(new ResolutionError("Could not parse service URL ::bad")),
    };
    scheduler = new ScrapeScheduler(gatherer, { logger });

    const report = await scheduler.collectNow();

    expect(report.targets).toBe(0);
    expect(report.records).toEqual([]);
    expect(report.errors).toEqual([{ message: "Could not parse service URL ::bad" }]);
    expect(error).toHaveBeenCalledWith(
      { err: "Could not parse service URL ::bad" },
      "Collection cycle failed",
    );
  });

  it("joins the cycle already in flight", async () => {
    const { gatherer, release } = createBlockingGatherer();
    scheduler = new ScrapeScheduler(gatherer, { logger: createMockLogger().logger });

    const first = scheduler.collectNow();
    const second = scheduler.collectNow();
    release();

    expect(await first).toBe(await second);
    expect(gatherer.gather).toHaveBeenCalledTimes(1);
  });

  it("skips ticks while a cycle is still running", async () => {
    const { gatherer, release } = createBlockingGatherer();
    scheduler = new ScrapeScheduler(gatherer, {
      intervalMs: 20,
      logger: createMockLogger().logger,
    });

    scheduler.start();
    await new Promise((r) => setTimeout(r, 100));
    expect(gatherer.gather).toHaveBeenCalledTimes(1);

    release();
    await waitFor(() => expect(gatherer.gather).toHaveBeenCalledTimes(2));
    scheduler.stop();
    release();
    await scheduler.drain();
  });

  it("drain waits for the cycle in flight", async () => {
    const { gatherer, release } = createBlockingGatherer();
    scheduler = new ScrapeScheduler(gatherer, { logger: createMockLogger().logger });

    void scheduler.collectNow();
    let drained = false;
    const draining = scheduler.drain().then(() => {
      drained = true;
    });
    await new Promise((r) => setTimeout(r, 20));
    expect(drained).toBe(false);

    release();
    await draining;
    expect(drained).toBe(true);
    expect(scheduler.getLastReport()?.targets).toBe(0);
  });

  it("drain resolves immediately when idle", async () => {
    scheduler = new ScrapeScheduler(createMockGatherer(), { logger: createMockLogger().logger });
    await expect(scheduler.drain()).resolves.toBeUndefined();
  });
});
