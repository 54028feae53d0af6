/**
 * Metrics Module
 *
 * Runs collection cycles on a schedule and keeps the latest cycle in memory
 * for the API.
 */

export { ScrapeScheduler } from "./scrape-scheduler.js";
export type { ScrapeSchedulerOptions, Gatherer } from "./scrape-scheduler.js";
export { MemoryAccumulator } from "./memory-accumulator.js";
