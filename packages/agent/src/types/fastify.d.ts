import "fastify";
import type { Scraper } from "../scraper/scraper.js";
import type { ScrapeScheduler } from "../metrics/scrape-scheduler.js";

declare module "fastify" {
  interface FastifyInstance {
    scraper: Scraper;
    scheduler: ScrapeScheduler;
  }
}
