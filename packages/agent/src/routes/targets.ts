/**
 * Targets API — the target list the next collection cycle would scrape.
 */

import type { FastifyPluginAsync } from "fastify";
import type { ScrapeTarget, TargetSummary } from "@scrapeline/shared";
import { stripCredentials } from "../scraper/tags.js";

export function summarizeTarget(target: ScrapeTarget): TargetSummary {
  const summary: TargetSummary = {
    url: stripCredentials(target.url).toString(),
    tags: { ...target.tags },
    source: target.source,
  };
  if (target.address) summary.address = target.address;
  return summary;
}

export const targetRoutes: FastifyPluginAsync = async (app) => {
  // -------------------------------------------------------------------------
  // GET /api/targets
  // -------------------------------------------------------------------------
  app.get("/", async (_request, reply) => {
    const targets = await app.scraper.resolveTargets();
    return reply.send({ targets: targets.map(summarizeTarget) });
  });
};
