/**
 * Metrics API routes — the latest collection cycle, and on-demand collection.
 */

import type { FastifyPluginAsync } from "fastify";
import { MetricsQuery } from "./metrics.schemas.js";

export const metricsRoutes: FastifyPluginAsync = async (app) => {
  // -------------------------------------------------------------------------
  // GET /api/metrics?kind=counter
  // -------------------------------------------------------------------------
  app.get<{ Querystring: MetricsQuery }>(
    "/",
    { schema: { querystring: MetricsQuery } },
    async (request, reply) => {
      const report = app.scheduler.getLastReport();
      if (!report) {
        return reply.status(404).send({ error: "No collection cycle has run yet" });
      }

      const { kind } = request.query;
      const records = kind ? report.records.filter((r) => r.kind === kind) : report.records;
      return reply.send({ ...report, records });
    },
  );

  // -------------------------------------------------------------------------
  // POST /api/metrics/collect
  // -------------------------------------------------------------------------
  app.post("/collect", async (_request, reply) => {
    const report = await app.scheduler.collectNow();
    return reply.send(report);
  });
};
