import type { FastifyPluginAsync } from "fastify";

export const healthRoutes: FastifyPluginAsync = async (app) => {
  app.get("/", async (_request, reply) => {
    const payload = {
      status: "ok",
      scheduler: app.scheduler.isRunning,
      discovery: app.scraper.isDiscovering,
      timestamp: new Date().toISOString(),
    };

    return reply.send(payload);
  });
};
