import Fastify, { type FastifyServerOptions, type FastifyError } from "fastify";

import { loadConfig, type AgentConfig } from "./config.js";
import { Scraper } from "./scraper/scraper.js";
import { DockerTargetWatcher } from "./discovery/docker-watcher.js";
import { ScrapeScheduler } from "./metrics/index.js";
import { healthRoutes } from "./routes/health.js";
import { targetRoutes } from "./routes/targets.js";
import { metricsRoutes } from "./routes/metrics.js";
import { logger } from "./logger.js";

const isDev = process.env.NODE_ENV !== "production";

export interface BuildAppOptions extends FastifyServerOptions {
  /** Agent configuration (default: read from the environment) */
  config?: AgentConfig;
  /** Override the scraper instance (for testing) */
  scraper?: Scraper;
  /** Override the scheduler instance (for testing) */
  scheduler?: ScrapeScheduler;
}

/** Build the scraper described by a configuration */
export function createScraper(config: AgentConfig): Scraper {
  const log = logger.child({ module: "scraper" });
  const discovery = config.monitorContainers
    ? new DockerTargetWatcher({
        socketPath: config.discovery.dockerSocketPath,
        intervalMs: config.discovery.intervalMs,
        logger: log.child({ module: "discovery" }),
      })
    : undefined;

  return new Scraper({
    urls: config.urls,
    services: config.services,
    bearerTokenPath: config.bearerTokenPath,
    responseTimeoutMs: config.responseTimeoutMs,
    tls: config.tls,
    discovery,
    logger: log,
  });
}

/**
 * Build and configure the Fastify application.
 * Exported separately from the server start so tests can use `app.inject()`.
 */
export async function buildApp(opts?: BuildAppOptions) {
  const {
    config: customConfig,
    scraper: customScraper,
    scheduler: customScheduler,
    ...fastifyOpts
  } = opts ?? {};
  const config = customConfig ?? loadConfig();

  const app = Fastify(
    Object.keys(fastifyOpts).length > 0
      ? fastifyOpts
      : {
          logger: isDev
            ? {
                level: config.logLevel,
                transport: {
                  target: "pino-pretty",
                  options: { colorize: true },
                },
              }
            : {
                level: config.logLevel,
                redact: ["req.headers.authorization"],
              },
        },
  );

  // Scraper + Scheduler (decorated so routes can access them)
  const scraper = customScraper ?? createScraper(config);
  const scheduler =
    customScheduler ??
    new ScrapeScheduler(scraper, {
      intervalMs: config.intervalMs,
      logger: logger.child({ module: "scheduler" }),
    });
  app.decorate("scraper", scraper);
  app.decorate("scheduler", scheduler);

  // ---------------------------------------------------------------------------
  // Global error handler — normalise error responses
  // ---------------------------------------------------------------------------
  app.setErrorHandler((error: FastifyError, request, reply) => {
    // Validation errors from Typebox schemas (Fastify AJV)
    if (error.validation) {
      const details = error.validation.map((v) => ({
        field: v.instancePath || "query",
        message: v.message ?? "Invalid value",
      }));
      reply.status(400).send({ error: "Validation failed", details });
      return;
    }

    // Known HTTP errors (4xx)
    if (error.statusCode && error.statusCode < 500) {
      reply.status(error.statusCode).send({
        error: error.message,
      });
      return;
    }

    // Unexpected errors (including target resolution failures)
    request.log.error(error);
    reply.status(error.statusCode ?? 500).send({
      error: error.message,
    });
  });

  // ---------------------------------------------------------------------------
  // API routes
  // ---------------------------------------------------------------------------
  await app.register(healthRoutes, { prefix: "/api/health" });
  await app.register(targetRoutes, { prefix: "/api/targets" });
  await app.register(metricsRoutes, { prefix: "/api/metrics" });

  // ---------------------------------------------------------------------------
  // Lifecycle hooks
  // ---------------------------------------------------------------------------

  // Start discovery and scheduled collection when the server is ready
  app.addHook("onReady", async () => {
    scraper.start();
    scheduler.start();
  });

  // Stop collection, wait for the cycle in flight, then stop discovery
  app.addHook("onClose", async () => {
    scheduler.stop();
    await scheduler.drain();
    await scraper.close();
  });

  return app;
}
