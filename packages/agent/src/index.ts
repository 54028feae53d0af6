import { buildApp } from "./app.js";
import { loadConfig, type AgentConfig } from "./config.js";
import { logger } from "./logger.js";

let config: AgentConfig;
try {
  config = loadConfig();
} catch (err) {
  logger.fatal(err);
  process.exit(1);
}
logger.level = config.logLevel;

const app = await buildApp({ config });

// Stop scraping cleanly on shutdown
for (const signal of ["SIGINT", "SIGTERM"] as const) {
  process.once(signal, () => {
    app.log.info(`Received ${signal}, shutting down`);
    app.close().then(
      () => process.exit(0),
      (err: unknown) => {
        app.log.error(err);
        process.exit(1);
      },
    );
  });
}

// Start
const { port, host } = config.server;

try {
  await app.listen({ port, host });
  app.log.info(`Scrape agent listening on ${host}:${port}`);
} catch (err) {
  app.log.error(err);
  process.exit(1);
}
