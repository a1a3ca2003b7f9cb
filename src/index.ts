import { serve } from "@hono/node-server";
import { logger } from "./logger";
import { createApp } from "./app";
import { loadConfig, type AppConfig } from "./config";
import { startScheduler } from "./scheduler";

logger.info("═══════════════════════════════════════════════════");
logger.info("  Harvest Watch");
logger.info("═══════════════════════════════════════════════════");

let config: AppConfig;
try {
  config = loadConfig();
} catch (error) {
  logger.error("Failed to load configuration:", error);
  process.exit(1);
}

const app = createApp(config);
const port = config.env.port;

startScheduler(config);

serve({ fetch: app.fetch, port }, (info) => {
  logger.info(`✅ Harvest Watch started on http://localhost:${info.port}`);
  logger.info(`   Health:  http://localhost:${info.port}/health`);
  logger.info(`   Servers: http://localhost:${info.port}/api/servers`);
  logger.info("═══════════════════════════════════════════════════");
});
