import "dotenv/config";
import { loadConfig } from "./config/index.js";
import { buildApp } from "./app.js";
import { createLogger } from "./lib/logger.js";
import { VERSION } from "./version.js";

async function main() {
  // 1. Load config
  const cfg = loadConfig();
  const logger = createLogger(cfg.log_level);
  logger.info(`Starting file store v${VERSION}`);
  logger.info(`Storage directory: ${cfg.storage.root}`);

  // 2. Build the app (opens the storage root)
  const { app } = await buildApp(cfg, { logger });

  // 3. Start server
  const server = app.listen(cfg.server.port, cfg.server.host, () => {
    logger.info(`Listening on ${cfg.server.host}:${cfg.server.port}`);
  });

  const shutdown = () => {
    logger.info("Shutting down");
    server.close(() => process.exit(0));
  };
  process.on("SIGINT", shutdown);
  process.on("SIGTERM", shutdown);
}

main().catch((err) => {
  console.error("Fatal:", err);
  process.exit(1);
});
