// =============================================================================
// @feedsieve/server: Entry point
// =============================================================================
// Loads config, creates the Express + MCP server, ensures the Neo4j schema,
// starts the update timer and starts listening.
// =============================================================================

import { ensureSchema, errorMessage } from "@feedsieve/shared";
import { createApp } from "./server.js";
import { registerFeedTools } from "./tools/feeds.js";
import { registerFilterTools } from "./tools/filters.js";
import { registerSettingTools } from "./tools/settings.js";
import { startScheduler, type SchedulerHandle } from "./scheduler.js";

const instance = createApp();
const { httpServer, deps, shutdown } = instance;

instance.addToolRegistrar(registerFeedTools);
instance.addToolRegistrar(registerFilterTools);
instance.addToolRegistrar(registerSettingTools);
const { config, logger } = deps;

// Constraints and default settings are created idempotently on every boot;
// the timer starts either way so a transient failure does not stop updates.
let scheduler: SchedulerHandle | undefined;

async function boot(): Promise<void> {
  if (deps.driver) {
    try {
      const result = await ensureSchema(deps.driver, logger);
      logger.info("Schema ensured", {
        constraints: result.constraints,
        settings: result.settings,
      });
    } catch (err) {
      logger.error("Schema setup failed (non-fatal)", { error: errorMessage(err) });
    }
  }

  scheduler = startScheduler(deps);
  if (config.UPDATE_ON_START) await scheduler.tick();
}

boot().catch((err: unknown) => {
  logger.error("Startup failed", { error: errorMessage(err) });
});

httpServer.keepAliveTimeout = 120_000;
httpServer.headersTimeout = 120_000;

httpServer.listen(config.PORT, "0.0.0.0", () => {
  logger.info("FeedSieve MCP server started", {
    port: config.PORT,
    host: "0.0.0.0",
    logLevel: config.LOG_LEVEL,
    corsOrigins: config.CORS_ORIGINS,
    rateLimitPerMin: config.RATE_LIMIT_PER_MIN,
  });
});

// Signal handlers registered here (not in createApp) to avoid accumulation
// if createApp is called multiple times (e.g., in tests).
function handleShutdown() {
  scheduler?.stop();
  shutdown()
    .then(() => process.exit(0))
    .catch((err: unknown) => {
      logger.error("Shutdown error", { error: errorMessage(err) });
      process.exit(1);
    });
}

process.once("SIGTERM", handleShutdown);
process.once("SIGINT", handleShutdown);

export type {
  ToolRegistrar,
  AppDependencies,
  AppInstance,
  AppOptions,
} from "./server.js";
export { createApp } from "./server.js";
