// =============================================================================
// @reinforce-lab/server — Entry point
// =============================================================================
// Loads config, creates the Express + MCP server, and starts listening.
// =============================================================================

import { createApp } from "./server.js";
import { registerSimulationTools } from "./tools/simulation.js";

const instance = createApp();
const { httpServer, deps, shutdown } = instance;

instance.addToolRegistrar(registerSimulationTools);
const { config, logger } = deps;

httpServer.keepAliveTimeout = 120_000;
httpServer.headersTimeout = 120_000;

httpServer.listen(config.PORT, "0.0.0.0", () => {
  logger.info("Simulation server started", {
    port: config.PORT,
    host: "0.0.0.0",
    logLevel: config.LOG_LEVEL,
    corsOrigins: config.CORS_ORIGINS,
    rateLimitPerMin: config.RATE_LIMIT_PER_MIN,
    vocabulary: config.SIM_VOCABULARY,
    targetToken: config.SIM_TARGET_TOKEN,
  });
});

// Signal handlers registered here (not in createApp) to avoid accumulation
// if createApp is called multiple times (e.g., in tests).
function handleShutdown() {
  shutdown()
    .then(() => process.exit(0))
    .catch((err) => {
      logger.error("Shutdown error", {
        error: err instanceof Error ? err.message : String(err),
      });
      process.exit(1);
    });
}

process.once("SIGTERM", handleShutdown);
process.once("SIGINT", handleShutdown);
