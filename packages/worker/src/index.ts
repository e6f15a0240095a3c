// =============================================================================
// @reinforce-lab/worker — Digest entry point
// =============================================================================
// Runs the insight digest once, or on DIGEST_CRON when started with
// --schedule (or whenever DIGEST_CRON is set).
//
// Usage:
//   READWISE_TOKEN=... ANTHROPIC_API_KEY=... npm run digest
//   DIGEST_CRON="0 7 * * *" npm run digest -- --schedule
// =============================================================================

import {
  type DigestConfig,
  type LlmClient,
  createLlmClient,
  createLogger,
  loadDigestConfig,
} from "@reinforce-lab/shared";
import { runDigest } from "./digest.js";
import { startScheduler } from "./scheduler.js";

let config: DigestConfig;
let llm: LlmClient;
try {
  config = loadDigestConfig();
  llm = createLlmClient(config);
} catch (err) {
  console.error(
    "Configuration error:",
    err instanceof Error ? err.message : String(err),
  );
  process.exit(1);
}

const logger = createLogger({
  level: config.LOG_LEVEL,
  bindings: { component: "digest" },
});
const wantsSchedule = process.argv.includes("--schedule");

if (wantsSchedule || config.DIGEST_CRON) {
  if (!config.DIGEST_CRON) {
    logger.fatal("--schedule requires DIGEST_CRON to be set");
    process.exit(1);
  }

  const scheduler = startScheduler(
    "insight_digest",
    config.DIGEST_CRON,
    () => runDigest({ config, logger, llm }),
    logger,
  );

  const handleShutdown = () => {
    scheduler.stop();
    process.exit(0);
  };
  process.once("SIGTERM", handleShutdown);
  process.once("SIGINT", handleShutdown);
} else {
  logger.info("Digest starting", { provider: llm.provider, model: llm.model });
  try {
    const result = await runDigest({ config, logger, llm });
    logger.info("Digest finished", {
      status: result.status,
      documents: result.documents,
      analyzed: result.analyzed,
      skipped: result.skipped,
      failed: result.failed,
      hits: result.hits.length,
      notePath: result.notePath,
    });
    if (result.status !== "completed") process.exitCode = 1;
  } catch (err) {
    logger.fatal("Digest failed", {
      error: err instanceof Error ? err.message : String(err),
    });
    process.exitCode = 1;
  }
}
