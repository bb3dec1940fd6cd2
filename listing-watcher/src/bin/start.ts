#!/usr/bin/env node

/**
 * Local loop: one run every POLL_INTERVAL_MS until SIGINT/SIGTERM.
 * Runs never overlap; the next one starts after the previous has finished.
 */

import { cfg, validateConfig } from "../config/env";
import { runOnce } from "../core/pipeline";
import { formatDuration, sleep } from "../core/utils";
import {
  createLogger,
  createNotifier,
  createPipelineOptions,
  createSourceAdapter,
  createStateAdapter,
} from "../service-config";

async function main() {
  const logger = createLogger();
  logger.info(
    `Starting in ${cfg.mode} mode with ${cfg.adapter} adapter, every ${formatDuration(cfg.pollIntervalMs)}`
  );

  for (const warning of validateConfig()) {
    logger.warn(warning);
  }

  const { state, close } = createStateAdapter(logger);
  const notifier = createNotifier(logger);
  const options = createPipelineOptions(logger);

  // Handle graceful shutdown
  let running = true;
  const shutdown = () => {
    logger.info("Received shutdown signal, stopping after the current run...");
    running = false;
  };

  process.on("SIGINT", shutdown);
  process.on("SIGTERM", shutdown);

  try {
    while (running) {
      const result = await runOnce(createSourceAdapter(logger), state, notifier, options);

      if (result.status !== "ok") {
        logger.warn(`Run ended with ${result.status}`);
      }

      // Sleep in short slices so a signal is noticed promptly
      const wakeAt = Date.now() + cfg.pollIntervalMs;
      while (running && Date.now() < wakeAt) {
        await sleep(Math.min(1000, wakeAt - Date.now()));
      }
    }
  } finally {
    await close();
  }

  logger.info("Shutdown complete");
}

if (require.main === module) {
  main().catch((error) => {
    console.error("[listing-watcher] Unhandled error:", error);
    process.exit(1);
  });
}
