#!/usr/bin/env node

/**
 * One pass of the watcher; meant to be triggered by an external scheduler
 */

import { cfg, validateConfig } from "../config/env";
import { runOnce } from "../core/pipeline";
import {
  createLogger,
  createNotifier,
  createPipelineOptions,
  createSourceAdapter,
  createStateAdapter,
} from "../service-config";

async function main(): Promise<number> {
  const logger = createLogger();
  logger.info(`Starting in ${cfg.mode} mode with ${cfg.adapter} adapter`);

  for (const warning of validateConfig()) {
    logger.warn(warning);
  }

  const { state, close } = createStateAdapter(logger);
  try {
    const result = await runOnce(
      createSourceAdapter(logger),
      state,
      createNotifier(logger),
      createPipelineOptions(logger)
    );
    return result.status === "ok" ? 0 : 1;
  } finally {
    await close();
  }
}

if (require.main === module) {
  main()
    .then((code) => {
      process.exitCode = code;
    })
    .catch((error) => {
      console.error("[listing-watcher] Unhandled error:", error);
      process.exit(1);
    });
}
