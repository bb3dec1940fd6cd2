/**
 * Builds the watcher's adapters and pipeline options from configuration
 */

import { ConsoleLogger, createRetryPolicy, Logger } from "@rentwatch/shared-utils";
import Redis from "ioredis";
import { LogNotifier } from "./adapters/notifier.log";
import { TelegramNotifier } from "./adapters/notifier.telegram";
import { ApiSource } from "./adapters/source.api";
import { BrowserSource } from "./adapters/source.browser";
import { MockSource } from "./adapters/source.mock";
import { FileStateStore } from "./adapters/state.file";
import { RedisStateStore } from "./adapters/state.redis";
import {
  cfg,
  hasTelegramCredentials,
  pipelineCfg,
  sourceCfg,
  stateCfg,
  telegramCfg,
} from "./config/env";
import { SEARCH_PROFILES } from "./config/profiles";
import { PipelineOptions } from "./core/pipeline";
import { NotifierPort, SourcePort, StatePort } from "./core/ports";

export const SERVICE_NAME = "listing-watcher";

export function createLogger(): Logger {
  return new ConsoleLogger(SERVICE_NAME, cfg.logLevel);
}

export function createSourceAdapter(logger: Logger): SourcePort {
  switch (cfg.adapter) {
    case "MOCK":
      return new MockSource(pipelineCfg.pageSize);

    case "API":
      return new ApiSource(
        {
          baseUrl: sourceCfg.baseUrl,
          apiUrl: sourceCfg.apiUrl,
          userAgent: sourceCfg.userAgent,
          timeoutMs: sourceCfg.timeoutMs,
        },
        logger.child("api")
      );

    case "BROWSER":
      return new BrowserSource(
        {
          listUrl: sourceCfg.listUrl,
          executablePath: sourceCfg.browser.executablePath,
          headless: sourceCfg.browser.headless,
          userAgent: sourceCfg.userAgent,
          timeoutMs: sourceCfg.timeoutMs,
        },
        logger.child("browser")
      );
  }
}

export interface StateHandle {
  state: StatePort;
  close(): Promise<void>;
}

export function createStateAdapter(logger: Logger): StateHandle {
  const options = { seenCap: pipelineCfg.seenCap, logger: logger.child("state") };

  switch (stateCfg.adapter) {
    case "REDIS": {
      const redis = new Redis(stateCfg.redis.url, { maxRetriesPerRequest: 3 });
      return {
        state: new RedisStateStore(redis, stateCfg.keyPrefix, options),
        close: async () => {
          await redis.quit();
        },
      };
    }

    case "FILE":
      return {
        state: new FileStateStore(stateCfg.dir, options),
        close: async () => {},
      };
  }
}

export function createNotifier(logger: Logger): NotifierPort {
  if (!hasTelegramCredentials()) {
    return new LogNotifier(logger.child("notify"));
  }

  return new TelegramNotifier(
    {
      botToken: telegramCfg.botToken,
      chatId: telegramCfg.chatId,
      apiUrl: telegramCfg.apiUrl,
      timeoutMs: telegramCfg.timeoutMs,
    },
    logger.child("telegram")
  );
}

export function createPipelineOptions(logger: Logger): PipelineOptions {
  return {
    profiles: SEARCH_PROFILES,
    fetch: {
      pageSize: pipelineCfg.pageSize,
      maxPages: pipelineCfg.maxPages,
      pageDelayMs: pipelineCfg.pageDelayMs,
    },
    regionDelayMs: pipelineCfg.regionDelayMs,
    delivery: {
      batchSize: pipelineCfg.batchSize,
      minIntervalMs: pipelineCfg.sendIntervalMs,
    },
    bootstrap: createRetryPolicy(
      pipelineCfg.bootstrapAttempts,
      pipelineCfg.bootstrapBackoffMs
    ),
    alertOnError: telegramCfg.alertOnError,
    normalize: { detailBaseUrl: sourceCfg.detailUrl },
    logger,
  };
}
