import * as dotenv from "dotenv";
import {
  createRedisConfig,
  createServiceConfig,
  parseEnvBoolean,
  parseEnvNumber,
  parseEnvNumberArray,
} from "@rentwatch/shared-utils";
import { DelayRange } from "../core/utils";

// Load environment variables from .env file
dotenv.config();

const DEFAULT_USER_AGENT =
  "Mozilla/5.0 (Macintosh; Intel Mac OS X 10_15_7) AppleWebKit/537.36 " +
  "(KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36";

export type SourceAdapter = "MOCK" | "API" | "BROWSER";
export type StateAdapter = "FILE" | "REDIS";

function delayRange(envVar: string, fallback: DelayRange): DelayRange {
  const [min = fallback[0], max = min] = parseEnvNumberArray(envVar, fallback);
  return [min, Math.max(min, max)];
}

function oneOf<T extends string>(envVar: string, allowed: readonly T[], fallback: T): T {
  const value = (process.env[envVar] ?? fallback).toUpperCase();
  const match = allowed.find((candidate) => candidate === value);
  if (!match) {
    throw new Error(`${envVar} must be one of ${allowed.join("|")}, got ${value}`);
  }
  return match;
}

export const cfg = {
  ...createServiceConfig(),
  adapter: oneOf<SourceAdapter>("ADAPTER", ["MOCK", "API", "BROWSER"], "MOCK"),
  pollIntervalMs: parseEnvNumber("POLL_INTERVAL_MS", 15 * 60 * 1000), // loop mode only
};

export const sourceCfg = {
  baseUrl: process.env.SOURCE_BASE_URL ?? "https://rent.591.com.tw",
  apiUrl: process.env.SOURCE_API_URL ?? "https://rent.591.com.tw/home/search/rsList",
  listUrl: process.env.SOURCE_LIST_URL ?? "https://rent.591.com.tw/list",
  detailUrl: process.env.SOURCE_DETAIL_URL ?? "https://rent.591.com.tw",
  userAgent: process.env.USER_AGENT ?? DEFAULT_USER_AGENT,
  timeoutMs: parseEnvNumber("REQUEST_TIMEOUT_MS", 30000),
  browser: {
    executablePath: process.env.BROWSER_EXECUTABLE_PATH ?? "",
    headless: parseEnvBoolean("BROWSER_HEADLESS", true),
  },
};

export const telegramCfg = {
  botToken: process.env.TELEGRAM_BOT_TOKEN ?? "",
  chatId: process.env.TELEGRAM_CHAT_ID ?? "",
  apiUrl: process.env.TELEGRAM_API_URL ?? "https://api.telegram.org",
  timeoutMs: 10000,
  alertOnError: parseEnvBoolean("ALERT_ON_ERROR", true),
};

export const stateCfg = {
  adapter: oneOf<StateAdapter>("STATE_ADAPTER", ["FILE", "REDIS"], "FILE"),
  dir: process.env.STATE_DIR ?? "./state",
  redis: createRedisConfig(),
  keyPrefix: process.env.STATE_KEY_PREFIX ?? "rentwatch",
};

export const pipelineCfg = {
  pageSize: parseEnvNumber("PAGE_SIZE", 30),
  maxPages: parseEnvNumber("MAX_PAGES", 5),
  batchSize: parseEnvNumber("BATCH_SIZE", 10),
  sendIntervalMs: parseEnvNumber("SEND_INTERVAL_MS", 1100),
  seenCap: parseEnvNumber("SEEN_CAP", 5000),
  pageDelayMs: delayRange("PAGE_DELAY_MS", [2000, 4000]),
  regionDelayMs: delayRange("REGION_DELAY_MS", [2000, 3000]),
  bootstrapAttempts: parseEnvNumber("BOOTSTRAP_ATTEMPTS", 3),
  bootstrapBackoffMs: parseEnvNumber("BOOTSTRAP_BACKOFF_MS", 1000),
};

export function hasTelegramCredentials(): boolean {
  return Boolean(telegramCfg.botToken && telegramCfg.chatId);
}

// Validation
export function validateConfig(): string[] {
  const warnings: string[] = [];

  if (cfg.adapter === "BROWSER" && !sourceCfg.browser.executablePath) {
    throw new Error(
      "BROWSER_EXECUTABLE_PATH is required when using BROWSER adapter"
    );
  }

  if (stateCfg.adapter === "REDIS" && !stateCfg.redis.url) {
    throw new Error("REDIS_URL is required when using REDIS state adapter");
  }

  if (pipelineCfg.pageSize <= 0 || pipelineCfg.maxPages <= 0 || pipelineCfg.batchSize <= 0) {
    throw new Error("PAGE_SIZE, MAX_PAGES and BATCH_SIZE must be positive");
  }

  if (!hasTelegramCredentials()) {
    warnings.push(
      "TELEGRAM_BOT_TOKEN or TELEGRAM_CHAT_ID missing; messages will only be logged"
    );
  }

  if (pipelineCfg.sendIntervalMs < 1000) {
    warnings.push(
      "SEND_INTERVAL_MS below 1s may hit the messaging rate limit"
    );
  }

  return warnings;
}
