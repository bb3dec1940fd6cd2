import {
  Logger,
  RetryExhaustedError,
  RetryPolicy,
  withRetry,
} from "@rentwatch/shared-utils";
import { deliver, DeliveryOptions, DeliveryResult } from "./deliver";
import { Listing, RegionProfile, RunResult } from "./dto";
import { SessionError } from "./errors";
import { fetchProfile, FetchOptions } from "./fetcher";
import { DEFAULT_FILTER_RULES, FilterRules, mergeRejections, select } from "./filter";
import { AlertKind, formatAlert } from "./format";
import { NormalizeOptions } from "./normalize";
import { NotifierPort, SourcePort, StatePort } from "./ports";
import { mergeQueue, rank } from "./rank";
import {
  DelayRange,
  errorMessage,
  formatDuration,
  jitter,
  sleep as defaultSleep,
} from "./utils";

export interface PipelineOptions {
  profiles: RegionProfile[];
  fetch: Pick<FetchOptions, "pageSize" | "maxPages" | "pageDelayMs">;
  regionDelayMs: DelayRange;
  delivery: Pick<DeliveryOptions, "batchSize" | "minIntervalMs">;
  bootstrap: RetryPolicy;
  alertOnError: boolean;
  logger: Logger;
  rules?: FilterRules;
  normalize?: NormalizeOptions;
  sleep?: (ms: number) => Promise<void>;
  random?: () => number;
}

/**
 * One sequential pass: fetch every profile, dedup and filter, merge with
 * the pending queue, rank, deliver one batch and persist the rest.
 */
export async function runOnce(
  source: SourcePort,
  state: StatePort,
  notifier: NotifierPort,
  options: PipelineOptions
): Promise<RunResult> {
  const startTime = Date.now();
  const { logger } = options;
  const sleep = options.sleep ?? defaultSleep;

  const result: RunResult = {
    status: "ok",
    fetched: 0,
    matched: 0,
    rejected: {},
    pendingIn: 0,
    delivered: 0,
    failedDeliveries: 0,
    carried: 0,
    durationMs: 0,
  };

  logger.info(`=== Run started (${new Date(startTime).toISOString()}) ===`);

  try {
    try {
      await openSession(source, options, sleep);
    } catch (error) {
      logger.error("Could not open source session:", error);
      await sendAlert(notifier, "session", error, options);
      result.status = "session_failed";
      result.error = errorMessage(error);
      return finish(result, startTime, logger);
    }

    // Run state, tracked so a failure part-way can still persist it
    let seen: Set<string> | undefined;
    let pending: Listing[] | undefined;
    let ranked: Listing[] | undefined;
    let delivery: DeliveryResult | undefined;
    let pendingSaved = false;
    const fresh: Listing[] = [];

    try {
      seen = await state.loadSeen();
      logger.info(`${seen.size} listing ids seen before`);

      for (const [index, profile] of options.profiles.entries()) {
        if (index > 0) {
          await sleep(jitter(options.regionDelayMs, options.random));
        }

        const fetched = await fetchProfile(source, profile, {
          ...options.fetch,
          logger: logger.child("fetch"),
          sleep,
          random: options.random,
        });
        result.fetched += fetched.records.length;

        const selection = select(
          fetched.records,
          seen,
          options.rules ?? DEFAULT_FILTER_RULES,
          options.normalize
        );
        fresh.push(...selection.listings);
        mergeRejections(result.rejected, selection.rejected);

        logger.info(
          `${profile.label}: ${fetched.records.length} fetched, ${selection.listings.length} new matches`
        );
      }
      result.matched = fresh.length;

      pending = await state.loadPending();
      result.pendingIn = pending.length;
      if (pending.length > 0) {
        logger.info(`Loaded ${pending.length} pending listings`);
      }

      // A pending listing fetched again while missing from seen is queued once
      for (const listing of pending) {
        seen.add(listing.id);
      }
      ranked = rank(mergeQueue(pending, fresh));

      if (ranked.length === 0) {
        logger.info("No new listings");
        await state.savePending([]);
        pendingSaved = true;
      } else {
        logger.info(
          `${ranked.length} listings queued (new ${fresh.length} + carried over ${pending.length})`
        );

        delivery = await deliver(ranked, notifier, {
          ...options.delivery,
          logger: logger.child("deliver"),
          sleep,
        });
        result.delivered = delivery.sent.length;
        result.failedDeliveries = delivery.failed.length;
        result.carried = delivery.remainder.length;

        if (delivery.remainder.length > 0) {
          logger.info(`${delivery.remainder.length} listings left for the next run`);
        }

        await state.savePending(delivery.remainder);
        pendingSaved = true;
      }

      await state.saveSeen(seen);
    } catch (error) {
      logger.error("Run failed:", error);
      await sendAlert(notifier, "run", error, options);
      result.status = "failed";
      result.error = errorMessage(error);

      if (seen && pending) {
        const undelivered = delivery?.remainder ?? ranked ?? rank(mergeQueue(pending, fresh));
        await persistAfterFailure(state, seen, pendingSaved ? undefined : undelivered, logger);
      } else {
        // Pending queue never loaded: leave both files alone so this run's
        // matches are found again next time.
        logger.warn("State left untouched; pending queue was not loaded");
      }
    }

    return finish(result, startTime, logger);
  } finally {
    try {
      await source.close();
    } catch (error) {
      logger.warn("Closing source failed:", error);
    }
  }
}

async function openSession(
  source: SourcePort,
  options: PipelineOptions,
  sleep: (ms: number) => Promise<void>
): Promise<void> {
  try {
    await withRetry(() => source.open(), options.bootstrap, {
      sleep,
      onRetry: (attempt, delayMs, error) =>
        options.logger.warn(
          `Session bootstrap attempt ${attempt} failed, retrying in ${delayMs}ms:`,
          errorMessage(error)
        ),
    });
  } catch (error) {
    const cause = error instanceof RetryExhaustedError ? error.lastError : error;
    throw new SessionError(
      `Source session could not be opened: ${errorMessage(cause)}`,
      cause
    );
  }
}

async function persistAfterFailure(
  state: StatePort,
  seen: Set<string>,
  undelivered: Listing[] | undefined,
  logger: Logger
): Promise<void> {
  if (undelivered) {
    try {
      await state.savePending(undelivered);
    } catch (error) {
      logger.error("Could not save pending listings after failure:", error);
      return; // saving seen now would drop the undelivered matches for good
    }
  }

  try {
    await state.saveSeen(seen);
  } catch (error) {
    logger.error("Could not save seen ids after failure:", error);
  }
}

async function sendAlert(
  notifier: NotifierPort,
  kind: AlertKind,
  error: unknown,
  options: PipelineOptions
): Promise<void> {
  if (!options.alertOnError) return;

  try {
    await notifier.send(formatAlert(kind, error));
  } catch (alertError) {
    options.logger.error("Alert could not be sent:", alertError);
  }
}

function finish(result: RunResult, startTime: number, logger: Logger): RunResult {
  result.durationMs = Date.now() - startTime;

  logger.info(`=== Run finished: ${result.status} ===`, {
    ...result,
    duration: formatDuration(result.durationMs),
  });

  return result;
}
