import type { Logger } from "@rentwatch/shared-utils";
import { Listing } from "./dto";
import { formatListing } from "./format";
import { NotifierPort } from "./ports";
import { sleep as defaultSleep } from "./utils";

export interface DeliveryOptions {
  batchSize: number;
  minIntervalMs: number; // messaging rate limit
  logger: Logger;
  sleep?: (ms: number) => Promise<void>;
}

export interface DeliveryResult {
  sent: Listing[];
  failed: Listing[];
  remainder: Listing[];
}

/**
 * Send the head of the ranked queue, one message per listing, and hand
 * back everything past the batch. A failed send does not stop the batch.
 */
export async function deliver(
  ranked: readonly Listing[],
  notifier: NotifierPort,
  options: DeliveryOptions
): Promise<DeliveryResult> {
  const { batchSize, minIntervalMs, logger } = options;
  const sleep = options.sleep ?? defaultSleep;

  const batch = ranked.slice(0, batchSize);
  const remainder = ranked.slice(batchSize);
  const sent: Listing[] = [];
  const failed: Listing[] = [];

  for (const [index, listing] of batch.entries()) {
    if (index > 0) {
      await sleep(minIntervalMs);
    }

    let ok = false;
    try {
      ok = await notifier.send(formatListing(listing));
    } catch (error) {
      logger.error(`Delivery of listing ${listing.id} threw:`, error);
    }

    if (ok) {
      sent.push(listing);
    } else {
      logger.warn(`Listing ${listing.id} was not delivered`);
      failed.push(listing);
    }
  }

  return { sent, failed, remainder };
}
