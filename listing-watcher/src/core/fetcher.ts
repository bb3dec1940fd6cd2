import type { Logger } from "@rentwatch/shared-utils";
import { RawRecord, RegionProfile, SearchPage } from "./dto";
import { SourcePort } from "./ports";
import { DelayRange, errorMessage, jitter, sleep as defaultSleep } from "./utils";

export interface FetchOptions {
  pageSize: number;
  maxPages: number; // safety cap per profile per run
  pageDelayMs: DelayRange;
  logger: Logger;
  sleep?: (ms: number) => Promise<void>;
  random?: () => number;
}

export interface ProfileFetch {
  records: RawRecord[];
  pages: number;
  total: number;
  error?: string; // page failure that cut pagination short
}

/**
 * Walk the search result pages of one profile. A failing page ends
 * pagination; records from earlier pages are kept.
 */
export async function fetchProfile(
  source: SourcePort,
  profile: RegionProfile,
  options: FetchOptions
): Promise<ProfileFetch> {
  const { pageSize, maxPages, logger } = options;
  const sleep = options.sleep ?? defaultSleep;

  const records: RawRecord[] = [];
  let total = 0;
  let pages = 0;

  for (let pageNum = 0; pageNum < maxPages; pageNum++) {
    const firstRow = pageNum * pageSize;

    if (pageNum > 0) {
      await sleep(jitter(options.pageDelayMs, options.random));
    }

    logger.info(`Searching ${profile.label} | page=${pageNum + 1} (firstRow=${firstRow})`);

    let page: SearchPage;
    try {
      page = await source.fetchPage(profile, firstRow);
    } catch (error) {
      logger.error(`Page ${pageNum + 1} of ${profile.label} failed:`, error);
      return { records, pages, total, error: errorMessage(error) };
    }

    pages++;

    if (page.records.length === 0) {
      logger.info(`Page ${pageNum + 1} is empty, stopping`);
      break;
    }

    records.push(...page.records);
    total = page.total;
    logger.info(`Got ${page.records.length} records (${records.length} / ${total})`);

    if (total > 0 && records.length >= total) {
      break;
    }
  }

  return { records, pages, total };
}
