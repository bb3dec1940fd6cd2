import type { Logger } from "@rentwatch/shared-utils";
import { Browser, BrowserContext, chromium, Page } from "playwright-core";
import { z } from "zod";
import { RawRecord, RegionProfile, SearchPage } from "../core/dto";
import { SourcePort } from "../core/ports";
import { searchUrl } from "../core/query";

export interface BrowserSourceConfig {
  listUrl: string;
  executablePath: string; // installed Chromium; playwright-core ships none
  headless: boolean;
  userAgent: string;
  timeoutMs: number;
}

// Search results live in the server-rendered state, not in the markup
export const EXTRACT_NUXT_SCRIPT = `(() => {
  const d = window.__NUXT__ && window.__NUXT__.data;
  if (!d) return null;
  for (const v of Object.values(d)) {
    const inner = v && v.data;
    if (inner && inner.items && Array.isArray(inner.items)) {
      return { items: inner.items, total: inner.total };
    }
  }
  return null;
})()`;

const nuxtPayloadSchema = z
  .object({
    items: z.array(z.record(z.unknown())),
    total: z.union([z.number(), z.string()]).nullish(),
  })
  .nullable();

/**
 * Renders the search page in headless Chromium and reads the embedded data
 */
export class BrowserSource implements SourcePort {
  private browser?: Browser;
  private context?: BrowserContext;
  private page?: Page;

  constructor(
    private config: BrowserSourceConfig,
    private logger: Logger
  ) {}

  async open(): Promise<void> {
    await this.close();

    this.browser = await chromium.launch({
      executablePath: this.config.executablePath,
      headless: this.config.headless,
    });
    this.context = await this.browser.newContext({ userAgent: this.config.userAgent });
    this.logger.info("Browser started");
  }

  async fetchPage(profile: RegionProfile, firstRow: number): Promise<SearchPage> {
    if (!this.context) {
      throw new Error("BrowserSource.fetchPage called before open()");
    }

    if (!this.page) {
      this.page = await this.context.newPage();
    }
    await this.page.goto(searchUrl(this.config.listUrl, profile, firstRow), {
      waitUntil: "networkidle",
      timeout: this.config.timeoutMs,
    });

    const payload = nuxtPayloadSchema.parse(await this.page.evaluate<unknown>(EXTRACT_NUXT_SCRIPT));
    if (!payload) {
      return { records: [], total: 0 };
    }

    return {
      records: payload.items.map((item): RawRecord => ({ source: "nuxt", item })),
      total: Number(payload.total ?? 0) || 0,
    };
  }

  async close(): Promise<void> {
    const browser = this.browser;
    this.page = undefined;
    this.context = undefined;
    this.browser = undefined;

    if (browser) {
      await browser.close();
      this.logger.info("Browser closed");
    }
  }
}
