import type { Logger } from "@rentwatch/shared-utils";
import axios, { AxiosInstance } from "axios";
import * as cheerio from "cheerio";
import { z } from "zod";
import { RawRecord, RegionProfile, SearchPage } from "../core/dto";
import { SourcePort } from "../core/ports";
import { searchParams } from "../core/query";

export interface ApiSourceConfig {
  baseUrl: string; // home page that hands out cookies + csrf token
  apiUrl: string; // JSON search endpoint
  userAgent: string;
  timeoutMs: number;
}

const searchResponseSchema = z.object({
  status: z.number(),
  records: z.union([z.string(), z.number()]).optional(),
  data: z.object({
    data: z.array(z.record(z.unknown())),
  }),
});

interface Session {
  cookie: string;
  csrfToken: string;
}

/**
 * JSON search endpoint behind a cookie + anti-forgery token handshake
 */
export class ApiSource implements SourcePort {
  private http: Pick<AxiosInstance, "get">;
  private session?: Session;

  constructor(
    private config: ApiSourceConfig,
    private logger: Logger,
    http?: Pick<AxiosInstance, "get">
  ) {
    this.http = http ?? axios.create({ timeout: config.timeoutMs });
  }

  async open(): Promise<void> {
    const response = await this.http.get<string>(this.config.baseUrl, {
      headers: {
        "User-Agent": this.config.userAgent,
        Accept: "text/html,application/xhtml+xml,application/xml;q=0.9,*/*;q=0.8",
      },
      responseType: "text",
    });

    const $ = cheerio.load(String(response.data));
    const csrfToken = $('meta[name="csrf-token"]').attr("content");
    if (!csrfToken) {
      throw new Error(`No csrf-token on ${this.config.baseUrl}`);
    }

    const setCookie: unknown = response.headers["set-cookie"];
    this.session = { cookie: cookieHeader(setCookie), csrfToken };
    this.logger.info("Search session established");
  }

  async fetchPage(profile: RegionProfile, firstRow: number): Promise<SearchPage> {
    if (!this.session) {
      throw new Error("ApiSource.fetchPage called before open()");
    }

    const response = await this.http.get<unknown>(this.config.apiUrl, {
      params: {
        is_format_data: "1",
        is_new_list: "1",
        type: "1",
        ...searchParams(profile, firstRow),
      },
      headers: {
        "User-Agent": this.config.userAgent,
        "X-CSRF-TOKEN": this.session.csrfToken,
        "X-Requested-With": "XMLHttpRequest",
        Cookie: this.session.cookie,
      },
    });

    const body = searchResponseSchema.parse(response.data);
    if (body.status !== 1) {
      throw new Error(`Search API returned status ${body.status}`);
    }

    return {
      records: body.data.data.map((item): RawRecord => ({ source: "api", item })),
      total: parseCount(body.records),
    };
  }

  async close(): Promise<void> {
    this.session = undefined;
  }
}

/**
 * "name=value; Path=/; HttpOnly" lines -> "name=value; name2=value2"
 */
export function cookieHeader(setCookie: unknown): string {
  const lines = Array.isArray(setCookie) ? setCookie : [setCookie];

  return lines
    .filter((line): line is string => typeof line === "string" && line !== "")
    .map((line) => line.split(";")[0].trim())
    .join("; ");
}

export function parseCount(value: string | number | undefined): number {
  if (typeof value === "number") return value;
  if (!value) return 0;

  const count = parseInt(value.replace(/,/g, ""), 10);
  return isNaN(count) ? 0 : count;
}
