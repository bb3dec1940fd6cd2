import { SilentLogger } from "@rentwatch/shared-utils";
import { describe, expect, it, vi } from "vitest";
import { RawRecord, SearchPage } from "../src/core/dto";
import { fetchProfile, FetchOptions } from "../src/core/fetcher";
import { SourcePort } from "../src/core/ports";
import { goodNuxtItem, nuxtRecord, testProfile } from "./builders";

function records(...ids: number[]): RawRecord[] {
  return ids.map((id) => nuxtRecord(goodNuxtItem(id)));
}

function fakeSource(pages: Array<SearchPage | Error>): SourcePort {
  const fetchPage = vi.fn();
  for (const page of pages) {
    if (page instanceof Error) {
      fetchPage.mockRejectedValueOnce(page);
    } else {
      fetchPage.mockResolvedValueOnce(page);
    }
  }
  fetchPage.mockResolvedValue({ records: [], total: 0 });

  return {
    open: vi.fn().mockResolvedValue(undefined),
    fetchPage,
    close: vi.fn().mockResolvedValue(undefined),
  };
}

describe("fetchProfile", () => {
  const baseOptions = (overrides: Partial<FetchOptions> = {}): FetchOptions => ({
    pageSize: 2,
    maxPages: 10,
    pageDelayMs: [1000, 3000],
    logger: new SilentLogger(),
    sleep: vi.fn().mockResolvedValue(undefined),
    random: () => 0.5,
    ...overrides,
  });

  it("should stop once the reported total is reached", async () => {
    const source = fakeSource([
      { records: records(1, 2), total: 5 },
      { records: records(3, 4), total: 5 },
      { records: records(5), total: 5 },
    ]);

    const result = await fetchProfile(source, testProfile, baseOptions());

    expect(result.records).toHaveLength(5);
    expect(result.pages).toBe(3);
    expect(result.total).toBe(5);
    expect(result.error).toBeUndefined();
    expect(source.fetchPage).toHaveBeenCalledTimes(3);
  });

  it("should request consecutive row offsets", async () => {
    const source = fakeSource([
      { records: records(1, 2), total: 4 },
      { records: records(3, 4), total: 4 },
    ]);

    await fetchProfile(source, testProfile, baseOptions());

    expect(vi.mocked(source.fetchPage).mock.calls).toEqual([
      [testProfile, 0],
      [testProfile, 2],
    ]);
  });

  it("should sleep a jittered delay between pages only", async () => {
    const sleep = vi.fn().mockResolvedValue(undefined);
    const source = fakeSource([
      { records: records(1, 2), total: 6 },
      { records: records(3, 4), total: 6 },
      { records: records(5, 6), total: 6 },
    ]);

    await fetchProfile(source, testProfile, baseOptions({ sleep }));

    expect(sleep.mock.calls).toEqual([[2000], [2000]]);
  });

  it("should stop on an empty page", async () => {
    const source = fakeSource([
      { records: records(1, 2), total: 0 },
      { records: [], total: 0 },
    ]);

    const result = await fetchProfile(source, testProfile, baseOptions());

    expect(result.records).toHaveLength(2);
    expect(result.pages).toBe(2);
    expect(source.fetchPage).toHaveBeenCalledTimes(2);
  });

  it("should respect the page cap", async () => {
    const source = fakeSource([
      { records: records(1, 2), total: 100 },
      { records: records(3, 4), total: 100 },
      { records: records(5, 6), total: 100 },
    ]);

    const result = await fetchProfile(source, testProfile, baseOptions({ maxPages: 2 }));

    expect(result.records).toHaveLength(4);
    expect(result.pages).toBe(2);
    expect(source.fetchPage).toHaveBeenCalledTimes(2);
  });

  it("should keep earlier pages when a later page fails", async () => {
    const source = fakeSource([
      { records: records(1, 2), total: 10 },
      new Error("HTTP 503"),
    ]);

    const result = await fetchProfile(source, testProfile, baseOptions());

    expect(result.records).toHaveLength(2);
    expect(result.pages).toBe(1);
    expect(result.total).toBe(10);
    expect(result.error).toBe("HTTP 503");
  });

  it("should return nothing when the first page fails", async () => {
    const source = fakeSource([new Error("timeout")]);

    const result = await fetchProfile(source, testProfile, baseOptions());

    expect(result).toEqual({ records: [], pages: 0, total: 0, error: "timeout" });
  });
});
