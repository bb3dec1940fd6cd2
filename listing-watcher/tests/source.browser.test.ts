import { SilentLogger } from "@rentwatch/shared-utils";
import { beforeEach, describe, expect, it, vi } from "vitest";
import { BrowserSource, BrowserSourceConfig, EXTRACT_NUXT_SCRIPT } from "../src/adapters/source.browser";
import { searchUrl } from "../src/core/query";
import { testProfile } from "./builders";

const chromium = vi.hoisted(() => {
  const page = { goto: vi.fn(), evaluate: vi.fn() };
  const context = { newPage: vi.fn() };
  const browser = { newContext: vi.fn(), close: vi.fn() };
  return { page, context, browser, launch: vi.fn() };
});

vi.mock("playwright-core", () => ({ chromium: { launch: chromium.launch } }));

const config: BrowserSourceConfig = {
  listUrl: "https://rent.example.test/list",
  executablePath: "/usr/bin/chromium",
  headless: true,
  userAgent: "test-agent",
  timeoutMs: 15000,
};

describe("BrowserSource", () => {
  beforeEach(() => {
    vi.clearAllMocks();
    chromium.launch.mockResolvedValue(chromium.browser);
    chromium.browser.newContext.mockResolvedValue(chromium.context);
    chromium.browser.close.mockResolvedValue(undefined);
    chromium.context.newPage.mockResolvedValue(chromium.page);
    chromium.page.goto.mockResolvedValue(null);
  });

  it("should launch the configured browser", async () => {
    const source = new BrowserSource(config, new SilentLogger());

    await source.open();

    expect(chromium.launch).toHaveBeenCalledWith({
      executablePath: "/usr/bin/chromium",
      headless: true,
    });
    expect(chromium.browser.newContext).toHaveBeenCalledWith({ userAgent: "test-agent" });
  });

  it("should read records from the rendered page state", async () => {
    chromium.page.evaluate.mockResolvedValue({ items: [{ id: 1 }, { id: 2 }], total: "25" });
    const source = new BrowserSource(config, new SilentLogger());
    await source.open();

    const page = await source.fetchPage(testProfile, 30);

    expect(page).toEqual({
      records: [
        { source: "nuxt", item: { id: 1 } },
        { source: "nuxt", item: { id: 2 } },
      ],
      total: 25,
    });
    expect(chromium.page.goto).toHaveBeenCalledWith(searchUrl(config.listUrl, testProfile, 30), {
      waitUntil: "networkidle",
      timeout: 15000,
    });
    expect(chromium.page.evaluate).toHaveBeenCalledWith(EXTRACT_NUXT_SCRIPT);
  });

  it("should reuse one tab across pages", async () => {
    chromium.page.evaluate.mockResolvedValue({ items: [], total: 0 });
    const source = new BrowserSource(config, new SilentLogger());
    await source.open();

    await source.fetchPage(testProfile, 0);
    await source.fetchPage(testProfile, 30);

    expect(chromium.context.newPage).toHaveBeenCalledTimes(1);
    expect(chromium.page.goto).toHaveBeenCalledTimes(2);
  });

  it("should return an empty page when no state is embedded", async () => {
    chromium.page.evaluate.mockResolvedValue(null);
    const source = new BrowserSource(config, new SilentLogger());
    await source.open();

    expect(await source.fetchPage(testProfile, 0)).toEqual({ records: [], total: 0 });
  });

  it("should reject unexpected page state", async () => {
    chromium.page.evaluate.mockResolvedValue({ items: "nope" });
    const source = new BrowserSource(config, new SilentLogger());
    await source.open();

    await expect(source.fetchPage(testProfile, 0)).rejects.toThrow();
  });

  it("should close the browser and require a new session", async () => {
    const source = new BrowserSource(config, new SilentLogger());
    await source.open();

    await source.close();
    await source.close();

    expect(chromium.browser.close).toHaveBeenCalledTimes(1);
    await expect(source.fetchPage(testProfile, 0)).rejects.toThrow(
      "BrowserSource.fetchPage called before open()"
    );
  });
});
