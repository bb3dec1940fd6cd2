import * as fs from "fs/promises";
import * as os from "os";
import * as path from "path";
import { SilentLogger } from "@rentwatch/shared-utils";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { FileStateStore } from "../src/adapters/state.file";
import { makeListing } from "./builders";

describe("FileStateStore", () => {
  let dir: string;
  let logger: SilentLogger;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), "listing-watcher-"));
    logger = new SilentLogger();
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  const readJson = async (name: string): Promise<unknown> =>
    JSON.parse(await fs.readFile(path.join(dir, name), "utf-8"));

  it("should start empty when no files exist", async () => {
    const store = new FileStateStore(dir, { logger });

    expect(await store.loadSeen()).toEqual(new Set());
    expect(await store.loadPending()).toEqual([]);
    expect(await store.readSeen()).toEqual({
      ok: false,
      error: { kind: "missing", location: path.join(dir, "seen_ids.json") },
    });
  });

  it("should round-trip seen ids", async () => {
    const store = new FileStateStore(dir, { logger });

    await store.saveSeen(new Set(["300", "100", "200"]));

    expect(await readJson("seen_ids.json")).toEqual(["100", "200", "300"]);
    expect(await store.loadSeen()).toEqual(new Set(["100", "200", "300"]));
  });

  it("should cap seen ids to the newest", async () => {
    const store = new FileStateStore(dir, { logger, seenCap: 3 });

    await store.saveSeen(new Set(["5", "1", "10", "7"]));

    expect(await readJson("seen_ids.json")).toEqual(["5", "7", "10"]);
  });

  it("should accept numeric ids in the seen file", async () => {
    await fs.writeFile(path.join(dir, "seen_ids.json"), "[17820451, \"17820388\"]");
    const store = new FileStateStore(dir, { logger });

    expect(await store.loadSeen()).toEqual(new Set(["17820451", "17820388"]));
  });

  it("should write pending listings with snake_case fields", async () => {
    const store = new FileStateStore(dir, { logger });
    const listing = makeListing({
      id: "42",
      photoUrl: "https://img.example.com/42.jpg",
      price: "",
      refreshedAt: "剛剛",
    });

    await store.savePending([listing]);

    expect(await readJson("pending_listings.json")).toEqual([
      {
        id: "42",
        title: "Test listing",
        address: "大安區-新生南路二段",
        url: "https://rent.591.com.tw/100",
        photo_url: "https://img.example.com/42.jpg",
        price: "",
        area_text: "20坪",
        area_value: 20,
        floor_text: "2F/5F",
        floor_value: 2,
        has_elevator: true,
        room_label: "2房1廳1衛",
        kind_label: "整層住家",
        refreshed_at: "剛剛",
      },
    ]);
    expect(await store.loadPending()).toEqual([listing]);
  });

  it("should create the state directory on first write", async () => {
    const nested = path.join(dir, "a", "b");
    const store = new FileStateStore(nested, { logger });

    await store.savePending([]);

    expect(await fs.readFile(path.join(nested, "pending_listings.json"), "utf-8")).toBe("[]");
  });

  it("should treat a corrupt seen file as empty and warn", async () => {
    const warn = vi.spyOn(logger, "warn");
    await fs.writeFile(path.join(dir, "seen_ids.json"), "{not json");
    const store = new FileStateStore(dir, { logger });

    expect(await store.loadSeen()).toEqual(new Set());
    expect(warn).toHaveBeenCalledTimes(1);
    expect((await store.readSeen()).ok).toBe(false);
  });

  it("should treat a non-array pending file as empty", async () => {
    await fs.writeFile(path.join(dir, "pending_listings.json"), '{"id": "1"}');
    const store = new FileStateStore(dir, { logger });

    const result = await store.readPending();

    expect(result.ok ? "ok" : result.error.kind).toBe("corrupt");
    expect(await store.loadPending()).toEqual([]);
  });

  it("should drop invalid pending entries and keep the rest", async () => {
    const warn = vi.spyOn(logger, "warn");
    await fs.writeFile(
      path.join(dir, "pending_listings.json"),
      JSON.stringify([{ id: "7", title: "Kept", price: 18000 }, { title: "No id" }, "junk"])
    );
    const store = new FileStateStore(dir, { logger });

    const pending = await store.loadPending();

    expect(pending).toHaveLength(1);
    expect(pending[0]).toEqual({
      id: "7",
      title: "Kept",
      address: "",
      url: "",
      photoUrl: "",
      price: 18000,
      areaText: "",
      areaValue: 0,
      floorText: "",
      floorValue: 0,
      hasElevator: false,
      roomLabel: "",
      kindLabel: "",
      refreshedAt: "",
    });
    expect(warn).toHaveBeenCalledWith("Dropped 2 invalid pending entries");
  });
});
