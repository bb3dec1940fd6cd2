import * as fs from "fs";
import * as path from "path";
import { z } from "zod";
import { RawItem, RawRecord, RegionProfile, SearchPage } from "../core/dto";
import { SourcePort } from "../core/ports";

const fixturesSchema = z.array(z.record(z.unknown()));

export function loadFixtures(
  fixturesPath = path.join(__dirname, "../../fixtures/nuxt_listings.json")
): RawItem[] {
  return fixturesSchema.parse(JSON.parse(fs.readFileSync(fixturesPath, "utf-8")));
}

/**
 * Serves fixture records as rendered-page results, for dev runs and tests.
 * Every profile sees the same records.
 */
export class MockSource implements SourcePort {
  private fixtures: RawItem[];
  private opened = false;

  constructor(
    private pageSize = 30,
    fixtures?: RawItem[]
  ) {
    this.fixtures = fixtures ?? loadFixtures();
  }

  async open(): Promise<void> {
    this.opened = true;
  }

  async fetchPage(_profile: RegionProfile, firstRow: number): Promise<SearchPage> {
    if (!this.opened) {
      throw new Error("MockSource.fetchPage called before open()");
    }

    const items = this.fixtures.slice(firstRow, firstRow + this.pageSize);

    return {
      records: items.map((item): RawRecord => ({ source: "nuxt", item })),
      total: this.fixtures.length,
    };
  }

  async close(): Promise<void> {
    this.opened = false;
  }
}
