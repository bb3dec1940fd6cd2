import { Listing, RawItem, RawRecord, RegionProfile } from "../src/core/dto";
import { COMMON_FILTERS } from "../src/config/profiles";

export function makeListing(overrides: Partial<Listing> = {}): Listing {
  return {
    id: "100",
    title: "Test listing",
    address: "大安區-新生南路二段",
    url: "https://rent.591.com.tw/100",
    photoUrl: "",
    price: 20000,
    areaText: "20坪",
    areaValue: 20,
    floorText: "2F/5F",
    floorValue: 2,
    hasElevator: true,
    roomLabel: "2房1廳1衛",
    kindLabel: "整層住家",
    refreshedAt: "",
    ...overrides,
  };
}

export function nuxtRecord(item: RawItem): RawRecord {
  return { source: "nuxt", item };
}

export function apiRecord(item: RawItem): RawRecord {
  return { source: "api", item };
}

/** A raw record that passes every filter rule */
export function goodNuxtItem(id: number, overrides: RawItem = {}): RawItem {
  return {
    id,
    title: `Listing ${id}`,
    price: "20,000",
    area: "20",
    area_name: "20坪",
    floor_name: "2F/5F",
    tags: ["有電梯"],
    layoutStr: "2房1廳1衛",
    kind_name: "整層住家",
    address: "永和區-竹林路",
    ...overrides,
  };
}

export const testProfile: RegionProfile = {
  label: "Test region",
  region: 1,
  sections: [5],
  filters: COMMON_FILTERS,
};

export const noSleep = async (): Promise<void> => {};
