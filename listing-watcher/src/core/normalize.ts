import { Listing, Price, RawItem, RawRecord, RawSource } from "./dto";

export const ELEVATOR_TAG = "有電梯";
export const DEFAULT_KIND_LABEL = "整層住家";
export const DEFAULT_DETAIL_BASE_URL = "https://rent.591.com.tw";

export interface NormalizeOptions {
  detailBaseUrl?: string;
}

type RecordNormalizer = (item: RawItem, options: Required<NormalizeOptions>) => Listing;

const normalizers: Record<RawSource, RecordNormalizer> = {
  nuxt: normalizeNuxtItem,
  api: normalizeApiItem,
};

/**
 * Map a transport record onto the canonical Listing. Never throws.
 */
export function normalize(raw: RawRecord, options: NormalizeOptions = {}): Listing {
  return normalizers[raw.source](raw.item, {
    detailBaseUrl: options.detailBaseUrl ?? DEFAULT_DETAIL_BASE_URL,
  });
}

// Records embedded in the rendered search page (window.__NUXT__)
function normalizeNuxtItem(item: RawItem, options: Required<NormalizeOptions>): Listing {
  const id = text(item.id);
  const floorText = text(item.floor_name);

  return Object.freeze({
    id,
    title: text(item.title),
    address: text(item.address),
    url: text(item.url) || detailUrl(options.detailBaseUrl, id),
    photoUrl: text(item.cover),
    price: parsePrice(item.price),
    areaText: text(item.area_name) || text(item.area),
    areaValue: parseArea(item.area),
    floorText,
    floorValue: parseFloor(floorText),
    hasElevator: tagNames(item.tags).includes(ELEVATOR_TAG),
    roomLabel: text(item.layoutStr),
    kindLabel: text(item.kind_name) || DEFAULT_KIND_LABEL,
    refreshedAt: text(item.refresh_time),
  });
}

// Records from the JSON search endpoint
function normalizeApiItem(item: RawItem, options: Required<NormalizeOptions>): Listing {
  const id = text(item.post_id);
  const floorText = text(item.floor_str);
  const rawArea = text(item.area);
  const photos = Array.isArray(item.photo_list) ? item.photo_list : [];

  return Object.freeze({
    id,
    title: text(item.title),
    address:
      text(item.location) ||
      [text(item.section_name), text(item.street_name)].filter(Boolean).join(""),
    url: detailUrl(options.detailBaseUrl, id),
    photoUrl: text(photos[0]),
    price: parsePrice(item.price),
    areaText: rawArea ? `${rawArea}坪` : "",
    areaValue: parseArea(item.area),
    floorText,
    floorValue: parseFloor(floorText),
    hasElevator: tagNames(item.rent_tag).includes(ELEVATOR_TAG),
    roomLabel: text(item.room_str),
    kindLabel: text(item.kind_name) || DEFAULT_KIND_LABEL,
    refreshedAt: text(item.refresh_time),
  });
}

/**
 * Current floor from a "4F/8F" style label. Basement floors count as 0,
 * and so does anything without digits ("RF/10F").
 */
export function parseFloor(floorText: string): number {
  if (!floorText) return 0;

  const part = floorText.split("/")[0].trim().toUpperCase();
  if (part.startsWith("B")) return 0;

  const digits = part.replace(/\D/g, "");
  return digits ? parseInt(digits, 10) : 0;
}

/**
 * Monthly rent. Numbers pass through, digit strings (with thousands
 * separators) are parsed, other strings become 0. A missing value stays
 * the empty-string sentinel so numeric bounds are not applied to it.
 */
export function parsePrice(value: unknown): Price {
  if (value === undefined || value === null) return "";
  if (typeof value === "number") {
    return Number.isFinite(value) ? Math.trunc(value) : 0;
  }
  if (typeof value === "string") {
    const cleaned = value.replace(/,/g, "").trim();
    return /^\d+$/.test(cleaned) ? parseInt(cleaned, 10) : 0;
  }
  return "";
}

export function parseArea(value: unknown): number {
  if (typeof value === "number") {
    return Number.isFinite(value) ? value : 0;
  }
  if (typeof value === "string") {
    const cleaned = value.replace(/,/g, "").trim();
    return /^(\d+\.?\d*|\.\d+)$/.test(cleaned) ? parseFloat(cleaned) : 0;
  }
  return 0;
}

export function detailUrl(baseUrl: string, id: string): string {
  return `${baseUrl.replace(/\/+$/, "")}/${id}`;
}

function text(value: unknown): string {
  if (typeof value === "string") return value;
  if (typeof value === "number" && Number.isFinite(value)) return String(value);
  return "";
}

function tagNames(value: unknown): string[] {
  if (!Array.isArray(value)) return [];

  return value.map((tag: unknown) => {
    if (typeof tag === "string") return tag;
    if (typeof tag === "object" && tag !== null && "name" in tag) {
      return text(tag.name);
    }
    return "";
  });
}
