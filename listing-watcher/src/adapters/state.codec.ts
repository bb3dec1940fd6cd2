import { err, ok, Result } from "@rentwatch/shared-utils";
import { z } from "zod";
import { Listing } from "../core/dto";

export type LoadError =
  | { kind: "missing"; location: string }
  | { kind: "unreadable"; location: string; cause: unknown }
  | { kind: "corrupt"; location: string; cause: unknown };

// On-disk shape: snake_case, one object per listing
const persistedListingSchema = z.object({
  id: z.string().min(1),
  title: z.string().default(""),
  address: z.string().default(""),
  url: z.string().default(""),
  photo_url: z.string().default(""),
  price: z.union([z.number(), z.string()]).default(""),
  area_text: z.string().default(""),
  area_value: z.number().default(0),
  floor_text: z.string().default(""),
  floor_value: z.number().default(0),
  has_elevator: z.boolean().default(false),
  room_label: z.string().default(""),
  kind_label: z.string().default(""),
  refreshed_at: z.string().default(""),
});

type PersistedListing = z.input<typeof persistedListingSchema>;

const seenSchema = z.array(z.union([z.string(), z.number()]).transform(String));
const pendingSchema = z.array(z.unknown());

export function toPersisted(listing: Listing): PersistedListing {
  return {
    id: listing.id,
    title: listing.title,
    address: listing.address,
    url: listing.url,
    photo_url: listing.photoUrl,
    price: listing.price,
    area_text: listing.areaText,
    area_value: listing.areaValue,
    floor_text: listing.floorText,
    floor_value: listing.floorValue,
    has_elevator: listing.hasElevator,
    room_label: listing.roomLabel,
    kind_label: listing.kindLabel,
    refreshed_at: listing.refreshedAt,
  };
}

function fromPersisted(value: z.output<typeof persistedListingSchema>): Listing {
  return Object.freeze({
    id: value.id,
    title: value.title,
    address: value.address,
    url: value.url,
    photoUrl: value.photo_url,
    price: value.price,
    areaText: value.area_text,
    areaValue: value.area_value,
    floorText: value.floor_text,
    floorValue: value.floor_value,
    hasElevator: value.has_elevator,
    roomLabel: value.room_label,
    kindLabel: value.kind_label,
    refreshedAt: value.refreshed_at,
  });
}

export function encodeSeen(ids: string[]): string {
  return JSON.stringify(ids);
}

export function encodePending(listings: Listing[]): string {
  return JSON.stringify(listings.map(toPersisted));
}

function parseJson(text: string, location: string): Result<unknown, LoadError> {
  try {
    return ok(JSON.parse(text));
  } catch (cause) {
    return err({ kind: "corrupt", location, cause });
  }
}

export function decodeSeen(text: string, location: string): Result<string[], LoadError> {
  const json = parseJson(text, location);
  if (!json.ok) return json;

  const parsed = seenSchema.safeParse(json.value);
  return parsed.success
    ? ok(parsed.data)
    : err({ kind: "corrupt", location, cause: parsed.error });
}

export interface DecodedPending {
  listings: Listing[];
  dropped: number; // entries that failed validation
}

/**
 * Entries that fail validation are dropped one by one; only a document
 * that is not a JSON array counts as corrupt.
 */
export function decodePending(
  text: string,
  location: string
): Result<DecodedPending, LoadError> {
  const json = parseJson(text, location);
  if (!json.ok) return json;

  const parsed = pendingSchema.safeParse(json.value);
  if (!parsed.success) {
    return err({ kind: "corrupt", location, cause: parsed.error });
  }

  const listings: Listing[] = [];
  let dropped = 0;

  for (const entry of parsed.data) {
    const listing = persistedListingSchema.safeParse(entry);
    if (listing.success) {
      listings.push(fromPersisted(listing.data));
    } else {
      dropped++;
    }
  }

  return ok({ listings, dropped });
}
