import { Listing } from "./dto";

/**
 * Recency proxy: post ids grow with posting time. Non-numeric ids rank lowest.
 */
export function postedMarker(listing: Pick<Listing, "id">): number {
  return idOrdinal(listing.id);
}

export function idOrdinal(id: string): number {
  return /^\d+$/.test(id) ? parseInt(id, 10) : 0;
}

// Known prices ascending, unknown prices last
function comparePrice(a: Listing, b: Listing): number {
  if (typeof a.price === "number" && typeof b.price === "number") {
    return a.price - b.price;
  }
  if (typeof a.price === "number") return -1;
  if (typeof b.price === "number") return 1;
  return 0;
}

/**
 * Newest first, then larger, then cheaper. Stable for equal keys.
 */
export function rank(listings: readonly Listing[]): Listing[] {
  return [...listings].sort(
    (a, b) =>
      postedMarker(b) - postedMarker(a) ||
      b.areaValue - a.areaValue ||
      comparePrice(a, b)
  );
}

/**
 * Pending queue followed by new matches, keeping the first copy of each id
 */
export function mergeQueue(pending: readonly Listing[], fresh: readonly Listing[]): Listing[] {
  const ids = new Set<string>();
  const merged: Listing[] = [];

  for (const listing of [...pending, ...fresh]) {
    if (ids.has(listing.id)) continue;
    ids.add(listing.id);
    merged.push(listing);
  }
  return merged;
}
