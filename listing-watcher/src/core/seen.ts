import { idOrdinal } from "./rank";

export const DEFAULT_SEEN_CAP = 5000;

/**
 * Keep the `cap` ids with the highest ordinal, oldest first.
 * Non-numeric ids share ordinal 0 and keep their insertion order.
 */
export function capSeenIds(ids: Iterable<string>, cap: number = DEFAULT_SEEN_CAP): string[] {
  const sorted = [...ids].sort((a, b) => idOrdinal(a) - idOrdinal(b));
  return cap > 0 ? sorted.slice(-cap) : [];
}
