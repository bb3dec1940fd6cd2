import { Listing, RawRecord, RejectReason } from "./dto";
import { normalize, NormalizeOptions } from "./normalize";

export interface FilterRules {
  maxPrice: number;
  maxWalkupFloor: number; // highest floor accepted without an elevator
  openPlanMarker: string;
  minArea: number; // ping
}

export const DEFAULT_FILTER_RULES: FilterRules = {
  maxPrice: 30000,
  maxWalkupFloor: 3,
  openPlanMarker: "開放式",
  minArea: 15,
};

interface Predicate {
  reason: RejectReason;
  accepts(listing: Listing, seen: ReadonlySet<string>, rules: FilterRules): boolean;
}

// Order only matters for short-circuiting; each predicate stands alone.
const predicates: Predicate[] = [
  { reason: "missing_id", accepts: (l) => l.id !== "" },
  { reason: "seen", accepts: (l, seen) => !seen.has(l.id) },
  {
    // Non-numeric prices (masked / negotiable) are let through on purpose.
    reason: "price_out_of_range",
    accepts: (l, _seen, rules) =>
      typeof l.price !== "number" || (l.price > 0 && l.price <= rules.maxPrice),
  },
  {
    reason: "walkup_too_high",
    accepts: (l, _seen, rules) => l.hasElevator || l.floorValue <= rules.maxWalkupFloor,
  },
  {
    reason: "open_plan",
    accepts: (l, _seen, rules) => !l.roomLabel.includes(rules.openPlanMarker),
  },
  { reason: "too_small", accepts: (l, _seen, rules) => l.areaValue >= rules.minArea },
];

/**
 * First rule the listing fails, or null when it passes them all
 */
export function evaluate(
  listing: Listing,
  seen: ReadonlySet<string>,
  rules: FilterRules = DEFAULT_FILTER_RULES
): RejectReason | null {
  for (const predicate of predicates) {
    if (!predicate.accepts(listing, seen, rules)) {
      return predicate.reason;
    }
  }
  return null;
}

export interface Selection {
  listings: Listing[];
  rejected: Partial<Record<RejectReason, number>>;
}

/**
 * Normalize, dedup and filter raw records. Every kept id is added to
 * `seen`, so a listing returned by two overlapping profiles is kept once.
 */
export function select(
  records: RawRecord[],
  seen: Set<string>,
  rules: FilterRules = DEFAULT_FILTER_RULES,
  normalizeOptions: NormalizeOptions = {}
): Selection {
  const listings: Listing[] = [];
  const rejected: Partial<Record<RejectReason, number>> = {};

  for (const raw of records) {
    const listing = normalize(raw, normalizeOptions);
    const reason = evaluate(listing, seen, rules);

    if (reason) {
      rejected[reason] = (rejected[reason] ?? 0) + 1;
      continue;
    }

    listings.push(listing);
    seen.add(listing.id);
  }

  return { listings, rejected };
}

export function mergeRejections(
  into: Partial<Record<RejectReason, number>>,
  from: Partial<Record<RejectReason, number>>
): void {
  for (const { reason } of predicates) {
    const count = from[reason];
    if (count) {
      into[reason] = (into[reason] ?? 0) + count;
    }
  }
}
