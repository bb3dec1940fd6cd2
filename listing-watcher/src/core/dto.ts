export type Price = number | string; // string = value the source did not give as a number

export interface Listing {
  readonly id: string; // source post id; ids grow with posting time
  readonly title: string;
  readonly address: string;
  readonly url: string;
  readonly photoUrl: string;

  readonly price: Price;
  readonly areaText: string; // e.g. "18.5坪"
  readonly areaValue: number;
  readonly floorText: string; // e.g. "4F/8F"
  readonly floorValue: number;
  readonly hasElevator: boolean;

  readonly roomLabel: string; // e.g. "2房1廳"
  readonly kindLabel: string;
  readonly refreshedAt: string;
}

/**
 * Raw record as produced by a transport, tagged with the transport that
 * produced it
 */
export type RawRecord =
  | { source: "api"; item: RawItem }
  | { source: "nuxt"; item: RawItem };

export type RawSource = RawRecord["source"];

export type RawItem = Record<string, unknown>;

export interface SearchFilters {
  kind: number; // 1 = whole-floor home
  layouts: number[]; // room counts
  price: [number, number];
  area: [number, number]; // ping
  other: string[];
  options: string[];
  order: string;
  orderType: "asc" | "desc";
}

export interface RegionProfile {
  label: string;
  region: number;
  sections: number[];
  filters: SearchFilters;
}

export interface SearchPage {
  records: RawRecord[];
  total: number; // server-reported match count, 0 when unknown
}

export type RejectReason =
  | "missing_id"
  | "seen"
  | "price_out_of_range"
  | "walkup_too_high"
  | "open_plan"
  | "too_small";

export type RunStatus = "ok" | "session_failed" | "failed";

export interface RunResult {
  status: RunStatus;
  fetched: number;
  matched: number;
  rejected: Partial<Record<RejectReason, number>>;
  pendingIn: number;
  delivered: number;
  failedDeliveries: number;
  carried: number;
  durationMs: number;
  error?: string;
}
