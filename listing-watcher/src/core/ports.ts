import { Listing, RegionProfile, SearchPage } from "./dto";

// Search-result transport (search API, rendered page, fixtures)
export interface SourcePort {
  open(): Promise<void>;
  fetchPage(profile: RegionProfile, firstRow: number): Promise<SearchPage>;
  close(): Promise<void>;
}

// Messaging channel; resolves false instead of throwing on delivery failure
export interface NotifierPort {
  send(text: string): Promise<boolean>;
}

// Seen ids + pending queue, read once at run start and written at run end
export interface StatePort {
  loadSeen(): Promise<Set<string>>;
  saveSeen(ids: Set<string>): Promise<void>;
  loadPending(): Promise<Listing[]>;
  savePending(listings: Listing[]): Promise<void>;
}
