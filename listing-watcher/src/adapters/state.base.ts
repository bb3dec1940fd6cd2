import { Logger, Result } from "@rentwatch/shared-utils";
import { Listing } from "../core/dto";
import { StatePort } from "../core/ports";
import { capSeenIds, DEFAULT_SEEN_CAP } from "../core/seen";
import {
  decodePending,
  DecodedPending,
  decodeSeen,
  encodePending,
  encodeSeen,
  LoadError,
} from "./state.codec";

export const SEEN_DOCUMENT = "seen_ids";
export const PENDING_DOCUMENT = "pending_listings";

export type StateDocument = typeof SEEN_DOCUMENT | typeof PENDING_DOCUMENT;

export interface StateStoreOptions {
  seenCap?: number;
  logger: Logger;
}

/**
 * State kept as two JSON documents. Subclasses only move text in and out;
 * decoding and the "unreadable means empty" policy live here.
 */
export abstract class DocumentStateStore implements StatePort {
  protected readonly seenCap: number;
  protected readonly logger: Logger;

  constructor(options: StateStoreOptions) {
    this.seenCap = options.seenCap ?? DEFAULT_SEEN_CAP;
    this.logger = options.logger;
  }

  /** Where a document lives, for log lines (path, key) */
  protected abstract locate(name: StateDocument): string;
  protected abstract readDocument(name: StateDocument): Promise<Result<string, LoadError>>;
  protected abstract writeDocument(name: StateDocument, text: string): Promise<void>;

  async readSeen(): Promise<Result<string[], LoadError>> {
    const text = await this.readDocument(SEEN_DOCUMENT);
    return text.ok ? decodeSeen(text.value, this.locate(SEEN_DOCUMENT)) : text;
  }

  async readPending(): Promise<Result<DecodedPending, LoadError>> {
    const text = await this.readDocument(PENDING_DOCUMENT);
    return text.ok ? decodePending(text.value, this.locate(PENDING_DOCUMENT)) : text;
  }

  async loadSeen(): Promise<Set<string>> {
    const result = await this.readSeen();
    return new Set(this.orDefault(result, []));
  }

  async saveSeen(ids: Set<string>): Promise<void> {
    await this.writeDocument(SEEN_DOCUMENT, encodeSeen(capSeenIds(ids, this.seenCap)));
  }

  async loadPending(): Promise<Listing[]> {
    const result = await this.readPending();
    const decoded = this.orDefault(result, { listings: [], dropped: 0 });

    if (decoded.dropped > 0) {
      this.logger.warn(`Dropped ${decoded.dropped} invalid pending entries`);
    }
    return decoded.listings;
  }

  async savePending(listings: Listing[]): Promise<void> {
    await this.writeDocument(PENDING_DOCUMENT, encodePending(listings));
  }

  private orDefault<T>(result: Result<T, LoadError>, fallback: T): T {
    if (result.ok) return result.value;

    const { error } = result;
    if (error.kind === "missing") {
      this.logger.debug(`No saved state at ${error.location}, starting empty`);
    } else {
      this.logger.warn(
        `State at ${error.location} is ${error.kind}, starting empty:`,
        error.cause
      );
    }
    return fallback;
  }
}
