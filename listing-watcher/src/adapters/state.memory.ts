import { Listing } from "../core/dto";
import { StatePort } from "../core/ports";
import { capSeenIds, DEFAULT_SEEN_CAP } from "../core/seen";

export class MemoryStateStore implements StatePort {
  private seen: string[] = [];
  private pending: Listing[] = [];
  private saves = { seen: 0, pending: 0 };

  constructor(private seenCap = DEFAULT_SEEN_CAP) {}

  async loadSeen(): Promise<Set<string>> {
    return new Set(this.seen);
  }

  async saveSeen(ids: Set<string>): Promise<void> {
    this.seen = capSeenIds(ids, this.seenCap);
    this.saves.seen++;
  }

  async loadPending(): Promise<Listing[]> {
    return [...this.pending];
  }

  async savePending(listings: Listing[]): Promise<void> {
    this.pending = [...listings];
    this.saves.pending++;
  }

  // Helper methods for testing and debugging
  getSeen(): string[] {
    return [...this.seen];
  }

  getPending(): Listing[] {
    return [...this.pending];
  }

  saveCount(): { seen: number; pending: number } {
    return { ...this.saves };
  }

  seed(state: { seen?: string[]; pending?: Listing[] }): void {
    this.seen = [...(state.seen ?? [])];
    this.pending = [...(state.pending ?? [])];
  }
}
