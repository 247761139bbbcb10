import { Injectable } from "@nestjs/common";

export interface CritiqueHistoryEntry {
  timestamp: string;
  fileHash: string;
  challengeCount: number;
  blindSpotCount: number;
  adjustment: number;
  verdictChallenged: boolean;
}

export const DEFAULT_HISTORY_CAPACITY = 200;

/**
 * Bounded, append-only log of past critiques. When full, the oldest entry is
 * overwritten. Entries are never modified after they are appended.
 */
@Injectable()
export class CritiqueHistory {
  private readonly entries: CritiqueHistoryEntry[] = [];
  private start = 0;

  constructor(readonly capacity: number = DEFAULT_HISTORY_CAPACITY) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new Error(`critique history capacity must be a positive integer, got ${capacity}`);
    }
  }

  get size(): number {
    return this.entries.length;
  }

  append(entry: CritiqueHistoryEntry): void {
    const frozen = Object.freeze({ ...entry });
    if (this.entries.length < this.capacity) {
      this.entries.push(frozen);
      return;
    }
    this.entries[this.start] = frozen;
    this.start = (this.start + 1) % this.capacity;
  }

  /** The `count` most recent entries, oldest first. */
  recent(count: number): CritiqueHistoryEntry[] {
    const ordered = this.toArray();
    return count > 0 ? ordered.slice(-count) : [];
  }

  toArray(): CritiqueHistoryEntry[] {
    return [...this.entries.slice(this.start), ...this.entries.slice(0, this.start)];
  }
}
