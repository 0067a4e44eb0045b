import type { HistoryEntry, StatisticsSnapshot } from "./types.js";

export const DEFAULT_HISTORY_SIZE = 1000;

export class Statistics {
  private recordCount = 0;
  private playbackHits = 0;
  private playbackMisses = 0;

  incrementRecord(): void {
    this.recordCount += 1;
  }

  incrementHit(): void {
    this.playbackHits += 1;
  }

  incrementMiss(): void {
    this.playbackMisses += 1;
  }

  snapshot(): StatisticsSnapshot {
    return {
      record_count: this.recordCount,
      playback_hits: this.playbackHits,
      playback_misses: this.playbackMisses,
    };
  }
}

/** Newest-first log of proxied requests, trimmed to `maxEntries`. */
export class RequestHistory {
  private readonly entries: HistoryEntry[] = [];
  private readonly maxEntries: number;

  constructor(maxEntries = DEFAULT_HISTORY_SIZE) {
    this.maxEntries = maxEntries;
  }

  add(entry: HistoryEntry): void {
    this.entries.unshift(entry);
    this.prune();
  }

  list(): HistoryEntry[] {
    return this.entries.map((entry) => ({ ...entry }));
  }

  private prune(): void {
    while (this.entries.length > this.maxEntries) {
      this.entries.pop();
    }
  }
}
