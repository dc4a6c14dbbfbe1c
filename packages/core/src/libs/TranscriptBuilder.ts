import type { Action } from "../types/game";
import type { TranscriptEntry } from "../types/match";

/**
 * Records the moves of a match in the order they were applied.
 */
export class TranscriptBuilder<TPlayer extends string, TMove> {
  private entries: TranscriptEntry<TPlayer, TMove>[] = [];

  addEntry(
    player: TPlayer,
    action: Action<TMove>,
    score: number | null = null
  ): TranscriptEntry<TPlayer, TMove> {
    const entry: TranscriptEntry<TPlayer, TMove> = {
      sequence: this.entries.length,
      player,
      action,
      score,
      timestamp: Date.now(),
    };

    this.entries.push(entry);
    return entry;
  }

  getEntries(): TranscriptEntry<TPlayer, TMove>[] {
    return [...this.entries];
  }

  get length(): number {
    return this.entries.length;
  }
}
