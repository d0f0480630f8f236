// server/src/domain/game/leaderboard.service.ts
import type { LeaderboardEntry, Winner } from "../../types";

export class LeaderboardSealedError extends Error {
  constructor() {
    super("Leaderboard is final, no more rounds can be recorded");
    this.name = "LeaderboardSealedError";
  }
}

/**
 * Session-wide results, one entry per completed round in question order.
 * Entries are frozen on the way in, so snapshots can be handed out freely.
 */
export class LeaderboardAggregator {
  private readonly entries: LeaderboardEntry[] = [];
  private sealed = false;

  get isFinal(): boolean {
    return this.sealed;
  }

  get size(): number {
    return this.entries.length;
  }

  record(questionText: string, winners: readonly Winner[]) {
    if (this.sealed) throw new LeaderboardSealedError();
    this.entries.push(
      Object.freeze({
        questionText,
        winners: Object.freeze(winners.map((w) => Object.freeze({ ...w }))),
      }),
    );
  }

  snapshot(): readonly LeaderboardEntry[] {
    return Object.freeze(this.entries.slice());
  }

  finalize() {
    this.sealed = true;
  }
}
