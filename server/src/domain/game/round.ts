// server/src/domain/game/round.ts
import type {
  ChatMessageEvent,
  Question,
  RevealOutcome,
  RoundResult,
  RoundState,
  Submission,
  Timestamp,
  Winner,
} from "../../types";
import { isCorrect, normalize } from "../question/textmatch";

export const DEFAULT_MAX_WINNERS = 5;

const ORDER: readonly RoundState[] = ["OPEN", "LOCKED", "REVEALED", "DONE"];

export class RoundTransitionError extends Error {
  constructor(readonly from: RoundState, readonly to: RoundState) {
    super(`Illegal round transition ${from} -> ${to}`);
    this.name = "RoundTransitionError";
  }
}

export type RoundOptions = {
  openDurationSeconds: number;
  maxWinners?: number;
};

/**
 * One question's lifecycle: OPEN -> LOCKED -> REVEALED -> DONE.
 *
 * Admission and transitions run inside the same exclusive section. The round is
 * created OPEN, so `postedAt` is fixed exactly once.
 */
export class Round {
  readonly question: Question;
  readonly postedAt: Timestamp;
  readonly cutoffAt: Timestamp;
  readonly maxWinners: number;

  private current: RoundState = "OPEN";
  private readonly log: Submission[] = [];
  private readonly ranked: Winner[] = [];
  private readonly winnerIds = new Set<string>();
  private outcome: RevealOutcome | null = null;
  private result: RoundResult | null = null;
  private inSection = false;

  constructor(question: Question, postedAt: Timestamp, opts: RoundOptions) {
    if (!Number.isFinite(postedAt)) throw new Error(`Invalid postedAt: ${postedAt}`);
    if (!(opts.openDurationSeconds >= 0)) throw new Error(`Invalid open duration: ${opts.openDurationSeconds}`);

    this.question = question;
    this.postedAt = postedAt;
    this.cutoffAt = postedAt + opts.openDurationSeconds;
    this.maxWinners = opts.maxWinners ?? DEFAULT_MAX_WINNERS;
  }

  get state(): RoundState {
    return this.current;
  }

  get submissions(): readonly Submission[] {
    return this.log.slice();
  }

  get winners(): readonly Winner[] {
    return this.ranked.slice();
  }

  /* ---------------------------------------------------------------------------------------- */
  admit(event: ChatMessageEvent): Submission {
    return this.exclusive(() => {
      const timestamp = typeof event.timestamp === "number" && Number.isFinite(event.timestamp) ? event.timestamp : null;
      const normalizedText = normalize(event.body);
      const correct = isCorrect(normalizedText, this.question.acceptedAnswers);
      const isValidWindow = this.current === "OPEN" && timestamp !== null && this.inWindow(timestamp);

      let isCountedWinner = false;
      if (
        isValidWindow &&
        correct &&
        timestamp !== null &&
        !this.winnerIds.has(event.senderId) &&
        this.ranked.length < this.maxWinners
      ) {
        this.insertWinner({
          senderId: event.senderId,
          senderName: event.senderName,
          timestamp,
          responseTimeSeconds: timestamp - this.postedAt,
          messageId: event.messageId ?? null,
        });
        isCountedWinner = true;
      }

      const submission: Submission = Object.freeze({
        senderId: event.senderId,
        senderName: event.senderName,
        rawText: event.body,
        timestamp,
        messageId: event.messageId ?? null,
        normalizedText,
        isCorrect: correct,
        isValidWindow,
        isCountedWinner,
      });

      // DONE rounds are immutable: the submission is evaluated but not kept
      if (this.current !== "DONE") this.log.push(submission);
      return submission;
    });
  }
  /* ---------------------------------------------------------------------------------------- */

  /** Returns true when the round actually moved, false when `to` was already reached. */
  transition(to: RoundState): boolean {
    return this.exclusive(() => this.step(to));
  }

  lock(): boolean {
    return this.transition("LOCKED");
  }

  /** LOCKED -> REVEALED; repeated calls hand back the same outcome. */
  reveal(): RevealOutcome {
    return this.exclusive(() => {
      this.step("REVEALED");
      if (!this.outcome) {
        const first = this.ranked[0];
        this.outcome = first
          ? { kind: "winner", winner: first, correctCount: this.ranked.length }
          : { kind: "none", acceptedAnswers: [...this.question.acceptedAnswers].sort() };
      }
      return this.outcome;
    });
  }

  finish(): RoundResult {
    return this.exclusive(() => {
      this.step("DONE");
      if (!this.result) {
        this.result = Object.freeze({
          questionText: this.question.text,
          winners: Object.freeze(this.ranked.map((w) => Object.freeze({ ...w }))),
        });
      }
      return this.result;
    });
  }

  /* ---------------------------------------------------------------------------------------- */
  private step(to: RoundState): boolean {
    const from = ORDER.indexOf(this.current);
    const target = ORDER.indexOf(to);

    // a round never re-opens: postedAt belongs to the one OPEN phase
    if (to === "OPEN") throw new RoundTransitionError(this.current, to);
    if (target <= from) return false;
    if (target !== from + 1) throw new RoundTransitionError(this.current, to);

    this.current = to;
    return true;
  }

  private inWindow(timestamp: Timestamp): boolean {
    if (timestamp < this.postedAt || timestamp > this.cutoffAt) return false;
    return timestamp - this.postedAt >= 0;
  }

  // ascending response time, equal times keep arrival order
  private insertWinner(winner: Winner) {
    let i = this.ranked.length;
    while (i > 0 && this.ranked[i - 1].responseTimeSeconds > winner.responseTimeSeconds) i--;
    this.ranked.splice(i, 0, winner);
    this.winnerIds.add(winner.senderId);
  }

  private exclusive<T>(fn: () => T): T {
    if (this.inSection) throw new Error("Round is already inside an exclusive section");
    this.inSection = true;
    try {
      return fn();
    } finally {
      this.inSection = false;
    }
  }
  /* ---------------------------------------------------------------------------------------- */
}
