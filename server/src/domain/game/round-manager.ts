// server/src/domain/game/round-manager.ts
import type { Logger } from "pino";
import type {
  ChatMessageEvent,
  ChatTransport,
  LeaderboardEntry,
  Question,
  RoundConfig,
  RoundDurations,
  RoundSignal,
  RoundState,
  SendOptions,
  SentMessage,
  SessionStatus,
  Submission,
  Timestamp,
} from "../../types";
import type { LeaderboardAggregator } from "./leaderboard.service";
import { PhaseTimer } from "./phase-timer";
import { Round } from "./round";

export type AuditSink = (event: string, data: Record<string, unknown>) => void;

export type RoundManagerDeps = {
  transport: ChatTransport;
  leaderboard: LeaderboardAggregator;
  config: RoundConfig;
  logger: Logger;
  clock?: () => Timestamp;
  audit?: AuditSink;
};

type ActiveRound = {
  round: Round;
  timer: PhaseTimer;
  number: number;
  isLast: boolean;
  // chat lines of this round go out one after another
  outbox: Promise<unknown>;
};

// the state a signal ends
const SIGNAL_PHASE: Record<RoundSignal, RoundState> = {
  STOP: "OPEN",
  REP: "LOCKED",
  NEXT: "REVEALED",
};

const systemClock = () => Date.now() / 1000;

export class RoundManager {
  private readonly transport: ChatTransport;
  private readonly leaderboard: LeaderboardAggregator;
  private readonly config: RoundConfig;
  private readonly log: Logger;
  private readonly clock: () => Timestamp;
  private readonly audit?: AuditSink;

  private questions: Question[] = [];
  private durations: RoundDurations;
  private active: ActiveRound | null = null;
  private lastIndex = -1;
  private opening = false;
  private running = false;
  private finished = false;
  private sessionSeq = 0;

  private readonly done: Promise<readonly LeaderboardEntry[]>;
  private resolveDone: (entries: readonly LeaderboardEntry[]) => void = () => {};

  constructor(deps: RoundManagerDeps) {
    this.transport = deps.transport;
    this.leaderboard = deps.leaderboard;
    this.config = deps.config;
    this.log = deps.logger;
    this.clock = deps.clock ?? systemClock;
    this.audit = deps.audit;
    this.durations = pickDurations(deps.config);
    this.done = new Promise((resolve) => {
      this.resolveDone = resolve;
    });
  }

  get isRunning(): boolean {
    return this.running;
  }

  get isFinished(): boolean {
    return this.finished;
  }

  /** The live round, if any. Exposed for status pages and tests. */
  get currentRound(): Round | null {
    return this.active?.round ?? null;
  }

  whenFinished(): Promise<readonly LeaderboardEntry[]> {
    return this.done;
  }

  /* ---------------------------------------------------------------------------------------- */
  async start(questions: readonly Question[], durations: RoundDurations = this.config) {
    if (this.running || this.finished) throw new Error("Trivia session already started");

    this.durations = checkDurations(pickDurations(durations));
    this.questions = questions.slice();
    this.running = true;
    this.sessionSeq += 1;

    this.log.info({ questions: this.questions.length, ...this.durations }, "session_start");

    if (this.questions.length === 0) {
      this.log.warn("No questions to play");
      this.finalize();
      return;
    }
    await this.openRound(0);
  }
  /* ---------------------------------------------------------------------------------------- */

  /* ---------------------------------------------------------------------------------------- */
  // transport callback: synchronous, no I/O
  onMessage(event: ChatMessageEvent): Submission | null {
    const current = this.active;
    if (!current) return null;

    const submission = current.round.admit(event);

    if (submission.isCountedWinner) {
      this.log.info(
        {
          q: current.number,
          sender: submission.senderName,
          answer: submission.normalizedText,
          responseTime: submission.timestamp === null ? null : submission.timestamp - current.round.postedAt,
        },
        "correct_answer",
      );
    } else if (submission.isCorrect && !submission.isValidWindow) {
      this.log.info(
        { q: current.number, sender: submission.senderName, timestamp: submission.timestamp, cutoffAt: current.round.cutoffAt },
        "answer_outside_window",
      );
    }

    this.audit?.("submission", {
      q: current.number,
      senderId: submission.senderId,
      sender: submission.senderName,
      text: submission.normalizedText,
      t: submission.timestamp,
      valid: submission.isValidWindow,
      correct: submission.isCorrect,
      winner: submission.isCountedWinner,
    });

    return submission;
  }
  /* ---------------------------------------------------------------------------------------- */

  /* ---------------------------------------------------------------------------------------- */
  /** Ends the matching phase now. Returns false when that phase is not the current one. */
  signal(kind: RoundSignal): boolean {
    const current = this.active;
    if (!current || current.round.state !== SIGNAL_PHASE[kind]) {
      this.log.debug({ signal: kind, state: current?.round.state ?? null }, "signal_ignored");
      return false;
    }

    current.timer.cancel(kind);
    this.log.info({ signal: kind, q: current.number }, "signal");
    this.runPhase(kind, current);
    return true;
  }
  /* ---------------------------------------------------------------------------------------- */

  /* ---------------------------------------------------------------------------------------- */
  async advance() {
    if (!this.running || this.opening) return;
    if (this.active) throw new Error(`Cannot advance while round Q${this.active.number} is ${this.active.round.state}`);

    const next = this.lastIndex + 1;
    if (next >= this.questions.length) {
      this.finalize();
      return;
    }
    await this.openRound(next);
  }
  /* ---------------------------------------------------------------------------------------- */

  /* ---------------------------------------------------------------------------------------- */
  /** Aborts the session: the live round is recorded as it stands and the leaderboard sealed. */
  stop() {
    if (!this.running) return;
    this.sessionSeq += 1;

    const current = this.active;
    if (current) {
      current.timer.cancel();
      current.round.lock();
      current.round.reveal();
      this.completeRound(current);
    }
    this.log.info("session_stopped");
    this.finalize();
  }
  /* ---------------------------------------------------------------------------------------- */

  status(): SessionStatus {
    const current = this.active;
    return {
      running: this.running,
      finished: this.finished,
      questionNumber: current?.number ?? null,
      totalQuestions: this.questions.length,
      state: current?.round.state ?? null,
      questionText: current?.round.question.text ?? null,
      postedAt: current?.round.postedAt ?? null,
      cutoffAt: current?.round.cutoffAt ?? null,
      submissions: current?.round.submissions.length ?? 0,
      winners: current?.round.winners ?? [],
    };
  }

  /* ---------------------------------------------------------------------------------------- */
  private async openRound(index: number) {
    const question = this.questions[index];
    if (!question) return;

    const seq = this.sessionSeq;
    const number = index + 1;
    this.opening = true;

    let posted: SentMessage | null;
    try {
      posted = await this.post(`Q${number}: ${question.text}`);
    } finally {
      this.opening = false;
    }
    if (seq !== this.sessionSeq || !this.running) return;

    let postedAt = posted?.timestamp;
    if (typeof postedAt !== "number" || !Number.isFinite(postedAt)) {
      this.log.warn({ q: number }, "No chat timestamp for the question, using the local clock");
      postedAt = this.clock();
    }

    const round = new Round(question, postedAt, {
      openDurationSeconds: this.durations.openDurationSeconds,
      maxWinners: this.config.maxWinnersPerRound,
    });
    const current: ActiveRound = {
      round,
      timer: new PhaseTimer(),
      number,
      isLast: number === this.questions.length,
      outbox: Promise.resolve(),
    };

    this.lastIndex = index;
    this.active = current;

    this.log.info({ q: number, question: question.text, postedAt, cutoffAt: round.cutoffAt }, "round_open");
    this.audit?.("round_open", { q: number, postedAt, cutoffAt: round.cutoffAt });

    current.timer.schedule("STOP", this.durations.openDurationSeconds * 1000, () => this.runPhase("STOP", current));
  }
  /* ---------------------------------------------------------------------------------------- */

  private runPhase(kind: RoundSignal, current: ActiveRound) {
    const phase =
      kind === "STOP" ? this.lockPhase(current) : kind === "REP" ? this.revealPhase(current) : this.nextPhase(current);
    phase.catch((err) => this.log.error({ err, phase: kind, q: current.number }, "phase failed"));
  }

  /* ---------------------------------------------------------------------------------------- */
  private async lockPhase(current: ActiveRound) {
    if (this.active !== current || !current.round.lock()) return;

    // next timer counts from the moment this phase began
    current.timer.schedule("REP", this.durations.revealDelaySeconds * 1000, () => this.runPhase("REP", current));

    this.log.info({ q: current.number, submissions: current.round.submissions.length }, "round_locked");
    this.audit?.("round_locked", { q: current.number });
    await this.postInOrder(current, "STOP");
  }
  /* ---------------------------------------------------------------------------------------- */

  /* ---------------------------------------------------------------------------------------- */
  private async revealPhase(current: ActiveRound) {
    if (this.active !== current || current.round.state !== "LOCKED") return;

    const outcome = current.round.reveal();
    if (!current.isLast) {
      current.timer.schedule("NEXT", this.durations.advanceDelaySeconds * 1000, () => this.runPhase("NEXT", current));
    }

    if (outcome.kind === "winner") {
      this.log.info({ q: current.number, correct: outcome.correctCount, first: outcome.winner.senderName }, "round_revealed");
      await this.postInOrder(current, "REP", outcome.winner.messageId ? { quoteId: outcome.winner.messageId } : undefined);
    } else {
      this.log.info({ q: current.number, correct: 0 }, "round_revealed");
      await this.postInOrder(current, `REP: ${outcome.acceptedAnswers.join(" / ")}`);
    }
    this.audit?.("round_revealed", { q: current.number, winners: current.round.winners.length });

    // the last question is recorded right after its reveal, without a NEXT
    if (current.isLast && this.active === current) {
      this.completeRound(current);
      await this.advance();
    }
  }
  /* ---------------------------------------------------------------------------------------- */

  /* ---------------------------------------------------------------------------------------- */
  private async nextPhase(current: ActiveRound) {
    if (this.active !== current || current.round.state !== "REVEALED") return;

    this.completeRound(current);
    if (!current.isLast) await this.postInOrder(current, "NEXT");
    await this.advance();
  }
  /* ---------------------------------------------------------------------------------------- */

  private completeRound(current: ActiveRound) {
    current.timer.cancel();
    const result = current.round.finish();
    this.leaderboard.record(result.questionText, result.winners);
    this.active = null;

    this.log.info({ q: current.number, winners: result.winners.map((w) => w.senderName) }, "round_done");
    this.audit?.("round_done", { q: current.number, winners: result.winners.length });
  }

  private finalize() {
    if (this.finished) return;
    this.running = false;
    this.finished = true;
    this.active?.timer.cancel();
    this.active = null;

    this.leaderboard.finalize();
    const entries = this.leaderboard.snapshot();
    this.log.info({ rounds: entries.length }, "session_finished");
    this.resolveDone(entries);
  }

  // waits for the round's previous line; post() never rejects, so the chain cannot break
  private postInOrder(current: ActiveRound, text: string, opts?: SendOptions): Promise<SentMessage | null> {
    const sent = current.outbox.then(() => this.post(text, opts));
    current.outbox = sent;
    return sent;
  }

  // sends are fire-and-forget for the game flow: failures are logged, never retried
  private async post(text: string, opts?: SendOptions): Promise<SentMessage | null> {
    try {
      return await this.transport.send(text, opts);
    } catch (err) {
      this.log.error({ err, text }, "chat send failed");
      return null;
    }
  }
}

/* ---------------------------------------------------------------------------------------- */
function pickDurations(d: RoundDurations): RoundDurations {
  return {
    openDurationSeconds: d.openDurationSeconds,
    revealDelaySeconds: d.revealDelaySeconds,
    advanceDelaySeconds: d.advanceDelaySeconds,
  };
}

function checkDurations(d: RoundDurations): RoundDurations {
  for (const [key, value] of Object.entries(d)) {
    if (!Number.isFinite(value) || value < 0) throw new Error(`Invalid ${key}: ${value}`);
  }
  return d;
}
/* ---------------------------------------------------------------------------------------- */
