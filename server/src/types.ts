export type Question = {
  text: string;
  acceptedAnswers: ReadonlySet<string>;
};

/** Epoch seconds; fractional values are allowed. */
export type Timestamp = number;

export type ChatMessageEvent = {
  senderId: string;
  senderName: string;
  body: string;
  timestamp?: Timestamp | null;
  messageId?: string;
};

export type SentMessage = {
  id?: string;
  timestamp?: Timestamp;
};

export type SendOptions = {
  quoteId?: string;
};

export interface ChatTransport {
  send(text: string, opts?: SendOptions): Promise<SentMessage>;
}

export type RoundState = "OPEN" | "LOCKED" | "REVEALED" | "DONE";

export type Submission = {
  senderId: string;
  senderName: string;
  rawText: string;
  timestamp: Timestamp | null;
  messageId: string | null;
  normalizedText: string;
  isCorrect: boolean;
  isValidWindow: boolean;
  isCountedWinner: boolean;
};

export type Winner = {
  senderId: string;
  senderName: string;
  timestamp: Timestamp;
  responseTimeSeconds: number;
  messageId: string | null;
};

export type RevealOutcome =
  | { kind: "winner"; winner: Winner; correctCount: number }
  | { kind: "none"; acceptedAnswers: string[] };

export type RoundResult = {
  questionText: string;
  winners: readonly Winner[];
};

export type LeaderboardEntry = RoundResult;

export type RoundDurations = {
  openDurationSeconds: number;
  revealDelaySeconds: number;
  advanceDelaySeconds: number;
};

export type RoundConfig = RoundDurations & {
  maxWinnersPerRound: number;
};

export type RoundSignal = "STOP" | "REP" | "NEXT";

export type SessionStatus = {
  running: boolean;
  finished: boolean;
  questionNumber: number | null;
  totalQuestions: number;
  state: RoundState | null;
  questionText: string | null;
  postedAt: Timestamp | null;
  cutoffAt: Timestamp | null;
  submissions: number;
  winners: readonly Winner[];
};
