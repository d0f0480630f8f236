import pino from "pino";
import type { ChatTransport, Question, SendOptions, SentMessage, Timestamp } from "./types";
import { toAcceptedSet } from "./domain/question/textmatch";

export const silentLogger = pino({ level: "silent" });

export function question(text: string, answers: string): Question {
  return { text, acceptedAnswers: toAcceptedSet(answers) };
}

export type SentLine = { text: string; opts?: SendOptions };

/** In-memory chat: records what the bot posts and stamps it from a settable clock. */
export class FakeTransport implements ChatTransport {
  readonly sent: SentLine[] = [];
  now: Timestamp = 1_000;
  failNext = false;
  omitTimestamp = false;
  private seq = 0;

  async send(text: string, opts?: SendOptions): Promise<SentMessage> {
    if (this.failNext) {
      this.failNext = false;
      throw new Error("network down");
    }
    this.sent.push(opts ? { text, opts } : { text });
    this.seq += 1;
    return this.omitTimestamp ? { id: `out-${this.seq}` } : { id: `out-${this.seq}`, timestamp: this.now };
  }

  texts(): string[] {
    return this.sent.map((s) => s.text);
  }
}
