import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import type { ChatMessageEvent, ChatTransport, RoundConfig } from "../../types";
import { FakeTransport, question, silentLogger } from "../../test-utils";
import { LeaderboardAggregator } from "./leaderboard.service";
import { RoundManager } from "./round-manager";

const config: RoundConfig = {
  openDurationSeconds: 15,
  revealDelaySeconds: 10,
  advanceDelaySeconds: 5,
  maxWinnersPerRound: 5,
};

const capital = question("Capital of France?", "Paris");
const sum = question("2+2?", "4|four");

// flushes pending promise chains; setImmediate stays real under the fake timers below
const flush = () => new Promise<void>((resolve) => setImmediate(resolve));

function answer(senderId: string, body: string, timestamp: number, messageId?: string): ChatMessageEvent {
  return { senderId, senderName: `Player ${senderId}`, body, timestamp, messageId };
}

function setup() {
  const transport = new FakeTransport();
  const leaderboard = new LeaderboardAggregator();
  const audit = vi.fn();
  const manager = new RoundManager({
    transport,
    leaderboard,
    config,
    logger: silentLogger,
    clock: () => 500,
    audit,
  });
  return { transport, leaderboard, audit, manager };
}

describe("RoundManager", () => {
  beforeEach(() => {
    vi.useFakeTimers({ toFake: ["setTimeout", "clearTimeout", "Date"] });
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it("plays every question through its phases on the timers", async () => {
    const { transport, leaderboard, manager } = setup();
    transport.now = 1000;

    await manager.start([capital, sum]);
    expect(manager.status()).toMatchObject({ questionNumber: 1, state: "OPEN", postedAt: 1000, cutoffAt: 1015 });

    expect(manager.onMessage(answer("a", "Paris!", 1003, "m1"))?.isCountedWinner).toBe(true);

    await vi.advanceTimersByTimeAsync(15_000);
    expect(manager.status().state).toBe("LOCKED");

    await vi.advanceTimersByTimeAsync(10_000);
    expect(manager.status().state).toBe("REVEALED");
    expect(transport.sent[2]).toEqual({ text: "REP", opts: { quoteId: "m1" } });

    transport.now = 1030;
    await vi.advanceTimersByTimeAsync(5_000);
    expect(manager.status()).toMatchObject({ questionNumber: 2, state: "OPEN", postedAt: 1030 });
    expect(leaderboard.size).toBe(1);

    await vi.advanceTimersByTimeAsync(25_000);

    expect(transport.texts()).toEqual([
      "Q1: Capital of France?",
      "STOP",
      "REP",
      "NEXT",
      "Q2: 2+2?",
      "STOP",
      "REP: 4 / four",
    ]);
    expect(manager.isFinished).toBe(true);
    expect(leaderboard.isFinal).toBe(true);
    await expect(manager.whenFinished()).resolves.toEqual([
      {
        questionText: "Capital of France?",
        winners: [{ senderId: "a", senderName: "Player a", timestamp: 1003, responseTimeSeconds: 3, messageId: "m1" }],
      },
      { questionText: "2+2?", winners: [] },
    ]);
  });

  it("lets explicit signals end a phase early and schedules from that moment", async () => {
    const { transport, manager } = setup();
    await manager.start([capital, sum]);

    await vi.advanceTimersByTimeAsync(5_000);
    expect(manager.signal("STOP")).toBe(true);
    expect(manager.status().state).toBe("LOCKED");
    expect(manager.signal("STOP")).toBe(false);
    await flush();

    // the duration timer was cancelled; the reveal timer counts from the signal
    await vi.advanceTimersByTimeAsync(9_999);
    expect(manager.status().state).toBe("LOCKED");
    await vi.advanceTimersByTimeAsync(1);
    expect(manager.status().state).toBe("REVEALED");

    expect(manager.signal("REP")).toBe(false);
    expect(manager.signal("NEXT")).toBe(true);
    expect(manager.status().questionNumber).toBeNull();
    await flush();

    expect(manager.status().questionNumber).toBe(2);
    expect(transport.texts()).toEqual(["Q1: Capital of France?", "STOP", "REP: paris", "NEXT", "Q2: 2+2?"]);
  });

  it("ignores a timer that fires after its phase was already ended by a signal", async () => {
    const { manager, leaderboard } = setup();
    await manager.start([capital]);

    manager.onMessage(answer("a", "paris", 1001));
    await vi.advanceTimersByTimeAsync(12_000);
    manager.signal("STOP");
    await flush();
    const winners = manager.status().winners;
    expect(winners).toHaveLength(1);

    // 15s: the cancelled duration timer would have fired here
    await vi.advanceTimersByTimeAsync(3_000);
    expect(manager.status()).toMatchObject({ state: "LOCKED", winners });

    await vi.advanceTimersByTimeAsync(7_000);
    expect(manager.isFinished).toBe(true);
    expect(leaderboard.snapshot()).toHaveLength(1);
  });

  it("delivers REP after a slow STOP even when the reveal timer fires first", async () => {
    const delivered: string[] = [];
    let releaseStop: () => void = () => {};
    const transport: ChatTransport = {
      async send(text) {
        if (text === "STOP") {
          await new Promise<void>((resolve) => {
            releaseStop = () => resolve();
          });
        }
        delivered.push(text);
        return { id: text, timestamp: 1000 };
      },
    };
    const manager = new RoundManager({ transport, leaderboard: new LeaderboardAggregator(), config, logger: silentLogger });

    await manager.start([capital], { openDurationSeconds: 1, revealDelaySeconds: 0.1, advanceDelaySeconds: 0 });
    await vi.advanceTimersByTimeAsync(1_500);

    // the round is revealed on time, but its REP waits behind the pending STOP
    expect(manager.status().state).toBe("REVEALED");
    expect(delivered).toEqual(["Q1: Capital of France?"]);

    releaseStop();
    await flush();

    expect(delivered).toEqual(["Q1: Capital of France?", "STOP", "REP: paris"]);
    expect(manager.isFinished).toBe(true);
  });

  it("drops messages when no round is active", async () => {
    const { manager, audit } = setup();
    expect(manager.onMessage(answer("a", "paris", 1))).toBeNull();

    await manager.start([capital]);
    manager.stop();
    expect(manager.onMessage(answer("a", "paris", 1001))).toBeNull();
    expect(audit).not.toHaveBeenCalledWith("submission", expect.anything());
  });

  it("falls back to the local clock when the question has no chat timestamp", async () => {
    const { transport, manager } = setup();
    transport.failNext = true;
    await manager.start([capital]);

    expect(manager.status()).toMatchObject({ state: "OPEN", postedAt: 500, cutoffAt: 515 });
    expect(transport.sent).toEqual([]);
  });

  it("keeps playing when a chat send fails", async () => {
    const { transport, manager } = setup();
    await manager.start([capital]);

    transport.failNext = true;
    await vi.advanceTimersByTimeAsync(15_000);
    expect(manager.status().state).toBe("LOCKED");

    await vi.advanceTimersByTimeAsync(10_000);
    expect(transport.texts()).toEqual(["Q1: Capital of France?", "REP: paris"]);
    expect(manager.isFinished).toBe(true);
  });

  it("records the live round and seals the leaderboard on stop", async () => {
    const { transport, leaderboard, manager } = setup();
    await manager.start([capital, sum]);
    manager.onMessage(answer("a", "paris", 1002));

    manager.stop();
    await vi.advanceTimersByTimeAsync(60_000);

    expect(transport.texts()).toEqual(["Q1: Capital of France?"]);
    expect(leaderboard.isFinal).toBe(true);
    const entries = await manager.whenFinished();
    expect(entries).toHaveLength(1);
    expect(entries[0].winners.map((w) => w.responseTimeSeconds)).toEqual([2]);
  });

  it("finishes at once without questions", async () => {
    const { manager } = setup();
    await manager.start([]);
    expect(manager.isFinished).toBe(true);
    await expect(manager.whenFinished()).resolves.toEqual([]);
  });

  it("refuses to start twice or with bad durations", async () => {
    const { manager } = setup();
    await expect(manager.start([capital], { ...config, revealDelaySeconds: -1 })).rejects.toThrow(
      "Invalid revealDelaySeconds: -1",
    );

    await manager.start([capital]);
    await expect(manager.start([capital])).rejects.toThrow("Trivia session already started");
  });

  it("refuses to advance past a round that is still in play", async () => {
    const { manager } = setup();
    await manager.start([capital, sum]);
    await expect(manager.advance()).rejects.toThrow("Cannot advance while round Q1 is OPEN");
  });

  it("uses the durations given at start", async () => {
    const { manager } = setup();
    await manager.start([capital], { openDurationSeconds: 2, revealDelaySeconds: 1, advanceDelaySeconds: 1 });
    expect(manager.status().cutoffAt).toBe(1002);

    await vi.advanceTimersByTimeAsync(2_000);
    expect(manager.status().state).toBe("LOCKED");
    await vi.advanceTimersByTimeAsync(1_000);
    expect(manager.isFinished).toBe(true);
  });

  it("reports every submission to the audit sink", async () => {
    const { manager, audit } = setup();
    await manager.start([capital]);
    manager.onMessage(answer("a", "Lyon", 1001));

    expect(audit).toHaveBeenCalledWith("submission", {
      q: 1,
      senderId: "a",
      sender: "Player a",
      text: "lyon",
      t: 1001,
      valid: true,
      correct: false,
      winner: false,
    });
  });
});
