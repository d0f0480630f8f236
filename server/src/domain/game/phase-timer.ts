// server/src/domain/game/phase-timer.ts
import type { RoundSignal } from "../../types";

/*
 * One pending phase timer per round. Every schedule/cancel bumps the uid, so a callback
 * that was already queued by the event loop when it got cancelled still does nothing.
 */
export class PhaseTimer {
  private timer?: NodeJS.Timeout;
  private uid = 0;
  private phase: RoundSignal | null = null;

  get pending(): RoundSignal | null {
    return this.phase;
  }

  schedule(phase: RoundSignal, delayMs: number, run: () => void) {
    this.cancel();
    const myUid = this.uid;
    this.phase = phase;
    this.timer = setTimeout(() => {
      if (this.uid !== myUid) return; // stale
      this.timer = undefined;
      this.phase = null;
      run();
    }, Math.max(0, delayMs));
  }

  /** Cancels the pending timer; with `phase`, only when that phase is the pending one. */
  cancel(phase?: RoundSignal): boolean {
    if (phase && this.phase !== phase) return false;
    if (this.timer) clearTimeout(this.timer);
    this.timer = undefined;
    this.phase = null;
    this.uid += 1;
    return true;
  }
}
