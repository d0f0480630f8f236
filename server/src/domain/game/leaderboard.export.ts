// server/src/domain/game/leaderboard.export.ts
import fs from "fs";
import { stringify } from "csv-stringify";
import type { LeaderboardEntry, Timestamp } from "../../types";
import { DEFAULT_MAX_WINNERS } from "./round";

export type ExportOptions = {
  timeZone?: string;
  maxWinners?: number;
};

const RULE = "=".repeat(80);

/* ---------------------------------------------------------------------------------------- */
export function formatClock(ts: Timestamp, timeZone = "UTC"): string {
  return new Intl.DateTimeFormat("en-GB", {
    timeZone,
    hour: "2-digit",
    minute: "2-digit",
    second: "2-digit",
    hourCycle: "h23",
  }).format(new Date(ts * 1000));
}

export function formatSeconds(seconds: number): string {
  return `${seconds.toFixed(1)}s`;
}
/* ---------------------------------------------------------------------------------------- */

/* ---------------------------------------------------------------------------------------- */
// Question | Winner1 | Time1 | ResponseTime1 | ... ; absent winners are empty cells
export function toLeaderboardRows(entries: readonly LeaderboardEntry[], opts: ExportOptions = {}): string[][] {
  const slots = opts.maxWinners ?? DEFAULT_MAX_WINNERS;

  const header = ["Question"];
  for (let i = 1; i <= slots; i++) header.push(`Winner${i}`, `Time${i}`, `ResponseTime${i}`);

  const rows = entries.map((entry) => {
    const row = [entry.questionText];
    for (const w of entry.winners.slice(0, slots)) {
      row.push(w.senderName, formatClock(w.timestamp, opts.timeZone), formatSeconds(w.responseTimeSeconds));
    }
    while (row.length < header.length) row.push("");
    return row;
  });

  return [header, ...rows];
}
/* ---------------------------------------------------------------------------------------- */

export function toLeaderboardCsv(entries: readonly LeaderboardEntry[], opts: ExportOptions = {}): Promise<string> {
  const rows = toLeaderboardRows(entries, opts);
  return new Promise((resolve, reject) => {
    stringify(rows, (err, output) => (err ? reject(err) : resolve(output)));
  });
}

export async function writeLeaderboardCsv(filePath: string, entries: readonly LeaderboardEntry[], opts: ExportOptions = {}) {
  const csv = await toLeaderboardCsv(entries, opts);
  await fs.promises.writeFile(filePath, csv, "utf-8");
}

/* ---------------------------------------------------------------------------------------- */
export function formatLeaderboard(entries: readonly LeaderboardEntry[]): string {
  const lines = [RULE, "LEADERBOARD", RULE];

  entries.forEach((entry, i) => {
    lines.push("", `Q${i + 1}: ${entry.questionText}`);
    if (entry.winners.length === 0) {
      lines.push("  No correct answers");
      return;
    }
    entry.winners.forEach((w, j) => lines.push(`  ${j + 1}. ${w.senderName} - ${formatSeconds(w.responseTimeSeconds)}`));
  });

  lines.push("", RULE);
  return lines.join("\n");
}
/* ---------------------------------------------------------------------------------------- */
