// server/src/utils/auditLog.ts
import fs from "fs";
import path from "path";
import type { Logger } from "pino";
import type { AuditSink } from "../domain/game/round-manager";

/** compact k=v k=v … */
export function fmtKV(data?: Record<string, unknown>): string {
  if (!data) return "";
  return Object.entries(data)
    .map(([k, v]) => (v === null || v === undefined ? `${k}=null` : `${k}=${JSON.stringify(v)}`))
    .join(" ");
}

/** one line: timestamp, event, then the k=v pairs */
export function formatAuditLine(event: string, data?: Record<string, unknown>, now = new Date()): string {
  const kv = fmtKV(data);
  return `[${now.toISOString()}] ${event}` + (kv ? "  " + kv : "");
}

export type AuditLog = {
  write: AuditSink;
  close: () => Promise<void>;
};

/* ---------------------------------------------------------------------------------------- */
/*
 * Append-only journal of every submission and phase change. A write error is logged once
 * and the journal goes quiet; the game keeps running.
 */
export function openAuditLog(filePath: string, logger: Logger): AuditLog {
  const resolved = path.resolve(filePath);
  fs.mkdirSync(path.dirname(resolved), { recursive: true });

  const stream = fs.createWriteStream(resolved, { flags: "a" });
  let broken = false;
  stream.on("error", (err) => {
    if (!broken) logger.error({ err, file: resolved }, "audit log write failed");
    broken = true;
  });
  stream.write(`\n=== AUDIT LOG START ${new Date().toISOString()} ===\n`);
  logger.info({ file: resolved }, "audit log enabled");

  return {
    write(event, data) {
      if (broken || stream.destroyed) return;
      stream.write(formatAuditLine(event, data) + "\n");
    },
    close() {
      return new Promise<void>((resolve) => stream.end(() => resolve()));
    },
  };
}
/* ---------------------------------------------------------------------------------------- */
