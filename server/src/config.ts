// server/src/config.ts
import { z } from "zod";
import type { RoundConfig } from "./types";

const flag = z
  .enum(["true", "false", "1", "0", "yes", "no"])
  .transform((v) => v === "true" || v === "1" || v === "yes");

const seconds = z.coerce.number().finite().min(0);

function isTimeZone(tz: string): boolean {
  try {
    new Intl.DateTimeFormat("en-GB", { timeZone: tz });
    return true;
  } catch {
    return false;
  }
}

const Env = z.object({
  PORT: z.coerce.number().int().min(0).max(65535).default(3001),
  HOST: z.string().min(1).default("0.0.0.0"),
  CLIENT_URL: z.string().default("http://localhost:5173"),
  BOT_NAME: z.string().min(1).default("Trivia"),
  QUESTIONS_CSV: z.string().min(1).default("questions.csv"),
  LEADERBOARD_CSV: z.string().min(1).default("leaderboard.csv"),
  QUESTION_DURATION: seconds.default(15),
  REP_DELAY: seconds.default(10),
  NEXT_DELAY: seconds.default(5),
  MAX_WINNERS: z.coerce.number().int().min(1).default(5),
  AUTO_START: flag.default("false"),
  TIME_ZONE: z.string().min(1).refine(isTimeZone, { message: "Unknown time zone" }).default("UTC"),
  LOG_LEVEL: z.enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"]).default("info"),
  AUDIT_LOG_FILE: z.string().optional(),
});

export type AppConfig = z.infer<typeof Env>;

export class ConfigError extends Error {
  constructor(readonly issues: string[]) {
    super(`Invalid configuration: ${issues.join("; ")}`);
    this.name = "ConfigError";
  }
}

/* ---------------------------------------------------------------------------------------- */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  // empty strings mean "unset", like a blank line in .env
  const raw = Object.fromEntries(Object.entries(env).filter(([, v]) => v !== undefined && v !== ""));

  const parsed = Env.safeParse(raw);
  if (!parsed.success) {
    throw new ConfigError(parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`));
  }
  return parsed.data;
}
/* ---------------------------------------------------------------------------------------- */

export function toRoundConfig(cfg: AppConfig): RoundConfig {
  return {
    openDurationSeconds: cfg.QUESTION_DURATION,
    revealDelaySeconds: cfg.REP_DELAY,
    advanceDelaySeconds: cfg.NEXT_DELAY,
    maxWinnersPerRound: cfg.MAX_WINNERS,
  };
}
