// server/src/import/questions.ingest.ts
import fs from "fs";
import type { Readable } from "stream";
import { parse } from "csv-parse";
import type { Logger } from "pino";
import { z } from "zod";
import type { Question } from "../types";
import { toAcceptedSet } from "../domain/question/textmatch";

export class QuestionBankError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "QuestionBankError";
  }
}

const Row = z.object({
  question: z.string().min(1),
  answers: z.string(), // alternatives separated by |
});

/* ----------------------- parse CSV ----------------------- */
export async function readQuestions(input: Readable, logger?: Logger): Promise<Question[]> {
  const rows: unknown[] = [];
  await new Promise<void>((resolve, reject) => {
    input
      .on("error", (e) => reject(e))
      .pipe(parse({ columns: true, trim: true, bom: true, skip_empty_lines: true }))
      .on("data", (r: unknown) => rows.push(r))
      .on("end", () => resolve())
      .on("error", (e) => reject(e));
  });

  if (rows.length === 0) throw new QuestionBankError("Question CSV is empty or has no header");

  const compact = (s: string) => s.replace(/\s+/g, " ").trim();

  return rows.map((raw, idx) => {
    const out = Row.safeParse(raw);
    if (!out.success) {
      const msg = out.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join("; ");
      throw new QuestionBankError(`Line ${idx + 2} invalid: ${msg}`);
    }

    const text = compact(out.data.question);
    const acceptedAnswers = toAcceptedSet(out.data.answers);
    if (acceptedAnswers.size === 0) {
      // kept: nobody can answer it, the round still plays out
      logger?.warn({ line: idx + 2, question: text }, "Question has no accepted answers");
    }
    return { text, acceptedAnswers };
  });
}
/* ----------------------------------------------------------- */

export async function loadQuestionsFromCsv(filePath: string, logger?: Logger): Promise<Question[]> {
  if (!fs.existsSync(filePath)) {
    throw new QuestionBankError(`Question CSV not found: ${filePath}`);
  }
  const questions = await readQuestions(fs.createReadStream(filePath, { encoding: "utf-8" }), logger);
  logger?.info({ file: filePath, count: questions.length }, "questions_loaded");
  return questions;
}
