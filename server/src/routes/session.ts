// server/src/routes/session.ts
import type { FastifyPluginAsync } from "fastify";
import { z } from "zod";
import type { Question } from "../types";
import type { LeaderboardAggregator } from "../domain/game/leaderboard.service";
import type { RoundManager } from "../domain/game/round-manager";
import { toLeaderboardCsv, type ExportOptions } from "../domain/game/leaderboard.export";
import { QuestionBankError } from "../import/questions.ingest";

type Opts = {
  manager: RoundManager;
  leaderboard: LeaderboardAggregator;
  loadQuestions: () => Promise<Question[]>;
  exportOptions?: ExportOptions;
};

const SignalBody = z.object({ signal: z.enum(["STOP", "REP", "NEXT"]) });

export const sessionRoutes = ({ manager, leaderboard, loadQuestions, exportOptions }: Opts): FastifyPluginAsync =>
  async (app) => {
    app.get("/session", async () => ({ status: manager.status() }));

    app.post("/session/start", async (req, reply) => {
      if (manager.isRunning || manager.isFinished) {
        return reply.code(409).send({ error: "session-already-started" });
      }

      let questions: Question[];
      try {
        questions = await loadQuestions();
      } catch (e) {
        if (e instanceof QuestionBankError) {
          req.log.warn({ err: e }, "question bank rejected");
          return reply.code(422).send({ error: "invalid-question-bank", detail: e.message });
        }
        throw e;
      }

      // a second start may have slipped in while the CSV was loading
      if (manager.isRunning || manager.isFinished) {
        return reply.code(409).send({ error: "session-already-started" });
      }
      await manager.start(questions);
      return reply.code(202).send({ ok: true, status: manager.status() });
    });

    app.post("/session/signal", async (req, reply) => {
      const parsed = SignalBody.safeParse(req.body);
      if (!parsed.success) return reply.code(400).send({ error: "invalid-signal" });

      const applied = manager.signal(parsed.data.signal);
      return reply.send({ ok: true, applied, status: manager.status() });
    });

    app.post("/session/stop", async (_req, reply) => {
      manager.stop();
      return reply.send({ ok: true, status: manager.status() });
    });

    app.get("/leaderboard", async () => ({
      final: leaderboard.isFinal,
      entries: leaderboard.snapshot(),
    }));

    app.get("/leaderboard.csv", async (_req, reply) => {
      const csv = await toLeaderboardCsv(leaderboard.snapshot(), exportOptions);
      return reply.type("text/csv; charset=utf-8").send(csv);
    });
  };

export default sessionRoutes;
