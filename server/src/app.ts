import "dotenv/config";
import fastify, { type FastifyBaseLogger } from "fastify";
import cors from "@fastify/cors";
import { Server } from "socket.io";

import { loadConfig, toRoundConfig } from "./config";
import { createLogger } from "./infra/logger";
import { GROUP_ROOM, GroupChat, registerGroupChatHandlers } from "./infra/group-chat";
import { LeaderboardAggregator } from "./domain/game/leaderboard.service";
import { RoundManager } from "./domain/game/round-manager";
import { formatLeaderboard, writeLeaderboardCsv } from "./domain/game/leaderboard.export";
import { loadQuestionsFromCsv } from "./import/questions.ingest";
import { openAuditLog } from "./utils/auditLog";
import { sessionRoutes } from "./routes/session";

async function main() {
  const CFG = loadConfig();
  const logger = createLogger(CFG.LOG_LEVEL);

  const appLogger: FastifyBaseLogger = logger;
  const app = fastify({ logger: appLogger });
  await app.register(cors, { origin: CFG.CLIENT_URL, credentials: true });

  // ---------- Socket.IO group chat ----------
  const io = new Server(app.server, {
    path: "/socket.io",
    cors: { origin: CFG.CLIENT_URL, methods: ["GET", "POST"], credentials: true },
  });

  const chat = new GroupChat({
    botName: CFG.BOT_NAME,
    broadcast: (line) => io.to(GROUP_ROOM).emit("chat_message", line),
    logger: logger.child({ module: "group-chat" }),
  });
  registerGroupChatHandlers(io, chat, logger.child({ module: "group-chat" }));

  // ---------- Trivia session ----------
  const audit = CFG.AUDIT_LOG_FILE ? openAuditLog(CFG.AUDIT_LOG_FILE, logger) : null;
  const leaderboard = new LeaderboardAggregator();
  const manager = new RoundManager({
    transport: chat,
    leaderboard,
    config: toRoundConfig(CFG),
    logger: logger.child({ module: "round-manager" }),
    audit: audit?.write,
  });
  chat.onMessage((event) => {
    manager.onMessage(event);
  });

  const exportOptions = { timeZone: CFG.TIME_ZONE, maxWinners: CFG.MAX_WINNERS };
  const loadQuestions = () => loadQuestionsFromCsv(CFG.QUESTIONS_CSV, logger);

  manager
    .whenFinished()
    .then(async (entries) => {
      logger.info("\n" + formatLeaderboard(entries));
      await writeLeaderboardCsv(CFG.LEADERBOARD_CSV, entries, exportOptions);
      logger.info({ file: CFG.LEADERBOARD_CSV }, "leaderboard saved");
    })
    .catch((err) => logger.error({ err }, "leaderboard export failed"));

  app.get("/health", async () => ({ ok: true, members: chat.memberCount }));
  await app.register(sessionRoutes({ manager, leaderboard, loadQuestions, exportOptions }));

  app.addHook("onClose", async () => {
    manager.stop();
    await audit?.close();
  });

  await app.listen({ port: CFG.PORT, host: CFG.HOST });
  app.log.info(`HTTP + WS on http://${CFG.HOST}:${CFG.PORT}`);

  if (CFG.AUTO_START) {
    await manager.start(await loadQuestions());
  }

  for (const sig of ["SIGINT", "SIGTERM"] as const) {
    process.once(sig, () => {
      app.log.info({ signal: sig }, "shutting down");
      app.close().then(
        () => process.exit(0),
        (err) => {
          app.log.error({ err }, "shutdown failed");
          process.exit(1);
        },
      );
    });
  }
}

main().catch((e) => {
  console.error(e);
  process.exit(1);
});
