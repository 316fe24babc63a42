import { parseConfig } from "./config.js";
import { logger } from "./logger.js";
import { createBot } from "./bot/bot.js";
import { QuestionStoreRepositorySqlite } from "./domain/questions/questionStoreRepositorySqlite.js";
import { DEFAULT_POLICY } from "./domain/policy.js";
import { QuizServiceImpl } from "./services/quiz.service.js";
import { createOwnerGuard } from "./security/ownerGuard.js";
import { installGlobalErrorHandlers } from "./infra/global-errors.js";

async function main(): Promise<void> {
  const config = parseConfig();

  const repo = new QuestionStoreRepositorySqlite({
    specific: config.SPECIFIC_DB_FILE,
    general: config.GENERAL_DB_FILE,
  });
  const quizService = new QuizServiceImpl(repo, DEFAULT_POLICY);

  const { bot } = await createBot(
    config.BOT_TOKEN,
    quizService,
    createOwnerGuard(config.OWNER_IDS)
  );

  installGlobalErrorHandlers(async () => {
    quizService.closeActive();
    await bot.stopPolling();
  });

  bot.on("polling_error", (err) =>
    logger.error("Telegram polling error", { err })
  );
  bot.on("error", (err) => logger.error("Telegram error", { err }));

  logger.info(
    `Bot started. Stores: specific=${config.SPECIFIC_DB_FILE}, general=${config.GENERAL_DB_FILE}`
  );
}

main().catch((e: unknown) => {
  logger.error("Startup failed", e);
  process.exit(1);
});
