import TelegramBot from "node-telegram-bot-api";
import { registerCommands } from "./commands.js";
import { registerCallbackHandlers } from "./handlers/callback.handler.js";
import { createCallbackProcessors } from "./processors.js";
import { logger } from "../logger.js";
import type { Services } from "../services/services.js";
import { createBotService } from "../services/bot.service.js";
import { reportService } from "../services/report.service.js";
import type { QuizService } from "../services/quiz.service.js";
import type { OwnerGuard } from "../security/ownerGuard.js";

export async function createBot(
  token: string,
  quizService: QuizService,
  isOwner: OwnerGuard
): Promise<{ bot: TelegramBot; services: Services }> {
  const bot = new TelegramBot(token, {
    polling: {
      autoStart: false,
      params: {
        timeout: 30,
        limit: 100,
        allowed_updates: ["message", "callback_query"],
      },
    },
  });

  // Keep queued updates so a /start sent before the process came up still arrives
  await bot.deleteWebHook();

  const services: Services = {
    quizService,
    reportService,
    botService: createBotService(bot),
    isOwner,
  };

  registerCommands(services);
  registerCallbackHandlers(services, createCallbackProcessors(services));

  await bot.startPolling({ restart: true });
  logger.info("Polling started.");

  const me = await bot.getMe();
  logger.info(`Logged in as @${me.username ?? "unknown"}`);

  return { bot, services };
}
