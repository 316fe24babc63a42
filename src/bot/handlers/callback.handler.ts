import type TelegramBot from "node-telegram-bot-api";
import { logger } from "../../logger.js";
import type { Services } from "../../services/services.js";
import type { BaseCallbackProcessor } from "./processors/baseCallbackProcessor.js";

/**
 * Routes inline-button callbacks to the first processor that parses them.
 */
export function registerCallbackHandlers(
  services: Services,
  processors: ReadonlyArray<BaseCallbackProcessor<unknown>>
): void {
  services.botService.on(
    "callback_query",
    async (q: TelegramBot.CallbackQuery): Promise<void> => {
      await dispatchCallback(services, processors, q);
    }
  );
}

export async function dispatchCallback(
  services: Services,
  processors: ReadonlyArray<BaseCallbackProcessor<unknown>>,
  q: TelegramBot.CallbackQuery
): Promise<void> {
  const data: string = q.data ?? "";
  const msg: TelegramBot.Message | undefined = q.message;
  if (!msg) return;

  if (!services.isOwner(q.from.id)) {
    await services.botService
      .answerCallbackQuery(q.id, { text: "This quiz is private." })
      .catch((error: unknown) =>
        logger.debug("answerCallbackQuery failed", { error })
      );
    return;
  }

  for (const processor of processors) {
    const parsed = processor.parse(data);
    if (parsed === null) continue;
    try {
      await processor.process(msg, q, parsed);
    } catch (error) {
      logger.error(`Error in ${processor.processName} processor:`, error);
      await processor.safeAnswerCallback(q.id, "Oops. Try again.");
    }
    return;
  }
  logger.debug(`Unhandled callback data: ${data}`);
}
