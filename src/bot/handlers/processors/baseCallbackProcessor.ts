import type TelegramBot from "node-telegram-bot-api";
import { logger } from "../../../logger.js";
import type { Services } from "../../../services/services.js";

/**
 * Handles one family of inline-button callbacks. `parse` returns null when the
 * callback data is not for this processor.
 */
export abstract class BaseCallbackProcessor<TParsed> {
  constructor(protected services: Services) {}

  abstract readonly regex: RegExp;
  abstract readonly processName: string;

  parse(data: string): TParsed | null {
    const match: RegExpExecArray | null = this.regex.exec(data);
    return match ? this.fromMatch(match) : null;
  }

  protected abstract fromMatch(match: RegExpExecArray): TParsed | null;

  abstract process(
    msg: TelegramBot.Message,
    query: TelegramBot.CallbackQuery,
    parsed: TParsed
  ): Promise<void>;

  async safeAnswerCallback(
    id: string | undefined,
    text?: string,
    showAlert: boolean = false
  ): Promise<void> {
    if (!id) return;
    try {
      await this.services.botService.answerCallbackQuery(
        id,
        text ? { text, show_alert: showAlert } : {}
      );
    } catch (error) {
      // expired queries cannot be answered any more
      logger.debug(`answerCallbackQuery failed in ${this.processName}`, {
        error,
      });
    }
  }
}
