import type TelegramBot from "node-telegram-bot-api";
import { beginQuiz } from "../quiz.handler.js";
import { BaseCallbackProcessor } from "./baseCallbackProcessor.js";

export class CountProcessor extends BaseCallbackProcessor<{ total: number }> {
  readonly processName: string = "count";
  readonly regex: RegExp = /^cnt:(\d+)$/;

  protected fromMatch(match: RegExpExecArray): { total: number } | null {
    const total: number = parseInt(match[1], 10);
    return Number.isFinite(total) ? { total } : null;
  }

  async process(
    msg: TelegramBot.Message,
    query: TelegramBot.CallbackQuery,
    parsed: { total: number }
  ): Promise<void> {
    await this.safeAnswerCallback(query.id);
    await beginQuiz(this.services, msg.chat.id, parsed.total);
  }
}
