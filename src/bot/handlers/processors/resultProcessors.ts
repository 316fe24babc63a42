import type TelegramBot from "node-telegram-bot-api";
import { showEntryScreen } from "../quiz.handler.js";
import { BaseCallbackProcessor } from "./baseCallbackProcessor.js";

interface SessionRef {
  sessionId: string;
}

export class RetryProcessor extends BaseCallbackProcessor<SessionRef> {
  readonly processName: string = "retry";
  readonly regex: RegExp = /^retry:([A-Za-z0-9_-]+)$/;

  protected fromMatch(match: RegExpExecArray): SessionRef {
    return { sessionId: match[1] };
  }

  async process(
    msg: TelegramBot.Message,
    query: TelegramBot.CallbackQuery
  ): Promise<void> {
    await this.safeAnswerCallback(query.id);
    if (this.services.quizService.activeSession()) {
      await this.services.botService.sendMessage(
        msg.chat.id,
        "A quiz is already running. Finish it or send /stop first."
      );
      return;
    }
    await showEntryScreen(this.services, msg.chat.id);
  }
}

export class ExitProcessor extends BaseCallbackProcessor<SessionRef> {
  readonly processName: string = "exit";
  readonly regex: RegExp = /^exit:([A-Za-z0-9_-]+)$/;

  protected fromMatch(match: RegExpExecArray): SessionRef {
    return { sessionId: match[1] };
  }

  async process(
    msg: TelegramBot.Message,
    query: TelegramBot.CallbackQuery,
    parsed: SessionRef
  ): Promise<void> {
    await this.safeAnswerCallback(query.id);
    this.services.quizService.getSession(parsed.sessionId)?.close();
    await this.services.botService.sendMessage(
      msg.chat.id,
      "Goodbye! Send /start whenever you want to play again."
    );
  }
}
