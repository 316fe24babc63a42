import type TelegramBot from "node-telegram-bot-api";
import type { QuizSession, SessionState } from "../../../domain/quizSession.js";
import { toOptionLabel, type OptionLabel, type Question } from "../../../domain/types.js";
import { EMPTY_KEYBOARD } from "../../keyboards.js";
import { showFinalResult, showQuestion } from "../quiz.handler.js";
import { BaseCallbackProcessor } from "./baseCallbackProcessor.js";

export interface AnswerCallback {
  sessionId: string;
  position: number;
  label: OptionLabel;
}

export class AnswerProcessor extends BaseCallbackProcessor<AnswerCallback> {
  readonly processName: string = "answer";
  readonly regex: RegExp = /^ans:([A-Za-z0-9_-]+):(\d+):([a-dA-D])$/;

  protected fromMatch(match: RegExpExecArray): AnswerCallback | null {
    const [, sessionId, positionS, labelS] = match;
    const position: number = parseInt(positionS, 10);
    const label: OptionLabel | null = toOptionLabel(labelS);
    if (!Number.isFinite(position) || label === null) return null;
    return { sessionId, position, label };
  }

  async process(
    msg: TelegramBot.Message,
    query: TelegramBot.CallbackQuery,
    parsed: AnswerCallback
  ): Promise<void> {
    const { botService, quizService, reportService } = this.services;
    const chatId: number = msg.chat.id;

    const session: QuizSession | undefined = quizService.getSession(
      parsed.sessionId
    );
    if (!session?.isActive) {
      await this.safeAnswerCallback(query.id, "This quiz is no longer active.");
      return;
    }
    // Double presses and presses on older question messages
    if (
      session.progress().position !== parsed.position ||
      session.hasAnsweredCurrent()
    ) {
      await this.safeAnswerCallback(query.id, "Already answered.");
      return;
    }

    const question: Question | undefined = session.current();
    if (!question) return;

    const ok: boolean = session.submit(parsed.label);
    await this.safeAnswerCallback(query.id);
    await botService.editMessageReplyMarkup(EMPTY_KEYBOARD, {
      chat_id: chatId,
      message_id: msg.message_id,
    });
    await botService.sendMessage(
      chatId,
      reportService.renderFeedback(ok, question.correct)
    );
    // Stopped while the feedback was on its way; /stop already reported it
    if (!session.isActive) return;

    const state: SessionState = session.advance();
    if (state.kind === "finished") {
      await showFinalResult(this.services, session, chatId);
    } else {
      await showQuestion(botService, session, chatId);
    }
  }
}
