import { InvalidRequestCountError } from "../../domain/errors.js";
import type { QuizSession } from "../../domain/quizSession.js";
import type { Question } from "../../domain/types.js";
import { logger } from "../../logger.js";
import type { BotService } from "../../services/bot.service.js";
import type { QuizStart } from "../../services/quiz.service.js";
import type { Services } from "../../services/services.js";
import { countKeyboard, optionsKeyboard, resultKeyboard } from "../keyboards.js";
import { renderEntryScreen, renderQuestion } from "../views.js";

export async function showEntryScreen(
  services: Services,
  chatId: number,
  greeting?: string
): Promise<void> {
  const { countChoices, defaultCount } = services.quizService.policy;
  await services.botService.sendMessage(chatId, renderEntryScreen(greeting), {
    reply_markup: countKeyboard(countChoices, defaultCount),
  });
}

/**
 * Starts a quiz of `total` questions and shows the first one. Invalid counts
 * and empty selections send the user back to the entry screen.
 */
export async function beginQuiz(
  services: Services,
  chatId: number,
  total: number
): Promise<QuizSession | undefined> {
  let start: QuizStart;
  try {
    start = await services.quizService.startQuiz(total);
  } catch (err) {
    if (err instanceof InvalidRequestCountError) {
      await showEntryScreen(services, chatId, "Please choose a valid amount.");
      return undefined;
    }
    throw err;
  }

  const { session, notices } = start;
  for (const notice of notices) {
    await services.botService.sendMessage(
      chatId,
      services.reportService.renderStoreNotice(notice)
    );
  }

  if (!session.isActive) {
    await showEntryScreen(
      services,
      chatId,
      "No questions are available right now."
    );
    return session;
  }

  await showQuestion(services.botService, session, chatId);
  return session;
}

export async function showQuestion(
  botService: BotService,
  session: QuizSession,
  chatId: number
): Promise<void> {
  const question: Question | undefined = session.current();
  if (!question) return;

  const { position, total } = session.progress();
  await botService.sendMessage(
    chatId,
    renderQuestion(question, position, total),
    {
      parse_mode: "MarkdownV2",
      reply_markup: optionsKeyboard(session.id, position),
    }
  );
}

/**
 * Sends the final score of a finished session with retry/exit buttons.
 */
export async function showFinalResult(
  services: Services,
  session: QuizSession,
  chatId: number,
  prefix?: string
): Promise<void> {
  const result = session.finalize();
  const report = services.reportService.renderFinalReport(result);
  logger.info(`Quiz ${session.id} finished`, {
    correct: result.correct,
    total: result.total,
    percentage: result.percentage,
    tier: result.tier,
  });

  const lines: string[] = [report.headline, report.detail, "", report.footer];
  if (prefix) lines.unshift(prefix, "");
  await services.botService.sendMessage(chatId, lines.join("\n"), {
    reply_markup: resultKeyboard(session.id),
  });
}
