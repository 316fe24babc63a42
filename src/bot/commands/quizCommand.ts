import { beginQuiz, showEntryScreen } from "../handlers/quiz.handler.js";
import { BaseCommand } from "./baseCommand.js";

export class QuizCommand extends BaseCommand {
  static readonly commandId: string = "quiz";
  static readonly pattern: RegExp = /^\/quiz(?:@\w+)?(?:\s+(\S.*?))?\s*$/i;

  protected async validate(): Promise<boolean> {
    return Promise.resolve(true);
  }

  public getCommandId(): string {
    return QuizCommand.commandId;
  }

  public async process(): Promise<void> {
    const raw: string | undefined = this.match?.[1];
    if (raw === undefined) {
      await showEntryScreen(this.services, this.chatId);
      return;
    }
    // Non-numeric or multi-word input becomes NaN and is rejected like any invalid count
    await beginQuiz(this.services, this.chatId, Number(raw));
  }
}
