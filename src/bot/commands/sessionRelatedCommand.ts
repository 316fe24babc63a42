import type { QuizSession } from "../../domain/quizSession.js";
import { BaseCommand } from "./baseCommand.js";

export abstract class SessionRelatedCommand extends BaseCommand {
  protected session: QuizSession | undefined;

  protected async validate(): Promise<boolean> {
    this.session = this.quizService.activeSession();
    if (!this.session) {
      await this.sendMessage("No quiz is running. Use /start to begin one.");
      return false;
    }
    return true;
  }

  /** Only call after validate() succeeded. */
  protected requireSession(): QuizSession {
    if (!this.session) throw new Error("No active session");
    return this.session;
  }
}
