import { showFinalResult } from "../handlers/quiz.handler.js";
import { SessionRelatedCommand } from "./sessionRelatedCommand.js";

export class StopCommand extends SessionRelatedCommand {
  static readonly commandId: string = "stop";
  static readonly pattern: RegExp = /^\/stop\b/i;

  public getCommandId(): string {
    return StopCommand.commandId;
  }

  protected async process(): Promise<void> {
    const session = this.requireSession();
    session.close();
    await showFinalResult(
      this.services,
      session,
      this.chatId,
      "⏹ Quiz stopped early."
    );
  }
}
