import { showEntryScreen } from "../handlers/quiz.handler.js";
import { BaseCommand } from "./baseCommand.js";

export class StartCommand extends BaseCommand {
  static readonly commandId: string = "start";
  static readonly pattern: RegExp = /^\/start\b/i;

  protected async validate(): Promise<boolean> {
    return Promise.resolve(true);
  }

  public getCommandId(): string {
    return StartCommand.commandId;
  }

  public async process(): Promise<void> {
    const running: boolean = this.quizService.activeSession() !== undefined;
    const name: string = this.msg.from.first_name ?? "there";
    const greeting: string =
      `Welcome, ${name}! 👋\n` +
      `Commands:\n` +
      `• /quiz <n> — start a quiz with n questions\n` +
      `• /progress — where you are in the current quiz\n` +
      `• /stop — end the current quiz early` +
      (running ? "\n\nStarting a new quiz will end the one in progress." : "");
    await showEntryScreen(this.services, this.chatId, greeting);
  }
}
