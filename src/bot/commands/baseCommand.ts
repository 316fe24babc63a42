import type TelegramBot from "node-telegram-bot-api";
import { logger } from "../../logger.js";
import type { BotService } from "../../services/bot.service.js";
import type { QuizService } from "../../services/quiz.service.js";
import type { Services } from "../../services/services.js";

export interface BotMessageFrom {
  id: number;
  first_name?: string;
  username?: string;
}

export interface BotMessage {
  chatId: number;
  from: BotMessageFrom;
}

export interface CommandClass {
  new (
    msg: BotMessage,
    match: RegExpExecArray | null,
    services: Services
  ): BaseCommand;
  readonly commandId: string;
  readonly pattern: RegExp;
}

export abstract class BaseCommand {
  protected msg: BotMessage;
  protected match: RegExpExecArray | null;
  protected services: Services;
  protected quizService: QuizService;
  protected botService: BotService;

  constructor(
    msg: BotMessage,
    match: RegExpExecArray | null,
    services: Services
  ) {
    this.msg = msg;
    this.match = match;
    this.services = services;
    this.quizService = services.quizService;
    this.botService = services.botService;
  }

  protected get chatId(): number {
    return this.msg.chatId;
  }

  protected async sendMessage(
    text: string,
    options?: TelegramBot.SendMessageOptions
  ): Promise<void> {
    await this.botService.sendMessage(this.msg.chatId, text, options);
  }

  public async execute(): Promise<void> {
    try {
      if (!this.services.isOwner(this.msg.from.id)) {
        logger.warn(`Rejected ${this.getCommandId()} from ${this.msg.from.id}`);
        await this.sendMessage("Sorry, this quiz is private.");
        return;
      }

      if (!(await this.validate())) {
        return;
      }

      await this.process();
    } catch (error) {
      logger.error(`Error in command ${this.getCommandId()} execution:`, error);
      await this.sendMessage(
        "Sorry, an error occurred while processing your command."
      );
    }
  }

  protected abstract validate(): Promise<boolean>;

  protected abstract process(): Promise<void>;

  public abstract getCommandId(): string;
}
