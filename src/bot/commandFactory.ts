import type TelegramBot from "node-telegram-bot-api";
import type { BaseCommand, BotMessage, CommandClass } from "./commands/baseCommand.js";
import type { Services } from "../services/services.js";

export class CommandFactory {
  #commands: Map<string, CommandClass> = new Map();
  #services: Services;

  constructor(services: Services) {
    this.#services = services;
  }

  registerCommand(Command: CommandClass): void {
    this.#commands.set(Command.commandId, Command);
  }

  submit(): void {
    for (const Command of this.#commands.values()) {
      this.#services.botService.onText(
        Command.pattern,
        async (msg: TelegramBot.Message, match: RegExpExecArray | null) => {
          const commandInstance = new Command(
            toBotMessage(msg),
            match,
            this.#services
          );
          await commandInstance.execute();
        }
      );
    }
  }

  createCommand(
    commandId: string,
    msg: BotMessage,
    match: RegExpExecArray | null
  ): BaseCommand | null {
    const Command = this.#commands.get(commandId);
    if (!Command) return null;
    return new Command(msg, match, this.#services);
  }
}

export function toBotMessage(msg: TelegramBot.Message): BotMessage {
  return {
    chatId: msg.chat.id,
    from: msg.from
      ? {
          id: msg.from.id,
          first_name: msg.from.first_name,
          username: msg.from.username,
        }
      : { id: 0 },
  };
}
