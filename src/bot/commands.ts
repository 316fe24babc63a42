import type { Services } from "../services/services.js";
import { CommandFactory } from "./commandFactory.js";
import { ProgressCommand } from "./commands/progressCommand.js";
import { QuizCommand } from "./commands/quizCommand.js";
import { StartCommand } from "./commands/startCommand.js";
import { StopCommand } from "./commands/stopCommand.js";

export function registerCommands(services: Services): CommandFactory {
  const commandFactory = new CommandFactory(services);
  commandFactory.registerCommand(StartCommand);
  commandFactory.registerCommand(QuizCommand);
  commandFactory.registerCommand(ProgressCommand);
  commandFactory.registerCommand(StopCommand);
  commandFactory.submit();
  return commandFactory;
}
