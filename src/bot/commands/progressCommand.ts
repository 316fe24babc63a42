import { SessionRelatedCommand } from "./sessionRelatedCommand.js";

export class ProgressCommand extends SessionRelatedCommand {
  static readonly commandId: string = "progress";
  static readonly pattern: RegExp = /^\/progress\b/i;

  public getCommandId(): string {
    return ProgressCommand.commandId;
  }

  protected async process(): Promise<void> {
    const progress = this.requireSession().progress();
    await this.sendMessage(
      this.services.reportService.renderProgressLine(progress)
    );
  }
}
