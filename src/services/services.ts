import type { OwnerGuard } from "../security/ownerGuard.js";
import type { BotService } from "./bot.service.js";
import type { QuizService } from "./quiz.service.js";
import type { ReportService } from "./report.service.js";

export interface Services {
  quizService: QuizService;
  reportService: ReportService;
  botService: BotService;
  isOwner: OwnerGuard;
}
