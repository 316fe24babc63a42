import type { StoreUnavailableError } from "../domain/errors.js";
import type { SessionProgress } from "../domain/quizSession.js";
import type { OptionLabel, PerformanceResult } from "../domain/types.js";

export interface ReportStrings {
  headline: string;
  detail: string;
  footer: string;
}

export function renderFeedback(
  correct: boolean,
  correctLabel: OptionLabel
): string {
  return correct
    ? "✅ Correct!"
    : `❌ Wrong. Correct answer: ${correctLabel.toUpperCase()}`;
}

export function formatPercent(percentage: number): string {
  return `${percentage.toFixed(1)}%`;
}

export function renderFinalReport(result: PerformanceResult): ReportStrings {
  const headline: string =
    result.total > 0
      ? `Quiz finished! You got ${result.correct} of ${result.total} questions right.`
      : "Quiz finished! No questions were available.";
  const detail: string = `Score: ${formatPercent(result.percentage)}`;
  return { headline, detail, footer: result.message };
}

export function renderProgressLine(p: SessionProgress): string {
  return `Question ${Math.min(p.position + 1, p.total)} of ${p.total} · correct so far: ${p.correct}/${p.answered}`;
}

export function renderStoreNotice(err: StoreUnavailableError): string {
  return `⚠️ The ${err.pool} question store could not be read, so this quiz has no ${err.pool} questions.`;
}

export interface ReportService {
  renderFeedback(correct: boolean, correctLabel: OptionLabel): string;
  renderFinalReport(result: PerformanceResult): ReportStrings;
  renderProgressLine(p: SessionProgress): string;
  renderStoreNotice(err: StoreUnavailableError): string;
}

export const reportService: ReportService = {
  renderFeedback,
  renderFinalReport,
  renderProgressLine,
  renderStoreNotice,
};
