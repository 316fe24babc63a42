import type { QuizPolicy } from "./policy.js";
import type { PerformanceResult, PerformanceTier } from "./types.js";

export function classify(percentage: number, policy: QuizPolicy): PerformanceTier {
  if (percentage >= policy.excellentThreshold) return "excellent";
  if (percentage >= policy.goodThreshold) return "good";
  return "needs_improvement";
}

/**
 * An empty run scores 0% in the lowest tier.
 */
export function evaluatePerformance(
  correct: number,
  total: number,
  policy: QuizPolicy
): PerformanceResult {
  const percentage: number = total > 0 ? (correct * 100) / total : 0;
  const tier: PerformanceTier = classify(percentage, policy);
  return {
    correct,
    total: Math.max(0, total),
    percentage,
    tier,
    message: policy.messages[tier],
  };
}
