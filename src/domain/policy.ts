import type { PerformanceTier } from "./types.js";

export interface QuizPolicy {
  /** Share of each run drawn from the "specific" pool; the rest is "general". */
  readonly specificRatio: number;
  readonly excellentThreshold: number; // percent, inclusive
  readonly goodThreshold: number; // percent, inclusive
  readonly countChoices: readonly number[];
  readonly defaultCount: number;
  readonly messages: Readonly<Record<PerformanceTier, string>>;
}

export const DEFAULT_POLICY: QuizPolicy = Object.freeze({
  specificRatio: 0.6,
  excellentThreshold: 70,
  goodThreshold: 50,
  countChoices: Object.freeze([10, 20, 30, 40, 50]),
  defaultCount: 40,
  messages: Object.freeze({
    excellent: "🎉 Congratulations! Excellent performance!",
    good: "👍 Good job! Keep studying!",
    needs_improvement: "📚 Keep studying to improve!",
  }),
});

export function createPolicy(overrides: Partial<QuizPolicy> = {}): QuizPolicy {
  const policy: QuizPolicy = {
    ...DEFAULT_POLICY,
    ...overrides,
    messages: { ...DEFAULT_POLICY.messages, ...overrides.messages },
  };

  if (!(policy.specificRatio >= 0 && policy.specificRatio <= 1)) {
    throw new RangeError(
      `specificRatio must be within 0..1, got ${policy.specificRatio}`
    );
  }
  if (policy.goodThreshold > policy.excellentThreshold) {
    throw new RangeError(
      `goodThreshold (${policy.goodThreshold}) cannot exceed excellentThreshold (${policy.excellentThreshold})`
    );
  }
  if (policy.countChoices.some((n) => !Number.isInteger(n) || n <= 0)) {
    throw new RangeError("countChoices must be positive integers");
  }

  return Object.freeze({
    ...policy,
    countChoices: Object.freeze([...policy.countChoices]),
    messages: Object.freeze(policy.messages),
  });
}
