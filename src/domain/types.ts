export const OPTION_LABELS = ["a", "b", "c", "d"] as const;
export type OptionLabel = (typeof OPTION_LABELS)[number];

export const POOL_NAMES = ["specific", "general"] as const;
export type PoolName = (typeof POOL_NAMES)[number];

export interface Question {
  readonly id: number;
  readonly number: number; // display number from the store
  readonly statement: string;
  readonly options: Readonly<Record<OptionLabel, string>>;
  readonly source: string;
  readonly correct: OptionLabel;
  readonly pool: PoolName;
}

export type QuestionPools = Readonly<Record<PoolName, readonly Question[]>>;

export type PerformanceTier = "excellent" | "good" | "needs_improvement";

export interface PerformanceResult {
  readonly correct: number;
  readonly total: number;
  readonly percentage: number; // 0..100
  readonly tier: PerformanceTier;
  readonly message: string;
}

const LABELS: ReadonlySet<string> = new Set<string>(OPTION_LABELS);

export function isOptionLabel(value: string): value is OptionLabel {
  return LABELS.has(value);
}

/**
 * Normalises a label coming from the store or the user ("B", " c ") to the
 * closed lowercase alphabet. Returns null for anything else.
 */
export function toOptionLabel(value: string): OptionLabel | null {
  const v = value.trim().toLowerCase();
  return isOptionLabel(v) ? v : null;
}
