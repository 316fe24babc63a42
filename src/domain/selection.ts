import { InvalidRequestCountError } from "./errors.js";
import type { QuizPolicy } from "./policy.js";
import { defaultRandom, shuffle, type RandomSource } from "./random.js";
import type { PoolName, Question, QuestionPools } from "./types.js";

export type PoolQuota = Record<PoolName, number>;

export function assertRequestCount(total: number): void {
  if (!Number.isInteger(total) || total <= 0) {
    throw new InvalidRequestCountError(total);
  }
}

export function splitQuota(total: number, specificRatio: number): PoolQuota {
  const specific: number = Math.floor(total * specificRatio);
  return { specific, general: total - specific };
}

/**
 * Draws a blended run: each pool is fully shuffled, truncated to its quota,
 * and the two slices are shuffled together.
 *
 * A pool smaller than its quota yields fewer questions. The shortfall is not
 * made up from the other pool, so the result can be shorter than `total`.
 */
export function selectQuestions(
  pools: QuestionPools,
  total: number,
  policy: QuizPolicy,
  random: RandomSource = defaultRandom
): Question[] {
  assertRequestCount(total);

  const quota: PoolQuota = splitQuota(total, policy.specificRatio);
  const specific: Question[] = shuffle(pools.specific, random).slice(
    0,
    quota.specific
  );
  const general: Question[] = shuffle(pools.general, random).slice(
    0,
    quota.general
  );

  return shuffle([...specific, ...general], random);
}
