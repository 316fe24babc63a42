import type { PoolName, Question } from "../types.js";

export interface QuestionStoreRepository {
  /**
   * Reads every question of one pool in the store's row order.
   * Rejects with StoreUnavailableError when the store cannot be read.
   */
  load(pool: PoolName): Promise<Question[]>;
}
