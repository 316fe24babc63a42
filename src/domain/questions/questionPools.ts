import { logger } from "../../logger.js";
import { StoreUnavailableError } from "../errors.js";
import type { PoolName, Question, QuestionPools } from "../types.js";
import type { QuestionStoreRepository } from "./questionStoreRepository.js";

export interface LoadedPools {
  pools: QuestionPools;
  notices: StoreUnavailableError[];
}

/**
 * Reads both pools. A store that fails becomes an empty pool and its error is
 * returned as a notice for the display layer instead of being thrown.
 */
export async function loadPools(
  repo: QuestionStoreRepository
): Promise<LoadedPools> {
  const notices: StoreUnavailableError[] = [];

  const read = async (pool: PoolName): Promise<Question[]> => {
    try {
      return await repo.load(pool);
    } catch (err) {
      const notice: StoreUnavailableError =
        err instanceof StoreUnavailableError
          ? err
          : new StoreUnavailableError(pool, err);
      logger.warn(notice.message, { pool });
      notices.push(notice);
      return [];
    }
  };

  // Sequential: one store handle open at a time.
  const specific: Question[] = await read("specific");
  const general: Question[] = await read("general");

  return { pools: { specific, general }, notices };
}
