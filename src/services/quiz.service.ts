import { logger } from "../logger.js";
import type { StoreUnavailableError } from "../domain/errors.js";
import { DEFAULT_POLICY, type QuizPolicy } from "../domain/policy.js";
import { loadPools, type LoadedPools } from "../domain/questions/questionPools.js";
import type { QuestionStoreRepository } from "../domain/questions/questionStoreRepository.js";
import { QuizSession } from "../domain/quizSession.js";
import { defaultRandom, type RandomSource } from "../domain/random.js";
import { assertRequestCount } from "../domain/selection.js";

export interface QuizStart {
  session: QuizSession;
  notices: StoreUnavailableError[];
}

export interface QuizService {
  readonly policy: QuizPolicy;
  startQuiz(total: number): Promise<QuizStart>;
  activeSession(): QuizSession | undefined;
  getSession(sessionId: string): QuizSession | undefined;
  closeActive(): QuizSession | undefined;
}

/**
 * Holds at most one session: starting a new quiz closes the previous one.
 */
export class QuizServiceImpl implements QuizService {
  public readonly policy: QuizPolicy;
  private readonly repo: QuestionStoreRepository;
  private readonly random: RandomSource;
  private current: QuizSession | undefined;

  public constructor(
    repo: QuestionStoreRepository,
    policy: QuizPolicy = DEFAULT_POLICY,
    random: RandomSource = defaultRandom
  ) {
    this.repo = repo;
    this.policy = policy;
    this.random = random;
  }

  public async startQuiz(total: number): Promise<QuizStart> {
    assertRequestCount(total);

    const { pools, notices }: LoadedPools = await loadPools(this.repo);
    this.closeActive();

    const session: QuizSession = QuizSession.prepare(
      total,
      pools,
      this.policy,
      this.random
    );
    this.current = session;

    logger.info(
      `Quiz ${session.id} started: requested=${total}, selected=${session.total}`,
      {
        specificPool: pools.specific.length,
        generalPool: pools.general.length,
      }
    );
    return { session, notices };
  }

  public activeSession(): QuizSession | undefined {
    return this.current?.isActive ? this.current : undefined;
  }

  /** Only the latest session is addressable; older ids are stale. */
  public getSession(sessionId: string): QuizSession | undefined {
    return this.current?.id === sessionId ? this.current : undefined;
  }

  public closeActive(): QuizSession | undefined {
    const sess: QuizSession | undefined = this.activeSession();
    if (!sess) return undefined;
    sess.close();
    logger.info(`Quiz ${sess.id} closed at position ${sess.progress().position}`);
    return sess;
  }
}
