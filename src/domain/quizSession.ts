import { nanoid } from "nanoid";
import { QuizStateError } from "./errors.js";
import { DEFAULT_POLICY, type QuizPolicy } from "./policy.js";
import { defaultRandom, type RandomSource } from "./random.js";
import { evaluatePerformance } from "./scoring.js";
import { selectQuestions } from "./selection.js";
import {
  toOptionLabel,
  type OptionLabel,
  type PerformanceResult,
  type Question,
  type QuestionPools,
} from "./types.js";

export type SessionState =
  | { kind: "active"; position: number }
  | { kind: "finished" };

export interface SessionProgress {
  position: number; // zero-based
  total: number;
  correct: number;
  answered: number;
}

export interface QuizSessionInit {
  requested: number;
  questions: readonly Question[];
  policy?: QuizPolicy;
  id?: string;
}

/**
 * One quiz attempt: a fixed, already-shuffled sequence walked front to back.
 *
 * submit() grades the current question without moving; advance() moves on.
 * Both are no-ops once the session is finished.
 */
export class QuizSession {
  public readonly id: string;
  public readonly requested: number;
  public readonly questions: readonly Question[];
  private readonly policy: QuizPolicy;

  private position: number = 0;
  private correctCount: number = 0;
  private active: boolean;
  // position -> whether the first submitted answer was right
  private readonly graded: Map<number, boolean> = new Map<number, boolean>();

  constructor(init: QuizSessionInit) {
    this.id = init.id ?? nanoid();
    this.requested = init.requested;
    this.questions = Object.freeze([...init.questions]);
    this.policy = init.policy ?? DEFAULT_POLICY;
    this.active = this.questions.length > 0;
  }

  public static prepare(
    requested: number,
    pools: QuestionPools,
    policy: QuizPolicy = DEFAULT_POLICY,
    random: RandomSource = defaultRandom
  ): QuizSession {
    const questions: Question[] = selectQuestions(
      pools,
      requested,
      policy,
      random
    );
    return new QuizSession({ requested, questions, policy });
  }

  public get state(): SessionState {
    return this.active
      ? { kind: "active", position: this.position }
      : { kind: "finished" };
  }

  public get isActive(): boolean {
    return this.active;
  }

  public get total(): number {
    return this.questions.length;
  }

  public get correct(): number {
    return this.correctCount;
  }

  public current(): Question | undefined {
    return this.active ? this.questions[this.position] : undefined;
  }

  public hasAnsweredCurrent(): boolean {
    return this.active && this.graded.has(this.position);
  }

  public submit(answer: string): boolean {
    const question: Question | undefined = this.current();
    if (!question) return false;

    const previous: boolean | undefined = this.graded.get(this.position);
    if (previous !== undefined) return previous;

    const label: OptionLabel | null = toOptionLabel(answer);
    const ok: boolean = label === question.correct;
    this.graded.set(this.position, ok);
    if (ok) this.correctCount += 1;
    return ok;
  }

  public advance(): SessionState {
    if (!this.active) return this.state;

    this.position += 1;
    if (this.position >= this.questions.length) {
      this.position = this.questions.length;
      this.active = false;
    }
    return this.state;
  }

  public close(): void {
    this.active = false;
  }

  public progress(): SessionProgress {
    return {
      position: this.position,
      total: this.questions.length,
      correct: this.correctCount,
      answered: this.graded.size,
    };
  }

  public finalize(): PerformanceResult {
    if (this.active) {
      throw new QuizStateError(
        `Session ${this.id} is still active at position ${this.position}`
      );
    }
    return evaluatePerformance(
      this.correctCount,
      this.questions.length,
      this.policy
    );
  }
}
