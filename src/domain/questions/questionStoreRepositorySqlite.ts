import { z } from "zod";
import { all, withReadOnlyDb } from "../../db/sqlite.js";
import { StoreUnavailableError } from "../errors.js";
import { toOptionLabel, type PoolName, type Question } from "../types.js";
import type { QuestionStoreRepository } from "./questionStoreRepository.js";

const QuestionRowSchema = z.object({
  id: z.number().int(),
  numero: z.number().int(),
  enunciado: z.string(),
  alternativa_a: z.string(),
  alternativa_b: z.string(),
  alternativa_c: z.string(),
  alternativa_d: z.string(),
  fonte: z.string().nullable().transform((s) => s ?? ""),
  gabarito: z.string().transform((s, ctx) => {
    const label = toOptionLabel(s);
    if (label === null) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `gabarito must be one of a, b, c, d (got '${s}')`,
      });
      return z.NEVER;
    }
    return label;
  }),
});

type QuestionRow = z.infer<typeof QuestionRowSchema>;

const SELECT_QUESTIONS = `
  SELECT id, numero, enunciado, alternativa_a, alternativa_b,
         alternativa_c, alternativa_d, fonte, gabarito
    FROM questoes`;

export type StoreFiles = Readonly<Record<PoolName, string>>;

export class QuestionStoreRepositorySqlite implements QuestionStoreRepository {
  private readonly files: StoreFiles;

  public constructor(files: StoreFiles) {
    this.files = files;
  }

  public async load(pool: PoolName): Promise<Question[]> {
    try {
      const rows = await withReadOnlyDb(this.files[pool], (db) =>
        all<unknown>(db, SELECT_QUESTIONS)
      );
      return rows.map((raw: unknown, i: number) => {
        const parsed = QuestionRowSchema.safeParse(raw);
        if (!parsed.success) {
          throw new Error(
            `row ${i + 1} is malformed: ${parsed.error.issues
              .map((issue) => `${issue.path.join(".")} ${issue.message}`)
              .join("; ")}`
          );
        }
        return toQuestion(parsed.data, pool);
      });
    } catch (err) {
      throw new StoreUnavailableError(pool, err);
    }
  }
}

function toQuestion(row: QuestionRow, pool: PoolName): Question {
  return Object.freeze({
    id: row.id,
    number: row.numero,
    statement: row.enunciado,
    options: Object.freeze({
      a: row.alternativa_a,
      b: row.alternativa_b,
      c: row.alternativa_c,
      d: row.alternativa_d,
    }),
    source: row.fonte,
    correct: row.gabarito,
    pool,
  });
}
