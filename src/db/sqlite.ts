import sqlite3 from "sqlite3";
import { logger } from "../logger.js";

export function openReadOnly(dbFile: string): Promise<sqlite3.Database> {
  return new Promise<sqlite3.Database>((resolve, reject) => {
    const db: sqlite3.Database = new sqlite3.Database(
      dbFile,
      sqlite3.OPEN_READONLY,
      (err: Error | null) => (err ? reject(err) : resolve(db))
    );
  });
}

export function closeDb(db: sqlite3.Database): Promise<void> {
  return new Promise<void>((resolve, reject) => {
    db.close((err: Error | null) => (err ? reject(err) : resolve()));
  });
}

export function all<T>(
  db: sqlite3.Database,
  sql: string,
  params: readonly unknown[] = []
): Promise<T[]> {
  return new Promise<T[]>((resolve, reject) => {
    db.all(sql, params, (err: Error | null, rows: T[]) =>
      err ? reject(err) : resolve(rows)
    );
  });
}

/**
 * Opens `dbFile` read-only for the duration of `fn` and always closes it,
 * whether `fn` resolves or rejects.
 */
export async function withReadOnlyDb<T>(
  dbFile: string,
  fn: (db: sqlite3.Database) => Promise<T>
): Promise<T> {
  const db: sqlite3.Database = await openReadOnly(dbFile);
  try {
    return await fn(db);
  } finally {
    await closeDb(db).catch((err: unknown) =>
      logger.warn(`Failed to close ${dbFile}`, { err })
    );
  }
}
