import Database from "better-sqlite3";
import type { DatabaseClient, OpenDatabaseOptions, PreparedStatement, RunResult, SqlValue } from "./types.js";

class BetterSqlitePreparedStatement implements PreparedStatement {
  constructor(private readonly statement: Database.Statement) {}

  run(...params: SqlValue[]): RunResult {
    const result = this.statement.run(...params);
    return {
      changes: result.changes,
      lastInsertRowid: Number(result.lastInsertRowid),
    };
  }

  get<T = unknown>(...params: SqlValue[]): T | undefined {
    return this.statement.get(...params) as T | undefined;
  }

  all<T = unknown>(...params: SqlValue[]): T[] {
    return this.statement.all(...params) as T[];
  }
}

class BetterSqliteDatabaseClient implements DatabaseClient {
  constructor(private readonly db: Database.Database) {}

  exec(sql: string): void {
    this.db.exec(sql);
  }

  pragma(statement: string): void {
    this.db.pragma(statement);
  }

  prepare(sql: string): PreparedStatement {
    return new BetterSqlitePreparedStatement(this.db.prepare(sql));
  }

  transaction<T>(fn: () => T): () => T {
    const wrapped = this.db.transaction(fn);
    return () => wrapped();
  }

  close(): void {
    this.db.close();
  }
}

export function createBetterSqliteAdapter(dbPath: string, options?: OpenDatabaseOptions): DatabaseClient {
  const db = new Database(dbPath, {
    readonly: options?.readonly ?? false,
    fileMustExist: !(options?.create ?? true),
  });

  return new BetterSqliteDatabaseClient(db);
}
