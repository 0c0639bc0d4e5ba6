import fs from "node:fs";
import path from "node:path";
import { createBetterSqliteAdapter } from "./adapter-better-sqlite.js";
import { migrate } from "./schema.js";
import type { DatabaseClient } from "./types.js";

export const DB_FILE_NAME = "takeout.db";

export function openAppDb(dbPath: string): DatabaseClient {
  if (dbPath !== ":memory:") {
    fs.mkdirSync(path.dirname(path.resolve(dbPath)), { recursive: true });
  }

  const db = createBetterSqliteAdapter(dbPath, { create: true });
  db.pragma("journal_mode = WAL");
  db.pragma("foreign_keys = ON");
  migrate(db);
  return db;
}

export function defaultDbPath(dataDir: string): string {
  return path.join(path.resolve(dataDir), DB_FILE_NAME);
}
