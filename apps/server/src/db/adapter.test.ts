import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { afterEach, describe, expect, test } from "vitest";
import { createBetterSqliteAdapter } from "./adapter-better-sqlite.js";
import { openAppDb } from "./database.js";
import type { DatabaseClient } from "./types.js";

const tempDirs: string[] = [];

afterEach(() => {
  for (const dir of tempDirs.splice(0, tempDirs.length)) {
    fs.rmSync(dir, { recursive: true, force: true });
  }
});

function withDbPath(name: string): string {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), "takeout-adapter-"));
  tempDirs.push(dir);
  return path.join(dir, `${name}.db`);
}

function runScenario(db: DatabaseClient) {
  db.exec("CREATE TABLE sample (id INTEGER PRIMARY KEY AUTOINCREMENT, label TEXT NOT NULL, value INTEGER NOT NULL)");

  const insert = db.prepare("INSERT INTO sample (label, value) VALUES (?, ?)");
  const selectOne = db.prepare("SELECT label, value FROM sample WHERE label = ?");

  const first = insert.run("a", 1);
  const tx = db.transaction(() => {
    insert.run("b", 2);
    insert.run("c", 3);
  });
  tx();

  const failing = db.transaction(() => {
    insert.run("d", 4);
    throw new Error("abort");
  });
  let rolledBack = false;
  try {
    failing();
  } catch (error) {
    rolledBack = error instanceof Error && error.message === "abort";
  }

  const update = db.prepare("UPDATE sample SET value = value + 5 WHERE label = ?").run("a");
  const rows = db.prepare("SELECT label, value FROM sample ORDER BY label ASC").all<{ label: string; value: number }>();
  const one = selectOne.get<{ label: string; value: number }>("a");

  db.close();

  return {
    firstChanges: first.changes,
    firstRowId: first.lastInsertRowid,
    updateChanges: update.changes,
    rolledBack,
    rows,
    one,
  };
}

describe("db adapter", () => {
  test("keeps stable semantics for core CRUD and transaction operations", () => {
    const result = runScenario(createBetterSqliteAdapter(withDbPath("adapter"), { create: true }));

    expect(result.rows).toEqual([
      { label: "a", value: 6 },
      { label: "b", value: 2 },
      { label: "c", value: 3 },
    ]);
    expect(result.firstChanges).toBe(1);
    expect(result.firstRowId).toBe(1);
    expect(result.updateChanges).toBe(1);
    expect(result.rolledBack).toBe(true);
    expect(result.one).toEqual({ label: "a", value: 6 });
  });

  test("creates the schema on open", () => {
    const db = openAppDb(withDbPath("schema"));
    const tables = db
      .prepare(`SELECT name FROM sqlite_master WHERE type = 'table' AND name NOT LIKE 'sqlite_%' ORDER BY name`)
      .all<{ name: string }>()
      .map((row) => row.name);
    db.close();

    expect(tables).toEqual([
      "contact",
      "conversation",
      "image",
      "import_run",
      "media_file",
      "message",
      "parse_warning",
      "participant",
    ]);
  });
});
