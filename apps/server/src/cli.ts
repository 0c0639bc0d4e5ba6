#!/usr/bin/env node

/**
 * takeout-threads command line
 *
 * Commands:
 *   extract [directory]  - Extract every *.html document as JSON lines or into SQLite
 *   serve                - Start the HTTP API
 *   groups               - Print the reconciled group overview as JSON lines,
 *                          from the database or straight from a directory (--from)
 */

import type { Group } from "@takeout-threads/shared";
import { Command, Option } from "commander";
import { z } from "zod";
import { loadConfig } from "./config.js";
import { openAppDb } from "./db/database.js";
import { listGroups } from "./services/groups.js";
import { importDirectory } from "./services/imports.js";
import { Store } from "./services/store.js";
import { reconcileDirectory } from "./services/threads.js";
import { startServer } from "./server.js";
import { createLogger } from "./utils/logger.js";

const config = loadConfig();
const logger = createLogger(config.logLevel);

const extractOptions = z.object({
  format: z.enum(["json", "sqlite"]),
  db: z.string().min(1),
});

const serveOptions = z.object({
  db: z.string().min(1),
  port: z.coerce.number().int().min(0).max(65535),
  host: z.string().min(1),
});

const groupsOptions = z.object({
  db: z.string().min(1),
  from: z.string().min(1).optional(),
});

function fail(error: unknown): void {
  logger.error({ err: error }, error instanceof Error ? error.message : "command failed");
  process.exitCode = 1;
}

const program = new Command();

program
  .name("takeout-threads")
  .description("Extract and reconcile Google Voice conversations from a Takeout export")
  .version("0.1.0");

program
  .command("extract")
  .description("Extract every *.html document in a directory")
  .argument("[directory]", "directory holding the exported documents", ".")
  .addOption(new Option("-f, --format <format>", "output format").choices(["json", "sqlite"]).default("json"))
  .option("--db <path>", "database file for sqlite output", config.dbPath)
  .action((directory: string, rawOptions: unknown) => {
    const options = extractOptions.parse(rawOptions);

    try {
      if (options.format === "json") {
        importDirectory(directory, { format: "json", write: (line) => process.stdout.write(`${line}\n`) }, logger);
        return;
      }

      const db = openAppDb(options.db);
      try {
        importDirectory(directory, { format: "sqlite", store: new Store(db) }, logger);
      } finally {
        db.close();
      }
    } catch (error) {
      fail(error);
    }
  });

program
  .command("serve")
  .description("Start the HTTP API")
  .option("--db <path>", "database file", config.dbPath)
  .option("-p, --port <port>", "port to listen on", String(config.port))
  .option("--host <host>", "interface to bind", config.host)
  .action(async (rawOptions: unknown) => {
    const options = serveOptions.parse(rawOptions);
    try {
      await startServer({ dbPath: options.db, port: options.port, host: options.host, logger });
    } catch (error) {
      fail(error);
    }
  });

program
  .command("groups")
  .description("Print the group overview, most recent first")
  .option("--db <path>", "database file", config.dbPath)
  .option("--from <directory>", "extract this directory in memory instead of reading the database")
  .action((rawOptions: unknown) => {
    const options = groupsOptions.parse(rawOptions);
    const print = (groups: Group[]) => {
      for (const group of groups) {
        process.stdout.write(`${JSON.stringify(group)}\n`);
      }
    };

    try {
      if (options.from) {
        print(reconcileDirectory(options.from, logger));
        return;
      }

      const db = openAppDb(options.db);
      try {
        print(listGroups(db));
      } finally {
        db.close();
      }
    } catch (error) {
      fail(error);
    }
  });

program.parseAsync().catch(fail);
