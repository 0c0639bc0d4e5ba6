import fs from "node:fs";
import path from "node:path";
import type { ImportSummary } from "@takeout-threads/shared";
import type { Logger } from "../utils/logger.js";
import { extractConversation } from "./extract/extractor.js";
import { serializeConversation } from "./extract/serialize.js";
import { parseDocument } from "./extract/tree.js";
import type { Conversation, ExtractionResult, ParserWarning } from "./extract/types.js";
import { MediaDirectory } from "./media.js";
import type { MediaLookup, Store } from "./store.js";

export type ImportTarget =
  | { format: "json"; write: (line: string) => void }
  | { format: "memory"; add: (conversation: Conversation) => void }
  | { format: "sqlite"; store: Store };

interface Tally {
  importId: number | null;
  processedFiles: number;
  extracted: number;
  failed: number;
  warnings: number;
}

export function listHtmlFiles(directory: string): string[] {
  return fs
    .readdirSync(directory, { withFileTypes: true })
    .filter((entry) => entry.isFile() && entry.name.endsWith(".html"))
    .map((entry) => entry.name)
    .sort();
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

function recordWarning(target: ImportTarget, tally: Tally, fileName: string, warning: ParserWarning, log: Logger): void {
  tally.warnings += 1;
  const level = warning.severity === "error" ? "error" : warning.severity === "warning" ? "warn" : "info";
  log[level]({ code: warning.code, details: warning.details }, "parse warning");

  if (target.format === "sqlite" && tally.importId !== null) {
    target.store.addParseWarning(tally.importId, fileName, warning);
  }
}

function mediaLookup(media: MediaDirectory, log: Logger): MediaLookup {
  return (imageUrl) => {
    const resolved = media.resolve(imageUrl);
    if (!resolved) {
      log.warn({ imageUrl }, "attachment not found");
      return undefined;
    }
    try {
      return { fileName: resolved.fileName, content: media.read(resolved) };
    } catch (error) {
      log.warn({ imageUrl, fileName: resolved.fileName, err: error }, "attachment unreadable");
      return undefined;
    }
  };
}

function processDocument(
  target: ImportTarget,
  tally: Tally,
  fileName: string,
  load: () => string,
  log: Logger,
  media?: MediaLookup
): void {
  tally.processedFiles += 1;

  let result: ExtractionResult;
  try {
    result = extractConversation(parseDocument(load()));
  } catch (error) {
    tally.failed += 1;
    recordWarning(
      target,
      tally,
      fileName,
      { severity: "error", code: "unreadable_document", details: { message: errorMessage(error) } },
      log
    );
    return;
  }

  for (const warning of result.warnings) {
    recordWarning(target, tally, fileName, warning, log);
  }

  if (!result.ok) {
    tally.failed += 1;
    recordWarning(
      target,
      tally,
      fileName,
      { severity: "error", code: result.reason, details: { message: result.message } },
      log
    );
    return;
  }

  const conversation: Conversation = { ...result.conversation, sourceFile: fileName };

  if (target.format === "json") {
    target.write(serializeConversation(conversation));
    tally.extracted += 1;
    return;
  }
  if (target.format === "memory") {
    target.add(conversation);
    tally.extracted += 1;
    return;
  }

  try {
    const conversationId = target.store.insertConversation(conversation, media);
    tally.extracted += 1;
    log.debug({ conversationId, type: conversation.type }, "conversation stored");
  } catch (error) {
    tally.failed += 1;
    recordWarning(
      target,
      tally,
      fileName,
      { severity: "error", code: "storage_failed", details: { message: errorMessage(error) } },
      log
    );
  }
}

function begin(target: ImportTarget, source: string): Tally {
  const importId = target.format === "sqlite" ? target.store.startImport(source).id : null;
  return { importId, processedFiles: 0, extracted: 0, failed: 0, warnings: 0 };
}

function finish(target: ImportTarget, tally: Tally, logger: Logger): ImportSummary {
  if (target.format === "sqlite" && tally.importId !== null) {
    target.store.finishImport(tally.importId, tally.extracted, tally.failed);
  }
  logger.info({ ...tally }, "import finished");
  return { ...tally };
}

export function importDirectory(directory: string, target: ImportTarget, logger: Logger): ImportSummary {
  const root = path.resolve(directory);
  const fileNames = listHtmlFiles(root);
  const media = target.format === "sqlite" ? new MediaDirectory(root) : undefined;

  const tally = begin(target, root);
  logger.info({ directory: root, files: fileNames.length, format: target.format }, "import started");

  for (const fileName of fileNames) {
    const log = logger.child({ file: fileName });
    processDocument(
      target,
      tally,
      fileName,
      () => fs.readFileSync(path.join(root, fileName), "utf8"),
      log,
      media ? mediaLookup(media, log) : undefined
    );
  }

  return finish(target, tally, logger);
}

// A single uploaded document; attachments are not available, so only image references are stored.
export function importDocument(store: Store, fileName: string, html: string, logger: Logger): ImportSummary {
  const target: ImportTarget = { format: "sqlite", store };
  const tally = begin(target, `upload:${fileName}`);
  processDocument(target, tally, fileName, () => html, logger.child({ file: fileName }));
  return finish(target, tally, logger);
}
