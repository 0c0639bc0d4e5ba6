import type { DatabaseClient } from "../db/types.js";
import { nowIso } from "../utils/time.js";
import type { Conversation, ParserWarning } from "./extract/types.js";

export interface ImportRunRecord {
  id: number;
  directory: string;
  startedAt: string;
  finishedAt: string | null;
  extractedCount: number;
  failedCount: number;
}

export interface StoredParseWarning extends ParserWarning {
  id: number;
  importId: number;
  sourceFile: string;
  createdAt: string;
}

export interface MediaPayload {
  fileName: string;
  content: Uint8Array;
}

export type MediaLookup = (imageUrl: string) => MediaPayload | undefined;

export class Store {
  constructor(private readonly db: DatabaseClient) {}

  getOrCreateContact(name: string, phoneNumber: string): number {
    this.db
      .prepare(`INSERT OR IGNORE INTO contact (name, phone_number) VALUES (?, ?)`)
      .run(name, phoneNumber);

    const row = this.db
      .prepare(`SELECT id FROM contact WHERE name = ? AND phone_number = ?`)
      .get<{ id: number }>(name, phoneNumber);
    if (!row) {
      throw new Error(`contact ${name} <${phoneNumber}> missing after insert`);
    }
    return row.id;
  }

  // One transaction per conversation; any failure rolls back every row written for it.
  insertConversation(conversation: Conversation, media?: MediaLookup): number {
    const write = this.db.transaction(() => {
      const { duration, transcript } = callFields(conversation);
      const conversationId = this.db
        .prepare(
          `INSERT INTO conversation (type, timestamp, duration, transcript, source_file)
           VALUES (?, ?, ?, ?, ?)`
        )
        .run(conversation.type, conversation.timestamp, duration, transcript, conversation.sourceFile ?? "")
        .lastInsertRowid;

      const insertParticipant = this.db.prepare(
        `INSERT OR IGNORE INTO participant (conversation_id, contact_id) VALUES (?, ?)`
      );
      for (const [name, phoneNumber] of Object.entries(conversation.participants)) {
        insertParticipant.run(conversationId, this.getOrCreateContact(name, phoneNumber));
      }

      if (conversation.type !== "chat") {
        return conversationId;
      }

      const insertMessage = this.db.prepare(
        `INSERT INTO message (conversation_id, timestamp, sender_contact_id, content)
         VALUES (?, ?, ?, ?)`
      );
      const insertImage = this.db.prepare(`INSERT INTO image (message_id, image_url) VALUES (?, ?)`);
      const insertMedia = this.db.prepare(
        `INSERT INTO media_file (image_id, file_name, content) VALUES (?, ?, ?)`
      );

      for (const message of conversation.messages) {
        const senderId = this.getOrCreateContact(message.sender, message.senderNumber);
        const messageId = insertMessage.run(conversationId, message.timestamp, senderId, message.content).lastInsertRowid;

        for (const imageUrl of message.images) {
          const imageId = insertImage.run(messageId, imageUrl).lastInsertRowid;
          const payload = media?.(imageUrl);
          if (payload) {
            insertMedia.run(imageId, payload.fileName, payload.content);
          }
        }
      }

      return conversationId;
    });

    return write();
  }

  startImport(directory: string): ImportRunRecord {
    const startedAt = nowIso();
    const id = this.db
      .prepare(`INSERT INTO import_run (directory, started_at) VALUES (?, ?)`)
      .run(directory, startedAt).lastInsertRowid;

    return { id, directory, startedAt, finishedAt: null, extractedCount: 0, failedCount: 0 };
  }

  finishImport(importId: number, extractedCount: number, failedCount: number): void {
    this.db
      .prepare(
        `UPDATE import_run
         SET finished_at = ?, extracted_count = ?, failed_count = ?
         WHERE id = ?`
      )
      .run(nowIso(), extractedCount, failedCount, importId);
  }

  addParseWarning(importId: number, sourceFile: string, warning: ParserWarning): void {
    this.db
      .prepare(
        `INSERT INTO parse_warning (import_id, source_file, severity, code, details_json, created_at)
         VALUES (?, ?, ?, ?, ?, ?)`
      )
      .run(importId, sourceFile, warning.severity, warning.code, JSON.stringify(warning.details), nowIso());
  }

  listImports(): ImportRunRecord[] {
    return this.db
      .prepare(
        `SELECT id, directory, started_at, finished_at, extracted_count, failed_count
         FROM import_run
         ORDER BY id DESC`
      )
      .all<ImportRunRow>()
      .map(toImportRun);
  }

  getImport(importId: number): ImportRunRecord | undefined {
    const row = this.db
      .prepare(
        `SELECT id, directory, started_at, finished_at, extracted_count, failed_count
         FROM import_run
         WHERE id = ?`
      )
      .get<ImportRunRow>(importId);
    return row ? toImportRun(row) : undefined;
  }

  listParseWarnings(importId: number): StoredParseWarning[] {
    const rows = this.db
      .prepare(
        `SELECT id, import_id, source_file, severity, code, details_json, created_at
         FROM parse_warning
         WHERE import_id = ?
         ORDER BY id ASC`
      )
      .all<{
        id: number;
        import_id: number;
        source_file: string;
        severity: ParserWarning["severity"];
        code: string;
        details_json: string;
        created_at: string;
      }>(importId);

    return rows.map((row) => ({
      id: row.id,
      importId: row.import_id,
      sourceFile: row.source_file,
      severity: row.severity,
      code: row.code,
      details: parseDetails(row.details_json),
      createdAt: row.created_at,
    }));
  }
}

interface ImportRunRow {
  id: number;
  directory: string;
  started_at: string;
  finished_at: string | null;
  extracted_count: number;
  failed_count: number;
}

function toImportRun(row: ImportRunRow): ImportRunRecord {
  return {
    id: row.id,
    directory: row.directory,
    startedAt: row.started_at,
    finishedAt: row.finished_at,
    extractedCount: row.extracted_count,
    failedCount: row.failed_count,
  };
}

function callFields(conversation: Conversation): { duration: string; transcript: string } {
  switch (conversation.type) {
    case "chat":
      return { duration: "", transcript: "" };
    case "voicemail":
      return { duration: conversation.duration, transcript: conversation.transcript };
    default:
      return { duration: conversation.duration, transcript: "" };
  }
}

function parseDetails(json: string): Record<string, unknown> {
  const parsed: unknown = JSON.parse(json);
  return typeof parsed === "object" && parsed !== null && !Array.isArray(parsed)
    ? Object.fromEntries(Object.entries(parsed))
    : {};
}
