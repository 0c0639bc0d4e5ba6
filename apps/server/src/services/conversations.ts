import type {
  Contact,
  ConversationDetail,
  ConversationListItem,
  ConversationPage,
  ConversationType,
  GroupMessage,
} from "@takeout-threads/shared";
import type { DatabaseClient, SqlValue } from "../db/types.js";
import { loadMessages } from "./groups.js";

const PREVIEW_LINES = 5;

export interface ConversationQuery {
  q: string;
  limit: number;
  offset: number;
}

interface ConversationRow {
  id: number;
  type: ConversationType;
  timestamp: string | null;
  duration: string;
  transcript: string;
  source_file: string;
}

function likePattern(term: string): string {
  return `%${term.replace(/[\\%_]/g, (match) => `\\${match}`)}%`;
}

function searchFilter(term: string): { where: string; params: SqlValue[] } {
  if (!term) {
    return { where: "", params: [] };
  }
  const pattern = likePattern(term);
  return {
    where: `WHERE cv.transcript LIKE ? ESCAPE '\\'
       OR EXISTS (SELECT 1 FROM message m WHERE m.conversation_id = cv.id AND m.content LIKE ? ESCAPE '\\')
       OR EXISTS (
         SELECT 1 FROM participant p JOIN contact ct ON ct.id = p.contact_id
         WHERE p.conversation_id = cv.id AND ct.name LIKE ? ESCAPE '\\'
       )`,
    params: [pattern, pattern, pattern],
  };
}

function participantsOf(db: DatabaseClient, conversationIds: readonly number[]): Map<number, Contact[]> {
  const byConversation = new Map<number, Contact[]>();
  if (conversationIds.length === 0) {
    return byConversation;
  }

  const rows = db
    .prepare(
      `SELECT p.conversation_id, ct.id, ct.name, ct.phone_number
       FROM participant p
       JOIN contact ct ON ct.id = p.contact_id
       WHERE p.conversation_id IN (${conversationIds.map(() => "?").join(", ")})
       ORDER BY p.conversation_id ASC, ct.id ASC`
    )
    .all<{ conversation_id: number; id: number; name: string; phone_number: string }>(...conversationIds);

  for (const row of rows) {
    const list = byConversation.get(row.conversation_id) ?? [];
    list.push({ id: row.id, name: row.name, phoneNumber: row.phone_number });
    byConversation.set(row.conversation_id, list);
  }
  return byConversation;
}

function chronological(db: DatabaseClient, conversationIds: readonly number[]): Map<number, GroupMessage[]> {
  const byConversation = new Map<number, GroupMessage[]>();
  for (const message of loadMessages(db, conversationIds).reverse()) {
    const list = byConversation.get(message.conversationId) ?? [];
    list.push(message);
    byConversation.set(message.conversationId, list);
  }
  return byConversation;
}

export function transcriptPreview(type: ConversationType, transcript: string, messages: readonly GroupMessage[]): string {
  if (type === "voicemail") {
    return transcript;
  }
  if (type !== "chat") {
    return "";
  }
  return messages
    .slice(0, PREVIEW_LINES)
    .map((message) => `${message.sender.name}: ${message.content}`)
    .join("\n");
}

function toListItem(row: ConversationRow, participants: Contact[], messages: readonly GroupMessage[]): ConversationListItem {
  return {
    id: row.id,
    type: row.type,
    timestamp: row.timestamp,
    duration: row.duration,
    sourceFile: row.source_file,
    participants,
    transcript: transcriptPreview(row.type, row.transcript, messages),
  };
}

export function searchConversations(db: DatabaseClient, query: ConversationQuery): ConversationPage {
  const filter = searchFilter(query.q.trim());

  const total =
    db
      .prepare(`SELECT COUNT(*) AS total FROM conversation cv ${filter.where}`)
      .get<{ total: number }>(...filter.params)?.total ?? 0;

  const rows = db
    .prepare(
      `SELECT cv.id, cv.type, cv.timestamp, cv.duration, cv.transcript, cv.source_file
       FROM conversation cv
       ${filter.where}
       ORDER BY cv.timestamp DESC, cv.id DESC
       LIMIT ? OFFSET ?`
    )
    .all<ConversationRow>(...filter.params, query.limit, query.offset);

  const ids = rows.map((row) => row.id);
  const participants = participantsOf(db, ids);
  const messages = chronological(db, ids);

  return {
    conversations: rows.map((row) =>
      toListItem(row, participants.get(row.id) ?? [], messages.get(row.id) ?? [])
    ),
    total,
    limit: query.limit,
    offset: query.offset,
  };
}

export function getConversation(db: DatabaseClient, id: number): ConversationDetail | undefined {
  const row = db
    .prepare(
      `SELECT id, type, timestamp, duration, transcript, source_file
       FROM conversation
       WHERE id = ?`
    )
    .get<ConversationRow>(id);
  if (!row) {
    return undefined;
  }

  const messages = chronological(db, [id]).get(id) ?? [];
  return {
    ...toListItem(row, participantsOf(db, [id]).get(id) ?? [], messages),
    transcript: row.transcript,
    messages,
  };
}
