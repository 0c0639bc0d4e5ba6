import type { Contact, ConversationType, Group, GroupMessage, GroupSummary, GroupThread } from "@takeout-threads/shared";
import type { DatabaseClient } from "../db/types.js";
import { foldGroups, groupKey, matchingConversations } from "./reconcile.js";

const RECENT_MESSAGES = 3;

interface MessageRow {
  id: number;
  conversation_id: number;
  timestamp: string | null;
  content: string;
  sender_id: number;
  sender_name: string;
  sender_phone: string;
}

function placeholders(count: number): string {
  return new Array(count).fill("?").join(", ");
}

// Messages for the given conversations (all when omitted), most recent first.
export function loadMessages(db: DatabaseClient, conversationIds?: readonly number[]): GroupMessage[] {
  if (conversationIds && conversationIds.length === 0) {
    return [];
  }

  const filter = conversationIds ? `WHERE m.conversation_id IN (${placeholders(conversationIds.length)})` : "";
  const params = conversationIds ? [...conversationIds] : [];

  const rows = db
    .prepare(
      `SELECT m.id, m.conversation_id, m.timestamp, m.content,
              c.id AS sender_id, c.name AS sender_name, c.phone_number AS sender_phone
       FROM message m
       JOIN contact c ON c.id = m.sender_contact_id
       ${filter}
       ORDER BY m.timestamp DESC, m.id DESC`
    )
    .all<MessageRow>(...params);

  const images = db
    .prepare(
      `SELECT i.message_id, i.image_url
       FROM image i
       JOIN message m ON m.id = i.message_id
       ${filter}
       ORDER BY i.id ASC`
    )
    .all<{ message_id: number; image_url: string }>(...params);

  const imagesByMessage = new Map<number, string[]>();
  for (const image of images) {
    const list = imagesByMessage.get(image.message_id) ?? [];
    list.push(image.image_url);
    imagesByMessage.set(image.message_id, list);
  }

  return rows.map((row) => ({
    id: row.id,
    conversationId: row.conversation_id,
    timestamp: row.timestamp,
    sender: { id: row.sender_id, name: row.sender_name, phoneNumber: row.sender_phone },
    content: row.content,
    images: imagesByMessage.get(row.id) ?? [],
  }));
}

export function listGroups(db: DatabaseClient): Group[] {
  const rows = db
    .prepare(
      `SELECT cv.id AS conversation_id, cv.type, cv.timestamp,
              ct.id AS contact_id, ct.name, ct.phone_number
       FROM conversation cv
       LEFT JOIN participant p ON p.conversation_id = cv.id
       LEFT JOIN contact ct ON ct.id = p.contact_id
       ORDER BY cv.timestamp DESC, cv.id DESC, ct.id ASC`
    )
    .all<{
      conversation_id: number;
      type: ConversationType;
      timestamp: string | null;
      contact_id: number | null;
      name: string | null;
      phone_number: string | null;
    }>();

  const heads = foldGroups<Contact>(
    rows.map((row) => ({
      conversationId: row.conversation_id,
      type: row.type,
      timestamp: row.timestamp,
      contactId: row.contact_id,
      participant:
        row.contact_id === null
          ? null
          : { id: row.contact_id, name: row.name ?? "", phoneNumber: row.phone_number ?? "" },
    }))
  );

  const groupByConversation = new Map<number, Group>();
  const groups = heads.map((head) => {
    const group: Group = { ...head, messages: [] };
    for (const conversationId of head.conversationIds) {
      groupByConversation.set(conversationId, group);
    }
    return group;
  });

  // Already ordered most recent first, so each bucket stays ordered.
  for (const message of loadMessages(db)) {
    groupByConversation.get(message.conversationId)?.messages.push(message);
  }

  return groups;
}

export function summarizeGroup(group: Group): GroupSummary {
  return {
    key: group.key,
    type: group.type,
    timestamp: group.timestamp,
    lastConversationId: group.lastConversationId,
    participants: group.participants,
    conversationCount: group.conversationIds.length,
    messageCount: group.messages.length,
    recentMessages: group.messages.slice(0, RECENT_MESSAGES),
  };
}

export function messagesForContacts(db: DatabaseClient, contactIds: readonly number[]): GroupThread {
  const key = groupKey(contactIds);
  const target = key ? key.split(",").map(Number) : [];

  const rows = db
    .prepare(
      `SELECT conversation_id, contact_id
       FROM participant
       ORDER BY conversation_id ASC, contact_id ASC`
    )
    .all<{ conversation_id: number; contact_id: number }>();

  const conversationIds = matchingConversations(
    rows.map((row) => ({ conversationId: row.conversation_id, contactId: row.contact_id })),
    target
  );

  const participants =
    target.length === 0
      ? []
      : db
          .prepare(
            `SELECT id, name, phone_number
             FROM contact
             WHERE id IN (${placeholders(target.length)})
             ORDER BY id ASC`
          )
          .all<{ id: number; name: string; phone_number: string }>(...target)
          .map((row) => ({ id: row.id, name: row.name, phoneNumber: row.phone_number }));

  return { key, participants, conversationIds, messages: loadMessages(db, conversationIds) };
}
