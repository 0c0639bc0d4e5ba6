import type { Contact, Group, GroupMessage } from "@takeout-threads/shared";
import type { Logger } from "../utils/logger.js";
import type { Conversation } from "./extract/types.js";
import { importDirectory } from "./imports.js";
import { compareTimestampDesc, foldGroups, type ConversationParticipantRow } from "./reconcile.js";

function contactIdentity(name: string, phoneNumber: string): string {
  return JSON.stringify([name, phoneNumber]);
}

// Ids follow (name, phone) order so the same input set always yields the same keys.
function buildContacts(conversations: readonly Conversation[]): Map<string, Contact> {
  const pairs = new Map<string, [string, string]>();
  const remember = (name: string, phoneNumber: string) => {
    pairs.set(contactIdentity(name, phoneNumber), [name, phoneNumber]);
  };

  for (const conversation of conversations) {
    for (const [name, phoneNumber] of Object.entries(conversation.participants)) {
      remember(name, phoneNumber);
    }
    if (conversation.type === "chat") {
      for (const message of conversation.messages) {
        remember(message.sender, message.senderNumber);
      }
    }
  }

  const sorted = [...pairs.values()].sort(([nameA, phoneA], [nameB, phoneB]) =>
    nameA === nameB ? (phoneA < phoneB ? -1 : phoneA > phoneB ? 1 : 0) : nameA < nameB ? -1 : 1
  );

  const contacts = new Map<string, Contact>();
  sorted.forEach(([name, phoneNumber], index) => {
    contacts.set(contactIdentity(name, phoneNumber), { id: index + 1, name, phoneNumber });
  });
  return contacts;
}

function lookup(contacts: Map<string, Contact>, name: string, phoneNumber: string): Contact {
  const contact = contacts.get(contactIdentity(name, phoneNumber));
  if (!contact) {
    throw new Error(`contact ${name} <${phoneNumber}> was not registered`);
  }
  return contact;
}

export function reconcileConversations(conversations: readonly Conversation[]): Group[] {
  const contacts = buildContacts(conversations);

  const ordered = conversations
    .map((conversation, conversationId) => ({ conversation, conversationId }))
    .sort(
      (a, b) =>
        compareTimestampDesc(a.conversation.timestamp, b.conversation.timestamp) || b.conversationId - a.conversationId
    );

  const rows: ConversationParticipantRow<Contact>[] = [];
  for (const { conversation, conversationId } of ordered) {
    const participants = Object.entries(conversation.participants)
      .map(([name, phoneNumber]) => lookup(contacts, name, phoneNumber))
      .sort((a, b) => a.id - b.id);

    if (participants.length === 0) {
      rows.push({ conversationId, type: conversation.type, timestamp: conversation.timestamp, contactId: null, participant: null });
    }
    for (const participant of participants) {
      rows.push({
        conversationId,
        type: conversation.type,
        timestamp: conversation.timestamp,
        contactId: participant.id,
        participant,
      });
    }
  }

  let messageId = 0;
  const messagesByConversation = new Map<number, GroupMessage[]>();
  conversations.forEach((conversation, conversationId) => {
    if (conversation.type !== "chat") {
      return;
    }
    messagesByConversation.set(
      conversationId,
      conversation.messages.map((message) => {
        messageId += 1;
        return {
          id: messageId,
          conversationId,
          timestamp: message.timestamp,
          sender: lookup(contacts, message.sender, message.senderNumber),
          content: message.content,
          images: [...message.images],
        };
      })
    );
  });

  return foldGroups(rows).map((head) => ({
    ...head,
    messages: head.conversationIds
      .flatMap((conversationId) => messagesByConversation.get(conversationId) ?? [])
      .sort((a, b) => compareTimestampDesc(a.timestamp, b.timestamp) || b.id - a.id),
  }));
}

// Extracts every document of a directory and groups the results without storage.
export function reconcileDirectory(directory: string, logger: Logger): Group[] {
  const conversations: Conversation[] = [];
  importDirectory(
    directory,
    {
      format: "memory",
      add: (conversation) => {
        conversations.push(conversation);
      },
    },
    logger
  );
  return reconcileConversations(conversations);
}
