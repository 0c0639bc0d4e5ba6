import type { Conversation, Message } from "./types.js";

export interface MessageRecord {
  timestamp: string | null;
  sender: string;
  sender_number: string;
  content: string;
  images?: string[];
}

export interface ConversationRecord {
  type: Conversation["type"];
  participants: Record<string, string>;
  timestamp: string | null;
  duration?: string;
  transcript?: string;
  messages?: MessageRecord[];
  source_file: string;
}

function messageRecord(message: Message): MessageRecord {
  return {
    timestamp: message.timestamp,
    sender: message.sender,
    sender_number: message.senderNumber,
    content: message.content,
    ...(message.images.length > 0 ? { images: message.images } : {}),
  };
}

export function toConversationRecord(conversation: Conversation): ConversationRecord {
  const record: ConversationRecord = {
    type: conversation.type,
    participants: conversation.participants,
    timestamp: conversation.timestamp,
    source_file: conversation.sourceFile ?? "",
  };

  switch (conversation.type) {
    case "chat":
      if (conversation.messages.length > 0) {
        record.messages = conversation.messages.map(messageRecord);
      }
      break;
    case "voicemail":
      if (conversation.duration) {
        record.duration = conversation.duration;
      }
      if (conversation.transcript) {
        record.transcript = conversation.transcript;
      }
      break;
    default:
      if (conversation.duration) {
        record.duration = conversation.duration;
      }
      break;
  }

  return record;
}

export function serializeConversation(conversation: Conversation): string {
  return JSON.stringify(toConversationRecord(conversation));
}
