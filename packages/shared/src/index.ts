export type CallType = "voicemail" | "missed_call" | "received_call" | "placed_call";
export type ConversationType = "chat" | CallType;

export interface Contact {
  id: number;
  name: string;
  phoneNumber: string;
}

export interface GroupMessage {
  id: number;
  conversationId: number;
  timestamp: string | null;
  sender: Contact;
  content: string;
  images: string[];
}

export interface Group {
  key: string;
  type: ConversationType;
  timestamp: string | null;
  lastConversationId: number;
  participants: Contact[];
  conversationIds: number[];
  messages: GroupMessage[];
}

export interface GroupSummary {
  key: string;
  type: ConversationType;
  timestamp: string | null;
  lastConversationId: number;
  participants: Contact[];
  conversationCount: number;
  messageCount: number;
  recentMessages: GroupMessage[];
}

export interface GroupThread {
  key: string;
  participants: Contact[];
  conversationIds: number[];
  messages: GroupMessage[];
}

export interface ConversationListItem {
  id: number;
  type: ConversationType;
  timestamp: string | null;
  duration: string;
  sourceFile: string;
  participants: Contact[];
  transcript: string;
}

export interface ConversationDetail extends ConversationListItem {
  messages: GroupMessage[];
}

export interface ConversationPage {
  conversations: ConversationListItem[];
  total: number;
  limit: number;
  offset: number;
}

export interface ImportSummary {
  importId: number | null;
  processedFiles: number;
  extracted: number;
  failed: number;
  warnings: number;
}

export interface ParseWarning {
  id: number;
  importId: number;
  sourceFile: string;
  severity: "info" | "warning" | "error";
  code: string;
  details: Record<string, unknown>;
  createdAt: string;
}

export interface ApiError {
  error: string;
  message: string;
}
