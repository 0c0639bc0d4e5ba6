import type { CallType } from "@takeout-threads/shared";

export type { CallType, ConversationType } from "@takeout-threads/shared";

export type Participants = Record<string, string>;

export interface Message {
  timestamp: string | null;
  sender: string;
  senderNumber: string;
  content: string;
  images: string[];
}

interface ConversationBase {
  participants: Participants;
  timestamp: string | null;
  sourceFile?: string;
}

export interface ChatConversation extends ConversationBase {
  type: "chat";
  messages: Message[];
}

export interface VoicemailConversation extends ConversationBase {
  type: "voicemail";
  duration: string;
  transcript: string;
}

export interface CallConversation extends ConversationBase {
  type: Exclude<CallType, "voicemail">;
  duration: string;
}

export type Conversation = ChatConversation | VoicemailConversation | CallConversation;

export interface ParserWarning {
  severity: "info" | "warning" | "error";
  code: string;
  details: Record<string, unknown>;
}

export type ExtractionFailure = "no_record" | "unrecognized_call_record";

export type ExtractionResult =
  | { ok: true; conversation: Conversation; warnings: ParserWarning[] }
  | { ok: false; reason: ExtractionFailure; message: string; warnings: ParserWarning[] };
