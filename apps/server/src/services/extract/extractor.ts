import { parseRfc3339 } from "../../utils/time.js";
import { collectFragments, type Fragment, type RecordKind } from "./rules.js";
import { parseDocument, type TreeDocument, type TreeElement } from "./tree.js";
import type {
  ChatConversation,
  Conversation,
  ExtractionResult,
  Message,
  ParserWarning,
  Participants,
} from "./types.js";

type FragmentOf<K extends Fragment["kind"]> = Extract<Fragment, { kind: K }>;

function ofKind<K extends Fragment["kind"]>(fragments: readonly Fragment[], kind: K): FragmentOf<K>[] {
  return fragments.filter((fragment): fragment is FragmentOf<K> => fragment.kind === kind);
}

function readTimestamp(
  raw: string | undefined,
  warnings: ParserWarning[],
  details: Record<string, unknown>
): string | null {
  if (raw === undefined) {
    warnings.push({ severity: "warning", code: "missing_timestamp", details });
    return null;
  }
  const parsed = parseRfc3339(raw);
  if (parsed === null) {
    warnings.push({ severity: "warning", code: "invalid_timestamp", details: { ...details, value: raw } });
  }
  return parsed;
}

function titleNames(fragments: readonly Fragment[]): string[] {
  const title = ofKind(fragments, "title")[0];
  if (!title || !title.text.includes(" to ")) {
    return [];
  }
  const parts = title.text.split(" to ");
  if (parts.length !== 2) {
    return [];
  }
  return parts.map((part) => part.trim()).filter(Boolean);
}

function mergeParticipants(
  body: ReadonlyArray<{ name: string; number: string }>,
  fallback: readonly string[]
): Participants {
  const merged = new Map<string, string>();
  for (const { name, number } of body) {
    const existing = merged.get(name);
    if (existing === undefined || number !== "") {
      merged.set(name, number);
    }
  }
  for (const name of fallback) {
    if (!merged.has(name)) {
      merged.set(name, "");
    }
  }
  return Object.fromEntries(merged);
}

function bodyParticipants(fragments: readonly Fragment[], record: RecordKind) {
  return ofKind(fragments, "participant").filter((fragment) => fragment.record === record);
}

interface MessageDraft {
  timeSeen: boolean;
  rawTime: string | undefined;
  sender?: string;
  senderNumber?: string;
  content?: string;
  images: string[];
}

function assembleMessages(fragments: readonly Fragment[], warnings: ParserWarning[]): Message[] {
  const drafts = new Map<TreeElement, MessageDraft>();
  const draftFor = (message: TreeElement): MessageDraft => {
    let draft = drafts.get(message);
    if (!draft) {
      draft = { timeSeen: false, rawTime: undefined, images: [] };
      drafts.set(message, draft);
    }
    return draft;
  };

  for (const fragment of fragments) {
    switch (fragment.kind) {
      case "message":
        draftFor(fragment.message);
        break;
      case "messageTime": {
        const draft = draftFor(fragment.message);
        if (!draft.timeSeen) {
          draft.timeSeen = true;
          draft.rawTime = fragment.raw;
        }
        break;
      }
      case "senderName": {
        const draft = draftFor(fragment.message);
        if (draft.sender === undefined) {
          draft.sender = fragment.name;
        }
        break;
      }
      case "senderNumber": {
        const draft = draftFor(fragment.message);
        if (draft.senderNumber === undefined) {
          draft.senderNumber = fragment.number;
        }
        break;
      }
      case "content": {
        const draft = draftFor(fragment.message);
        if (draft.content === undefined) {
          draft.content = fragment.text;
        }
        break;
      }
      case "image":
        draftFor(fragment.message).images.push(fragment.src);
        break;
      default:
        break;
    }
  }

  const messages: Message[] = [];
  let index = 0;
  for (const draft of drafts.values()) {
    const position = index;
    index += 1;

    if (!draft.sender) {
      warnings.push({ severity: "warning", code: "message_missing_sender", details: { index: position } });
      continue;
    }

    messages.push({
      timestamp: draft.timeSeen
        ? readTimestamp(draft.rawTime, warnings, { field: "message.timestamp", index: position })
        : null,
      sender: draft.sender,
      senderNumber: draft.senderNumber ?? "",
      content: draft.content ?? "",
      images: draft.images,
    });
  }
  return messages;
}

function earliest(messages: readonly Message[]): string | null {
  let result: string | null = null;
  for (const message of messages) {
    if (message.timestamp !== null && (result === null || message.timestamp < result)) {
      result = message.timestamp;
    }
  }
  return result;
}

function assembleChat(fragments: readonly Fragment[], warnings: ParserWarning[]): ChatConversation {
  const messages = assembleMessages(fragments, warnings);
  return {
    type: "chat",
    participants: mergeParticipants(bodyParticipants(fragments, "chat"), titleNames(fragments)),
    timestamp: earliest(messages),
    messages,
  };
}

function assembleCall(fragments: readonly Fragment[], warnings: ParserWarning[]): ExtractionResult {
  const label = ofKind(fragments, "callLabel")[0];
  if (!label) {
    return {
      ok: false,
      reason: "unrecognized_call_record",
      message: "call record carries none of the known call markers",
      warnings,
    };
  }

  const contributors = bodyParticipants(fragments, "call");
  const participants = mergeParticipants(contributors, contributors.length === 0 ? titleNames(fragments) : []);

  const published = ofKind(fragments, "callTime")[0];
  const timestamp = published ? readTimestamp(published.raw, warnings, { field: "timestamp" }) : null;
  const duration = ofKind(fragments, "duration")[0]?.text ?? "";

  let conversation: Conversation;
  if (label.type === "voicemail") {
    conversation = {
      type: "voicemail",
      participants,
      timestamp,
      duration,
      transcript: ofKind(fragments, "transcript")[0]?.text ?? "",
    };
  } else {
    conversation = { type: label.type, participants, timestamp, duration };
  }

  return { ok: true, conversation, warnings };
}

export function assembleConversation(fragments: readonly Fragment[]): ExtractionResult {
  const warnings: ParserWarning[] = [];
  const records = new Set(ofKind(fragments, "record").map((fragment) => fragment.record));

  if (records.has("call")) {
    if (records.has("chat")) {
      warnings.push({
        severity: "info",
        code: "conflicting_records",
        details: { kept: "call", dropped: "chat" },
      });
    }
    return assembleCall(fragments, warnings);
  }

  if (records.has("chat")) {
    return { ok: true, conversation: assembleChat(fragments, warnings), warnings };
  }

  return {
    ok: false,
    reason: "no_record",
    message: "document holds neither a chat log nor a call record",
    warnings,
  };
}

export function extractConversation(document: TreeDocument): ExtractionResult {
  return assembleConversation(collectFragments(document));
}

export function extractFromHtml(html: string): ExtractionResult {
  return extractConversation(parseDocument(html));
}
