import { collapseWhitespace, telNumber, trimParens } from "../../utils/normalize.js";
import { attr, hasClasses, textOf, type TreeDocument, type TreeElement, type TreeNode } from "./tree.js";
import type { CallType } from "./types.js";

export type RecordKind = "chat" | "call";

export type Fragment =
  | { kind: "title"; text: string }
  | { kind: "record"; record: RecordKind }
  | { kind: "participant"; record: RecordKind; name: string; number: string }
  | { kind: "callLabel"; type: CallType }
  | { kind: "callTime"; raw: string | undefined }
  | { kind: "duration"; text: string }
  | { kind: "transcript"; text: string }
  | { kind: "message"; message: TreeElement }
  | { kind: "messageTime"; message: TreeElement; raw: string | undefined }
  | { kind: "senderName"; message: TreeElement; name: string }
  | { kind: "senderNumber"; message: TreeElement; number: string }
  | { kind: "content"; message: TreeElement; text: string }
  | { kind: "image"; message: TreeElement; src: string };

export interface WalkContext {
  record?: RecordKind;
  contributor: boolean;
  message?: TreeElement;
  cite: boolean;
  tel?: string;
}

interface ElementRule {
  name: string;
  tag?: string;
  classes?: readonly string[];
  when?: (ctx: WalkContext, element: TreeElement) => boolean;
  enter?: (ctx: WalkContext, element: TreeElement) => WalkContext;
  emit?: (element: TreeElement, ctx: WalkContext) => Fragment[];
}

// Checked in this order inside each text node.
export const CALL_MARKERS: ReadonlyArray<readonly [marker: string, type: CallType]> = [
  ["Voicemail", "voicemail"],
  ["Placed call", "placed_call"],
  ["Received call", "received_call"],
  ["Missed call", "missed_call"],
];

const ROOT_CONTEXT: WalkContext = { contributor: false, cite: false };

const inChat = (ctx: WalkContext) => ctx.record === "chat";
const inCall = (ctx: WalkContext) => ctx.record === "call";
const inMessage = (ctx: WalkContext) => ctx.message !== undefined;
const elementTel = (element: TreeElement) => telNumber(attr(element, "href") ?? "");

export const RULES: readonly ElementRule[] = [
  {
    name: "title",
    tag: "title",
    emit: (element) => [{ kind: "title", text: collapseWhitespace(textOf(element)) }],
  },
  {
    name: "chat-log",
    tag: "div",
    classes: ["hChatLog", "hfeed"],
    enter: (ctx) => ({ ...ctx, record: "chat", contributor: false }),
    emit: () => [{ kind: "record", record: "chat" }],
  },
  {
    name: "call-record",
    tag: "div",
    classes: ["haudio"],
    enter: (ctx) => ({ ...ctx, record: "call", contributor: false, message: undefined, cite: false }),
    emit: () => [{ kind: "record", record: "call" }],
  },
  {
    name: "contributor",
    tag: "div",
    classes: ["contributor", "vcard"],
    when: inCall,
    enter: (ctx) => ({ ...ctx, contributor: true }),
  },
  {
    name: "tel-link",
    tag: "a",
    when: (_ctx, element) => elementTel(element) !== null,
    enter: (ctx, element) => ({ ...ctx, tel: elementTel(element) ?? "" }),
    emit: (element, ctx) =>
      ctx.message && ctx.cite ? [{ kind: "senderNumber", message: ctx.message, number: elementTel(element) ?? "" }] : [],
  },
  {
    name: "formatted-name",
    classes: ["fn"],
    emit: (element, ctx) => {
      const name = collapseWhitespace(textOf(element));
      if (!name) {
        return [];
      }

      const fragments: Fragment[] = [];
      if (ctx.record === "chat" || (ctx.record === "call" && ctx.contributor)) {
        fragments.push({ kind: "participant", record: ctx.record, name, number: ctx.tel ?? "" });
      }
      if (ctx.message && ctx.cite) {
        fragments.push({ kind: "senderName", message: ctx.message, name });
      }
      return fragments;
    },
  },
  {
    name: "message",
    tag: "div",
    classes: ["message"],
    when: inChat,
    enter: (ctx, element) => ({ ...ctx, message: element, cite: false }),
    emit: (element) => [{ kind: "message", message: element }],
  },
  {
    name: "message-time",
    tag: "abbr",
    classes: ["dt"],
    when: inMessage,
    emit: (element, ctx) => (ctx.message ? [{ kind: "messageTime", message: ctx.message, raw: attr(element, "title") }] : []),
  },
  {
    name: "sender",
    tag: "cite",
    when: inMessage,
    enter: (ctx) => ({ ...ctx, cite: true }),
  },
  {
    name: "content",
    tag: "q",
    when: inMessage,
    emit: (element, ctx) => (ctx.message ? [{ kind: "content", message: ctx.message, text: textOf(element) }] : []),
  },
  {
    name: "image",
    tag: "img",
    when: inMessage,
    emit: (element, ctx) => {
      const src = attr(element, "src");
      return ctx.message && src !== undefined ? [{ kind: "image", message: ctx.message, src }] : [];
    },
  },
  {
    name: "published",
    tag: "abbr",
    classes: ["published"],
    when: inCall,
    emit: (element) => [{ kind: "callTime", raw: attr(element, "title") }],
  },
  {
    name: "duration",
    tag: "abbr",
    classes: ["duration"],
    when: inCall,
    emit: (element) => [{ kind: "duration", text: trimParens(textOf(element)) }],
  },
  {
    name: "transcript",
    tag: "span",
    classes: ["full-text"],
    when: inCall,
    emit: (element) => [{ kind: "transcript", text: textOf(element) }],
  },
];

function matches(rule: ElementRule, element: TreeElement, ctx: WalkContext): boolean {
  if (rule.tag !== undefined && rule.tag !== element.tag) {
    return false;
  }
  if (rule.classes && !hasClasses(element, rule.classes)) {
    return false;
  }
  return rule.when ? rule.when(ctx, element) : true;
}

function textFragments(text: string, ctx: WalkContext): Fragment[] {
  if (!inCall(ctx)) {
    return [];
  }
  const trimmed = text.trim();
  const found = CALL_MARKERS.find(([marker]) => trimmed.includes(marker));
  return found ? [{ kind: "callLabel", type: found[1] }] : [];
}

function* walk(root: TreeNode, rootCtx: WalkContext): Generator<Fragment> {
  const pending: Array<[TreeNode, WalkContext]> = [[root, rootCtx]];

  for (let item = pending.pop(); item; item = pending.pop()) {
    const [node, ctx] = item;
    if (node.kind === "text") {
      yield* textFragments(node.text, ctx);
      continue;
    }

    let next = ctx;
    for (const rule of RULES) {
      if (!matches(rule, node, ctx)) {
        continue;
      }
      if (rule.emit) {
        yield* rule.emit(node, ctx);
      }
      if (rule.enter) {
        next = rule.enter(next, node);
      }
    }

    for (let index = node.children.length - 1; index >= 0; index -= 1) {
      const child = node.children[index];
      if (child) {
        pending.push([child, next]);
      }
    }
  }
}

export function collectFragments(document: TreeDocument): Fragment[] {
  return document.children.flatMap((child) => [...walk(child, ROOT_CONTEXT)]);
}
