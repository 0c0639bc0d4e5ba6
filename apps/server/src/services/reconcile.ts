import type { ConversationType } from "@takeout-threads/shared";

export function groupKey(contactIds: Iterable<number>): string {
  return [...new Set(contactIds)].sort((a, b) => a - b).join(",");
}

// The empty key of participant-less conversations is listed but never parsed.
export function parseGroupKey(key: string): number[] | null {
  if (!/^\d+(,\d+)*$/.test(key)) {
    return null;
  }
  return [...new Set(key.split(",").map(Number))].sort((a, b) => a - b);
}

export function compareTimestampDesc(a: string | null, b: string | null): number {
  if (a === b) {
    return 0;
  }
  if (a === null) {
    return 1;
  }
  if (b === null) {
    return -1;
  }
  return a < b ? 1 : -1;
}

// Exact-set matching, one state per conversation while its participant rows stream past.

export type MatchStatus = "accumulating" | "confirmed-valid" | "confirmed-invalid";

export interface MatchState {
  conversationId: number;
  status: MatchStatus;
  seen: Set<number>;
}

export interface ParticipantRow {
  conversationId: number;
  contactId: number | null;
}

export function openMatch(conversationId: number): MatchState {
  return { conversationId, status: "accumulating", seen: new Set() };
}

export function advanceMatch(state: MatchState, contactId: number | null, target: ReadonlySet<number>): MatchState {
  if (state.status !== "accumulating" || contactId === null) {
    return state;
  }
  if (!target.has(contactId)) {
    return { ...state, status: "confirmed-invalid" };
  }
  state.seen.add(contactId);
  return state;
}

export function closeMatch(state: MatchState, target: ReadonlySet<number>): MatchState {
  if (state.status !== "accumulating") {
    return state;
  }
  return { ...state, status: state.seen.size === target.size ? "confirmed-valid" : "confirmed-invalid" };
}

export function matchingConversations(rows: Iterable<ParticipantRow>, contactIds: Iterable<number>): number[] {
  const target = new Set(contactIds);
  const matched: number[] = [];
  if (target.size === 0) {
    return matched;
  }

  let current: MatchState | undefined;
  const finish = (state: MatchState) => {
    if (closeMatch(state, target).status === "confirmed-valid") {
      matched.push(state.conversationId);
    }
  };

  for (const row of rows) {
    if (!current || current.conversationId !== row.conversationId) {
      if (current) {
        finish(current);
      }
      current = openMatch(row.conversationId);
    }
    current = advanceMatch(current, row.contactId, target);
  }
  if (current) {
    finish(current);
  }

  return matched;
}

// Group overview: rows arrive most recent conversation first, one conversation at a time.

export interface ConversationParticipantRow<P> {
  conversationId: number;
  type: ConversationType;
  timestamp: string | null;
  contactId: number | null;
  participant: P | null;
}

export interface GroupHead<P> {
  key: string;
  type: ConversationType;
  timestamp: string | null;
  lastConversationId: number;
  participants: P[];
  conversationIds: number[];
}

interface OpenConversation<P> {
  conversationId: number;
  type: ConversationType;
  timestamp: string | null;
  contactIds: number[];
  participants: P[];
}

export interface GroupFoldState<P> {
  byKey: Map<string, GroupHead<P>>;
  groups: GroupHead<P>[];
  current?: OpenConversation<P>;
}

export function emptyGroupFold<P>(): GroupFoldState<P> {
  return { byKey: new Map(), groups: [] };
}

function closeConversation<P>(state: GroupFoldState<P>): GroupFoldState<P> {
  const open = state.current;
  if (!open) {
    return state;
  }

  const key = groupKey(open.contactIds);
  const existing = state.byKey.get(key);
  if (existing) {
    existing.conversationIds.push(open.conversationId);
  } else {
    const head: GroupHead<P> = {
      key,
      type: open.type,
      timestamp: open.timestamp,
      lastConversationId: open.conversationId,
      participants: open.participants,
      conversationIds: [open.conversationId],
    };
    state.byKey.set(key, head);
    state.groups.push(head);
  }
  return { ...state, current: undefined };
}

export function foldGroupRow<P>(state: GroupFoldState<P>, row: ConversationParticipantRow<P>): GroupFoldState<P> {
  let next = state;
  if (!next.current || next.current.conversationId !== row.conversationId) {
    next = closeConversation(next);
    next = {
      ...next,
      current: {
        conversationId: row.conversationId,
        type: row.type,
        timestamp: row.timestamp,
        contactIds: [],
        participants: [],
      },
    };
  }

  const open = next.current;
  if (open && row.contactId !== null && row.participant !== null && !open.contactIds.includes(row.contactId)) {
    open.contactIds.push(row.contactId);
    open.participants.push(row.participant);
  }
  return next;
}

export function foldGroups<P>(rows: Iterable<ConversationParticipantRow<P>>): GroupHead<P>[] {
  let state = emptyGroupFold<P>();
  for (const row of rows) {
    state = foldGroupRow(state, row);
  }
  return closeConversation(state).groups;
}
