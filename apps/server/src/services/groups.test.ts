import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { openAppDb } from "../db/database.js";
import type { DatabaseClient } from "../db/types.js";
import { sampleConversations } from "../testing/conversations.js";
import { listGroups, messagesForContacts, summarizeGroup } from "./groups.js";
import { parseGroupKey } from "./reconcile.js";
import { Store } from "./store.js";

let db: DatabaseClient;

beforeEach(() => {
  db = openAppDb(":memory:");
  const store = new Store(db);
  for (const conversation of sampleConversations()) {
    store.insertConversation(conversation);
  }
});

afterEach(() => {
  db.close();
});

describe("group overview", () => {
  it("lists groups most recent first and merges split group files", () => {
    const groups = listGroups(db);

    expect(groups.map((group) => [group.key, group.type, group.conversationIds])).toEqual([
      ["2", "missed_call", [4]],
      ["1,2,3", "chat", [2, 1]],
      ["1,2", "chat", [3]],
      ["4", "voicemail", [5]],
    ]);
  });

  it("takes type, timestamp and participants from the most recent conversation", () => {
    const group = listGroups(db)[1];

    expect(group?.timestamp).toBe("2024-06-01T09:00:00.000Z");
    expect(group?.lastConversationId).toBe(2);
    expect(group?.participants).toEqual([
      { id: 1, name: "Me", phoneNumber: "+15550002222" },
      { id: 2, name: "Lena Park", phoneNumber: "+15550003333" },
      { id: 3, name: "Ravi Mehta", phoneNumber: "+15550008888" },
    ]);
  });

  it("attaches messages with their images across the merged conversations", () => {
    const group = listGroups(db)[1];

    expect(group?.messages.map((message) => message.content)).toEqual(["b3", "b2", "b1", "a2", "a1"]);
    expect(group?.messages[1]?.images).toEqual([
      "Group Conversation - 2024-06-01T09_00_00Z-2-1",
      "Group Conversation - 2024-06-01T09_00_00Z-2-2",
    ]);
    expect(group?.messages[1]?.sender).toEqual({ id: 1, name: "Me", phoneNumber: "+15550002222" });
  });

  it("summarizes a group with its latest messages", () => {
    const group = listGroups(db)[1];
    if (!group) {
      throw new Error("group missing");
    }

    const summary = summarizeGroup(group);

    expect(summary.conversationCount).toBe(2);
    expect(summary.messageCount).toBe(5);
    expect(summary.recentMessages.map((message) => message.content)).toEqual(["b3", "b2", "b1"]);
  });

  it("groups a conversation without participants under the empty key", () => {
    new Store(db).insertConversation({
      type: "missed_call",
      participants: {},
      timestamp: "2020-01-01T00:00:00.000Z",
      duration: "",
    });

    const last = listGroups(db).find((group) => group.key === "");

    expect(last?.conversationIds).toEqual([6]);
    expect(last?.participants).toEqual([]);
  });

  it("lists the empty-key group without making it openable by key", () => {
    new Store(db).insertConversation({
      type: "missed_call",
      participants: {},
      timestamp: "2020-01-01T00:00:00.000Z",
      duration: "",
    });

    expect(listGroups(db).map((group) => group.key)).toContain("");
    expect(parseGroupKey("")).toBeNull();
    expect(messagesForContacts(db, [])).toEqual({ key: "", participants: [], conversationIds: [], messages: [] });
  });
});

describe("messages for an exact contact set", () => {
  it("returns every conversation with exactly those participants", () => {
    const thread = messagesForContacts(db, [3, 1, 2]);

    expect(thread.key).toBe("1,2,3");
    expect(thread.conversationIds).toEqual([1, 2]);
    expect(thread.messages.map((message) => message.content)).toEqual(["b3", "b2", "b1", "a2", "a1"]);
    expect(thread.participants.map((contact) => contact.name)).toEqual(["Me", "Lena Park", "Ravi Mehta"]);
  });

  it("excludes supersets of the requested set", () => {
    expect(messagesForContacts(db, [1, 2]).conversationIds).toEqual([3]);
    expect(messagesForContacts(db, [2]).conversationIds).toEqual([4]);
    expect(messagesForContacts(db, [2]).messages).toEqual([]);
  });

  it("finds nothing for an unmatched set", () => {
    const thread = messagesForContacts(db, [1, 2, 3, 4]);

    expect(thread.conversationIds).toEqual([]);
    expect(thread.messages).toEqual([]);
  });
});
