import { describe, expect, it } from "vitest";
import type { GroupSummary, ImportSummary } from "./index.js";

describe("shared types", () => {
  it("supports group overview contracts", () => {
    const summary: GroupSummary = {
      key: "1,4",
      type: "chat",
      timestamp: "2024-05-23T04:54:15.125Z",
      lastConversationId: 7,
      participants: [
        { id: 1, name: "Me", phoneNumber: "+15550002222" },
        { id: 4, name: "Lena Park", phoneNumber: "" },
      ],
      conversationCount: 2,
      messageCount: 9,
      recentMessages: [],
    };

    expect(summary.key.split(",").map(Number)).toEqual(summary.participants.map((contact) => contact.id));
  });

  it("supports import contracts", () => {
    const summary: ImportSummary = { importId: null, processedFiles: 3, extracted: 2, failed: 1, warnings: 0 };

    expect(summary.extracted + summary.failed).toBe(summary.processedFiles);
  });
});
