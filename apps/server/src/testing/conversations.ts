import type { ChatConversation, Conversation } from "../services/extract/types.js";

function chat(
  sourceFile: string,
  participants: Record<string, string>,
  lines: Array<[timestamp: string, sender: string, content: string, images?: string[]]>
): ChatConversation {
  const messages = lines.map(([timestamp, sender, content, images]) => ({
    timestamp,
    sender,
    senderNumber: participants[sender] ?? "",
    content,
    images: images ?? [],
  }));
  return {
    type: "chat",
    participants,
    timestamp: messages[0]?.timestamp ?? null,
    messages,
    sourceFile,
  };
}

const trio = { Me: "+15550002222", "Lena Park": "+15550003333", "Ravi Mehta": "+15550008888" };

// Two files of one group thread, a two-party chat, a call and a voicemail from an unnumbered caller.
export function sampleConversations(): Conversation[] {
  return [
    chat("Group Conversation - 2024-05-01T10_00_00Z.html", trio, [
      ["2024-05-01T10:00:00.000Z", "Me", "a1"],
      ["2024-05-01T10:05:00.000Z", "Ravi Mehta", "a2"],
    ]),
    chat("Group Conversation - 2024-06-01T09_00_00Z.html", trio, [
      ["2024-06-01T09:00:00.000Z", "Lena Park", "b1"],
      ["2024-06-01T09:01:00.000Z", "Me", "b2", ["Group Conversation - 2024-06-01T09_00_00Z-2-1", "Group Conversation - 2024-06-01T09_00_00Z-2-2"]],
      ["2024-06-01T09:02:00.000Z", "Ravi Mehta", "b3"],
    ]),
    chat("Lena Park - Text - 2024-04-01T08_00_00Z.html", { Me: "+15550002222", "Lena Park": "+15550003333" }, [
      ["2024-04-01T08:00:00.000Z", "Lena Park", "c1"],
    ]),
    {
      type: "missed_call",
      participants: { "Lena Park": "+15550003333" },
      timestamp: "2024-07-01T12:00:00.000Z",
      duration: "",
      sourceFile: "Lena Park - Missed - 2024-07-01T12_00_00Z.html",
    },
    {
      type: "voicemail",
      participants: { "Lena Park": "" },
      timestamp: null,
      duration: "00:00:05",
      transcript: "it's Lena again",
      sourceFile: "Lena Park - Voicemail - unknown.html",
    },
  ];
}
