import { describe, expect, it } from "vitest";
import {
  classifyActivity,
  classifyReactions,
  computeSessionActivity,
  describeParticipantActivity
} from "../src/analysis/session-activity.computer";
import type { ChatFile } from "../src/types";

const files: ChatFile[] = [
  {
    fileName: "meeting GMT20240205-010101.txt",
    records: [
      { timestamp: "00:01:00", speaker: "Ana", message: "hello 👋", sourceFile: "meeting GMT20240205-010101.txt" },
      { timestamp: "00:02:00", speaker: "Ana", message: 'Reacted to "hello" with 👏', sourceFile: "meeting GMT20240205-010101.txt" },
      { timestamp: "00:03:00", speaker: "Ana", message: "question?", sourceFile: "meeting GMT20240205-010101.txt" },
      { timestamp: "00:04:00", speaker: "Ben", message: "hi", sourceFile: "meeting GMT20240205-010101.txt" }
    ]
  },
  {
    fileName: "meeting GMT20240206-010101.txt",
    records: [
      { timestamp: "00:01:00", speaker: "Ben", message: 'Reacted to "x" with 👍', sourceFile: "meeting GMT20240206-010101.txt" }
    ]
  }
];

describe("computeSessionActivity", () => {
  it("breaks each file down per speaker", () => {
    const activity = computeSessionActivity(files);

    expect(activity.sessions.map(s => [s.label, s.date, s.totalMessages])).toEqual([
      ["Day 1", "20240205", 4],
      ["Day 2", "20240206", 1]
    ]);
    expect(activity.sessions[0].participants).toEqual([
      { speaker: "Ana", messageCount: 3, reactionCount: 1, chatCount: 2, emojiCount: 2 },
      { speaker: "Ben", messageCount: 1, reactionCount: 0, chatCount: 1, emojiCount: 0 }
    ]);
    expect(activity.sessions[1].participants).toEqual([
      { speaker: "Ben", messageCount: 1, reactionCount: 1, chatCount: 0, emojiCount: 1 }
    ]);
  });

  it("floors the means over every session and speaker row", () => {
    const activity = computeSessionActivity(files);
    expect(activity.meanChatCount).toBe(1);
    expect(activity.meanReactionCount).toBe(0);
  });

  it("handles no files", () => {
    expect(computeSessionActivity([])).toEqual({ sessions: [], meanChatCount: 0, meanReactionCount: 0 });
  });
});

describe("describeParticipantActivity", () => {
  it("writes one note per speaker covering every session", () => {
    const notes = describeParticipantActivity(computeSessionActivity(files));

    expect(notes.map(n => [n.speaker, n.notes])).toEqual([
      ["Ana", "Day 1: very active in chat (3), reacting actively (1) | Day 2: did not chat or react"],
      ["Ben", "Day 1: very active in chat (1), no reactions | Day 2: very active in chat (1), reacting actively (1)"]
    ]);
    expect(notes[0].sessions[1]).toEqual({
      session: "Day 2",
      activity: "absent",
      reaction: "none",
      messageCount: 0,
      reactionCount: 0
    });
  });
});

describe("activity levels", () => {
  it("compares message counts with the mean chat count", () => {
    expect(classifyActivity(0, 0)).toBe("absent");
    expect(classifyActivity(1, 3)).toBe("less_active");
    expect(classifyActivity(3, 3)).toBe("very_active");
  });

  it("compares reaction counts with the mean reaction count", () => {
    expect(classifyReactions(0, 0)).toBe("none");
    expect(classifyReactions(1, 2)).toBe("less_active");
    expect(classifyReactions(2, 2)).toBe("active");
  });
});
