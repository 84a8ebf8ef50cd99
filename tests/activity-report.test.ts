import { describe, expect, it } from "vitest";
import { analyseChatFiles } from "../src/analysis/activity-report";
import { parseChatText } from "../src/parsers/record-assembler";
import { generateActivityReport } from "../src/html/html-generator";
import { barWidthPercent, formatSessionDate } from "../src/html/format.utils";
import type { AnalysisOptions, ChatFile } from "../src/types";

const options: AnalysisOptions = { courseName: "EDA", sessionLabel: "Day 4", topN: 1 };

const day1: ChatFile = {
  fileName: "day1.txt",
  records: parseChatText([
    "00:24:39 [Instructor] Alexander Graham Bell: sore Bu",
    "01:46:25 Issac Newton: household_new[(household_new['year'] == 2018)]",
    '01:46:47 [TA] J. Robert Oppenheimer: Reacted to "household_new[(household..." with 👏',
    "01:48:40 Issac Newton: data awalnya berubah"
  ].join("\n"), "day1.txt")
};

const day2: ChatFile = {
  fileName: "day2.txt",
  records: parseChatText("00:10:00 Issac Newton: <b>Bold</b> & more", "day2.txt")
};

describe("analyseChatFiles", () => {
  it("merges files, ranks speakers and summarises sessions", () => {
    const report = analyseChatFiles([day1, day2], options);

    expect(report.files).toEqual(["day1.txt", "day2.txt"]);
    expect(report.records).toHaveLength(5);
    expect(report.ranking.mostActive).toEqual([{ speaker: "Issac Newton", messageCount: 3 }]);
    expect(report.ranking.mostSilent).toEqual([
      { speaker: "Alexander Graham Bell", role: "Instructor", messageCount: 1 }
    ]);
    expect(report.activity.sessions.map(s => s.label)).toEqual(["Day 1", "Day 2"]);
    expect(report.participantNotes.map(n => n.speaker)).toEqual([
      "Alexander Graham Bell",
      "Issac Newton",
      "J. Robert Oppenheimer"
    ]);
  });

  it("produces an empty report for files without messages", () => {
    const report = analyseChatFiles([{ fileName: "empty.txt", records: [] }], options);
    expect(report.ranking).toEqual({ mostActive: [], mostSilent: [] });
    expect(report.speakers).toEqual([]);
  });
});

describe("generateActivityReport", () => {
  it("escapes chat text and labels charts with course and session", () => {
    const html = generateActivityReport(analyseChatFiles([day1, day2], options));
    expect(html).toContain("<title>Chat Activity - EDA Day 4</title>");
    expect(html).toContain("Top 1 Most Active Participants - EDA Day 4");
    expect(html).toContain("&lt;b&gt;Bold&lt;/b&gt; &amp; more");
    expect(html).toContain("[Instructor] Alexander Graham Bell");
    expect(html).not.toContain("<b>Bold</b>");
  });

  it("shows an empty state when there are no messages", () => {
    const html = generateActivityReport(analyseChatFiles([], options));
    expect(html).toContain("No chat messages were found in the uploaded files.");
  });

  it("limits the record table", () => {
    const html = generateActivityReport(analyseChatFiles([day1, day2], options), { maxRecords: 2 });
    expect(html).toContain("Showing 2 of 5 messages. The CSV export has all of them.");
  });
});

describe("format helpers", () => {
  it("scales bars to the largest value", () => {
    expect(barWidthPercent(2, 4)).toBe(50);
    expect(barWidthPercent(1, 3)).toBe(33.3);
    expect(barWidthPercent(1, 0)).toBe(0);
  });

  it("formats session date tokens", () => {
    expect(formatSessionDate("20240205")).toBe("2024-02-05");
    expect(formatSessionDate(undefined)).toBe("Unknown Date");
  });
});
