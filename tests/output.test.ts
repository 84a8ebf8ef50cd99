import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { writeReportOutputs } from "../src/cli/output";
import { runAnalysis } from "../src/cli/analysis-runner";
import { analyseChatFiles } from "../src/analysis/activity-report";
import { parseChatText } from "../src/parsers/record-assembler";
import { recordsToCsv } from "../src/utils/csv.utils";

let workDir: string;

beforeEach(() => {
  workDir = fs.mkdtempSync(path.join(os.tmpdir(), "chat-activity-out-"));
});

afterEach(() => {
  fs.rmSync(workDir, { recursive: true, force: true });
});

const report = analyseChatFiles(
  [{ fileName: "day1.txt", records: parseChatText('00:00:01 Ana: hi, "all"\n00:00:02 Ben: halo\nsecond line', "day1.txt") }],
  { courseName: "EDA", sessionLabel: "Day 1", topN: 2 }
);

describe("writeReportOutputs", () => {
  it("writes the CSV export with exactly the serialised records", () => {
    const outDir = path.join(workDir, "out");
    const written = writeReportOutputs(report, outDir, { csv: true, html: false });

    expect(written).toEqual({
      json: path.join(outDir, "activity_summary.json"),
      csv: path.join(outDir, "chat_data.csv")
    });
    expect(fs.readFileSync(path.join(outDir, "chat_data.csv"), "utf8")).toBe(recordsToCsv(report.records));
    expect(fs.existsSync(path.join(outDir, "activity_report.html"))).toBe(false);
  });

  it("skips the CSV export when it is turned off", () => {
    const written = writeReportOutputs(report, workDir, { csv: false, html: true });

    expect(written.csv).toBeUndefined();
    expect(fs.existsSync(path.join(workDir, "chat_data.csv"))).toBe(false);
    expect(fs.readFileSync(path.join(workDir, "activity_report.html"), "utf8")).toContain(
      "<title>Chat Activity - EDA Day 1</title>"
    );
  });

  it("always writes the JSON summary", () => {
    writeReportOutputs(report, workDir, { csv: false, html: false });

    const summary = JSON.parse(fs.readFileSync(path.join(workDir, "activity_summary.json"), "utf8"));
    expect(summary.totalMessages).toBe(2);
    expect(summary.mostActive).toEqual([
      { speaker: "Ana", messageCount: 1 },
      { speaker: "Ben", messageCount: 1 }
    ]);
    expect(fs.readdirSync(workDir)).toEqual(["activity_summary.json"]);
  });
});

describe("runAnalysis", () => {
  it("loads chat and attendance files and writes only the selected outputs", () => {
    const chatPath = path.join(workDir, "day1.txt");
    fs.writeFileSync(chatPath, "00:00:01 Ana Putri: pagi\n00:00:02 Budi: halo\n00:00:03 Ana Putri: ok\n");
    const attendancePath = path.join(workDir, "participants.csv");
    fs.writeFileSync(attendancePath, [
      "Name (original name),Email,Join time,Leave time,Duration (minutes)",
      "Ana Putri,,02/05/2024 09:00:00 AM,02/05/2024 10:00:00 AM,60",
      "Citra,,02/05/2024 09:02:00 AM,02/05/2024 10:00:00 AM,58",
      ""
    ].join("\n"));
    const outDir = path.join(workDir, "out");

    const result = runAnalysis([chatPath], {
      courseName: "EDA",
      sessionLabel: "Day 1",
      topN: 1,
      outDir,
      encoding: "utf8",
      sortByDate: false,
      csv: false,
      html: true,
      attendance: [attendancePath]
    });

    expect(result.ranking.mostActive).toEqual([{ speaker: "Ana Putri", messageCount: 2 }]);
    expect(fs.readdirSync(outDir).sort()).toEqual(["activity_report.html", "activity_summary.json"]);

    const summary = JSON.parse(fs.readFileSync(path.join(outDir, "activity_summary.json"), "utf8"));
    expect(summary.attendance.notes.map((note: { name: string; attendance: string }) => [note.name, note.attendance])).toEqual([
      ["Ana Putri", "Day 1: ✅"],
      ["Citra", "Day 1: ✅"]
    ]);
  });
});
