import { describe, expect, it } from "vitest";
import { csvToRecords, parseCsvRows, recordsToCsv } from "../src/utils/csv.utils";
import { UnreadableInputError } from "../src/utils/errors";
import type { ChatRecord } from "../src/types";

const records: ChatRecord[] = [
  {
    timestamp: "00:24:39",
    role: "Instructor",
    speaker: "Alexander Graham Bell",
    message: "sore Bu",
    sourceFile: "day1.txt"
  },
  {
    timestamp: "01:46:25",
    speaker: "Issac Newton",
    message: 'a, "b"\nc',
    sourceFile: "day1.txt"
  }
];

describe("recordsToCsv", () => {
  it("writes a header and one row per record", () => {
    expect(recordsToCsv(records)).toBe(
      "timestamp,role,speaker,message,source_file\n" +
      "00:24:39,Instructor,Alexander Graham Bell,sore Bu,day1.txt\n" +
      '01:46:25,,Issac Newton,"a, ""b""\nc",day1.txt\n'
    );
  });

  it("writes only the header for no records", () => {
    expect(recordsToCsv([])).toBe("timestamp,role,speaker,message,source_file\n");
  });
});

describe("csvToRecords", () => {
  it("reads back speaker, message and source file of every record", () => {
    const tricky: ChatRecord[] = [
      ...records,
      { timestamp: "[10:00:00]", speaker: "Sari", message: "  indented\r\nline ", sourceFile: "GMT20240205 day, 2.txt" },
      { timestamp: "10:01", speaker: "Dewi", message: "", sourceFile: "d.txt" }
    ];
    expect(csvToRecords(recordsToCsv(tricky))).toEqual(tricky);
  });

  it("rejects a file with a different header", () => {
    expect(() => csvToRecords("Time,Participant,Message\n1,2,3\n")).toThrow(UnreadableInputError);
  });

  it("rejects rows with the wrong number of cells", () => {
    const content = "timestamp,role,speaker,message,source_file\n00:01,,Budi\n";
    expect(() => csvToRecords(content)).toThrow("CSV row 2 has 3 cells, expected 5");
  });
});

describe("parseCsvRows", () => {
  it("splits CRLF rows and keeps cell whitespace", () => {
    expect(parseCsvRows("a, b\r\n1,2")).toEqual([["a", " b"], ["1", "2"]]);
  });
});
