import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { loadAttendanceFiles, loadChatFiles, parseChatFile } from "../src/cli/file-processor";
import { decodeChatBuffer, discoverChatFiles } from "../src/utils/file.utils";
import { InvalidArgumentError, UnreadableInputError } from "../src/utils/errors";

let workDir: string;

beforeEach(() => {
  workDir = fs.mkdtempSync(path.join(os.tmpdir(), "chat-activity-"));
});

afterEach(() => {
  fs.rmSync(workDir, { recursive: true, force: true });
});

const write = (relativePath: string, content: string | Buffer) => {
  const fullPath = path.join(workDir, relativePath);
  fs.mkdirSync(path.dirname(fullPath), { recursive: true });
  fs.writeFileSync(fullPath, content);
  return fullPath;
};

describe("decodeChatBuffer", () => {
  it("drops a UTF-8 byte order mark", () => {
    expect(decodeChatBuffer(Buffer.from("\uFEFF00:00:01 Ana: x", "utf8"), "a.txt")).toBe("00:00:01 Ana: x");
  });

  it("decodes other encodings", () => {
    expect(decodeChatBuffer(Buffer.from([0x63, 0x61, 0x66, 0xe9]), "a.txt", "latin1")).toBe("café");
  });

  it("rejects bytes that are not valid UTF-8", () => {
    expect(() => decodeChatBuffer(Buffer.from([0x41, 0xff, 0x42]), "bad.txt")).toThrow(UnreadableInputError);
  });

  it("keeps a replacement character that is stored in valid UTF-8", () => {
    const text = "00:00:01 Ana: emoji lost \uFFFD here\n";
    expect(decodeChatBuffer(Buffer.from(text, "utf8"), "ok.txt")).toBe(text);
  });

  it("rejects a multi-byte sequence cut off at the end of the file", () => {
    expect(() => decodeChatBuffer(Buffer.from([0x41, 0xe2, 0x82]), "cut.txt")).toThrow("cut.txt is not valid utf8 text");
  });

  it("rejects binary content", () => {
    expect(() => decodeChatBuffer(Buffer.from([0x41, 0x00, 0x42]), "bin.txt")).toThrow("bin.txt looks like a binary file");
  });

  it("rejects an unknown encoding", () => {
    expect(() => decodeChatBuffer(Buffer.from("x"), "a.txt", "not-an-encoding")).toThrow(InvalidArgumentError);
  });
});

describe("chat file discovery and loading", () => {
  it("finds .txt files recursively in path order", () => {
    const b = write("b.txt", "");
    const a = write("a.txt", "");
    write("notes.md", "");
    const c = write("sub/c.txt", "");
    expect(discoverChatFiles(workDir)).toEqual([a, b, c]);
  });

  it("parses a file and tags records with its base name", () => {
    const filePath = write("meeting GMT20240205-090000.txt", "00:00:01 Ana: hi\n00:00:02 Ben: halo\n");
    const file = parseChatFile(filePath);
    expect(file.fileName).toBe("meeting GMT20240205-090000.txt");
    expect(file.records.map(r => [r.speaker, r.sourceFile])).toEqual([
      ["Ana", "meeting GMT20240205-090000.txt"],
      ["Ben", "meeting GMT20240205-090000.txt"]
    ]);
  });

  it("keeps explicit files in the order given, or sorts them by session date", () => {
    const later = write("x GMT20240206-1.txt", "00:00:01 Ana: hi\n");
    const earlier = write("y GMT20240205-1.txt", "00:00:01 Ben: hi\n");

    expect(loadChatFiles([later, earlier]).map(f => f.fileName)).toEqual(["x GMT20240206-1.txt", "y GMT20240205-1.txt"]);
    expect(loadChatFiles([later, earlier], { sortByDate: true }).map(f => f.fileName)).toEqual([
      "y GMT20240205-1.txt",
      "x GMT20240206-1.txt"
    ]);
  });

  it("requires at least one chat file", () => {
    expect(() => loadChatFiles([workDir])).toThrow(InvalidArgumentError);
    expect(() => loadChatFiles([])).toThrow(InvalidArgumentError);
  });

  it("rejects a path that does not exist", () => {
    expect(() => loadChatFiles([path.join(workDir, "missing.txt")])).toThrow(InvalidArgumentError);
  });
});

describe("attendance file loading", () => {
  const header = "Name (original name),Email,Join time,Leave time,Duration (minutes)";

  it("reads every .csv export in a folder, in path order", () => {
    write("att/b.csv", `${header}\nBudi,,02/05/2024 09:05:00 AM,02/05/2024 09:30:00 AM,25\n`);
    write("att/a.csv", `\uFEFF${header}\nAna,,02/05/2024 09:00:00 AM,02/05/2024 10:00:00 AM,60\n`);
    write("att/notes.txt", "not an export");

    expect(loadAttendanceFiles([path.join(workDir, "att")]).map(row => [row.name, row.sourceFile])).toEqual([
      ["Ana", "a.csv"],
      ["Budi", "b.csv"]
    ]);
  });

  it("requires at least one export", () => {
    write("att/notes.txt", "");
    expect(() => loadAttendanceFiles([path.join(workDir, "att")])).toThrow(
      "No attendance files (.csv) found in the given paths"
    );
  });
});
