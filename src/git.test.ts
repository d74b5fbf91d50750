import { describe, expect, test } from "vitest";
import {
  countLines,
  expandRename,
  isBinaryContent,
  netChange,
  parseCommitInfo,
  parseNumstat,
  totalChange,
} from "./git.js";
import type { FileChange } from "./types.js";

function change(insertions: number, deletions: number): FileChange {
  return { path: "test.py", insertions, deletions, loc: null };
}

describe("expandRename", () => {
  test("no rename — passthrough", () => {
    expect(expandRename("src/file.ts")).toBe("src/file.ts");
  });

  test("full rename a.txt => b.txt", () => {
    expect(expandRename("a.txt => b.txt")).toBe("b.txt");
  });

  test("full rename with directories", () => {
    expect(expandRename("old/dir/a.txt => new/dir/b.txt")).toBe("new/dir/b.txt");
  });

  test("curly brace rename at the start", () => {
    expect(expandRename("{old => new}/file.txt")).toBe("new/file.txt");
  });

  test("curly brace rename takes everything after the arrow", () => {
    expect(expandRename("src/{old => new}/file.ts")).toBe("new/file.ts");
  });

  test("empty old side { => new}/file.ts", () => {
    expect(expandRename("{ => new}/file.ts")).toBe("new/file.ts");
  });

  test("empty new side {old => }/f", () => {
    expect(expandRename("{old => }/f")).toBe("/f");
  });

  test("braces without an arrow are left alone", () => {
    expect(expandRename("lib/{vendor}/x.ts")).toBe("lib/{vendor}/x.ts");
  });
});

describe("netChange / totalChange", () => {
  test("positive net", () => {
    expect(netChange(change(10, 3))).toBe(7);
    expect(totalChange(change(10, 3))).toBe(13);
  });

  test("negative net", () => {
    expect(netChange(change(3, 10))).toBe(-7);
    expect(totalChange(change(3, 10))).toBe(13);
  });

  test("zero net", () => {
    expect(netChange(change(5, 5))).toBe(0);
    expect(totalChange(change(0, 0))).toBe(0);
  });
});

describe("parseNumstat", () => {
  test("single file", () => {
    expect(parseNumstat("10\t5\tsrc/file.py")).toEqual([
      { path: "src/file.py", insertions: 10, deletions: 5, loc: null },
    ]);
  });

  test("multiple files keep input order", () => {
    const result = parseNumstat("10\t5\tsrc/file1.py\n3\t0\tsrc/file2.py\n");
    expect(result.map((c) => c.path)).toEqual(["src/file1.py", "src/file2.py"]);
    expect(result[1].insertions).toBe(3);
    expect(result[1].deletions).toBe(0);
  });

  test("empty input", () => {
    expect(parseNumstat("")).toEqual([]);
    expect(parseNumstat("   \n  ")).toEqual([]);
  });

  test("binary file", () => {
    expect(parseNumstat("-\t-\timage.png")).toEqual([
      { path: "image.png", insertions: 0, deletions: 0, loc: null },
    ]);
  });

  test("brace rename resolves to the new path", () => {
    expect(parseNumstat("5\t3\t{old => new}/file.py")[0].path).toBe("new/file.py");
  });

  test("full rename resolves to the new path", () => {
    expect(parseNumstat("1\t1\told_name.py => new_name.py")[0].path).toBe("new_name.py");
  });

  test("malformed lines are dropped", () => {
    const result = parseNumstat("garbage\n1\t2\n4\t1\tkept.ts\n\n");
    expect(result).toEqual([{ path: "kept.ts", insertions: 4, deletions: 1, loc: null }]);
  });

  test("tabs inside the path are kept", () => {
    expect(parseNumstat("1\t0\tweird\tname.txt")[0].path).toBe("weird\tname.txt");
  });
});

describe("countLines", () => {
  test("empty content", () => {
    expect(countLines("")).toBe(0);
  });

  test("terminated lines", () => {
    expect(countLines("a\nb\nc\n")).toBe(3);
  });

  test("final line without newline", () => {
    expect(countLines("a\nb")).toBe(2);
    expect(countLines("single")).toBe(1);
  });

  test("blank lines count", () => {
    expect(countLines("\n\n")).toBe(2);
  });
});

describe("isBinaryContent", () => {
  test("NUL byte marks binary", () => {
    expect(isBinaryContent("PNG\0\0data")).toBe(true);
    expect(isBinaryContent("plain text\n")).toBe(false);
  });
});

describe("parseCommitInfo", () => {
  test("keeps six hash chars, local timestamp and the first message line", () => {
    const output = "COMMIT\0abcdef1234567890\0" + "2024-01-15 10:00:00 +0100\0Add parser\n\nLonger body\n";
    expect(parseCommitInfo(output)).toEqual({
      shortHash: "abcdef",
      date: "2024-01-15 10:00:00",
      message: "Add parser",
    });
  });

  test("unexpected output", () => {
    expect(parseCommitInfo("")).toBeNull();
    expect(parseCommitInfo("COMMIT\0abc")).toBeNull();
  });
});
