import { describe, it, expect } from "vitest";
import {
  buildCommitContext,
  classifyFile,
  classifySize,
  mergeFileLists,
  parseCommitHeader,
  parseNameStatus,
  parseNumstat,
  resolveRenamedPath,
  summarizeFile,
} from "../src/git-history.js";
import { HASH, PARENT_HASH, file } from "./helpers.js";

// ─── Header ──────────────────────────────────────────────────────────────────

describe("parseCommitHeader", () => {
  const raw = [
    HASH,
    "a1b2c3d",
    "Test Dev <dev@example.com>",
    "2025-06-03T14:34:10+02:00",
    "1748954050",
    PARENT_HASH,
    "Fix token refresh\n\nLonger body.\n",
  ].join("\x00");

  it("reads every field and trims the message", () => {
    expect(parseCommitHeader(raw)).toEqual({
      hash: HASH,
      shortHash: "a1b2c3d",
      author: "Test Dev <dev@example.com>",
      date: "2025-06-03T14:34:10+02:00",
      timestamp: 1748954050,
      parents: [PARENT_HASH],
      message: "Fix token refresh\n\nLonger body.",
    });
  });

  it("reads a root commit with no parents and a merge with two", () => {
    const root = parseCommitHeader(raw.replace(PARENT_HASH, ""));
    expect(root?.parents).toEqual([]);
    const merge = parseCommitHeader(raw.replace(PARENT_HASH, `${PARENT_HASH} ${HASH}`));
    expect(merge?.parents).toEqual([PARENT_HASH, HASH]);
  });

  it("rejects malformed output", () => {
    expect(parseCommitHeader("fatal: bad revision")).toBeNull();
    expect(parseCommitHeader(["zzz", "z", "a", "d", "1", "", "m"].join("\x00"))).toBeNull();
  });
});

// ─── File lists ──────────────────────────────────────────────────────────────

describe("parseNumstat", () => {
  it("reads counts, binary files and renames", () => {
    const raw = [
      "12\t3\tsrc/auth.py",
      "-\t-\tassets/logo.png",
      "4\t0\tsrc/{old => new}/util.ts",
      "1\t1\tREADME => docs/README.md",
      "",
    ].join("\n");
    expect(parseNumstat(raw)).toEqual([
      { path: "src/auth.py", insertions: 12, deletions: 3, binary: false },
      { path: "assets/logo.png", insertions: 0, deletions: 0, binary: true },
      { path: "src/new/util.ts", insertions: 4, deletions: 0, binary: false },
      { path: "docs/README.md", insertions: 1, deletions: 1, binary: false },
    ]);
  });
});

describe("resolveRenamedPath", () => {
  it("collapses an empty brace side", () => {
    expect(resolveRenamedPath("src/{lib => }/a.ts")).toBe("src/a.ts");
    expect(resolveRenamedPath("src/{ => lib}/a.ts")).toBe("src/lib/a.ts");
  });
});

describe("parseNameStatus", () => {
  it("maps status letters and keeps the old path of a rename", () => {
    const raw = "A\tsrc/new.ts\nD\tsrc/gone.ts\nM\tsrc/auth.py\nR087\tsrc/a.ts\tsrc/b.ts\nT\tbin/run\n";
    expect(parseNameStatus(raw)).toEqual([
      { path: "src/new.ts", status: "added" },
      { path: "src/gone.ts", status: "deleted" },
      { path: "src/auth.py", status: "modified" },
      { path: "src/b.ts", status: "renamed", previousPath: "src/a.ts" },
      { path: "bin/run", status: "modified" },
    ]);
  });
});

describe("mergeFileLists", () => {
  it("attaches counts by path and defaults missing ones to zero", () => {
    const merged = mergeFileLists(
      [
        { path: "src/auth.py", status: "modified" },
        { path: "src/empty.ts", status: "added" },
      ],
      [{ path: "src/auth.py", insertions: 2, deletions: 1, binary: false }],
    );
    expect(merged).toEqual([
      { path: "src/auth.py", status: "modified", insertions: 2, deletions: 1, binary: false },
      { path: "src/empty.ts", status: "added", insertions: 0, deletions: 0, binary: false },
    ]);
  });
});

// ─── Derived facts ───────────────────────────────────────────────────────────

describe("summarizeFile", () => {
  it("describes each kind of change on one line", () => {
    expect(summarizeFile(file("src/auth.py", "modified", 12, 3))).toBe("src/auth.py: modified (+12 -3)");
    expect(summarizeFile({ ...file("src/b.ts", "renamed", 1, 0), previousPath: "src/a.ts" })).toBe(
      "src/a.ts → src/b.ts: renamed (+1 -0)",
    );
    expect(summarizeFile({ ...file("logo.png", "added", 0, 0), binary: true })).toBe(
      "logo.png: binary file added",
    );
    expect(summarizeFile({ ...file("logo.png", "modified", 0, 0), binary: true })).toBe(
      "logo.png: binary file changed",
    );
  });
});

describe("classifySize", () => {
  it("uses 10 and 50 changed lines as the thresholds", () => {
    expect(classifySize(0)).toBe("small");
    expect(classifySize(9)).toBe("small");
    expect(classifySize(10)).toBe("medium");
    expect(classifySize(49)).toBe("medium");
    expect(classifySize(50)).toBe("large");
  });
});

describe("classifyFile", () => {
  it("sorts paths into source, config, docs and tests", () => {
    expect(classifyFile("src/auth.py")).toBe("source");
    expect(classifyFile("tests/test_auth.py")).toBe("tests");
    expect(classifyFile("src/auth.test.ts")).toBe("tests");
    expect(classifyFile("README.md")).toBe("docs");
    expect(classifyFile("docs/guide/setup.html")).toBe("docs");
    expect(classifyFile("package.json")).toBe("config");
    expect(classifyFile("Dockerfile")).toBe("config");
    expect(classifyFile(".env.local")).toBe("config");
  });
});

describe("buildCommitContext", () => {
  it("derives totals, categories, size and merge flag", () => {
    const ctx = buildCommitContext(
      {
        hash: HASH,
        shortHash: "a1b2c3d",
        author: "Test Dev <dev@example.com>",
        date: "2025-06-03T14:34:10+02:00",
        timestamp: 1748954050,
        parents: [PARENT_HASH, HASH],
        message: "Merge branch 'auth'",
      },
      [file("src/auth.py", "modified", 20, 5), file("tests/test_auth.py", "added", 30, 0)],
      "",
    );
    expect(ctx.stats).toEqual({ files: 2, insertions: 50, deletions: 5 });
    expect(ctx.fileStats).toEqual({ source: 1, config: 0, docs: 0, tests: 1 });
    expect(ctx.sizeClass).toBe("large");
    expect(ctx.isMerge).toBe(true);
    expect(ctx.diffSummary).toEqual([
      "src/auth.py: modified (+20 -5)",
      "tests/test_auth.py: added (+30 -0)",
    ]);
  });
});
