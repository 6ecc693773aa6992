import { describe, it, expect } from "vitest";
import { readFileSync } from "node:fs";
import { join } from "node:path";
import {
  addReflection,
  appendJournalEntry,
  appendToDocument,
  assembleEntry,
  buildCommitMetadata,
  hasEntryFor,
  renderEntry,
} from "../src/journal-writer.js";
import type { JournalEntry, SectionResult } from "../src/types.js";
import { file, makeCommit, tempDir } from "./helpers.js";

// ─── Helpers ─────────────────────────────────────────────────────────────────

const RESULTS: SectionResult[] = [
  {
    kind: "discussionNotes",
    items: ["Human: why does refresh fail?", "Assistant: the expiry is not persisted."],
  },
  { kind: "summary", text: "Fixed the token refresh." },
  { kind: "commitMetadata", entries: { area: "auth", Size: "huge" } },
  { kind: "frustrations", items: [] },
  { kind: "toneMood", mood: "relieved", indicators: "\"finally works\"" },
  { kind: "accomplishments", items: ["Fixed token refresh", "Added expiry cache"] },
];

const EXPECTED_MARKDOWN = `### 2:34 PM — Commit a1b2c3d

#### Summary

Fixed the token refresh.

#### Accomplishments

- Fixed token refresh

- Added expiry cache

#### Tone/Mood

> relieved
> "finally works"

#### Discussion Notes (from chat)

> **Human:** why does refresh fail?

> **Assistant:** the expiry is not persisted.

#### Commit Metadata

- **files changed:** 1
- **insertions:** 5
- **deletions:** 1
- **size:** small
- **file types:** source 1
- **area:** auth`;

function entryFor(shortHash: string, day = "2025-06-03"): JournalEntry {
  return {
    hash: shortHash.padEnd(40, "0"),
    shortHash,
    day,
    time: "2:34 PM",
    sections: [{ kind: "summary", text: `Entry ${shortHash}` }],
    metadata: { "files changed": "1" },
  };
}

// ─── Assembly ────────────────────────────────────────────────────────────────

describe("buildCommitMetadata", () => {
  it("puts computed facts first and model keys after them", () => {
    const commit = makeCommit({
      files: [file("src/auth.py", "modified", 20, 5), file("tests/test_auth.py", "added", 30, 0)],
      parents: ["0f1e2d3c4b5a69788796a5b4c3d2e1f001234567", "1111111111111111111111111111111111111111"],
    });
    expect(buildCommitMetadata(commit, { Insertions: "999", ticket: "JRN-7" })).toEqual({
      "files changed": "2",
      insertions: "50",
      deletions: "5",
      size: "large",
      merge: "yes",
      "file types": "source 1, tests 1",
      ticket: "JRN-7",
    });
  });
});

describe("assembleEntry", () => {
  it("drops empty sections, orders the rest and folds in model metadata", () => {
    const entry = assembleEntry(makeCommit(), RESULTS);
    expect(entry.day).toBe("2025-06-03");
    expect(entry.time).toBe("2:34 PM");
    expect(entry.sections.map((s) => s.kind)).toEqual([
      "summary",
      "accomplishments",
      "toneMood",
      "discussionNotes",
    ]);
    expect(entry.metadata.area).toBe("auth");
    expect(entry.metadata.Size).toBeUndefined();
  });
});

// ─── Rendering ───────────────────────────────────────────────────────────────

describe("renderEntry", () => {
  it("renders headers, bullets, quotes and the metadata block", () => {
    expect(renderEntry(assembleEntry(makeCommit(), RESULTS))).toBe(EXPECTED_MARKDOWN);
  });

  it("renders a mood without indicators on its own line", () => {
    const md = renderEntry(
      assembleEntry(makeCommit(), [{ kind: "toneMood", mood: "focused", indicators: "" }]),
    );
    expect(md).toContain("#### Tone/Mood\n\n> focused\n\n#### Commit Metadata");
  });

  it("renders only the header and metadata when every section is empty", () => {
    const md = renderEntry(assembleEntry(makeCommit(), [{ kind: "summary", text: "" }]));
    expect(md).toBe(
      [
        "### 2:34 PM — Commit a1b2c3d",
        "#### Commit Metadata",
        "- **files changed:** 1\n- **insertions:** 5\n- **deletions:** 1\n- **size:** small\n- **file types:** source 1",
      ].join("\n\n"),
    );
  });
});

describe("hasEntryFor", () => {
  it("matches an entry header by short hash", () => {
    expect(hasEntryFor(EXPECTED_MARKDOWN, "a1b2c3d")).toBe(true);
    expect(hasEntryFor(EXPECTED_MARKDOWN, "a1b2c3")).toBe(false);
    expect(hasEntryFor("", "a1b2c3d")).toBe(false);
  });
});

describe("appendToDocument", () => {
  it("starts a new document with the day header", () => {
    expect(appendToDocument(undefined, "2025-06-03", "### entry")).toBe(
      "# Daily Journal Entries - June 3, 2025\n\n### entry\n",
    );
  });

  it("separates entries with a horizontal rule", () => {
    expect(appendToDocument("# Day\n\n### one\n\n\n", "2025-06-03", "### two")).toBe(
      "# Day\n\n### one\n\n---\n\n### two\n",
    );
  });
});

// ─── Persistence ─────────────────────────────────────────────────────────────

describe("appendJournalEntry", () => {
  it("creates the day's document on first write", async () => {
    const dir = tempDir();
    const entry = entryFor("1111111");
    const { filePath, outcome } = await appendJournalEntry(dir, entry, "### first", "skip");

    expect(outcome).toBe("written");
    expect(filePath).toBe(join(dir, "daily", "2025-06-03-journal.md"));
    expect(readFileSync(filePath, "utf-8")).toBe("# Daily Journal Entries - June 3, 2025\n\n### first\n");
  });

  it("appends later entries without touching earlier content", async () => {
    const dir = tempDir();
    const first = renderEntry(entryFor("1111111"));
    const second = renderEntry(entryFor("2222222"));
    await appendJournalEntry(dir, entryFor("1111111"), first, "skip");
    const { filePath } = await appendJournalEntry(dir, entryFor("2222222"), second, "skip");

    expect(readFileSync(filePath, "utf-8")).toBe(
      `# Daily Journal Entries - June 3, 2025\n\n${first}\n\n---\n\n${second}\n`,
    );
  });

  it("skips a commit already in the document under the skip policy", async () => {
    const dir = tempDir();
    const entry = entryFor("1111111");
    const md = renderEntry(entry);
    const { filePath } = await appendJournalEntry(dir, entry, md, "skip");
    const before = readFileSync(filePath, "utf-8");

    const again = await appendJournalEntry(dir, entry, md, "skip");
    expect(again.outcome).toBe("duplicate");
    expect(readFileSync(filePath, "utf-8")).toBe(before);
  });

  it("appends a second copy under the append policy", async () => {
    const dir = tempDir();
    const entry = entryFor("1111111");
    const md = renderEntry(entry);
    await appendJournalEntry(dir, entry, md, "append");
    const { filePath, outcome } = await appendJournalEntry(dir, entry, md, "append");

    expect(outcome).toBe("written");
    expect(readFileSync(filePath, "utf-8").split("### 2:34 PM — Commit 1111111")).toHaveLength(3);
  });

  it("keeps every entry when appends race on the same document", async () => {
    const dir = tempDir();
    const hashes = ["1111111", "2222222", "3333333", "4444444", "5555555"];
    await Promise.all(
      hashes.map((h) => appendJournalEntry(dir, entryFor(h), renderEntry(entryFor(h)), "skip")),
    );
    const content = readFileSync(join(dir, "daily", "2025-06-03-journal.md"), "utf-8");

    for (const h of hashes) expect(hasEntryFor(content, h)).toBe(true);
    expect(content.match(/^# Daily Journal Entries/gm)).toHaveLength(1);
    expect(content.match(/^---$/gm)).toHaveLength(4);
  });
});

describe("addReflection", () => {
  const now = new Date(2025, 5, 3, 18, 0, 0);

  it("starts a document when none exists", async () => {
    const dir = tempDir();
    const filePath = await addReflection(dir, "Long day.", now);
    expect(readFileSync(filePath, "utf-8")).toBe(
      "# Daily Journal Entries - June 3, 2025\n\n## Reflection (2025-06-03 18:00:00)\n\nLong day.\n",
    );
  });

  it("appends the text verbatim after existing entries", async () => {
    const dir = tempDir();
    await appendJournalEntry(dir, entryFor("1111111"), "### entry", "skip");
    const text = "Long day.\n\n  - kept *as* typed";
    const filePath = await addReflection(dir, text, now);

    expect(readFileSync(filePath, "utf-8")).toBe(
      `# Daily Journal Entries - June 3, 2025\n\n### entry\n\n## Reflection (2025-06-03 18:00:00)\n\n${text}\n`,
    );
  });
});
