import { describe, it, expect } from "vitest";
import { existsSync, mkdirSync, readFileSync, writeFileSync } from "node:fs";
import { join } from "node:path";
import {
  findDayToSummarize,
  summarizeDay,
  summarizePreviousDay,
} from "../src/daily-summary.js";
import { dailySummaryPath } from "../src/journal-paths.js";
import type { SectionKind } from "../src/types.js";
import { ScriptedModel, makeConfig, tempDir } from "./helpers.js";

const DAY_DOC = `# Daily Journal Entries - June 2, 2025

### 9:00 AM — Commit 1111111

#### Summary

Fixed login.

## Reflection (2025-06-02 18:00:00)

Good day.
`;

const REPLIES: Partial<Record<SectionKind, string>> = {
  summary: "Fixed the login flow.",
  accomplishments: "- Fixed login\n- Added tests",
  frustrations: "NONE",
};

// ─── Helpers ─────────────────────────────────────────────────────────────────

function setup(days: Record<string, string> = { "2025-06-02": DAY_DOC }) {
  const repoDir = tempDir();
  const journal = join(repoDir, "journal");
  mkdirSync(join(journal, "daily"), { recursive: true });
  for (const [day, content] of Object.entries(days)) {
    writeFileSync(join(journal, "daily", `${day}-journal.md`), content);
  }
  return { repoDir, journal, config: makeConfig(repoDir) };
}

function replyModel(replies: Partial<Record<SectionKind, string>> = REPLIES): ScriptedModel {
  return new ScriptedModel((prompt) => {
    const reply = replies[prompt.kind];
    if (reply === undefined) throw new Error(`no reply for ${prompt.kind}`);
    return reply;
  });
}

// ─── Trigger ─────────────────────────────────────────────────────────────────

describe("findDayToSummarize", () => {
  it("picks the latest earlier day without a summary", () => {
    const { journal } = setup({ "2025-06-01": "a", "2025-06-02": "b", "2025-06-03": "c" });
    expect(findDayToSummarize(journal, "2025-06-03")).toBe("2025-06-02");
    expect(findDayToSummarize(journal, "2025-06-02")).toBe("2025-06-01");
  });

  it("does not reach back past a day that is already summarized", () => {
    const { journal } = setup({ "2025-06-01": "a", "2025-06-02": "b" });
    mkdirSync(join(journal, "summaries", "daily"), { recursive: true });
    writeFileSync(dailySummaryPath(journal, "2025-06-02"), "done");
    expect(findDayToSummarize(journal, "2025-06-03")).toBeUndefined();
  });

  it("finds nothing without a daily directory", () => {
    expect(findDayToSummarize(join(tempDir(), "journal"), "2025-06-03")).toBeUndefined();
  });
});

// ─── Generation ──────────────────────────────────────────────────────────────

describe("summarizeDay", () => {
  it("writes the summary sections and the day's reflections", async () => {
    const { journal, config } = setup();
    const model = replyModel();
    const result = await summarizeDay("2025-06-02", config, model);

    const expected = [
      "# Daily Summary - June 2, 2025",
      "## Summary",
      "Fixed the login flow.",
      "## Key Accomplishments",
      "- Fixed login\n- Added tests",
      "## Reflections",
      "### Reflection (2025-06-02 18:00:00)\n\nGood day.",
    ].join("\n\n") + "\n";
    expect(result.outcome).toBe("written");
    expect(result.filePath).toBe(dailySummaryPath(journal, "2025-06-02"));
    expect(readFileSync(result.filePath, "utf-8")).toBe(expected);
    expect([...model.calls].sort()).toEqual(["accomplishments", "frustrations", "summary"]);
  });

  it("gives the model the whole day's journal", async () => {
    const { config } = setup();
    const prompts: string[] = [];
    const model = new ScriptedModel((prompt) => {
      prompts.push(prompt.user);
      return "NONE";
    });
    await summarizeDay("2025-06-02", config, model);
    expect(prompts[0]).toContain("<context>\n# Journal for June 2, 2025\n\n# Daily Journal Entries - June 2, 2025\n");
  });

  it("never replaces an existing summary", async () => {
    const { config } = setup();
    await summarizeDay("2025-06-02", config, replyModel());
    const model = replyModel();
    const second = await summarizeDay("2025-06-02", config, model);
    expect(second.outcome).toBe("exists");
    expect(model.calls).toEqual([]);
  });

  it("leaves out a section whose call failed", async () => {
    const { config } = setup();
    const result = await summarizeDay(
      "2025-06-02",
      config,
      replyModel({ accomplishments: "- Fixed login", frustrations: "NONE" }),
    );
    expect(result.outcome).toBe("written");
    expect(result.warnings.map((w) => w.message)).toEqual([
      "summary failed after 1 attempt(s): no reply for summary",
    ]);
    expect(readFileSync(result.filePath, "utf-8")).not.toContain("## Summary");
  });

  it("skips without a model", async () => {
    const { config } = setup();
    const result = await summarizeDay("2025-06-02", config, undefined);
    expect(result).toMatchObject({ outcome: "skipped", reason: "no-model" });
    expect(existsSync(result.filePath)).toBe(false);
  });

  it("skips a day without a journal", async () => {
    const { config } = setup();
    const result = await summarizeDay("2025-05-30", config, replyModel());
    expect(result).toMatchObject({ outcome: "skipped", reason: "no-journal" });
  });

  it("skips a day with nothing to report so a later run can retry", async () => {
    const { config } = setup({ "2025-06-02": "# Daily Journal Entries - June 2, 2025\n\n### 9:00 AM — Commit 1111111\n" });
    const result = await summarizeDay(
      "2025-06-02",
      config,
      replyModel({ summary: "NONE", accomplishments: "NONE", frustrations: "NONE" }),
    );
    expect(result).toMatchObject({ outcome: "skipped", reason: "no-content" });
    expect(existsSync(result.filePath)).toBe(false);
  });
});

describe("summarizePreviousDay", () => {
  it("summarizes the day before the new commit's day", async () => {
    const { config } = setup({ "2025-06-02": DAY_DOC, "2025-06-03": "today" });
    const result = await summarizePreviousDay("2025-06-03", config, replyModel());
    expect(result?.day).toBe("2025-06-02");
    expect(result?.outcome).toBe("written");
  });

  it("does nothing on a later commit of the same day", async () => {
    const { config } = setup({ "2025-06-02": DAY_DOC, "2025-06-03": "today" });
    await summarizePreviousDay("2025-06-03", config, replyModel());
    const model = replyModel();
    expect(await summarizePreviousDay("2025-06-03", config, model)).toBeUndefined();
    expect(model.calls).toEqual([]);
  });
});
