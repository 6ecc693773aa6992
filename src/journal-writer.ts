// src/journal-writer.ts — Journal entry assembly, rendering and persistence
// One markdown document per day: journal/daily/YYYY-MM-DD-journal.md.
// Entries are appended under a per-file lock and written atomically;
// existing content is never rewritten.

import { existsSync } from "node:fs";
import { readFile } from "node:fs/promises";
import type {
  CommitContext,
  DuplicatePolicy,
  FileCategory,
  JournalEntry,
  SectionResult,
} from "./types.js";
import { isEmptySection, sectionOrder, sectionTitle } from "./sections.js";
import { withFileLock, writeFileAtomic } from "./file-lock.js";
import {
  dailyJournalPath,
  formatDayHeading,
  isoDay,
  isoDisplayTime,
  localDay,
  localTimestamp,
} from "./journal-paths.js";

const ENTRY_SEPARATOR = "\n\n---\n\n";
const FILE_CATEGORIES: readonly FileCategory[] = ["source", "config", "docs", "tests"];
const SPEAKER_LINE = /^(human|user|assistant|ai)\s*:\s*(.*)$/i;

export type AppendOutcome = "written" | "duplicate";

// ─── Assembly ────────────────────────────────────────────────────────────────

/**
 * Facts computed from the commit, followed by model-supplied keys that do not
 * collide with them.
 */
export function buildCommitMetadata(
  commit: CommitContext,
  modelEntries: Record<string, string> = {},
): Record<string, string> {
  const metadata: Record<string, string> = {
    "files changed": String(commit.stats.files),
    insertions: String(commit.stats.insertions),
    deletions: String(commit.stats.deletions),
    size: commit.sizeClass,
  };
  if (commit.isMerge) metadata.merge = "yes";

  const categories = FILE_CATEGORIES
    .filter((c) => commit.fileStats[c] > 0)
    .map((c) => `${c} ${commit.fileStats[c]}`);
  if (categories.length > 0) metadata["file types"] = categories.join(", ");

  const taken = new Set(Object.keys(metadata).map((k) => k.toLowerCase()));
  for (const [key, value] of Object.entries(modelEntries)) {
    if (taken.has(key.toLowerCase())) continue;
    taken.add(key.toLowerCase());
    metadata[key] = value;
  }
  return metadata;
}

/**
 * Drop empty sections, order the rest by the registry and fold the
 * commit-metadata result into the deterministic metadata block.
 */
export function assembleEntry(commit: CommitContext, results: SectionResult[]): JournalEntry {
  let modelMetadata: Record<string, string> = {};
  const sections: SectionResult[] = [];
  for (const result of results) {
    if (result.kind === "commitMetadata") {
      modelMetadata = result.entries;
      continue;
    }
    if (!isEmptySection(result)) sections.push(result);
  }
  sections.sort((a, b) => sectionOrder(a.kind) - sectionOrder(b.kind));

  return {
    hash: commit.hash,
    shortHash: commit.shortHash,
    day: isoDay(commit.date),
    time: isoDisplayTime(commit.date),
    sections,
    metadata: buildCommitMetadata(commit, modelMetadata),
  };
}

// ─── Rendering ───────────────────────────────────────────────────────────────

export function entryHeader(time: string, shortHash: string): string {
  return `### ${time} — Commit ${shortHash}`;
}

function renderBody(section: SectionResult): string {
  switch (section.kind) {
    case "summary":
    case "technicalSynopsis":
      return section.text.trim();
    case "accomplishments":
    case "frustrations":
      return section.items.map((item) => `- ${item}`).join("\n\n");
    case "toneMood":
      return [section.mood, section.indicators]
        .filter((line) => line !== "")
        .map((line) => `> ${line}`)
        .join("\n");
    case "discussionNotes":
      return section.items.map(renderQuote).join("\n\n");
    case "commitMetadata":
      return renderMetadata(section.entries);
  }
}

/** "Human: text" → "> **Human:** text"; continuation lines stay quoted. */
function renderQuote(item: string): string {
  const match = SPEAKER_LINE.exec(item);
  const lines = (match ? match[2] : item).split("\n");
  if (match) {
    const speaker = /^(human|user)$/i.test(match[1]) ? "Human" : "Assistant";
    lines[0] = `**${speaker}:** ${lines[0]}`;
  }
  return lines.map((line) => `> ${line}`.trimEnd()).join("\n");
}

function renderMetadata(entries: Record<string, string>): string {
  return Object.entries(entries)
    .map(([key, value]) => `- **${key}:** ${value}`)
    .join("\n");
}

export function renderEntry(entry: JournalEntry): string {
  const blocks: string[] = [entryHeader(entry.time, entry.shortHash)];
  for (const section of entry.sections) {
    blocks.push(`#### ${sectionTitle(section.kind)}`);
    blocks.push(renderBody(section));
  }
  blocks.push(`#### ${sectionTitle("commitMetadata")}`);
  blocks.push(renderMetadata(entry.metadata));
  return blocks.join("\n\n");
}

export function dayHeader(day: string): string {
  return `# Daily Journal Entries - ${formatDayHeading(day)}`;
}

// ─── Persistence ─────────────────────────────────────────────────────────────

/** True when the document already holds an entry for this commit. */
export function hasEntryFor(content: string, shortHash: string): boolean {
  const escaped = shortHash.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
  return new RegExp(`^### .* — Commit ${escaped}\\s*$`, "m").test(content);
}

async function readIfExists(filePath: string): Promise<string | undefined> {
  return existsSync(filePath) ? readFile(filePath, "utf-8") : undefined;
}

export function appendToDocument(existing: string | undefined, day: string, block: string): string {
  if (existing === undefined || existing.trim() === "") {
    return `${dayHeader(day)}\n\n${block}\n`;
  }
  return `${existing.trimEnd()}${ENTRY_SEPARATOR}${block}\n`;
}

/**
 * Append a rendered entry to its day's document. With the "skip" policy an
 * entry for a commit that is already present is not written again.
 */
export async function appendJournalEntry(
  journalDir: string,
  entry: JournalEntry,
  markdown: string,
  policy: DuplicatePolicy,
): Promise<{ filePath: string; outcome: AppendOutcome }> {
  const filePath = dailyJournalPath(journalDir, entry.day);
  const outcome = await withFileLock(filePath, async (): Promise<AppendOutcome> => {
    const existing = await readIfExists(filePath);
    if (policy === "skip" && existing !== undefined && hasEntryFor(existing, entry.shortHash)) {
      return "duplicate";
    }
    await writeFileAtomic(filePath, appendToDocument(existing, entry.day, markdown));
    return "written";
  });
  return { filePath, outcome };
}

/**
 * Append a reflection to today's document, verbatim.
 */
export async function addReflection(
  journalDir: string,
  text: string,
  now: Date = new Date(),
): Promise<string> {
  const day = localDay(now);
  const filePath = dailyJournalPath(journalDir, day);
  await withFileLock(filePath, async () => {
    const existing = await readIfExists(filePath);
    const block = `## Reflection (${localTimestamp(now)})\n\n${text}`;
    const content = existing === undefined || existing.trim() === ""
      ? `${dayHeader(day)}\n\n${block}`
      : `${existing.trimEnd()}\n\n${block}`;
    await writeFileAtomic(filePath, content.endsWith("\n") ? content : `${content}\n`);
  });
  return filePath;
}
