// src/llm/serializer.ts — JournalContext to markdown serialization

import type { ConversationWindow, JournalContext, ScoredRecord, SectionKind, SectionPrompt } from "../types.js";
import { SECTION_TEMPLATES } from "../templates/sections.js";

const MAX_MESSAGE_CHARS = 1_000;
const MAX_RELEVANT_CHARS = 300;
const MAX_RELEVANT_MESSAGES = 5;
const MAX_HUNK_CHARS = 6_000;

// Sanitize values before interpolation
export function sanitize(s: string, maxLen = 500): string {
  return s.replace(/\n/g, " ").replace(/`/g, "'").slice(0, maxLen);
}

/**
 * Chat text keeps its own characters. Line breaks become indented
 * continuation lines under the list item.
 */
export function quoteMessage(text: string, maxLen = MAX_MESSAGE_CHARS): string {
  const clipped = text.length > maxLen ? `${text.slice(0, maxLen)}…` : text;
  return clipped
    .trim()
    .split(/\r?\n/)
    .map((line, i) => (i === 0 ? line : `  ${line}`.trimEnd()))
    .join("\n");
}

function speakerLabel(record: ScoredRecord): string {
  return record.speaker === "human" ? "Human" : "Assistant";
}

/** Best-scoring records first; records with no keyword overlap are left out. */
function relevantMessages(window: ConversationWindow): string[] {
  const top = window.ranked.filter((r) => r.score > 0).slice(0, MAX_RELEVANT_MESSAGES);
  if (top.length === 0) return [];
  const lines = ["## Most Relevant Messages"];
  lines.push(`Matched on: ${window.keywords.join(", ")}`);
  for (const r of top) {
    lines.push(`- ${speakerLabel(r)} (score ${r.score}): ${quoteMessage(r.text, MAX_RELEVANT_CHARS)}`);
  }
  lines.push("");
  return lines;
}

/**
 * Serialize the context for one section prompt.
 * Conversation, terminal history and earlier journal text are included only when present.
 */
export function serializeContext(ctx: JournalContext): string {
  const { commit } = ctx;
  const lines: string[] = [];

  lines.push("# Commit");
  lines.push(`- Hash: ${commit.shortHash}`);
  lines.push(`- Author: ${sanitize(commit.author, 200)}`);
  lines.push(`- Date: ${commit.date}`);
  lines.push(`- Size: ${commit.sizeClass} (+${commit.stats.insertions} -${commit.stats.deletions} in ${commit.stats.files} files)`);
  if (commit.isMerge) lines.push("- Merge commit");
  lines.push("");
  lines.push("## Message");
  lines.push(commit.message);
  lines.push("");

  lines.push("## Changed Files");
  for (const line of commit.diffSummary) lines.push(`- ${sanitize(line, 300)}`);
  lines.push("");

  if (commit.hunkText) {
    lines.push("## Changed Hunks");
    lines.push("```diff");
    lines.push(commit.hunkText.slice(0, MAX_HUNK_CHARS).replace(/```/g, "'''"));
    lines.push("```");
    lines.push("");
  }

  if (ctx.previous) {
    lines.push("## Previous Commit");
    lines.push(`- ${ctx.previous.shortHash}: ${sanitize(ctx.previous.subject, 200)}`);
    lines.push("");
  }

  if (ctx.window.records.length > 0) {
    lines.push("## Conversation (oldest first)");
    for (const r of ctx.window.records) {
      lines.push(`- ${speakerLabel(r)}: ${quoteMessage(r.text)}`);
    }
    lines.push("");
    lines.push(...relevantMessages(ctx.window));
  }

  if (ctx.shellHistory.length > 0) {
    lines.push("## Terminal Commands");
    for (const c of ctx.shellHistory) lines.push(`- \`${sanitize(c.command, 300)}\``);
    lines.push("");
  }

  const { latestEntry, reflections } = ctx.recentJournal;
  if (latestEntry || reflections.length > 0) {
    lines.push("## Earlier Journal Today");
    if (latestEntry) lines.push(latestEntry);
    for (const r of reflections) lines.push(r);
    lines.push("");
  }

  return lines.join("\n").trimEnd();
}

export function buildSectionPrompt(kind: SectionKind, context: string): SectionPrompt {
  const template = SECTION_TEMPLATES[kind];
  return {
    kind,
    system: template.systemPrompt,
    user: `<instructions>\n${template.formatInstructions}\n</instructions>\n\n<context>\n${context}\n</context>`,
  };
}
