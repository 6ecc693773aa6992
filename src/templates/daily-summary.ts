// src/templates/daily-summary.ts — Prompts for the end-of-day summary
// Same shape as the per-commit templates, but the context is a whole day's journal.

import type { SectionKind } from "../types.js";
import type { SectionTemplate } from "./sections.js";

const DAY_RULES = `
GROUNDING RULES (these override all other instructions):
- Your ONLY source of truth is the day's journal in the <context> section.
- NEVER add work, feelings, or problems that no entry mentions.
- If the journal does not support this section, reply with the single word NONE.
- Write in the past tense. No headings, no preamble, no closing remarks.`;

export const DAILY_SUMMARY_TEMPLATES = {
  summary: {
    systemPrompt: `You write the summary paragraph of a developer's end-of-day journal summary.
${DAY_RULES}`,
    formatInstructions: `Write ONE paragraph of 3-5 sentences covering what the day's commits achieved as a whole.
Group related commits together instead of listing them one by one.`,
  },
  accomplishments: {
    systemPrompt: `You list the key accomplishments of a developer's day, taken from their journal entries.
${DAY_RULES}`,
    formatInstructions: `List the day's most significant accomplishments, one item per line, each line starting with "- ".
Merge items that describe the same piece of work. At most 6 items.`,
  },
  frustrations: {
    systemPrompt: `You list the challenges a developer ran into during one day, taken from their journal entries.
${DAY_RULES}`,
    formatInstructions: `List the problems and roadblocks the entries record, one item per line, each line starting with "- ".
Note whether a problem was resolved later in the day when an entry says so.
Reply NONE if no entry records a difficulty.`,
  },
} satisfies Partial<Record<SectionKind, SectionTemplate>>;

export type DailySummaryKind = keyof typeof DAILY_SUMMARY_TEMPLATES;

export const DAILY_SUMMARY_SECTIONS: readonly { kind: DailySummaryKind; title: string }[] = [
  { kind: "summary", title: "Summary" },
  { kind: "accomplishments", title: "Key Accomplishments" },
  { kind: "frustrations", title: "Challenges" },
];
