// src/templates/sections.ts — Section prompt templates
// One small, constrained prompt per section.
// Each section is generated by its own call so a failure in one never touches another.
// The model may answer NONE when the context holds no evidence for the section.

import type { SectionKind } from "../types.js";

export interface SectionTemplate {
  systemPrompt: string;
  formatInstructions: string;
}

// ─── Shared system prompt addendum ──────────────────────────────────────────

const GROUNDING_RULES = `
GROUNDING RULES (these override all other instructions):
- You are a JOURNALIST, not a novelist. Your ONLY source of truth is the <context> section provided in the user message.
- NEVER invent intentions, feelings, decisions, or obstacles that are not visible in the commit, the conversation, or the terminal commands.
- Quote the developer's own words when they explain a decision. Do not paraphrase a quote into something stronger.
- If the context does not support this section, reply with the single word NONE.
- Write in the past tense, in plain sentences. No headings, no preamble, no closing remarks.`;

// ─── Section templates ──────────────────────────────────────────────────────

const summary: SectionTemplate = {
  systemPrompt: `You write the summary paragraph of a developer's engineering journal entry for one git commit.
${GROUNDING_RULES}`,
  formatInstructions: `Write ONE paragraph of 2-4 sentences describing what changed in this commit and why.
Lead with the purpose when the conversation states it; otherwise describe the change itself.
Prefer concrete nouns from the commit (file names, functions) over general words like "improvements".`,
};

const technicalSynopsis: SectionTemplate = {
  systemPrompt: `You write the technical synopsis of a developer's engineering journal entry for one git commit.
${GROUNDING_RULES}`,
  formatInstructions: `Write ONE paragraph describing HOW the change was implemented: the files, functions, data structures and approach.
Mention only code elements that appear in the changed files list or the changed hunks.
Keep it under 120 words.`,
};

const accomplishments: SectionTemplate = {
  systemPrompt: `You list the accomplishments recorded in a developer's engineering journal entry for one git commit.
${GROUNDING_RULES}`,
  formatInstructions: `List what was accomplished in this commit, one item per line, each line starting with "- ".
Each item is one sentence. At most 6 items.
Reply NONE if nothing beyond a trivial edit was accomplished.`,
};

const frustrations: SectionTemplate = {
  systemPrompt: `You list the frustrations and roadblocks recorded in a developer's engineering journal entry for one git commit.
${GROUNDING_RULES}`,
  formatInstructions: `List the problems, dead ends, or difficulties the developer ran into, one item per line, each line starting with "- ".
Only include problems the conversation or terminal commands actually show (errors, failed attempts, reverts, complaints).
Reply NONE if there is no evidence of any difficulty.`,
};

const toneMood: SectionTemplate = {
  systemPrompt: `You describe the developer's mood for one entry of their engineering journal.
${GROUNDING_RULES}
- Mood must be inferred ONLY from the developer's own messages in the conversation. The commit alone is never evidence of mood.`,
  formatInstructions: `Reply with exactly two lines:
Mood: <one to three words>
Indicators: <the specific phrases or behaviour in the conversation that show this mood>
Reply NONE if the developer's messages show no clear mood.`,
};

const discussionNotes: SectionTemplate = {
  systemPrompt: `You select discussion notes for a developer's engineering journal entry from their conversation with an AI assistant.
${GROUNDING_RULES}
- Copy excerpts VERBATIM. Never reword an excerpt.`,
  formatInstructions: `Pick the 1-5 conversation excerpts that best explain the decisions behind this commit.
One excerpt per line, prefixed with the speaker:
Human: <verbatim text>
Assistant: <verbatim text>
An excerpt that spans several lines in the conversation (indented continuation lines) is joined onto one line with " / ".
Favour messages listed under "Most Relevant Messages" when they explain the change.
Reply NONE if the conversation contains nothing about this commit.`,
};

const commitMetadata: SectionTemplate = {
  systemPrompt: `You extract descriptive metadata for one git commit in a developer's engineering journal.
${GROUNDING_RULES}`,
  formatInstructions: `Reply with "key: value" lines only, at most 5 lines. Useful keys: area, change type, tickets, follow-up.
Do not repeat file counts or line counts; those are recorded separately.
Reply NONE if nothing useful can be said.`,
};

export const SECTION_TEMPLATES: Record<SectionKind, SectionTemplate> = {
  summary,
  technicalSynopsis,
  accomplishments,
  frustrations,
  toneMood,
  discussionNotes,
  commitMetadata,
};
