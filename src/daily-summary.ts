// src/daily-summary.ts — End-of-day summary of a daily journal
// The first commit of a new day summarizes the most recent earlier day that has
// a journal but no summary yet. A summary is written once and never replaced:
// journal/summaries/daily/YYYY-MM-DD-summary.md.

import { existsSync } from "node:fs";
import type { ResolvedConfig, SectionPrompt, SectionResult, Warning } from "./types.js";
import type { LanguageModel } from "./llm/client.js";
import { invokeModel } from "./llm/dispatcher.js";
import { parseSection } from "./response-parser.js";
import { isEmptySection } from "./sections.js";
import { withFileLock, writeFileAtomic } from "./file-lock.js";
import {
  dailyJournalPath,
  dailySummaryPath,
  formatDayHeading,
  journalDir,
  listJournalDays,
} from "./journal-paths.js";
import { extractReflections, readJournalDocument } from "./recent-journal.js";
import { DAILY_SUMMARY_SECTIONS, DAILY_SUMMARY_TEMPLATES } from "./templates/daily-summary.js";
import type { DailySummaryKind } from "./templates/daily-summary.js";
import type { Logger } from "./logger.js";
import { silentLogger } from "./logger.js";

const MAX_JOURNAL_CHARS = 20_000;

export type DailySummaryOutcome = "written" | "exists" | "skipped";

export interface DailySummaryResult {
  day: string;
  filePath: string;
  outcome: DailySummaryOutcome;
  /** Why nothing was written: "no-journal", "no-model" or "no-content". */
  reason?: string;
  markdown?: string;
  warnings: Warning[];
}

export interface DailySummaryOptions {
  logger?: Logger;
}

// ─── Trigger ─────────────────────────────────────────────────────────────────

/**
 * The latest day before `today` that has a journal, when it has no summary yet.
 * Older unsummarized days are left alone.
 */
export function findDayToSummarize(dir: string, today: string): string | undefined {
  const earlier = listJournalDays(dir).filter((day) => day < today);
  const latest = earlier[earlier.length - 1];
  if (latest === undefined || existsSync(dailySummaryPath(dir, latest))) return undefined;
  return latest;
}

/** Summarize the day before `today` if it still needs one. */
export async function summarizePreviousDay(
  today: string,
  config: ResolvedConfig,
  model: LanguageModel | undefined,
  options: DailySummaryOptions = {},
): Promise<DailySummaryResult | undefined> {
  const day = findDayToSummarize(journalDir(config), today);
  return day === undefined ? undefined : summarizeDay(day, config, model, options);
}

// ─── Prompt and rendering ────────────────────────────────────────────────────

export function buildDailySummaryPrompt(kind: DailySummaryKind, day: string, journal: string): SectionPrompt {
  const template = DAILY_SUMMARY_TEMPLATES[kind];
  const text = journal.length > MAX_JOURNAL_CHARS ? `${journal.slice(0, MAX_JOURNAL_CHARS)}\n…` : journal;
  return {
    kind,
    system: template.systemPrompt,
    user: `<instructions>\n${template.formatInstructions}\n</instructions>\n\n<context>\n# Journal for ${formatDayHeading(day)}\n\n${text.trim()}\n</context>`,
  };
}

function renderBody(result: SectionResult): string {
  switch (result.kind) {
    case "summary":
    case "technicalSynopsis":
      return result.text;
    case "accomplishments":
    case "frustrations":
    case "discussionNotes":
      return result.items.map((item) => `- ${item}`).join("\n");
    case "toneMood":
      return [result.mood, result.indicators].filter((line) => line !== "").join("\n");
    case "commitMetadata":
      return Object.entries(result.entries).map(([k, v]) => `- **${k}:** ${v}`).join("\n");
  }
}

export function renderDailySummary(day: string, results: SectionResult[], reflections: string[]): string {
  const blocks = [`# Daily Summary - ${formatDayHeading(day)}`];
  for (const { kind, title } of DAILY_SUMMARY_SECTIONS) {
    const result = results.find((r) => r.kind === kind);
    if (!result || isEmptySection(result)) continue;
    blocks.push(`## ${title}`, renderBody(result));
  }
  if (reflections.length > 0) {
    blocks.push("## Reflections", ...reflections.map((r) => r.replace(/^## /, "### ")));
  }
  return `${blocks.join("\n\n")}\n`;
}

// ─── Generation ──────────────────────────────────────────────────────────────

/**
 * Write the summary of one day. Failed section calls are left out; a day with
 * nothing to say, no model or no journal is skipped so a later run can retry.
 */
export async function summarizeDay(
  day: string,
  config: ResolvedConfig,
  model: LanguageModel | undefined,
  options: DailySummaryOptions = {},
): Promise<DailySummaryResult> {
  const logger = options.logger ?? silentLogger;
  const dir = journalDir(config);
  const filePath = dailySummaryPath(dir, day);
  const warnings: Warning[] = [];
  const done = (outcome: DailySummaryOutcome, reason?: string, markdown?: string): DailySummaryResult => ({
    day,
    filePath,
    outcome,
    ...(reason === undefined ? {} : { reason }),
    ...(markdown === undefined ? {} : { markdown }),
    warnings,
  });

  if (existsSync(filePath)) return done("exists");
  const journal = readJournalDocument(dailyJournalPath(dir, day));
  if (journal === undefined || journal.trim() === "") return done("skipped", "no-journal");
  if (!model) return done("skipped", "no-model");

  logger.info(`summarizing ${day}`);
  const results = await Promise.all(
    DAILY_SUMMARY_SECTIONS.map(async ({ kind }): Promise<SectionResult | undefined> => {
      const reply = await invokeModel(model, buildDailySummaryPrompt(kind, day, journal), config.llm);
      if (!reply.ok) {
        warnings.push({
          level: "warn",
          module: "daily-summary",
          message: `${kind} failed after ${reply.attempts} attempt(s): ${reply.reason}`,
        });
        return undefined;
      }
      return parseSection(kind, reply.text, warnings);
    }),
  );
  const sections = results.filter((r): r is SectionResult => r !== undefined && !isEmptySection(r));
  const reflections = extractReflections(journal);
  if (sections.length === 0 && reflections.length === 0) return done("skipped", "no-content");

  const markdown = renderDailySummary(day, sections, reflections);
  const outcome = await withFileLock(filePath, async (): Promise<DailySummaryOutcome> => {
    if (existsSync(filePath)) return "exists";
    await writeFileAtomic(filePath, markdown);
    return "written";
  });
  return done(outcome, undefined, markdown);
}
