// src/pipeline.ts — Pipeline Orchestrator
// idle → aggregating → filtering → dispatching → parsing → assembling → persisted
// Soft failures are recorded and the run continues; a commit that cannot be read
// or a journal that cannot be written ends the run in "aborted".

import type {
  Degradation,
  JournalContext,
  JournalEntry,
  ResolvedConfig,
  RunResult,
  RunStage,
  SectionResult,
  Warning,
} from "./types.js";
import { CommitReadError, JournalWriteError } from "./types.js";
import type { VersionControl } from "./git-history.js";
import { GitRepository } from "./git-history.js";
import type { ConversationStore } from "./conversation-store.js";
import { openConversationStore } from "./conversation-store.js";
import type { LanguageModel } from "./llm/client.js";
import { createLanguageModel } from "./llm/client.js";
import type { DispatchOutcome } from "./llm/dispatcher.js";
import { dispatchSections } from "./llm/dispatcher.js";
import { collectContext } from "./context-collector.js";
import { filterConversation } from "./relevance-filter.js";
import { parseSection } from "./response-parser.js";
import { emptySection } from "./sections.js";
import { appendJournalEntry, assembleEntry, hasEntryFor, renderEntry } from "./journal-writer.js";
import { dailyJournalPath, isoDay, journalDir } from "./journal-paths.js";
import { readJournalDocument } from "./recent-journal.js";
import type { Logger } from "./logger.js";
import { silentLogger } from "./logger.js";

export interface PipelineDependencies {
  vcs: VersionControl;
  store?: ConversationStore;
  model?: LanguageModel;
}

export interface PipelineOptions {
  /** Assemble and render, but write nothing. */
  dryRun?: boolean;
  logger?: Logger;
}

/** Real collaborators for a configured repository. */
export function createDependencies(config: ResolvedConfig): PipelineDependencies {
  return {
    vcs: new GitRepository(config.repoDir),
    store: config.conversation.enabled ? openConversationStore(config) : undefined,
    model: createLanguageModel(config.llm),
  };
}

class RunTracker {
  readonly stages: RunStage[] = ["idle"];
  readonly degradations: Degradation[] = [];
  readonly warnings: Warning[] = [];

  constructor(private readonly logger: Logger) {}

  get stage(): RunStage {
    return this.stages[this.stages.length - 1];
  }

  enter(stage: RunStage, detail?: string): void {
    this.stages.push(stage);
    this.logger.info(detail ? `${stage}: ${detail}` : stage);
  }

  degrade(unit: string, message: string): void {
    this.degradations.push({ unit, message });
    this.logger.warning({ level: "warn", module: unit, message });
  }

  result(fields: Omit<RunResult, "stage" | "stages" | "degradations" | "warnings" | "outcome"> & {
    outcome?: RunResult["outcome"];
  }): RunResult {
    return {
      ...fields,
      outcome: fields.outcome ?? (this.degradations.length > 0 ? "soft-failure" : "ok"),
      stage: this.stage,
      stages: [...this.stages],
      degradations: [...this.degradations],
      warnings: [...this.warnings],
    };
  }
}

/**
 * Generate and persist the journal entry for one commit.
 */
export async function generateJournalEntry(
  ref: string,
  config: ResolvedConfig,
  deps: PipelineDependencies,
  options: PipelineOptions = {},
): Promise<RunResult> {
  const logger = options.logger ?? silentLogger;
  const run = new RunTracker(logger);
  const startTime = performance.now();

  try {
    // ─── Aggregating ─────────────────────────────────────────────────────
    run.enter("aggregating", ref);
    const collectDegradations: Degradation[] = [];
    const collected = await collectContext(ref, config, deps, collectDegradations, run.warnings);
    for (const d of collectDegradations) run.degrade(d.unit, d.message);

    if (collected.status === "skip") {
      run.enter("skipped", `${collected.commit.shortHash} only touches journal files`);
      return run.result({ outcome: "skipped", reason: collected.reason, written: false });
    }
    const { commit } = collected;
    const dir = journalDir(config);
    const filePath = dailyJournalPath(dir, isoDay(commit.date));

    if (!options.dryRun && config.journal.onDuplicate === "skip") {
      const existing = readExisting(filePath);
      if (existing !== undefined && hasEntryFor(existing, commit.shortHash)) {
        run.enter("skipped", `${commit.shortHash} already has an entry in ${filePath}`);
        return run.result({ outcome: "skipped", reason: "duplicate", filePath, written: false });
      }
    }

    // ─── Filtering ───────────────────────────────────────────────────────
    run.enter("filtering", `${collected.conversation.length} conversation records`);
    const window = filterConversation(collected.conversation, commit, collected.previous, {
      maxMessages: config.conversation.maxMessages,
      budget: config.conversation.windowBudget,
    });
    logger.info(`  window: ${window.records.length} records, boundary=${window.boundary}`);

    const ctx: JournalContext = {
      commit,
      previous: collected.previous,
      window,
      shellHistory: collected.shellHistory,
      recentJournal: collected.recentJournal,
    };

    // ─── Dispatching ─────────────────────────────────────────────────────
    run.enter("dispatching", deps.model ? deps.model.name : "no model configured");
    const outcomes = await dispatchSections(ctx, deps.model, config.llm, run.warnings);

    // ─── Parsing ─────────────────────────────────────────────────────────
    run.enter("parsing");
    const results = outcomes.map((o) => toSectionResult(o, run));

    // ─── Assembling ──────────────────────────────────────────────────────
    run.enter("assembling");
    const entry = assembleEntry(commit, results);
    const markdown = renderEntry(entry);
    logger.info(`  sections: ${entry.sections.map((s) => s.kind).join(", ") || "metadata only"}`);

    if (options.dryRun) {
      return run.result({ filePath, entry, markdown, written: false });
    }

    const appended = await persist(dir, entry, markdown, config);
    if (appended.outcome === "duplicate") {
      run.enter("skipped", `${commit.shortHash} was written by another run`);
      return run.result({ outcome: "skipped", reason: "duplicate", filePath, entry, markdown, written: false });
    }

    run.enter("persisted", `${appended.filePath} in ${Math.round(performance.now() - startTime)}ms`);
    return run.result({ filePath: appended.filePath, entry, markdown, written: true });
  } catch (err: unknown) {
    if (err instanceof CommitReadError || err instanceof JournalWriteError) {
      run.enter("aborted", err.message);
      logger.error(err.message);
      return run.result({ outcome: "hard-failure", reason: err.name, error: err, written: false });
    }
    throw err;
  }
}

function readExisting(filePath: string): string | undefined {
  try {
    return readJournalDocument(filePath);
  } catch (err: unknown) {
    throw new JournalWriteError(filePath, "existing document is unreadable", err instanceof Error ? err : undefined);
  }
}

function toSectionResult(outcome: DispatchOutcome, run: RunTracker): SectionResult {
  if (outcome.status === "skipped") return emptySection(outcome.kind);
  if (!outcome.reply.ok) {
    run.degrade(outcome.kind, outcome.reply.reason);
    return emptySection(outcome.kind);
  }
  const parseWarnings: Warning[] = [];
  const result = parseSection(outcome.kind, outcome.reply.text, parseWarnings);
  for (const w of parseWarnings) run.degrade(outcome.kind, w.message);
  return result;
}

async function persist(
  dir: string,
  entry: JournalEntry,
  markdown: string,
  config: ResolvedConfig,
): ReturnType<typeof appendJournalEntry> {
  try {
    return await appendJournalEntry(dir, entry, markdown, config.journal.onDuplicate);
  } catch (err: unknown) {
    if (err instanceof JournalWriteError) throw err;
    const filePath = dailyJournalPath(dir, entry.day);
    throw new JournalWriteError(
      filePath,
      err instanceof Error ? err.message : String(err),
      err instanceof Error ? err : undefined,
    );
  }
}
