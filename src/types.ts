// src/types.ts — ALL shared types for commit-journal
// Commit context, conversation window, section results, run outcome, config, errors.

// ─── Commit context ──────────────────────────────────────────────────────────

export type FileStatus = "added" | "modified" | "deleted" | "renamed";

export type FileCategory = "source" | "config" | "docs" | "tests";

export type SizeClass = "small" | "medium" | "large";

export interface ChangedFile {
  path: string;
  status: FileStatus;
  insertions: number;
  deletions: number;
  binary: boolean;
  previousPath?: string; // renames only
}

export interface CommitStats {
  files: number;
  insertions: number;
  deletions: number;
}

export interface CommitContext {
  hash: string;
  shortHash: string;
  author: string; // "Name <email>"
  date: string; // committer date, ISO 8601 with offset
  timestamp: number; // unix seconds
  message: string;
  parents: string[];
  changedFiles: ChangedFile[];
  diffSummary: string[];
  stats: CommitStats;
  fileStats: Record<FileCategory, number>;
  sizeClass: SizeClass;
  isMerge: boolean;
  /** Changed-hunk text, bounded. Used for keyword extraction only. */
  hunkText: string;
}

export interface PreviousCommit {
  hash: string;
  shortHash: string;
  timestamp: number;
  subject: string;
}

// ─── Conversation ────────────────────────────────────────────────────────────

export type Speaker = "human" | "assistant";

export interface ConversationRecord {
  speaker: Speaker;
  text: string;
  timestamp?: number; // epoch ms
  sessionId: string;
  id?: string;
}

export interface ScoredRecord extends ConversationRecord {
  score: number;
}

/**
 * Where the backward scan stopped:
 * - previous-commit: a record referenced the previous commit (excluded from the window)
 * - cap: the message cap was reached first
 * - exhausted: every record was scanned
 */
export type WindowBoundary = "previous-commit" | "cap" | "exhausted";

export interface ConversationWindow {
  records: ScoredRecord[]; // oldest first
  ranked: ScoredRecord[]; // highest score first
  keywords: string[];
  boundary: WindowBoundary;
  scanned: number;
}

export interface ShellCommand {
  command: string;
  timestamp?: number; // unix seconds
}

export interface RecentJournalContext {
  latestEntry?: string;
  reflections: string[];
}

/** Everything a section prompt may draw on. */
export interface JournalContext {
  commit: CommitContext;
  previous?: PreviousCommit;
  window: ConversationWindow;
  shellHistory: ShellCommand[];
  recentJournal: RecentJournalContext;
}

// ─── Sections ────────────────────────────────────────────────────────────────

export type TextSectionKind = "summary" | "technicalSynopsis";
export type ListSectionKind = "accomplishments" | "frustrations" | "discussionNotes";

export type SectionKind =
  | TextSectionKind
  | ListSectionKind
  | "toneMood"
  | "commitMetadata";

export type SectionResult =
  | { kind: TextSectionKind; text: string }
  | { kind: ListSectionKind; items: string[] }
  | { kind: "toneMood"; mood: string; indicators: string }
  | { kind: "commitMetadata"; entries: Record<string, string> };

export interface SectionPrompt {
  kind: SectionKind;
  system: string;
  user: string;
}

export interface JournalEntry {
  hash: string;
  shortHash: string;
  day: string; // YYYY-MM-DD, the commit's own calendar date
  time: string; // "2:34 PM"
  sections: SectionResult[]; // non-empty, registry order, without commitMetadata
  metadata: Record<string, string>;
}

// ─── Run result ──────────────────────────────────────────────────────────────

export type RunStage =
  | "idle"
  | "aggregating"
  | "filtering"
  | "dispatching"
  | "parsing"
  | "assembling"
  | "persisted"
  | "skipped"
  | "aborted";

export type RunOutcome = "ok" | "soft-failure" | "hard-failure" | "skipped";

/** A unit that failed softly; the run continued without it. */
export interface Degradation {
  unit: string;
  message: string;
}

export interface RunResult {
  outcome: RunOutcome;
  stage: RunStage;
  stages: RunStage[];
  degradations: Degradation[];
  warnings: Warning[];
  reason?: string;
  filePath?: string;
  entry?: JournalEntry;
  markdown?: string;
  written: boolean;
  error?: Error;
}

// ─── Config ──────────────────────────────────────────────────────────────────

export type DuplicatePolicy = "skip" | "append";

export type LLMProvider = "anthropic" | "openai";

export interface ResolvedConfig {
  repoDir: string;
  journal: {
    path: string; // relative to repoDir unless absolute
    onDuplicate: DuplicatePolicy;
  };
  git: {
    excludePatterns: string[];
  };
  conversation: {
    enabled: boolean;
    workspaceDb?: string;
    globalDb?: string;
    sessionId?: string;
    maxMessages: number;
    windowBudget?: number;
  };
  shellHistory: {
    enabled: boolean;
    files: string[];
    maxCommands: number;
  };
  llm: {
    provider: LLMProvider;
    model: string;
    apiKey?: string;
    baseUrl?: string;
    maxOutputTokens: number;
    timeoutMs: number;
    maxRetries: number;
    retryDelayMs: number;
  };
  verbose: boolean;
}

// ─── Warnings (passed to all modules) ───────────────────────────────────────

export interface Warning {
  level: "info" | "warn" | "error";
  module: string;
  message: string;
  file?: string;
}

// ─── Errors ──────────────────────────────────────────────────────────────────

/** The commit or repository could not be read. Nothing is persisted. */
export class CommitReadError extends Error {
  constructor(
    public readonly ref: string,
    message: string,
  ) {
    super(`Cannot read commit ${ref}: ${message}`);
    this.name = "CommitReadError";
  }
}

/** The journal document could not be written. */
export class JournalWriteError extends Error {
  constructor(
    public readonly filePath: string,
    message: string,
    cause?: Error,
  ) {
    super(`Cannot write ${filePath}: ${message}`);
    this.name = "JournalWriteError";
    if (cause) this.cause = cause;
  }
}

export class ConversationStoreError extends Error {
  constructor(message: string, cause?: Error) {
    super(message);
    this.name = "ConversationStoreError";
    if (cause) this.cause = cause;
  }
}

export class LLMError extends Error {
  constructor(
    message: string,
    public readonly statusCode?: number,
  ) {
    super(message);
    this.name = "LLMError";
  }

  /** Rate limits, server errors and transport failures are worth another attempt. */
  get retryable(): boolean {
    if (this.statusCode === undefined) return true;
    return this.statusCode === 429 || this.statusCode >= 500;
  }
}

export class ConfigError extends Error {
  constructor(
    public readonly key: string,
    message: string,
  ) {
    super(`Invalid config value for "${key}": ${message}`);
    this.name = "ConfigError";
  }
}
