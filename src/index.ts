// src/index.ts — Library API
// Two entry points: generateJournalEntry() and addReflection()

export { generateJournalEntry, createDependencies } from "./pipeline.js";
export type { PipelineDependencies, PipelineOptions } from "./pipeline.js";
export { addReflection, assembleEntry, renderEntry } from "./journal-writer.js";
export { summarizeDay, summarizePreviousDay, findDayToSummarize } from "./daily-summary.js";
export type { DailySummaryResult, DailySummaryOutcome } from "./daily-summary.js";
export { resolveConfig, parseCliArgs, validateFileConfig, workerArgs, CONFIG_FILENAME } from "./config.js";
export type { ParsedArgs, FileConfig } from "./config.js";
export { collectContext } from "./context-collector.js";
export { filterConversation, extractKeywords, DEFAULT_MAX_MESSAGES } from "./relevance-filter.js";
export { dispatchSections, invokeModel } from "./llm/dispatcher.js";
export type { DispatchOutcome, ModelReply, InvokeOptions } from "./llm/dispatcher.js";
export { parseSection } from "./response-parser.js";
export { SECTION_REGISTRY, emptySection, isEmptySection } from "./sections.js";
export { GitRepository } from "./git-history.js";
export type { VersionControl } from "./git-history.js";
export { SqliteConversationStore, openConversationStore } from "./conversation-store.js";
export type { ConversationStore, ConversationQuery } from "./conversation-store.js";
export { AnthropicModel, OpenAIChatModel, createLanguageModel } from "./llm/client.js";
export type { LanguageModel, CompletionOptions } from "./llm/client.js";
export { createLogger, fileSink } from "./logger.js";
export type { Logger, LogSink } from "./logger.js";
export { maskSecrets } from "./sanitize.js";

// Re-export all public types
export type {
  CommitContext,
  ChangedFile,
  PreviousCommit,
  ConversationRecord,
  ConversationWindow,
  ScoredRecord,
  ShellCommand,
  RecentJournalContext,
  JournalContext,
  SectionKind,
  SectionResult,
  SectionPrompt,
  JournalEntry,
  RunResult,
  RunStage,
  RunOutcome,
  Degradation,
  ResolvedConfig,
  DuplicatePolicy,
  Warning,
} from "./types.js";

export {
  CommitReadError,
  JournalWriteError,
  ConversationStoreError,
  LLMError,
  ConfigError,
} from "./types.js";
