// src/context-collector.ts — Context Aggregator
// Gathers everything one journal entry may draw on. Only the commit itself is
// required: a commit that cannot be read aborts the run. Every other source
// degrades to empty and is recorded.

import type {
  CommitContext,
  ConversationRecord,
  Degradation,
  PreviousCommit,
  RecentJournalContext,
  ResolvedConfig,
  ShellCommand,
  Warning,
} from "./types.js";
import type { VersionControl } from "./git-history.js";
import { buildCommitContext } from "./git-history.js";
import type { ConversationStore } from "./conversation-store.js";
import { readShellHistory } from "./shell-history.js";
import { readRecentJournal } from "./recent-journal.js";
import {
  createJournalMatcher,
  dailyJournalPath,
  isJournalOnlyCommit,
  isoDay,
  journalDir,
} from "./journal-paths.js";

export interface CollectorDependencies {
  vcs: VersionControl;
  store?: ConversationStore;
}

export type CollectedContext =
  | { status: "skip"; reason: "journal-only"; commit: CommitContext }
  | {
      status: "ready";
      commit: CommitContext;
      previous?: PreviousCommit;
      conversation: ConversationRecord[];
      shellHistory: ShellCommand[];
      recentJournal: RecentJournalContext;
    };

function message(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/**
 * Remove files matched by `exclude` from a commit, recomputing its summary,
 * counts and hunk text.
 */
export function withoutFiles(commit: CommitContext, exclude: (path: string) => boolean): CommitContext {
  const kept = commit.changedFiles.filter((f) => !exclude(f.path));
  if (kept.length === commit.changedFiles.length) return commit;

  const hunks = commit.hunkText
    .split(/^(?=diff --git )/m)
    .filter((chunk) => {
      const target = /^diff --git a\/\S+ b\/(\S+)/.exec(chunk);
      return !target || !exclude(target[1]);
    })
    .join("");

  return buildCommitContext(
    {
      hash: commit.hash,
      shortHash: commit.shortHash,
      author: commit.author,
      date: commit.date,
      timestamp: commit.timestamp,
      parents: commit.parents,
      message: commit.message,
    },
    kept,
    hunks,
  );
}

export async function collectContext(
  ref: string,
  config: ResolvedConfig,
  deps: CollectorDependencies,
  degradations: Degradation[],
  warnings: Warning[],
): Promise<CollectedContext> {
  // Hard failure: CommitReadError propagates
  const raw = deps.vcs.readCommit(ref);

  const isJournalFile = createJournalMatcher(config);
  if (isJournalOnlyCommit(raw.changedFiles, isJournalFile)) {
    return { status: "skip", reason: "journal-only", commit: raw };
  }
  const commit = withoutFiles(raw, isJournalFile);

  let previous: PreviousCommit | undefined;
  try {
    previous = deps.vcs.readPreviousCommit(commit);
  } catch (err: unknown) {
    degradations.push({ unit: "previous-commit", message: message(err) });
  }

  const conversation = await readConversation(config, deps.store, previous, degradations);

  let shellHistory: ShellCommand[] = [];
  if (config.shellHistory.enabled) {
    const shellWarnings: Warning[] = [];
    shellHistory = readShellHistory(
      config.shellHistory.files,
      previous?.timestamp,
      config.shellHistory.maxCommands,
      shellWarnings,
    );
    for (const w of shellWarnings) {
      degradations.push({ unit: "shell-history", message: w.file ? `${w.file}: ${w.message}` : w.message });
    }
    warnings.push(...shellWarnings);
  }

  let recentJournal: RecentJournalContext = { reflections: [] };
  try {
    recentJournal = readRecentJournal(dailyJournalPath(journalDir(config), isoDay(commit.date)));
  } catch (err: unknown) {
    degradations.push({ unit: "recent-journal", message: message(err) });
  }

  return { status: "ready", commit, previous, conversation, shellHistory, recentJournal };
}

async function readConversation(
  config: ResolvedConfig,
  store: ConversationStore | undefined,
  previous: PreviousCommit | undefined,
  degradations: Degradation[],
): Promise<ConversationRecord[]> {
  if (!config.conversation.enabled) return [];
  if (!store) {
    degradations.push({ unit: "conversation", message: "no conversation store found" });
    return [];
  }
  try {
    return await store.query({
      since: previous ? previous.timestamp * 1000 : undefined,
      sessionId: config.conversation.sessionId,
      limit: config.conversation.maxMessages,
    });
  } catch (err: unknown) {
    degradations.push({ unit: "conversation", message: message(err) });
    return [];
  }
}
