// Shared fakes for pipeline tests: an in-memory repository, a scripted model,
// a fixed conversation store and a config pointing at a temp directory.

import { mkdtempSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { buildCommitContext } from "../src/git-history.js";
import type { VersionControl } from "../src/git-history.js";
import type { ConversationQuery, ConversationStore } from "../src/conversation-store.js";
import type { CompletionOptions, LanguageModel } from "../src/llm/client.js";
import type {
  ChangedFile,
  CommitContext,
  ConversationRecord,
  FileStatus,
  PreviousCommit,
  ResolvedConfig,
  SectionKind,
  SectionPrompt,
} from "../src/types.js";
import { CommitReadError } from "../src/types.js";

export const HASH = "a1b2c3d4e5f60718293a4b5c6d7e8f9012345678";
export const PARENT_HASH = "0f1e2d3c4b5a69788796a5b4c3d2e1f001234567";

export const PREVIOUS: PreviousCommit = {
  hash: PARENT_HASH,
  shortHash: "0f1e2d3",
  timestamp: 1748950000,
  subject: "Add session store for login flow",
};

export function file(
  path: string,
  status: FileStatus = "modified",
  insertions = 5,
  deletions = 1,
): ChangedFile {
  return { path, status, insertions, deletions, binary: false };
}

export function makeCommit(
  opts: {
    hash?: string;
    date?: string;
    files?: ChangedFile[];
    hunkText?: string;
    message?: string;
    parents?: string[];
  } = {},
): CommitContext {
  const hash = opts.hash ?? HASH;
  return buildCommitContext(
    {
      hash,
      shortHash: hash.slice(0, 7),
      author: "Test Dev <dev@example.com>",
      date: opts.date ?? "2025-06-03T14:34:10+02:00",
      timestamp: 1748954050,
      parents: opts.parents ?? [PARENT_HASH],
      message: opts.message ?? "Fix token refresh in auth module",
    },
    opts.files ?? [file("src/auth.py")],
    opts.hunkText ?? "",
  );
}

export function record(
  text: string,
  speaker: ConversationRecord["speaker"] = "human",
  timestamp?: number,
): ConversationRecord {
  return timestamp === undefined
    ? { speaker, text, sessionId: "s1" }
    : { speaker, text, sessionId: "s1", timestamp };
}

export class FakeRepository implements VersionControl {
  previousCalls = 0;

  constructor(
    private readonly commits: Record<string, CommitContext>,
    private readonly previous: PreviousCommit | undefined = PREVIOUS,
  ) {}

  readCommit(ref: string): CommitContext {
    const commit = this.commits[ref];
    if (!commit) throw new CommitReadError(ref, "unknown revision");
    return commit;
  }

  readPreviousCommit(): PreviousCommit | undefined {
    this.previousCalls++;
    return this.previous;
  }
}

export class FakeStore implements ConversationStore {
  queries: ConversationQuery[] = [];

  constructor(private readonly records: ConversationRecord[] | Error) {}

  async query(query: ConversationQuery): Promise<ConversationRecord[]> {
    this.queries.push(query);
    if (this.records instanceof Error) throw this.records;
    return this.records.slice(-query.limit);
  }
}

type Responder = (prompt: SectionPrompt, options: CompletionOptions) => string | Promise<string>;

/** Model whose reply is chosen per section kind. */
export class ScriptedModel implements LanguageModel {
  readonly name = "scripted";
  readonly calls: SectionKind[] = [];

  constructor(private readonly respond: Responder) {}

  async complete(prompt: SectionPrompt, options: CompletionOptions): Promise<string> {
    this.calls.push(prompt.kind);
    return this.respond(prompt, options);
  }
}

export const CANNED_REPLIES: Record<SectionKind, string> = {
  summary: "Fixed the token refresh so sessions survive a restart.",
  technicalSynopsis: "Moved refresh_token into auth.py and cached the expiry.",
  accomplishments: "- Fixed token refresh\n- Added expiry cache",
  frustrations: "NONE",
  toneMood: "Mood: relieved\nIndicators: \"finally works\"",
  discussionNotes: "Human: why does refresh fail after restart?\nAssistant: the expiry is not persisted.",
  commitMetadata: "area: auth\nchange type: bugfix",
};

export function cannedModel(overrides: Partial<Record<SectionKind, Responder>> = {}): ScriptedModel {
  return new ScriptedModel((prompt, options) => {
    const override = overrides[prompt.kind];
    return override ? override(prompt, options) : CANNED_REPLIES[prompt.kind];
  });
}

/** Never resolves on its own; rejects once the signal aborts. */
export function hang(_prompt: SectionPrompt, options: CompletionOptions): Promise<string> {
  return new Promise((_, reject) => {
    options.signal.addEventListener("abort", () => reject(new Error("aborted")), { once: true });
  });
}

export function tempDir(): string {
  return mkdtempSync(join(tmpdir(), "commit-journal-"));
}

export function makeConfig(repoDir: string, overrides: Partial<ResolvedConfig> = {}): ResolvedConfig {
  return {
    repoDir,
    journal: { path: "journal", onDuplicate: "skip" },
    git: { excludePatterns: [] },
    conversation: { enabled: true, maxMessages: 150 },
    shellHistory: { enabled: false, files: [], maxCommands: 50 },
    llm: {
      provider: "anthropic",
      model: "test-model",
      apiKey: "test-secret",
      maxOutputTokens: 256,
      timeoutMs: 1_000,
      maxRetries: 0,
      retryDelayMs: 0,
    },
    verbose: false,
    ...overrides,
  };
}
