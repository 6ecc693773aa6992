// src/conversation-store.ts — Read-only access to AI chat history
// The bundled store reads the SQLite state databases of a VS Code-family editor
// (Cursor's composer layout):
//   workspace state.vscdb  ItemTable     composer.composerData → { allComposers: [...] }
//   global state.vscdb     cursorDiskKV  composerData:<id>     → { fullConversationHeadersOnly: [...] }
//                                        bubbleId:<id>:<bubble> → { text, type }
// Every query opens its own read-only connection and closes it before returning.

import { existsSync, readdirSync, readFileSync } from "node:fs";
import { homedir, platform } from "node:os";
import { join } from "node:path";
import { fileURLToPath } from "node:url";
import Database from "better-sqlite3";
import type { ConversationRecord, ResolvedConfig, Speaker } from "./types.js";
import { ConversationStoreError } from "./types.js";
import { maskSecrets } from "./sanitize.js";

const BUSY_TIMEOUT_MS = 5_000;

export interface ConversationQuery {
  /** Epoch ms. Sessions last updated before this are ignored. */
  since?: number;
  sessionId?: string;
  /** Most recent N records are returned. */
  limit: number;
}

/** Records come back oldest first, secrets masked. */
export interface ConversationStore {
  query(query: ConversationQuery): Promise<ConversationRecord[]>;
}

export interface ComposerSummary {
  composerId: string;
  createdAt?: number;
  lastUpdatedAt?: number;
}

// ─── SQLite store ────────────────────────────────────────────────────────────

export class SqliteConversationStore implements ConversationStore {
  constructor(
    private readonly workspaceDb: string,
    private readonly globalDb: string,
  ) {}

  async query(query: ConversationQuery): Promise<ConversationRecord[]> {
    const composers = this.readComposers(query);
    if (composers.length === 0) return [];

    const records = withDatabase(this.globalDb, (db) => {
      const get = db.prepare<[string], { value: string | Buffer }>(
        "SELECT value FROM cursorDiskKV WHERE key = ?",
      );
      const lookup = (key: string): unknown => {
        const row = get.get(key);
        return row ? parseJsonValue(row.value) : undefined;
      };

      const out: ConversationRecord[] = [];
      for (const composer of composers) {
        out.push(...readComposerRecords(composer, lookup));
      }
      return out;
    });

    const inRange = query.since === undefined
      ? records
      : records.filter((r) => r.timestamp === undefined || r.timestamp >= (query.since ?? 0));
    return inRange.slice(-query.limit);
  }

  private readComposers(query: ConversationQuery): ComposerSummary[] {
    const raw = withDatabase(this.workspaceDb, (db) => {
      const row = db
        .prepare<[string], { value: string | Buffer }>("SELECT value FROM ItemTable WHERE key = ?")
        .get("composer.composerData");
      return row ? parseJsonValue(row.value) : undefined;
    });

    return parseComposerList(raw)
      .filter((c) => query.sessionId === undefined || c.composerId === query.sessionId)
      .filter((c) => query.since === undefined || (c.lastUpdatedAt ?? c.createdAt ?? Infinity) >= query.since)
      .sort((a, b) => (a.createdAt ?? 0) - (b.createdAt ?? 0));
  }
}

function withDatabase<T>(path: string, fn: (db: Database.Database) => T): T {
  if (!existsSync(path)) {
    throw new ConversationStoreError(`Conversation database not found: ${path}`);
  }
  let db: Database.Database | undefined;
  try {
    db = new Database(path, { readonly: true, fileMustExist: true, timeout: BUSY_TIMEOUT_MS });
    return fn(db);
  } catch (err: unknown) {
    if (err instanceof ConversationStoreError) throw err;
    const cause = err instanceof Error ? err : undefined;
    throw new ConversationStoreError(
      `Failed to read ${path}: ${cause?.message ?? String(err)}`,
      cause,
    );
  } finally {
    db?.close();
  }
}

// ─── Decoding (exported for testing) ────────────────────────────────────────

function isObject(v: unknown): v is Record<string, unknown> {
  return typeof v === "object" && v !== null && !Array.isArray(v);
}

function optNumber(v: unknown): number | undefined {
  return typeof v === "number" && Number.isFinite(v) ? v : undefined;
}

export function parseJsonValue(value: string | Buffer): unknown {
  const text = typeof value === "string" ? value : value.toString("utf-8");
  try {
    const parsed: unknown = JSON.parse(text);
    return parsed;
  } catch (err: unknown) {
    throw new ConversationStoreError(
      `Malformed JSON in conversation store: ${err instanceof Error ? err.message : String(err)}`,
    );
  }
}

export function parseComposerList(raw: unknown): ComposerSummary[] {
  if (!isObject(raw) || !Array.isArray(raw.allComposers)) return [];
  const out: ComposerSummary[] = [];
  for (const item of raw.allComposers) {
    if (!isObject(item) || typeof item.composerId !== "string") continue;
    out.push({
      composerId: item.composerId,
      createdAt: optNumber(item.createdAt),
      lastUpdatedAt: optNumber(item.lastUpdatedAt),
    });
  }
  return out;
}

function speakerOf(type: unknown): Speaker | undefined {
  if (type === 1) return "human";
  if (type === 2) return "assistant";
  return undefined;
}

function readComposerRecords(
  composer: ComposerSummary,
  lookup: (key: string) => unknown,
): ConversationRecord[] {
  const data = lookup(`composerData:${composer.composerId}`);
  if (!isObject(data) || !Array.isArray(data.fullConversationHeadersOnly)) return [];

  const records: ConversationRecord[] = [];
  for (const header of data.fullConversationHeadersOnly) {
    if (!isObject(header) || typeof header.bubbleId !== "string") continue;
    const bubble = lookup(`bubbleId:${composer.composerId}:${header.bubbleId}`);
    if (!isObject(bubble)) continue;
    const speaker = speakerOf(header.type ?? bubble.type);
    const text = typeof bubble.text === "string" ? bubble.text.trim() : "";
    if (!speaker || !text) continue;
    const timestamp = optNumber(bubble.createdAt) ?? composer.lastUpdatedAt;
    records.push({
      speaker,
      text: maskSecrets(text),
      sessionId: composer.composerId,
      id: header.bubbleId,
      ...(timestamp !== undefined ? { timestamp } : {}),
    });
  }
  return records;
}

// ─── Discovery ───────────────────────────────────────────────────────────────

/** Editor user-data directory for the current platform. */
export function defaultEditorDataDir(): string {
  const home = homedir();
  switch (platform()) {
    case "darwin":
      return join(home, "Library", "Application Support", "Cursor", "User");
    case "win32":
      return join(process.env.APPDATA ?? join(home, "AppData", "Roaming"), "Cursor", "User");
    default:
      return join(home, ".config", "Cursor", "User");
  }
}

export function defaultGlobalDb(dataDir = defaultEditorDataDir()): string {
  return join(dataDir, "globalStorage", "state.vscdb");
}

/**
 * Find the workspace database whose workspace.json points at `repoDir`.
 * Each workspaceStorage/<hash>/ holds a workspace.json like {"folder":"file:///path"}.
 */
export function findWorkspaceDb(
  repoDir: string,
  dataDir = defaultEditorDataDir(),
): string | undefined {
  const storage = join(dataDir, "workspaceStorage");
  if (!existsSync(storage)) return undefined;

  for (const entry of readdirSync(storage, { withFileTypes: true })) {
    if (!entry.isDirectory()) continue;
    const dir = join(storage, entry.name);
    const meta = join(dir, "workspace.json");
    const db = join(dir, "state.vscdb");
    if (!existsSync(meta) || !existsSync(db)) continue;
    if (workspaceFolder(meta) === repoDir) return db;
  }
  return undefined;
}

function workspaceFolder(metaPath: string): string | undefined {
  let parsed: unknown;
  try {
    parsed = JSON.parse(readFileSync(metaPath, "utf-8"));
  } catch {
    // Half-written or foreign workspace.json; not ours
    return undefined;
  }
  if (!isObject(parsed) || typeof parsed.folder !== "string") return undefined;
  if (!parsed.folder.startsWith("file://")) return undefined;
  return fileURLToPath(parsed.folder).replace(/[\\/]+$/, "");
}

/**
 * Open the configured store, falling back to the editor's default locations.
 * Returns undefined when either database cannot be found.
 */
export function openConversationStore(
  config: Pick<ResolvedConfig, "repoDir" | "conversation">,
  dataDir = defaultEditorDataDir(),
): ConversationStore | undefined {
  const workspaceDb = config.conversation.workspaceDb ?? findWorkspaceDb(config.repoDir, dataDir);
  const globalDb = config.conversation.globalDb ?? defaultGlobalDb(dataDir);
  if (!workspaceDb || !existsSync(globalDb)) return undefined;
  return new SqliteConversationStore(workspaceDb, globalDb);
}
