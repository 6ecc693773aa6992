// src/git-history.ts — Commit reader
// Reads one commit and its first parent from git: metadata, per-file line counts,
// a one-line-per-file diff summary and a bounded slice of the changed hunks.

import { execFileSync } from "node:child_process";
import { basename, extname } from "node:path";
import type {
  ChangedFile,
  CommitContext,
  FileCategory,
  FileStatus,
  PreviousCommit,
  SizeClass,
} from "./types.js";
import { CommitReadError } from "./types.js";

// ─── Constants ───────────────────────────────────────────────────────────────

/** Object id of the empty tree, the diff base for a root commit. */
export const EMPTY_TREE = "4b825dc642cb6eb9a060e54bf8d69288fbee4904";

const FIELD_SEP = "\x00";
const GIT_TIMEOUT_MS = 10_000;
const MAX_BUFFER = 32 * 1024 * 1024;
const MAX_HUNK_CHARS = 20_000;
const SMALL_COMMIT_LINES = 10;
const MEDIUM_COMMIT_LINES = 50;

const CONFIG_EXTENSIONS = new Set([
  ".json", ".yaml", ".yml", ".toml", ".ini", ".cfg", ".conf", ".env", ".lock", ".xml",
]);
const CONFIG_FILES = new Set([
  "dockerfile", "makefile", "procfile", ".gitignore", ".gitattributes", ".editorconfig",
  ".npmrc", ".nvmrc", ".prettierrc", ".eslintrc",
]);
const DOC_EXTENSIONS = new Set([".md", ".mdx", ".rst", ".txt", ".adoc"]);

// ─── Types ───────────────────────────────────────────────────────────────────

/** Read access to the repository. Errors from readCommit are hard failures. */
export interface VersionControl {
  readCommit(ref: string): CommitContext;
  readPreviousCommit(commit: CommitContext): PreviousCommit | undefined;
}

export interface CommitHeader {
  hash: string;
  shortHash: string;
  author: string;
  date: string;
  timestamp: number;
  parents: string[];
  message: string;
}

export interface NumstatEntry {
  path: string;
  insertions: number;
  deletions: number;
  binary: boolean;
}

export interface NameStatusEntry {
  path: string;
  status: FileStatus;
  previousPath?: string;
}

// ─── Git repository ──────────────────────────────────────────────────────────

export class GitRepository implements VersionControl {
  constructor(private readonly repoDir: string) {}

  readCommit(ref: string): CommitContext {
    const header = this.git(ref, [
      "show",
      "-s",
      `--format=%H%x00%h%x00%an <%ae>%x00%cI%x00%ct%x00%P%x00%B`,
      ref,
      "--",
    ]);
    const parsed = parseCommitHeader(header);
    if (!parsed) throw new CommitReadError(ref, "unexpected git show output");

    // Merge commits are described against their first parent
    const base = parsed.parents[0] ?? EMPTY_TREE;
    const numstat = this.git(ref, ["diff", "--numstat", "-M", base, parsed.hash, "--"]);
    const nameStatus = this.git(ref, ["diff", "--name-status", "-M", base, parsed.hash, "--"]);
    const hunks = this.git(ref, ["diff", "-U0", "--no-color", "-M", base, parsed.hash, "--"]);

    return buildCommitContext(
      parsed,
      mergeFileLists(parseNameStatus(nameStatus), parseNumstat(numstat)),
      hunks.slice(0, MAX_HUNK_CHARS),
    );
  }

  readPreviousCommit(commit: CommitContext): PreviousCommit | undefined {
    const parent = commit.parents[0];
    if (!parent) return undefined;
    const raw = this.git(parent, ["show", "-s", "--format=%H%x00%h%x00%ct%x00%s", parent, "--"]);
    const [hash, shortHash, ts, subject] = raw.trim().split(FIELD_SEP);
    if (!hash || !shortHash) throw new CommitReadError(parent, "unexpected git show output");
    return { hash, shortHash, timestamp: Number(ts), subject: subject ?? "" };
  }

  private git(ref: string, args: string[]): string {
    const out = runGit(this.repoDir, args);
    if (out === null) throw new CommitReadError(ref, `git ${args[0]} failed in ${this.repoDir}`);
    return out;
  }
}

/**
 * Run git and return stdout, or null if git is missing or the command fails.
 */
export function runGit(cwd: string, args: string[]): string | null {
  try {
    return execFileSync("git", args, {
      cwd,
      encoding: "utf-8",
      timeout: GIT_TIMEOUT_MS,
      maxBuffer: MAX_BUFFER,
      stdio: ["ignore", "pipe", "pipe"],
    });
  } catch {
    return null;
  }
}

/** Absolute path of the .git directory, or null outside a repository. */
export function resolveGitDir(cwd: string): string | null {
  const out = runGit(cwd, ["rev-parse", "--absolute-git-dir"]);
  return out === null ? null : out.trim();
}

// ─── Parsing (exported for testing) ──────────────────────────────────────────

export function parseCommitHeader(raw: string): CommitHeader | null {
  const fields = raw.split(FIELD_SEP);
  if (fields.length < 7) return null;
  const [hash, shortHash, author, date, ts, parents] = fields;
  const timestamp = Number(ts);
  if (!/^[0-9a-f]{7,64}$/.test(hash) || !Number.isFinite(timestamp)) return null;
  return {
    hash,
    shortHash,
    author,
    date,
    timestamp,
    parents: parents.split(" ").filter(Boolean),
    // %B is last; anything after the sixth separator belongs to it
    message: fields.slice(6).join(FIELD_SEP).trim(),
  };
}

/**
 * Parse `git diff --numstat -M` output. Binary files report "-" counts.
 * Renames appear as "old => new" or "dir/{old => new}/file"; the new path is kept.
 */
export function parseNumstat(raw: string): NumstatEntry[] {
  const entries: NumstatEntry[] = [];
  for (const line of raw.split("\n")) {
    const match = /^(-|\d+)\t(-|\d+)\t(.+)$/.exec(line);
    if (!match) continue;
    const binary = match[1] === "-" && match[2] === "-";
    entries.push({
      path: resolveRenamedPath(match[3]),
      insertions: binary ? 0 : Number(match[1]),
      deletions: binary ? 0 : Number(match[2]),
      binary,
    });
  }
  return entries;
}

export function resolveRenamedPath(field: string): string {
  const braced = /^(.*)\{(.*) => (.*)\}(.*)$/.exec(field);
  if (braced) {
    const [, prefix, , to, suffix] = braced;
    return `${prefix}${to}${suffix}`.replace(/\/\//g, "/");
  }
  const arrow = field.indexOf(" => ");
  return arrow === -1 ? field : field.slice(arrow + 4);
}

/** Parse `git diff --name-status -M` output. */
export function parseNameStatus(raw: string): NameStatusEntry[] {
  const entries: NameStatusEntry[] = [];
  for (const line of raw.split("\n")) {
    if (!line.trim()) continue;
    const parts = line.split("\t");
    const code = parts[0]?.[0];
    if (!code || parts.length < 2) continue;
    if ((code === "R" || code === "C") && parts.length >= 3) {
      entries.push({ path: parts[2], status: "renamed", previousPath: parts[1] });
      continue;
    }
    const status: FileStatus = code === "A" ? "added" : code === "D" ? "deleted" : "modified";
    entries.push({ path: parts[1], status });
  }
  return entries;
}

export function mergeFileLists(
  nameStatus: NameStatusEntry[],
  numstat: NumstatEntry[],
): ChangedFile[] {
  const counts = new Map(numstat.map((n): [string, NumstatEntry] => [n.path, n]));
  return nameStatus.map((entry) => {
    const n = counts.get(entry.path);
    return {
      ...entry,
      insertions: n?.insertions ?? 0,
      deletions: n?.deletions ?? 0,
      binary: n?.binary ?? false,
    };
  });
}

// ─── Derived facts ───────────────────────────────────────────────────────────

export function buildCommitContext(
  header: CommitHeader,
  changedFiles: ChangedFile[],
  hunkText: string,
): CommitContext {
  const insertions = changedFiles.reduce((sum, f) => sum + f.insertions, 0);
  const deletions = changedFiles.reduce((sum, f) => sum + f.deletions, 0);
  return {
    ...header,
    changedFiles,
    diffSummary: changedFiles.map(summarizeFile),
    stats: { files: changedFiles.length, insertions, deletions },
    fileStats: countCategories(changedFiles),
    sizeClass: classifySize(insertions + deletions),
    isMerge: header.parents.length > 1,
    hunkText,
  };
}

export function summarizeFile(file: ChangedFile): string {
  if (file.binary) {
    const verb = file.status === "added" ? "added" : file.status === "deleted" ? "deleted" : "changed";
    return `${file.path}: binary file ${verb}`;
  }
  const counts = `(+${file.insertions} -${file.deletions})`;
  if (file.status === "renamed") {
    return `${file.previousPath ?? "?"} → ${file.path}: renamed ${counts}`;
  }
  return `${file.path}: ${file.status} ${counts}`;
}

export function classifySize(changedLines: number): SizeClass {
  if (changedLines < SMALL_COMMIT_LINES) return "small";
  if (changedLines < MEDIUM_COMMIT_LINES) return "medium";
  return "large";
}

export function classifyFile(path: string): FileCategory {
  const lower = path.toLowerCase();
  const name = basename(lower);
  if (
    /(^|\/)(test|tests|__tests__|spec|specs)\//.test(lower) ||
    /\.(test|spec)\.[a-z0-9]+$/.test(name) ||
    /^test_.*\.py$/.test(name)
  ) {
    return "tests";
  }
  if (DOC_EXTENSIONS.has(extname(name)) || /(^|\/)docs?\//.test(lower)) return "docs";
  if (CONFIG_EXTENSIONS.has(extname(name)) || CONFIG_FILES.has(name) || name.startsWith(".env")) {
    return "config";
  }
  return "source";
}

function countCategories(files: ChangedFile[]): Record<FileCategory, number> {
  const stats: Record<FileCategory, number> = { source: 0, config: 0, docs: 0, tests: 0 };
  for (const f of files) stats[classifyFile(f.path)]++;
  return stats;
}
