// src/relevance-filter.ts — Bounded, ranked conversation window for one commit
//
// 1. Keywords come from the commit: changed file names, their path tokens, and
//    identifiers declared in the changed hunks.
// 2. Records are scanned newest to oldest until one references the previous
//    commit (hash prefix or subject line) or the cap is hit. The boundary
//    record belongs to the previous commit's work and is left out.
// 3. Each scanned record is scored by keyword overlap. A budget smaller than
//    the scanned slice keeps only the best-scoring records; the boundary never moves.
//
// No clock is consulted: records without timestamps are handled the same way.

import { basename } from "node:path";
import type {
  CommitContext,
  ConversationRecord,
  ConversationWindow,
  PreviousCommit,
  ScoredRecord,
  WindowBoundary,
} from "./types.js";

// ─── Constants ───────────────────────────────────────────────────────────────

export const DEFAULT_MAX_MESSAGES = 150;

const MIN_KEYWORD_LENGTH = 3;
const MIN_HASH_PREFIX = 7;
const MIN_SUBJECT_LENGTH = 12;
const FILE_NAME_WEIGHT = 3;
const KEYWORD_WEIGHT = 1;

const DECLARATION =
  /\b(?:function|def|class|const|let|var|interface|type|enum|fn|func|struct|trait|impl)\s+([A-Za-z_$][\w$]*)/g;
const HUNK_CONTEXT = /^@@[^@\n]*@@[ \t]*(.*)$/gm;
const IDENTIFIER = /[A-Za-z_$][\w$]*/g;

const STOPWORDS = new Set([
  "the", "and", "for", "with", "this", "that", "from", "into", "src", "lib", "dist",
  "index", "main", "test", "tests", "spec", "utils", "util", "new", "true", "false",
  "null", "none", "self", "return", "import", "export", "default", "async", "await",
  "public", "private", "static", "void", "string", "number", "boolean", "class",
  "function", "const", "let", "var", "def", "type", "interface", "enum",
]);

// ─── Types ───────────────────────────────────────────────────────────────────

export interface RelevanceOptions {
  maxMessages?: number;
  /** Keep at most this many records, by score. Defaults to the cap. */
  budget?: number;
}

export interface CommitKeywords {
  /** Lower-cased basenames with extension, e.g. "auth.py". */
  fileNames: Set<string>;
  /** Stems, path tokens and hunk identifiers. */
  terms: Set<string>;
}

// ─── Keywords ────────────────────────────────────────────────────────────────

export function extractKeywords(commit: CommitContext): CommitKeywords {
  const fileNames = new Set<string>();
  const terms = new Set<string>();
  const addTerm = (raw: string) => {
    const t = raw.toLowerCase();
    if (t.length >= MIN_KEYWORD_LENGTH && !STOPWORDS.has(t) && !/^\d+$/.test(t)) terms.add(t);
  };

  for (const file of commit.changedFiles) {
    for (const path of [file.path, file.previousPath]) {
      if (!path) continue;
      const name = basename(path).toLowerCase();
      if (name.length >= MIN_KEYWORD_LENGTH) fileNames.add(name);
      for (const token of path.split(/[\\/._-]+/)) addTerm(token);
    }
  }

  for (const match of commit.hunkText.matchAll(DECLARATION)) addTerm(match[1]);
  for (const match of commit.hunkText.matchAll(HUNK_CONTEXT)) {
    for (const id of match[1].matchAll(IDENTIFIER)) addTerm(id[0]);
  }

  return { fileNames, terms };
}

// ─── Scoring ─────────────────────────────────────────────────────────────────

export function scoreRecord(text: string, keywords: CommitKeywords): number {
  const lower = text.toLowerCase();
  let score = 0;
  for (const name of keywords.fileNames) {
    if (lower.includes(name)) score += FILE_NAME_WEIGHT;
  }
  const tokens = new Set(lower.split(/[^a-z0-9_$]+/));
  for (const term of keywords.terms) {
    if (tokens.has(term)) score += KEYWORD_WEIGHT;
  }
  return score;
}

/**
 * True when the text names the previous commit: a hash prefix of at least
 * 7 characters, or its subject line when that is at least 12 characters long.
 */
export function referencesCommit(text: string, previous: PreviousCommit): boolean {
  const lower = text.toLowerCase();
  const hash = previous.hash.toLowerCase();
  for (const token of lower.match(/\b[0-9a-f]{7,40}\b/g) ?? []) {
    if (token.length >= MIN_HASH_PREFIX && hash.startsWith(token)) return true;
  }
  const subject = previous.subject.trim().toLowerCase();
  return subject.length >= MIN_SUBJECT_LENGTH && lower.includes(subject);
}

// ─── Window ──────────────────────────────────────────────────────────────────

/**
 * Select the conversation window for a commit. `records` must be oldest first.
 */
export function filterConversation(
  records: ConversationRecord[],
  commit: CommitContext,
  previous: PreviousCommit | undefined,
  options: RelevanceOptions = {},
): ConversationWindow {
  const cap = options.maxMessages ?? DEFAULT_MAX_MESSAGES;
  const keywords = extractKeywords(commit);
  const keywordList = [...keywords.fileNames, ...keywords.terms];

  // Newest first
  const scanned: ScoredRecord[] = [];
  let boundary: WindowBoundary = "exhausted";
  for (let i = records.length - 1; i >= 0; i--) {
    if (scanned.length >= cap) {
      boundary = "cap";
      break;
    }
    const record = records[i];
    if (previous && referencesCommit(record.text, previous)) {
      boundary = "previous-commit";
      break;
    }
    scanned.push({ ...record, score: scoreRecord(record.text, keywords) });
  }

  // Stable sort on a newest-first list: equal scores keep the more recent record ahead
  const ranked = [...scanned].sort((a, b) => b.score - a.score);
  const budget = options.budget ?? cap;
  const kept = budget < ranked.length ? new Set(ranked.slice(0, budget)) : new Set(ranked);

  return {
    records: scanned.filter((r) => kept.has(r)).reverse(),
    ranked: ranked.filter((r) => kept.has(r)),
    keywords: keywordList,
    boundary,
    scanned: scanned.length,
  };
}
