// src/journal-paths.ts — Journal file locations and recursion guard

import { existsSync, readdirSync } from "node:fs";
import { isAbsolute, join, relative, resolve } from "node:path";
import picomatch from "picomatch";
import type { ChangedFile, ResolvedConfig } from "./types.js";

const MONTHS = [
  "January", "February", "March", "April", "May", "June",
  "July", "August", "September", "October", "November", "December",
];

export function journalDir(config: Pick<ResolvedConfig, "repoDir" | "journal">): string {
  return resolve(config.repoDir, config.journal.path);
}

export function dailyJournalPath(dir: string, day: string): string {
  return join(dir, "daily", `${day}-journal.md`);
}

export function dailySummaryPath(dir: string, day: string): string {
  return join(dir, "summaries", "daily", `${day}-summary.md`);
}

/** Days that have a daily journal document, oldest first. */
export function listJournalDays(dir: string): string[] {
  const daily = join(dir, "daily");
  if (!existsSync(daily)) return [];
  return readdirSync(daily)
    .map((name) => /^(\d{4}-\d{2}-\d{2})-journal\.md$/.exec(name)?.[1])
    .filter((day): day is string => day !== undefined)
    .sort();
}

/**
 * Matcher for files the journal itself produces, plus user excludes.
 * Paths are repository-relative with forward slashes.
 */
export function createJournalMatcher(
  config: Pick<ResolvedConfig, "repoDir" | "journal" | "git">,
): (path: string) => boolean {
  const rel = isAbsolute(config.journal.path)
    ? relative(config.repoDir, config.journal.path)
    : config.journal.path;
  const prefix = rel.replace(/\\/g, "/").replace(/^\.\//, "").replace(/\/+$/, "");
  const patterns = [`${prefix}/**`, ...config.git.excludePatterns];
  return picomatch(patterns, { dot: true });
}

/**
 * A commit is journal-only when every changed file is a journal file.
 * An empty file list is not journal-only.
 */
export function isJournalOnlyCommit(
  files: ChangedFile[],
  isJournalFile: (path: string) => boolean,
): boolean {
  return files.length > 0 && files.every((f) => isJournalFile(f.path));
}

// ─── Dates ───────────────────────────────────────────────────────────────────

/**
 * Calendar day of an ISO 8601 timestamp, in the offset it was written with.
 * "2025-06-03T23:10:00-07:00" is June 3rd even where the reader is already on June 4th.
 */
export function isoDay(iso: string): string {
  const match = /^(\d{4}-\d{2}-\d{2})/.exec(iso);
  if (!match) throw new RangeError(`Not an ISO 8601 date: ${iso}`);
  return match[1];
}

/** "14:05" in an ISO timestamp → "2:05 PM". */
export function isoDisplayTime(iso: string): string {
  const match = /T(\d{2}):(\d{2})/.exec(iso);
  if (!match) throw new RangeError(`Not an ISO 8601 date-time: ${iso}`);
  return formatClock(Number(match[1]), Number(match[2]));
}

export function formatClock(hours: number, minutes: number): string {
  const suffix = hours >= 12 ? "PM" : "AM";
  const h12 = hours % 12 === 0 ? 12 : hours % 12;
  return `${h12}:${String(minutes).padStart(2, "0")} ${suffix}`;
}

/** "2025-06-03" → "June 3, 2025" */
export function formatDayHeading(day: string): string {
  const [year, month, date] = day.split("-").map(Number);
  return `${MONTHS[month - 1]} ${date}, ${year}`;
}

/** Local calendar day of a Date, "YYYY-MM-DD". */
export function localDay(date: Date): string {
  return `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}`;
}

/** Local "YYYY-MM-DD HH:MM:SS". */
export function localTimestamp(date: Date): string {
  return `${localDay(date)} ${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`;
}

function pad(n: number): string {
  return String(n).padStart(2, "0");
}
