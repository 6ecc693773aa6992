// src/response-parser.ts — Model reply → typed section result
// Parsing never fails outward: any error degrades to the kind's canonical empty value.

import type { SectionKind, SectionResult, Warning } from "./types.js";
import { emptySection } from "./sections.js";

const NO_EVIDENCE = /^none\.?$/i;
const BULLET = /^(?:[-*•+]|\d+[.)])\s+/;

export function parseText(raw: string): string {
  return raw.trim();
}

/** One non-blank line per item, one leading bullet marker removed. */
export function parseList(raw: string): string[] {
  return raw
    .split("\n")
    .map((line) => line.trim().replace(BULLET, "").trim())
    .filter((line) => line !== "");
}

/**
 * Labeled "Mood:" / "Indicators:" lines, else the first two non-blank lines.
 * Either field may be empty on its own.
 */
export function parseMood(raw: string): { mood: string; indicators: string } {
  const lines = parseList(raw);
  let mood = "";
  let indicators = "";
  for (const line of lines) {
    const labeled = /^\**(mood|indicators?)\**\s*:\s*\**\s*(.*)$/i.exec(line);
    if (!labeled) continue;
    const value = labeled[2].replace(/\*+$/, "").trim();
    if (labeled[1].toLowerCase() === "mood") mood ||= value;
    else indicators ||= value;
  }
  if (!mood && !indicators) {
    mood = lines[0] ?? "";
    indicators = lines[1] ?? "";
  }
  return { mood, indicators };
}

/**
 * "key: value" per line, split on the first colon. Lines without a colon or
 * with an empty key are skipped; markdown bullets and bold around keys are removed.
 */
export function parseMap(raw: string): Record<string, string> {
  const entries: Record<string, string> = {};
  for (const line of parseList(raw)) {
    const colon = line.indexOf(":");
    if (colon === -1) continue;
    const key = line.slice(0, colon).replace(/\*+/g, "").trim();
    const value = line.slice(colon + 1).replace(/^\*+/, "").trim();
    if (!key || !value) continue;
    entries[key] = value;
  }
  return entries;
}

function parseKind(kind: SectionKind, raw: string): SectionResult {
  switch (kind) {
    case "summary":
    case "technicalSynopsis":
      return { kind, text: parseText(raw) };
    case "accomplishments":
    case "frustrations":
    case "discussionNotes":
      return { kind, items: parseList(raw) };
    case "toneMood":
      return { kind, ...parseMood(raw) };
    case "commitMetadata":
      return { kind, entries: parseMap(raw) };
  }
}

/**
 * Parse a reply for one section. A NONE reply, an empty reply or a parse
 * error yields the canonical empty value.
 */
export function parseSection(
  kind: SectionKind,
  raw: string,
  warnings: Warning[] = [],
): SectionResult {
  const trimmed = raw.trim();
  if (trimmed === "" || NO_EVIDENCE.test(trimmed)) return emptySection(kind);
  try {
    return parseKind(kind, trimmed);
  } catch (err: unknown) {
    warnings.push({
      level: "warn",
      module: "response-parser",
      message: `Could not parse ${kind} reply: ${err instanceof Error ? err.message : String(err)}`,
    });
    return emptySection(kind);
  }
}
