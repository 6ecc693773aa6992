// src/recent-journal.ts — Latest entry and later reflections from a daily file

import { existsSync, readFileSync } from "node:fs";
import type { RecentJournalContext } from "./types.js";

const ENTRY_HEADER = /^### /gm;
const REFLECTION_HEADER = /^## Reflection /m;
const ENTRY_SEPARATOR = /\n---\s*$/;

/**
 * Split a daily journal document into the most recent entry and the
 * reflections written after it.
 */
export function extractRecentJournal(content: string): RecentJournalContext {
  let lastEntry = -1;
  for (const match of content.matchAll(ENTRY_HEADER)) {
    lastEntry = match.index ?? lastEntry;
  }
  const tail = lastEntry === -1 ? content : content.slice(lastEntry);
  const [head, ...rest] = tail.split(REFLECTION_HEADER);

  const latestEntry = lastEntry === -1 ? undefined : head.replace(ENTRY_SEPARATOR, "").trim();
  const reflections = rest
    .map((r) => `## Reflection ${r}`.replace(ENTRY_SEPARATOR, "").trim())
    .filter(Boolean);

  return latestEntry ? { latestEntry, reflections } : { reflections };
}

/** Every reflection block in a daily document, in document order. */
export function extractReflections(content: string): string[] {
  const blocks: string[] = [];
  let current: string[] | undefined;
  const close = () => {
    if (current) blocks.push(current.join("\n").trim());
    current = undefined;
  };
  for (const line of content.split("\n")) {
    if (REFLECTION_HEADER.test(line)) {
      close();
      current = [line];
    } else if (line.startsWith("### ") || line.trim() === "---") {
      close();
    } else {
      current?.push(line);
    }
  }
  close();
  return blocks;
}

export function readJournalDocument(filePath: string): string | undefined {
  return existsSync(filePath) ? readFileSync(filePath, "utf-8") : undefined;
}

export function readRecentJournal(filePath: string): RecentJournalContext {
  const content = readJournalDocument(filePath);
  return content === undefined ? { reflections: [] } : extractRecentJournal(content);
}
