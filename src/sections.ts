// src/sections.ts — Section registry
// The single source of section order, titles and context requirements.
// Adding a section kind means one row here, one template and one parser case.

import type { SectionKind, SectionResult } from "./types.js";

export interface SectionDefinition {
  kind: SectionKind;
  title: string;
  /** Skipped without a call when the conversation window is empty. */
  requiresConversation: boolean;
}

export const SECTION_REGISTRY: readonly SectionDefinition[] = [
  { kind: "summary", title: "Summary", requiresConversation: false },
  { kind: "technicalSynopsis", title: "Technical Synopsis", requiresConversation: false },
  { kind: "accomplishments", title: "Accomplishments", requiresConversation: false },
  { kind: "frustrations", title: "Frustrations or Roadblocks", requiresConversation: false },
  { kind: "toneMood", title: "Tone/Mood", requiresConversation: true },
  { kind: "discussionNotes", title: "Discussion Notes (from chat)", requiresConversation: true },
  { kind: "commitMetadata", title: "Commit Metadata", requiresConversation: false },
];

export function sectionOrder(kind: SectionKind): number {
  return SECTION_REGISTRY.findIndex((s) => s.kind === kind);
}

export function sectionTitle(kind: SectionKind): string {
  return SECTION_REGISTRY.find((s) => s.kind === kind)?.title ?? kind;
}

/** Canonical empty value of each kind. */
export function emptySection(kind: SectionKind): SectionResult {
  switch (kind) {
    case "summary":
    case "technicalSynopsis":
      return { kind, text: "" };
    case "accomplishments":
    case "frustrations":
    case "discussionNotes":
      return { kind, items: [] };
    case "toneMood":
      return { kind, mood: "", indicators: "" };
    case "commitMetadata":
      return { kind, entries: {} };
  }
}

export function isEmptySection(result: SectionResult): boolean {
  switch (result.kind) {
    case "summary":
    case "technicalSynopsis":
      return result.text.trim() === "";
    case "accomplishments":
    case "frustrations":
    case "discussionNotes":
      return result.items.length === 0;
    case "toneMood":
      return result.mood === "" && result.indicators === "";
    case "commitMetadata":
      return Object.keys(result.entries).length === 0;
  }
}
