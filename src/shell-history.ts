// src/shell-history.ts — Terminal commands run since the previous commit
// Understands zsh extended history (": <ts>:<duration>;cmd"), bash HISTTIMEFORMAT
// stamps ("#<ts>" on the line before a command) and plain one-command-per-line files.

import { existsSync, readFileSync } from "node:fs";
import type { ShellCommand, Warning } from "./types.js";
import { maskSecrets } from "./sanitize.js";

const ZSH_EXTENDED = /^: (\d+):\d+;(.*)$/;
const BASH_STAMP = /^#(\d{9,})$/;

/**
 * Parse one history file's content.
 *
 * When the file carries timestamps, only commands at or after `since` are kept.
 * A file without any timestamp contributes its last `maxCommands` lines.
 */
export function parseShellHistory(
  content: string,
  since: number | undefined,
  maxCommands: number,
): ShellCommand[] {
  const commands: ShellCommand[] = [];
  let pendingStamp: number | undefined;
  let sawTimestamp = false;

  for (const line of content.split("\n")) {
    const trimmed = line.trimEnd();
    if (!trimmed) continue;

    const zsh = ZSH_EXTENDED.exec(trimmed);
    if (zsh) {
      sawTimestamp = true;
      commands.push({ command: zsh[2], timestamp: Number(zsh[1]) });
      continue;
    }
    const stamp = BASH_STAMP.exec(trimmed);
    if (stamp) {
      sawTimestamp = true;
      pendingStamp = Number(stamp[1]);
      continue;
    }
    commands.push(pendingStamp === undefined ? { command: trimmed } : { command: trimmed, timestamp: pendingStamp });
    pendingStamp = undefined;
  }

  const inRange = sawTimestamp && since !== undefined
    ? commands.filter((c) => c.timestamp !== undefined && c.timestamp >= since)
    : commands;

  return inRange.slice(-maxCommands).map((c) => ({ ...c, command: maskSecrets(c.command) }));
}

/**
 * Read every configured history file. Missing files are skipped, unreadable
 * ones produce a warning. Results are ordered by timestamp where known.
 */
export function readShellHistory(
  files: string[],
  since: number | undefined,
  maxCommands: number,
  warnings: Warning[],
): ShellCommand[] {
  const all: ShellCommand[] = [];
  for (const file of files) {
    if (!existsSync(file)) continue;
    try {
      // zsh history may hold metafied bytes; latin1 keeps every byte readable
      const content = readFileSync(file, "latin1");
      all.push(...parseShellHistory(content, since, maxCommands));
    } catch (err: unknown) {
      const msg = err instanceof Error ? err.message : String(err);
      warnings.push({ level: "warn", module: "shell-history", message: msg, file });
    }
  }
  const ordered = all
    .map((c, i) => ({ c, i }))
    .sort((a, b) => (a.c.timestamp ?? 0) - (b.c.timestamp ?? 0) || a.i - b.i)
    .map(({ c }) => c);
  return ordered.slice(-maxCommands);
}
