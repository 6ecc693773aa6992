#!/usr/bin/env node
// CLI entry point for commit-journal

import { spawn } from "node:child_process";
import { join, resolve } from "node:path";
import { fileURLToPath } from "node:url";
import { parseCliArgs, resolveConfig, workerArgs } from "../config.js";
import type { ParsedArgs } from "../config.js";
import { createDependencies, generateJournalEntry } from "../pipeline.js";
import { addReflection } from "../journal-writer.js";
import { createLanguageModel } from "../llm/client.js";
import { journalDir, localDay } from "../journal-paths.js";
import { findDayToSummarize, summarizeDay, summarizePreviousDay } from "../daily-summary.js";
import type { DailySummaryResult } from "../daily-summary.js";
import { resolveGitDir, runGit } from "../git-history.js";
import { createLogger, fileSink, printWarnings } from "../logger.js";
import type { Logger } from "../logger.js";
import type { Warning } from "../types.js";

const LOG_FILENAME = "commit-journal.log";

const HELP_TEXT = `
commit-journal

Usage:
  commit-journal generate [ref]          Write the journal entry for a commit (default: HEAD)
  commit-journal hook [ref]              Start a background worker for the commit and return at once
  commit-journal reflect <text...>       Append a reflection to today's journal
  commit-journal summarize [YYYY-MM-DD]  Write the daily summary (default: latest earlier day without one)

Options:
  --config, -c         Path to config file (default: commit-journal.config.json)
  --repo               Repository directory (default: current directory)
  --journal            Journal directory, relative to the repository (default: journal)
  --provider           LLM provider: anthropic or openai
  --model              LLM model name
  --quiet, -q          Suppress warnings
  --verbose, -v        Print each pipeline stage
  --dry-run            Print the entry to stdout instead of writing it
  --help, -h           Show this help text

Environment Variables:
  ANTHROPIC_API_KEY    API key for the anthropic provider
  OPENAI_API_KEY       API key for the openai provider

Git hook (.git/hooks/post-commit):
  #!/bin/sh
  commit-journal hook HEAD
`.trim();

async function main(): Promise<number> {
  const args = await parseCliArgs(process.argv.slice(2));

  switch (args.command) {
    case "help":
      process.stdout.write(HELP_TEXT + "\n");
      return 0;
    case "hook":
      return runHook(args);
    case "worker":
      return runWorker(args);
    case "reflect":
      return runReflect(args);
    case "summarize":
      return runSummarize(args);
    case "generate":
      return runGenerate(args);
  }
}

async function runGenerate(args: ParsedArgs): Promise<number> {
  const logger = createLogger({ verbose: args.verbose, quiet: args.quiet });
  const warnings: Warning[] = [];
  const config = resolveConfig(args, warnings);
  printWarnings(warnings, logger);

  const ref = args.positionals[0] ?? "HEAD";
  const result = await generateJournalEntry(ref, config, createDependencies(config), {
    dryRun: args.dryRun,
    logger,
  });
  printWarnings(result.warnings, logger);

  if (args.dryRun && result.markdown) {
    process.stdout.write(result.markdown + "\n");
  } else if (result.written && !args.quiet) {
    process.stderr.write(`Written to ${result.filePath}\n`);
  } else if (result.outcome === "skipped" && !args.quiet) {
    process.stderr.write(`Skipped: ${result.reason}\n`);
  }
  return result.outcome === "hard-failure" ? 1 : 0;
}

/**
 * Called from post-commit. Never fails the commit: the worker is detached
 * and every error here is reported and swallowed into exit code 0.
 */
function runHook(args: ParsedArgs): number {
  const repoDir = resolve(args.repo ?? ".");
  const ref = args.positionals[0] ?? "HEAD";
  // Pin the ref now; HEAD may move before the worker reads it
  const hash = runGit(repoDir, ["rev-parse", "--verify", `${ref}^{commit}`])?.trim();
  if (!hash) {
    process.stderr.write(`[warn] commit-journal: cannot resolve ${ref}, no entry written\n`);
    return 0;
  }

  const script = fileURLToPath(import.meta.url);
  const argv = [...process.execArgv, script, ...workerArgs(args, hash, repoDir)];

  try {
    const child = spawn(process.execPath, argv, {
      cwd: repoDir,
      detached: true,
      stdio: "ignore",
      env: process.env,
    });
    child.on("error", (err) => {
      process.stderr.write(`[warn] commit-journal: worker failed to start: ${err.message}\n`);
    });
    child.unref();
  } catch (err: unknown) {
    const msg = err instanceof Error ? err.message : String(err);
    process.stderr.write(`[warn] commit-journal: worker failed to start: ${msg}\n`);
  }
  return 0;
}

/** Background half of the hook. Logs to .git/commit-journal.log; always exits 0. */
async function runWorker(args: ParsedArgs): Promise<number> {
  const repoDir = resolve(args.repo ?? ".");
  const gitDir = resolveGitDir(repoDir) ?? join(repoDir, ".git");
  const logger = createLogger({
    verbose: true,
    timestamps: true,
    sink: fileSink(join(gitDir, LOG_FILENAME)),
  });

  try {
    const warnings: Warning[] = [];
    const config = resolveConfig(args, warnings);
    printWarnings(warnings, logger);
    const ref = args.positionals[0] ?? "HEAD";
    const deps = createDependencies(config);
    const result = await generateJournalEntry(ref, config, deps, { logger });
    printWarnings(result.warnings, logger);
    logResult(logger, ref, result.outcome, result.reason, result.filePath);

    // First commit of a new day: summarize the previous one
    if (result.entry) {
      const summary = await summarizePreviousDay(result.entry.day, config, deps.model, { logger });
      if (summary) logSummary(logger, summary);
    }
  } catch (err: unknown) {
    logger.error(`worker crashed: ${err instanceof Error ? (err.stack ?? err.message) : String(err)}`);
  }
  return 0;
}

function logResult(
  logger: Logger,
  ref: string,
  outcome: string,
  reason: string | undefined,
  filePath: string | undefined,
): void {
  const detail = [reason, filePath].filter(Boolean).join(", ");
  const line = `${ref.slice(0, 12)}: ${outcome}${detail ? ` (${detail})` : ""}`;
  if (outcome === "hard-failure") logger.error(line);
  else logger.warning({ level: outcome === "ok" ? "info" : "warn", module: "worker", message: line });
}

function logSummary(logger: Logger, summary: DailySummaryResult): void {
  printWarnings(summary.warnings, logger);
  const detail = summary.reason ?? summary.filePath;
  logger.warning({
    level: summary.outcome === "written" ? "info" : "warn",
    module: "daily-summary",
    message: `${summary.day}: ${summary.outcome} (${detail})`,
  });
}

async function runSummarize(args: ParsedArgs): Promise<number> {
  const logger = createLogger({ verbose: args.verbose, quiet: args.quiet });
  const warnings: Warning[] = [];
  const config = resolveConfig(args, warnings);
  printWarnings(warnings, logger);

  const day = args.positionals[0] ?? findDayToSummarize(journalDir(config), localDay(new Date()));
  if (day === undefined) {
    if (!args.quiet) process.stderr.write("Nothing to summarize\n");
    return 0;
  }
  if (!/^\d{4}-\d{2}-\d{2}$/.test(day)) {
    process.stderr.write(`[error] expected a day as YYYY-MM-DD, got ${day}\n`);
    return 1;
  }
  const summary = await summarizeDay(day, config, createLanguageModel(config.llm), { logger });
  printWarnings(summary.warnings, logger);
  if (!args.quiet) {
    process.stderr.write(
      summary.outcome === "skipped"
        ? `Skipped ${day}: ${summary.reason}\n`
        : `Summary ${summary.outcome === "written" ? "written to" : "already exists at"} ${summary.filePath}\n`,
    );
  }
  return 0;
}

async function runReflect(args: ParsedArgs): Promise<number> {
  const text = args.positionals.join(" ");
  if (!text.trim()) {
    process.stderr.write("[error] reflect needs some text\n");
    return 1;
  }
  const warnings: Warning[] = [];
  const config = resolveConfig(args, warnings);
  const filePath = await addReflection(journalDir(config), text);
  if (!args.quiet) process.stderr.write(`Reflection added to ${filePath}\n`);
  return 0;
}

main().then(
  (code) => process.exit(code),
  (err: unknown) => {
    process.stderr.write(`Fatal error: ${err instanceof Error ? err.message : String(err)}\n`);
    process.exit(1);
  },
);
