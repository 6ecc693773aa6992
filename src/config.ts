// src/config.ts — Config Resolver
// defaults ← commit-journal.config.json (or "commitJournal" in package.json) ← CLI args.
// API keys come from the environment; a key found in a config file is used but warned about.

import { existsSync, readFileSync } from "node:fs";
import { homedir } from "node:os";
import { isAbsolute, join, resolve } from "node:path";
import type {
  DuplicatePolicy,
  LLMProvider,
  ResolvedConfig,
  Warning,
} from "./types.js";
import { ConfigError } from "./types.js";

export const CONFIG_FILENAME = "commit-journal.config.json";
const PACKAGE_JSON_KEY = "commitJournal";

export type Command = "generate" | "hook" | "worker" | "reflect" | "summarize" | "help";

export interface ParsedArgs {
  command: Command;
  positionals: string[];
  config?: string;
  repo?: string;
  journal?: string;
  model?: string;
  provider?: string;
  quiet: boolean;
  verbose: boolean;
  dryRun: boolean;
  help: boolean;
}

const DEFAULT_MODELS: Record<LLMProvider, string> = {
  anthropic: "claude-3-5-haiku-latest",
  openai: "gpt-4o-mini",
};

function defaults(repoDir: string): ResolvedConfig {
  return {
    repoDir,
    journal: {
      path: "journal",
      onDuplicate: "skip",
    },
    git: {
      excludePatterns: [],
    },
    conversation: {
      enabled: true,
      maxMessages: 150,
    },
    shellHistory: {
      enabled: false,
      files: [join(homedir(), ".zsh_history"), join(homedir(), ".bash_history")],
      maxCommands: 50,
    },
    llm: {
      provider: "anthropic",
      model: DEFAULT_MODELS.anthropic,
      maxOutputTokens: 1024,
      timeoutMs: 30_000,
      maxRetries: 1,
      retryDelayMs: 1_000,
    },
    verbose: false,
  };
}

/** Shape of a config file after validation. Every field is optional. */
export interface FileConfig {
  journal?: { path?: string; onDuplicate?: DuplicatePolicy };
  git?: { excludePatterns?: string[] };
  conversation?: {
    enabled?: boolean;
    workspaceDb?: string;
    globalDb?: string;
    sessionId?: string;
    maxMessages?: number;
    windowBudget?: number;
  };
  shellHistory?: { enabled?: boolean; files?: string[]; maxCommands?: number };
  llm?: {
    provider?: LLMProvider;
    model?: string;
    apiKey?: string;
    baseUrl?: string;
    maxOutputTokens?: number;
    timeoutMs?: number;
    maxRetries?: number;
    retryDelayMs?: number;
  };
  verbose?: boolean;
}

/**
 * Resolve config from CLI args, config file, environment and defaults.
 */
export function resolveConfig(
  args: ParsedArgs,
  warnings: Warning[] = [],
  env: NodeJS.ProcessEnv = process.env,
  cwd: string = process.cwd(),
): ResolvedConfig {
  const repoDir = resolve(cwd, args.repo ?? ".");
  const base = defaults(repoDir);
  const fileConfig = loadConfigFile(args.config, repoDir, warnings) ?? {};

  const provider = parseProvider(args.provider, "--provider") ?? fileConfig.llm?.provider ?? base.llm.provider;
  const envKey = provider === "openai" ? env.OPENAI_API_KEY : env.ANTHROPIC_API_KEY;
  const resolvePath = (p: string) => (isAbsolute(p) ? p : resolve(repoDir, p));

  const config: ResolvedConfig = {
    repoDir,
    journal: {
      path: args.journal ?? fileConfig.journal?.path ?? base.journal.path,
      onDuplicate: fileConfig.journal?.onDuplicate ?? base.journal.onDuplicate,
    },
    git: {
      excludePatterns: fileConfig.git?.excludePatterns ?? base.git.excludePatterns,
    },
    conversation: {
      ...base.conversation,
      ...fileConfig.conversation,
      workspaceDb: fileConfig.conversation?.workspaceDb
        ? resolvePath(fileConfig.conversation.workspaceDb)
        : undefined,
      globalDb: fileConfig.conversation?.globalDb
        ? resolvePath(fileConfig.conversation.globalDb)
        : undefined,
    },
    shellHistory: {
      ...base.shellHistory,
      ...fileConfig.shellHistory,
    },
    llm: {
      ...base.llm,
      ...fileConfig.llm,
      provider,
      model:
        args.model ??
        env.COMMIT_JOURNAL_LLM_MODEL ??
        fileConfig.llm?.model ??
        DEFAULT_MODELS[provider],
      apiKey: envKey ?? fileConfig.llm?.apiKey,
    },
    verbose: args.verbose || (fileConfig.verbose ?? base.verbose),
  };

  if (!config.llm.apiKey && !config.llm.baseUrl) {
    warnings.push({
      level: "info",
      module: "config",
      message: `No API key for ${provider}. Entries will hold commit metadata only. Set ${
        provider === "openai" ? "OPENAI_API_KEY" : "ANTHROPIC_API_KEY"
      } to enable prose sections.`,
    });
  }

  return config;
}

function loadConfigFile(
  configPath: string | undefined,
  repoDir: string,
  warnings: Warning[],
): FileConfig | null {
  // Explicit config path
  if (configPath) {
    const absPath = resolve(configPath);
    if (!existsSync(absPath)) {
      warnings.push({
        level: "warn",
        module: "config",
        message: `Config file not found: ${configPath}`,
      });
      return null;
    }
    return parseConfigFile(absPath, warnings);
  }

  const jsonConfig = join(repoDir, CONFIG_FILENAME);
  if (existsSync(jsonConfig)) {
    return parseConfigFile(jsonConfig, warnings);
  }

  const pkgJson = join(repoDir, "package.json");
  if (existsSync(pkgJson)) {
    const pkg = readJson(pkgJson, warnings);
    if (isObject(pkg) && PACKAGE_JSON_KEY in pkg) {
      return validateFileConfig(pkg[PACKAGE_JSON_KEY], warnings);
    }
  }

  return null;
}

function parseConfigFile(filePath: string, warnings: Warning[]): FileConfig | null {
  const parsed = readJson(filePath, warnings);
  if (parsed === undefined) return null;
  return validateFileConfig(parsed, warnings);
}

function readJson(filePath: string, warnings: Warning[]): unknown {
  try {
    const parsed: unknown = JSON.parse(readFileSync(filePath, "utf-8"));
    return parsed;
  } catch (err: unknown) {
    const msg = err instanceof Error ? err.message : String(err);
    warnings.push({
      level: "warn",
      module: "config",
      message: `Failed to parse config file ${filePath}: ${msg}`,
    });
    return undefined;
  }
}

// ─── Validation ──────────────────────────────────────────────────────────────

function isObject(v: unknown): v is Record<string, unknown> {
  return typeof v === "object" && v !== null && !Array.isArray(v);
}

/**
 * Check a parsed config value field by field. Unknown keys are ignored,
 * wrongly typed values throw ConfigError.
 */
export function validateFileConfig(raw: unknown, warnings: Warning[] = []): FileConfig {
  if (!isObject(raw)) throw new ConfigError("(root)", "expected an object");
  const root = raw;

  const section = (key: string): Record<string, unknown> | undefined => {
    const v = root[key];
    if (v === undefined) return undefined;
    if (!isObject(v)) throw new ConfigError(key, "expected an object");
    return v;
  };

  const config: FileConfig = {};

  const journal = section("journal");
  if (journal) {
    config.journal = {
      path: optString(journal, "journal.path"),
      onDuplicate: parseDuplicatePolicy(optString(journal, "journal.onDuplicate")),
    };
  }

  const git = section("git");
  if (git) {
    config.git = { excludePatterns: optStringArray(git, "git.excludePatterns") };
  }

  const conversation = section("conversation");
  if (conversation) {
    config.conversation = {
      enabled: optBoolean(conversation, "conversation.enabled"),
      workspaceDb: optString(conversation, "conversation.workspaceDb"),
      globalDb: optString(conversation, "conversation.globalDb"),
      sessionId: optString(conversation, "conversation.sessionId"),
      maxMessages: optPositiveInt(conversation, "conversation.maxMessages"),
      windowBudget: optPositiveInt(conversation, "conversation.windowBudget"),
    };
  }

  const shell = section("shellHistory");
  if (shell) {
    config.shellHistory = {
      enabled: optBoolean(shell, "shellHistory.enabled"),
      files: optStringArray(shell, "shellHistory.files")?.map(expandHome),
      maxCommands: optPositiveInt(shell, "shellHistory.maxCommands"),
    };
  }

  const llm = section("llm");
  if (llm) {
    const apiKey = optString(llm, "llm.apiKey");
    if (apiKey) {
      warnings.push({
        level: "warn",
        module: "config",
        message:
          "API keys should not be stored in config files. Use the ANTHROPIC_API_KEY or OPENAI_API_KEY environment variable instead.",
      });
    }
    config.llm = {
      provider: parseProvider(optString(llm, "llm.provider"), "llm.provider"),
      model: optString(llm, "llm.model"),
      apiKey,
      baseUrl: optString(llm, "llm.baseUrl"),
      maxOutputTokens: optPositiveInt(llm, "llm.maxOutputTokens"),
      timeoutMs: optPositiveInt(llm, "llm.timeoutMs"),
      maxRetries: optNonNegativeInt(llm, "llm.maxRetries"),
      retryDelayMs: optNonNegativeInt(llm, "llm.retryDelayMs"),
    };
  }

  config.verbose = optBoolean(root, "verbose");
  return stripUndefined(config);
}

function parseProvider(value: string | undefined, key: string): LLMProvider | undefined {
  if (value === undefined) return undefined;
  if (value === "anthropic" || value === "openai") return value;
  throw new ConfigError(key, `expected "anthropic" or "openai", got "${value}"`);
}

function parseDuplicatePolicy(value: string | undefined): DuplicatePolicy | undefined {
  if (value === undefined) return undefined;
  if (value === "skip" || value === "append") return value;
  throw new ConfigError("journal.onDuplicate", `expected "skip" or "append", got "${value}"`);
}

function leaf(path: string): string {
  return path.slice(path.lastIndexOf(".") + 1);
}

function optString(obj: Record<string, unknown>, path: string): string | undefined {
  const v = obj[leaf(path)];
  if (v === undefined) return undefined;
  if (typeof v !== "string") throw new ConfigError(path, "expected a string");
  return v;
}

function optBoolean(obj: Record<string, unknown>, path: string): boolean | undefined {
  const v = obj[leaf(path)];
  if (v === undefined) return undefined;
  if (typeof v !== "boolean") throw new ConfigError(path, "expected a boolean");
  return v;
}

function optNonNegativeInt(obj: Record<string, unknown>, path: string): number | undefined {
  const v = obj[leaf(path)];
  if (v === undefined) return undefined;
  if (typeof v !== "number" || !Number.isInteger(v) || v < 0) {
    throw new ConfigError(path, "expected a non-negative integer");
  }
  return v;
}

function optPositiveInt(obj: Record<string, unknown>, path: string): number | undefined {
  const v = optNonNegativeInt(obj, path);
  if (v === 0) throw new ConfigError(path, "expected a positive integer");
  return v;
}

function optStringArray(obj: Record<string, unknown>, path: string): string[] | undefined {
  const v = obj[leaf(path)];
  if (v === undefined) return undefined;
  if (!Array.isArray(v) || !v.every((item) => typeof item === "string")) {
    throw new ConfigError(path, "expected an array of strings");
  }
  return v.map(String);
}

function expandHome(p: string): string {
  return p === "~" || p.startsWith("~/") ? join(homedir(), p.slice(1)) : p;
}

/** Drop undefined leaves so spreading a section never clobbers a default. */
function stripUndefined(config: FileConfig): FileConfig {
  const clean = <T extends object>(obj: T): T => {
    for (const key of Object.keys(obj)) {
      if (Reflect.get(obj, key) === undefined) Reflect.deleteProperty(obj, key);
    }
    return obj;
  };
  if (config.journal) clean(config.journal);
  if (config.git) clean(config.git);
  if (config.conversation) clean(config.conversation);
  if (config.shellHistory) clean(config.shellHistory);
  if (config.llm) clean(config.llm);
  return clean(config);
}

/**
 * Parse CLI args using mri.
 */
export async function parseCliArgs(argv: string[]): Promise<ParsedArgs> {
  const mri = (await import("mri")).default;
  const args = mri(argv, {
    alias: { c: "config", q: "quiet", v: "verbose", h: "help" },
    boolean: ["dry-run", "quiet", "verbose", "help"],
    string: ["config", "repo", "journal", "model", "provider"],
  });

  const positionals = args._.map(String);
  const first = positionals[0];
  const command: Command =
    first === "generate" ||
    first === "hook" ||
    first === "worker" ||
    first === "reflect" ||
    first === "summarize" ||
    first === "help"
      ? first
      : "generate";
  if (first === command) positionals.shift();

  return {
    command: args.help ? "help" : command,
    positionals,
    config: optArg(args.config),
    repo: optArg(args.repo),
    journal: optArg(args.journal),
    model: optArg(args.model),
    provider: optArg(args.provider),
    quiet: args.quiet === true,
    verbose: args.verbose === true,
    dryRun: args["dry-run"] === true,
    help: args.help === true,
  };
}

/**
 * Arguments for the detached worker of `hook`: the pinned commit plus every
 * option that changes how the entry is generated.
 */
export function workerArgs(args: ParsedArgs, hash: string, repoDir: string): string[] {
  const out = ["worker", hash, "--repo", repoDir];
  if (args.config) out.push("--config", resolve(args.config));
  if (args.journal) out.push("--journal", args.journal);
  if (args.provider) out.push("--provider", args.provider);
  if (args.model) out.push("--model", args.model);
  return out;
}

function optArg(v: unknown): string | undefined {
  return typeof v === "string" && v !== "" ? v : undefined;
}
