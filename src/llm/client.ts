// src/llm/client.ts — HTTP clients for LLM API calls
// Both clients take the caller's AbortSignal; timeouts and retries live in the dispatcher.

import type { ResolvedConfig, SectionPrompt } from "../types.js";
import { LLMError } from "../types.js";

export interface CompletionOptions {
  signal: AbortSignal;
}

/** Anything that turns a section prompt into text. Failures throw LLMError. */
export interface LanguageModel {
  readonly name: string;
  complete(prompt: SectionPrompt, options: CompletionOptions): Promise<string>;
}

type LLMConfig = ResolvedConfig["llm"];

// ─── Anthropic Messages API ──────────────────────────────────────────────────

export class AnthropicModel implements LanguageModel {
  readonly name: string;

  constructor(
    private readonly apiKey: string,
    private readonly config: Pick<LLMConfig, "model" | "baseUrl" | "maxOutputTokens">,
  ) {
    this.name = `anthropic:${config.model}`;
  }

  async complete(prompt: SectionPrompt, options: CompletionOptions): Promise<string> {
    const baseUrl = this.config.baseUrl ?? "https://api.anthropic.com";
    const data = await postJson(
      `${baseUrl}/v1/messages`,
      {
        "x-api-key": this.apiKey,
        "anthropic-version": "2023-06-01",
      },
      {
        model: this.config.model,
        max_tokens: this.config.maxOutputTokens,
        system: prompt.system,
        messages: [{ role: "user", content: prompt.user }],
        temperature: 0,
      },
      options.signal,
    );
    // { content: [{ type: "text", text }] }
    const text = firstString(field(data, "content"), (block) => field(block, "text"));
    if (text === undefined) {
      throw new LLMError("LLM response missing content text");
    }
    return text;
  }
}

// ─── OpenAI-compatible chat completions (also local servers) ────────────────

export class OpenAIChatModel implements LanguageModel {
  readonly name: string;

  constructor(
    private readonly apiKey: string | undefined,
    private readonly config: Pick<LLMConfig, "model" | "baseUrl" | "maxOutputTokens">,
  ) {
    this.name = `openai:${config.model}`;
  }

  async complete(prompt: SectionPrompt, options: CompletionOptions): Promise<string> {
    const baseUrl = (this.config.baseUrl ?? "https://api.openai.com/v1").replace(/\/+$/, "");
    const headers: Record<string, string> = this.apiKey
      ? { Authorization: `Bearer ${this.apiKey}` }
      : {};
    const data = await postJson(
      `${baseUrl}/chat/completions`,
      headers,
      {
        model: this.config.model,
        max_tokens: this.config.maxOutputTokens,
        temperature: 0,
        messages: [
          { role: "system", content: prompt.system },
          { role: "user", content: prompt.user },
        ],
      },
      options.signal,
    );
    // { choices: [{ message: { content } }] }
    const text = firstString(field(data, "choices"), (choice) => field(field(choice, "message"), "content"));
    if (text === undefined) {
      throw new LLMError("LLM response missing message content");
    }
    return text;
  }
}

async function postJson(
  url: string,
  headers: Record<string, string>,
  body: unknown,
  signal: AbortSignal,
): Promise<unknown> {
  let response: Response;
  try {
    response = await fetch(url, {
      method: "POST",
      signal,
      headers: { "Content-Type": "application/json", ...headers },
      body: JSON.stringify(body),
    });
  } catch (err) {
    if (err instanceof Error && err.name === "AbortError") {
      throw new LLMError("LLM API request aborted");
    }
    throw new LLMError(`LLM API request failed: ${err instanceof Error ? err.message : String(err)}`);
  }

  if (!response.ok) {
    const text = await response.text().catch(() => "");
    // Truncate error body to avoid leaking sensitive data in logs
    const safeBody = text.slice(0, 200);
    throw new LLMError(`LLM API returned ${response.status}: ${safeBody}`, response.status);
  }
  const data: unknown = await response.json();
  return data;
}

function field(value: unknown, key: string): unknown {
  return typeof value === "object" && value !== null ? Reflect.get(value, key) : undefined;
}

function firstString(list: unknown, pick: (item: unknown) => unknown): string | undefined {
  if (!Array.isArray(list)) return undefined;
  for (const item of list) {
    const v = pick(item);
    if (typeof v === "string") return v;
  }
  return undefined;
}

/**
 * Build the configured model, or undefined when no model can be reached
 * (no API key and no self-hosted base URL).
 */
export function createLanguageModel(config: LLMConfig): LanguageModel | undefined {
  if (config.provider === "openai") {
    if (!config.apiKey && !config.baseUrl) return undefined;
    return new OpenAIChatModel(config.apiKey, config);
  }
  if (!config.apiKey) return undefined;
  return new AnthropicModel(config.apiKey, config);
}
