// src/llm/dispatcher.ts — One independent model call per section kind
// Calls run concurrently. Each has its own timeout and retry budget and resolves
// to a reply or a failure sentinel; nothing here throws past the caller.

import type { JournalContext, SectionKind, SectionPrompt, Warning } from "../types.js";
import { LLMError } from "../types.js";
import { SECTION_REGISTRY } from "../sections.js";
import type { LanguageModel } from "./client.js";
import { buildSectionPrompt, serializeContext } from "./serializer.js";

export interface InvokeOptions {
  timeoutMs: number;
  maxRetries: number;
  retryDelayMs: number;
}

export type ModelReply =
  | { ok: true; text: string; attempts: number }
  | { ok: false; reason: string; attempts: number };

export type DispatchOutcome =
  | { kind: SectionKind; status: "replied"; reply: ModelReply }
  | { kind: SectionKind; status: "skipped"; reason: "no-conversation" | "no-model" };

/**
 * Call the model once with a hard timeout. The timeout aborts the request
 * and also settles the call if the model ignores the signal.
 */
async function callOnce(
  model: LanguageModel,
  prompt: SectionPrompt,
  timeoutMs: number,
): Promise<string> {
  const controller = new AbortController();
  let timer: NodeJS.Timeout | undefined;
  const timedOut = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      controller.abort();
      reject(new LLMError(`LLM API request timed out after ${timeoutMs}ms`));
    }, timeoutMs);
  });
  try {
    return await Promise.race([model.complete(prompt, { signal: controller.signal }), timedOut]);
  } finally {
    clearTimeout(timer);
  }
}

/**
 * Call the model with automatic retry. Rate limits, server errors, timeouts and
 * transport failures are retried up to `maxRetries` times; other errors are not.
 */
export async function invokeModel(
  model: LanguageModel,
  prompt: SectionPrompt,
  options: InvokeOptions,
): Promise<ModelReply> {
  let attempts = 0;
  let lastError = "no attempt made";
  while (attempts <= options.maxRetries) {
    attempts++;
    try {
      const text = await callOnce(model, prompt, options.timeoutMs);
      return { ok: true, text, attempts };
    } catch (err: unknown) {
      lastError = err instanceof Error ? err.message : String(err);
      const retryable = !(err instanceof LLMError) || err.retryable;
      if (!retryable || attempts > options.maxRetries) break;
      await new Promise((resolve) => setTimeout(resolve, options.retryDelayMs));
    }
  }
  return { ok: false, reason: lastError, attempts };
}

/**
 * Dispatch every registered section. Results come back in registry order,
 * whatever order the calls finish in.
 */
export async function dispatchSections(
  ctx: JournalContext,
  model: LanguageModel | undefined,
  options: InvokeOptions,
  warnings: Warning[] = [],
): Promise<DispatchOutcome[]> {
  const context = serializeContext(ctx);
  const hasConversation = ctx.window.records.length > 0;

  return Promise.all(
    SECTION_REGISTRY.map(async (section): Promise<DispatchOutcome> => {
      if (section.requiresConversation && !hasConversation) {
        return { kind: section.kind, status: "skipped", reason: "no-conversation" };
      }
      if (!model) {
        return { kind: section.kind, status: "skipped", reason: "no-model" };
      }
      const reply = await invokeModel(model, buildSectionPrompt(section.kind, context), options);
      if (!reply.ok) {
        warnings.push({
          level: "warn",
          module: "dispatcher",
          message: `${section.kind} failed after ${reply.attempts} attempt(s): ${reply.reason}`,
        });
      }
      return { kind: section.kind, status: "replied", reply };
    }),
  );
}
