import { afterEach, describe, it, expect, vi } from "vitest";
import { AnthropicModel, OpenAIChatModel, createLanguageModel } from "../src/llm/client.js";
import { LLMError } from "../src/types.js";
import type { SectionPrompt } from "../src/types.js";

// ─── Helpers ─────────────────────────────────────────────────────────────────

const PROMPT: SectionPrompt = { kind: "summary", system: "be brief", user: "what changed?" };
const LLM = { model: "test-model", maxOutputTokens: 256 };

function stubFetch(status: number, body: unknown) {
  const fetchMock = vi.fn(async (_url: string, _init: RequestInit) =>
    new Response(typeof body === "string" ? body : JSON.stringify(body), { status }),
  );
  vi.stubGlobal("fetch", fetchMock);
  return fetchMock;
}

function signal(): AbortSignal {
  return new AbortController().signal;
}

afterEach(() => {
  vi.unstubAllGlobals();
});

// ─── Anthropic ───────────────────────────────────────────────────────────────

describe("AnthropicModel", () => {
  it("posts a messages request and returns the first text block", async () => {
    const fetchMock = stubFetch(200, { content: [{ type: "text", text: "Fixed auth." }] });
    const text = await new AnthropicModel("test-secret", LLM).complete(PROMPT, { signal: signal() });

    expect(text).toBe("Fixed auth.");
    const [url, init] = fetchMock.mock.calls[0];
    expect(url).toBe("https://api.anthropic.com/v1/messages");
    expect(init.headers).toMatchObject({ "x-api-key": "test-secret", "anthropic-version": "2023-06-01" });
    expect(JSON.parse(String(init.body))).toEqual({
      model: "test-model",
      max_tokens: 256,
      system: "be brief",
      messages: [{ role: "user", content: "what changed?" }],
      temperature: 0,
    });
  });

  it("reports the status and a truncated body on failure", async () => {
    stubFetch(429, "slow down");
    const call = new AnthropicModel("test-secret", LLM).complete(PROMPT, { signal: signal() });
    await expect(call).rejects.toBeInstanceOf(LLMError);
    await expect(call).rejects.toMatchObject({ statusCode: 429, message: "LLM API returned 429: slow down" });
  });

  it("rejects a reply without text", async () => {
    stubFetch(200, { content: [] });
    await expect(
      new AnthropicModel("test-secret", LLM).complete(PROMPT, { signal: signal() }),
    ).rejects.toThrow("LLM response missing content text");
  });
});

// ─── OpenAI-compatible ───────────────────────────────────────────────────────

describe("OpenAIChatModel", () => {
  it("talks to a self-hosted server without a key", async () => {
    const fetchMock = stubFetch(200, { choices: [{ message: { content: "hi" } }] });
    const model = new OpenAIChatModel(undefined, { ...LLM, baseUrl: "http://localhost:8080/v1/" });

    expect(await model.complete(PROMPT, { signal: signal() })).toBe("hi");
    const [url, init] = fetchMock.mock.calls[0];
    expect(url).toBe("http://localhost:8080/v1/chat/completions");
    expect(init.headers).toEqual({ "Content-Type": "application/json" });
  });
});

describe("createLanguageModel", () => {
  const base = { ...LLM, timeoutMs: 1000, maxRetries: 0, retryDelayMs: 0 };

  it("needs a key for anthropic", () => {
    expect(createLanguageModel({ ...base, provider: "anthropic" })).toBeUndefined();
    expect(createLanguageModel({ ...base, provider: "anthropic", apiKey: "test-secret" })?.name).toBe(
      "anthropic:test-model",
    );
  });

  it("accepts a base URL instead of a key for openai", () => {
    expect(createLanguageModel({ ...base, provider: "openai" })).toBeUndefined();
    expect(createLanguageModel({ ...base, provider: "openai", baseUrl: "http://localhost:8080/v1" })?.name).toBe(
      "openai:test-model",
    );
  });
});
