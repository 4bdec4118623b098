import assert from "node:assert/strict";
import { describe, it } from "node:test";
import { RequestInit, Response } from "node-fetch";
import { REVIEW_ANALYSIS_JSON_SCHEMA_INSTRUCTION } from "../../ai/prompts/review-analysis.v1.prompt";
import { buildGeminiPrompt, GeminiProvider } from "../../ai/providers/gemini.provider";
import { EmptyGenerationError, FetchLike } from "../../ai/providers/generation-provider";
import { OpenAiProvider } from "../../ai/providers/openai.provider";
import { createGenerationProvider } from "../../ai/providers/provider.factory";
import { loadEnv } from "../../config/env";

const logger = {
  debug() {},
  info() {},
  warn() {},
  error() {},
};

interface RecordedCall {
  url: string;
  headers: RequestInit["headers"];
  body: string;
}

function fetchMock(replies: Array<{ status: number; body: unknown }>): {
  fetchImpl: FetchLike;
  calls: RecordedCall[];
  responses: Response[];
} {
  const calls: RecordedCall[] = [];
  const responses: Response[] = [];
  const fetchImpl: FetchLike = async (url, init) => {
    calls.push({
      url,
      headers: init?.headers,
      body: typeof init?.body === "string" ? init.body : "",
    });
    const reply = replies[calls.length - 1];
    if (!reply) {
      throw new Error("no scripted reply");
    }
    const response = new Response(JSON.stringify(reply.body), {
      status: reply.status,
      headers: { "content-type": "application/json" },
    });
    responses.push(response);
    return response;
  };
  return { fetchImpl, calls, responses };
}

const request = { prompt: "Analyze.", reviewsText: "- Clean room" };

describe("OpenAiProvider", () => {
  it("posts a chat completion and returns text with the finish reason", async () => {
    const { fetchImpl, calls } = fetchMock([
      { status: 200, body: { choices: [{ message: { content: "{\"a\":1}" }, finish_reason: "length" }] } },
    ]);
    const provider = new OpenAiProvider(
      { apiKey: "test-key", baseUrl: "https://llm.test/v1", model: "gpt-4o-mini", maxTokens: 100, fetchImpl },
      logger,
    );

    const output = await provider.generate(request);

    assert.deepEqual(output, { text: "{\"a\":1}", finishReason: "length" });
    assert.equal(calls.length, 1);
    assert.equal(calls[0]?.url, "https://llm.test/v1/chat/completions");
    assert.deepEqual(calls[0]?.headers, {
      authorization: "Bearer test-key",
      "content-type": "application/json",
    });
    assert.deepEqual(JSON.parse(calls[0]?.body ?? ""), {
      model: "gpt-4o-mini",
      temperature: 0.2,
      messages: [
        { role: "system", content: `Analyze.\n\n${REVIEW_ANALYSIS_JSON_SCHEMA_INSTRUCTION}` },
        { role: "user", content: "REVIEWS:\n- Clean room" },
      ],
      max_tokens: 100,
    });
  });

  it("uses max_completion_tokens for gpt-5 models", () => {
    const provider = new OpenAiProvider(
      { apiKey: "test-key", baseUrl: "https://llm.test/v1", model: "gpt-5-mini", maxTokens: 64 },
      logger,
    );
    const body = provider.buildRequestBody(request);
    assert.equal(body.max_completion_tokens, 64);
    assert.equal(body.max_tokens, undefined);
  });

  it("rejects with the HTTP status on API errors", async () => {
    const { fetchImpl } = fetchMock([{ status: 500, body: { error: "boom" } }]);
    const provider = new OpenAiProvider(
      { apiKey: "test-key", baseUrl: "https://llm.test/v1", model: "gpt-4o-mini", maxTokens: 100, fetchImpl },
      logger,
    );

    await assert.rejects(provider.generate(request), /OpenAI API error: HTTP 500/);
  });

  it("rejects with EmptyGenerationError when there is no content", async () => {
    const { fetchImpl } = fetchMock([{ status: 200, body: { choices: [{ message: { content: null }, finish_reason: "content_filter" }] } }]);
    const provider = new OpenAiProvider(
      { apiKey: "test-key", baseUrl: "https://llm.test/v1", model: "gpt-4o-mini", maxTokens: 100, fetchImpl },
      logger,
    );

    await assert.rejects(
      provider.generate(request),
      (error: unknown) => error instanceof EmptyGenerationError && error.finishReason === "content_filter",
    );
  });
});

describe("GeminiProvider", () => {
  it("retries without JSON mode when the model rejects it", async () => {
    const { fetchImpl, calls, responses } = fetchMock([
      { status: 400, body: { error: { message: "responseMimeType not supported" } } },
      {
        status: 200,
        body: { candidates: [{ content: { parts: [{ text: "{\"a\":1}" }] }, finishReason: "MAX_TOKENS" }] },
      },
    ]);
    const provider = new GeminiProvider(
      { apiKey: "test-key", model: "gemini-1.5-flash", maxOutputTokens: 256, fetchImpl },
      logger,
    );

    const output = await provider.generate(request);

    assert.deepEqual(output, { text: "{\"a\":1}", finishReason: "MAX_TOKENS" });
    assert.equal(calls.length, 2);
    assert.equal(responses[0]?.bodyUsed, true);
    assert.equal(
      calls[0]?.url,
      "https://generativelanguage.googleapis.com/v1beta/models/gemini-1.5-flash:generateContent",
    );
    assert.deepEqual(JSON.parse(calls[0]?.body ?? "").generationConfig, {
      temperature: 0.2,
      maxOutputTokens: 256,
      responseMimeType: "application/json",
    });
    assert.deepEqual(JSON.parse(calls[1]?.body ?? "").generationConfig, {
      temperature: 0.2,
      maxOutputTokens: 256,
    });
  });

  it("sends prompt, schema and corpus in one user turn", async () => {
    const { fetchImpl, calls } = fetchMock([
      { status: 200, body: { candidates: [{ content: { parts: [{ text: "{}" }] }, finishReason: "STOP" }] } },
    ]);
    const provider = new GeminiProvider({ apiKey: "test-key", model: "gemini-pro", maxOutputTokens: 10, fetchImpl }, logger);

    await provider.generate(request);

    assert.equal(calls.length, 1);
    assert.deepEqual(JSON.parse(calls[0]?.body ?? ""), {
      contents: [{ role: "user", parts: [{ text: buildGeminiPrompt(request) }] }],
      generationConfig: { temperature: 0.2, maxOutputTokens: 10 },
    });
  });

  it("rejects with the raw body when no candidate text exists", async () => {
    const { fetchImpl } = fetchMock([{ status: 200, body: { candidates: [] } }]);
    const provider = new GeminiProvider({ apiKey: "test-key", model: "gemini-pro", maxOutputTokens: 10, fetchImpl }, logger);

    await assert.rejects(
      provider.generate(request),
      (error: unknown) =>
        error instanceof EmptyGenerationError &&
        error.rawBody === "{\"candidates\":[]}" &&
        error.finishReason === null,
    );
  });
});

describe("buildGeminiPrompt", () => {
  it("places the corpus between separators", () => {
    const prompt = buildGeminiPrompt(request);
    assert.ok(prompt.startsWith(`Analyze.\n\n${REVIEW_ANALYSIS_JSON_SCHEMA_INSTRUCTION}\n\n---\nREVIEWS TO ANALYZE:\n- Clean room\n---\n`));
  });
});

describe("createGenerationProvider", () => {
  it("builds the provider named by LLM_PROVIDER", () => {
    const openai = createGenerationProvider(loadEnv({ OPENAI_API_KEY: "test-key" }), logger);
    const gemini = createGenerationProvider(
      loadEnv({ LLM_PROVIDER: "Gemini", GEMINI_API_KEY: "test-key", GEMINI_MODEL: "gemini-2.0-flash" }),
      logger,
    );

    assert.equal(openai.name, "openai");
    assert.equal(openai.getModelName(), "gpt-4o-mini");
    assert.equal(gemini.name, "gemini");
    assert.equal(gemini.getModelName(), "gemini-2.0-flash");
  });
});
