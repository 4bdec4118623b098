import { Logger } from "../../config/logger";
import { REVIEW_ANALYSIS_JSON_SCHEMA_INSTRUCTION } from "../prompts/review-analysis.v1.prompt";
import {
  defaultFetch,
  EmptyGenerationError,
  estimateTokenCount,
  FetchLike,
  GenerationOutput,
  GenerationRequest,
  TextGenerationProvider,
} from "./generation-provider";

export interface ChatCompletionsRequestBody {
  model: string;
  temperature: number;
  messages: Array<{
    role: "system" | "user";
    content: string;
  }>;
  max_tokens?: number;
  max_completion_tokens?: number;
}

interface ChatCompletionsResponse {
  choices?: Array<{
    message?: {
      content?: string | null;
    };
    finish_reason?: string | null;
  }>;
}

export interface OpenAiProviderOptions {
  apiKey: string;
  baseUrl: string;
  model: string;
  maxTokens: number;
  fetchImpl?: FetchLike;
}

export class OpenAiProvider implements TextGenerationProvider {
  readonly name = "openai";
  private readonly fetchImpl: FetchLike;

  constructor(
    private readonly options: OpenAiProviderOptions,
    private readonly logger: Logger,
  ) {
    this.fetchImpl = options.fetchImpl ?? defaultFetch;
  }

  getModelName(): string {
    return this.options.model;
  }

  buildRequestBody(request: GenerationRequest): ChatCompletionsRequestBody {
    const body: ChatCompletionsRequestBody = {
      model: this.options.model,
      temperature: 0.2,
      messages: [
        {
          role: "system",
          content: `${request.prompt}\n\n${REVIEW_ANALYSIS_JSON_SCHEMA_INSTRUCTION}`,
        },
        {
          role: "user",
          content: `REVIEWS:\n${request.reviewsText}`,
        },
      ],
    };
    if (usesMaxCompletionTokens(this.options.model)) {
      body.max_completion_tokens = this.options.maxTokens;
    } else {
      body.max_tokens = this.options.maxTokens;
    }
    return body;
  }

  async generate(request: GenerationRequest): Promise<GenerationOutput> {
    const startedAt = Date.now();
    try {
      const response = await this.fetchImpl(`${this.options.baseUrl}/chat/completions`, {
        method: "POST",
        headers: {
          authorization: `Bearer ${this.options.apiKey}`,
          "content-type": "application/json",
        },
        body: JSON.stringify(this.buildRequestBody(request)),
      });

      const rawBody = await response.text();
      if (!response.ok) {
        throw new Error(`OpenAI API error: HTTP ${response.status} - ${rawBody}`);
      }

      const body = JSON.parse(rawBody) as ChatCompletionsResponse;
      const choice = body.choices?.[0];
      const finishReason = choice?.finish_reason ?? null;
      const content = choice?.message?.content;
      if (!content) {
        throw new EmptyGenerationError("OpenAI response does not contain message content", rawBody, finishReason);
      }

      this.logger.info("llm.call.completed", {
        provider: this.name,
        modelName: this.options.model,
        latencyMs: Date.now() - startedAt,
        maxTokens: this.options.maxTokens,
        tokenEstimate: estimateTokenCount(request.prompt + request.reviewsText, content),
        finishReason,
      });
      return { text: content, finishReason };
    } catch (error) {
      this.logger.warn("llm.call.failed", {
        provider: this.name,
        modelName: this.options.model,
        latencyMs: Date.now() - startedAt,
        error: error instanceof Error ? error.message : "Unknown error",
      });
      throw error;
    }
  }
}

function usesMaxCompletionTokens(model: string): boolean {
  const normalized = model.trim().toLowerCase();
  return normalized.startsWith("gpt-5");
}
