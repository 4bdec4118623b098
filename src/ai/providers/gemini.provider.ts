import { Response } from "node-fetch";
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

const GEMINI_API_BASE_URL = "https://generativelanguage.googleapis.com/v1beta/models";

export interface GeminiGenerationConfig {
  temperature: number;
  maxOutputTokens: number;
  responseMimeType?: "application/json";
}

export interface GeminiRequestBody {
  contents: Array<{
    role: "user";
    parts: Array<{ text: string }>;
  }>;
  generationConfig: GeminiGenerationConfig;
}

interface GeminiResponse {
  candidates?: Array<{
    content?: {
      parts?: Array<{ text?: string }>;
    };
    finishReason?: string;
  }>;
}

export interface GeminiProviderOptions {
  apiKey: string;
  model: string;
  maxOutputTokens: number;
  fetchImpl?: FetchLike;
}

export class GeminiProvider implements TextGenerationProvider {
  readonly name = "gemini";
  private readonly fetchImpl: FetchLike;

  constructor(
    private readonly options: GeminiProviderOptions,
    private readonly logger: Logger,
  ) {
    this.fetchImpl = options.fetchImpl ?? defaultFetch;
  }

  getModelName(): string {
    return this.options.model;
  }

  buildRequestBody(request: GenerationRequest, jsonMode: boolean): GeminiRequestBody {
    const generationConfig: GeminiGenerationConfig = {
      temperature: 0.2,
      maxOutputTokens: this.options.maxOutputTokens,
    };
    if (jsonMode) {
      generationConfig.responseMimeType = "application/json";
    }
    return {
      contents: [
        {
          role: "user",
          parts: [{ text: buildGeminiPrompt(request) }],
        },
      ],
      generationConfig,
    };
  }

  async generate(request: GenerationRequest): Promise<GenerationOutput> {
    const startedAt = Date.now();
    const jsonMode = supportsJsonMode(this.options.model);
    try {
      let response = await this.post(this.buildRequestBody(request, jsonMode));
      if (response.status === 400 && jsonMode) {
        const rejection = await response.text();
        this.logger.warn("llm.gemini.json_mode_rejected", {
          modelName: this.options.model,
          body: rejection,
        });
        response = await this.post(this.buildRequestBody(request, false));
      }

      const rawBody = await response.text();
      if (!response.ok) {
        throw new Error(`Gemini API error: HTTP ${response.status} - ${rawBody}`);
      }

      const body = JSON.parse(rawBody) as GeminiResponse;
      const candidate = body.candidates?.[0];
      const finishReason = candidate?.finishReason ?? null;
      const text = candidate?.content?.parts?.[0]?.text;
      if (!text) {
        throw new EmptyGenerationError("Could not extract text from Gemini response", rawBody, finishReason);
      }

      this.logger.info("llm.call.completed", {
        provider: this.name,
        modelName: this.options.model,
        latencyMs: Date.now() - startedAt,
        maxTokens: this.options.maxOutputTokens,
        tokenEstimate: estimateTokenCount(request.prompt + request.reviewsText, text),
        finishReason,
      });
      return { text, finishReason };
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

  private post(body: GeminiRequestBody): Promise<Response> {
    return this.fetchImpl(`${GEMINI_API_BASE_URL}/${encodeURIComponent(this.options.model)}:generateContent`, {
      method: "POST",
      headers: {
        "content-type": "application/json",
        "x-goog-api-key": this.options.apiKey,
      },
      body: JSON.stringify(body),
    });
  }
}

export function buildGeminiPrompt(request: GenerationRequest): string {
  return [
    request.prompt,
    "",
    REVIEW_ANALYSIS_JSON_SCHEMA_INSTRUCTION,
    "",
    "---",
    "REVIEWS TO ANALYZE:",
    request.reviewsText,
    "---",
    "",
    "Analyze the reviews above and return the JSON object. Do not cut the answer short.",
  ].join("\n");
}

function supportsJsonMode(model: string): boolean {
  return model.includes("1.5") || model.includes("2.0");
}
