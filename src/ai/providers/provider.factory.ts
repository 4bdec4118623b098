import { EnvConfig } from "../../config/env";
import { Logger } from "../../config/logger";
import { GeminiProvider } from "./gemini.provider";
import { FetchLike, TextGenerationProvider } from "./generation-provider";
import { OpenAiProvider } from "./openai.provider";

export function createGenerationProvider(
  env: EnvConfig,
  logger: Logger,
  fetchImpl?: FetchLike,
): TextGenerationProvider {
  if (env.llmProvider === "gemini") {
    if (!env.geminiApiKey) {
      throw new Error("Missing GEMINI_API_KEY");
    }
    return new GeminiProvider(
      {
        apiKey: env.geminiApiKey,
        model: env.geminiModel,
        maxOutputTokens: env.geminiMaxOutputTokens,
        fetchImpl,
      },
      logger,
    );
  }

  if (!env.openaiApiKey) {
    throw new Error("Missing OPENAI_API_KEY");
  }
  return new OpenAiProvider(
    {
      apiKey: env.openaiApiKey,
      baseUrl: env.openaiBaseUrl,
      model: env.openaiModel,
      maxTokens: env.openaiMaxTokens,
      fetchImpl,
    },
    logger,
  );
}
