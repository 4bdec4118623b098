import dotenv from "dotenv";

dotenv.config();

export type LogLevel = "debug" | "info" | "warn" | "error";
export type LlmProviderName = "openai" | "gemini";

export interface EnvConfig {
  nodeEnv: string;
  port: number;
  logLevel: LogLevel;
  llmProvider: LlmProviderName;
  llmTimeoutMs: number;
  openaiApiKey?: string;
  openaiBaseUrl: string;
  openaiModel: string;
  openaiMaxTokens: number;
  geminiApiKey?: string;
  geminiModel: string;
  geminiMaxOutputTokens: number;
  maxReviewsDefault: number;
  uploadLimit: string;
}

type RawEnv = Record<string, string | undefined>;

function getOptionalTrimmed(source: RawEnv, name: string): string | undefined {
  const value = source[name];
  if (typeof value !== "string") {
    return undefined;
  }
  const trimmed = value.trim();
  return trimmed.length > 0 ? trimmed : undefined;
}

function getRequiredFor(source: RawEnv, name: string, provider: LlmProviderName): string {
  const value = getOptionalTrimmed(source, name);
  if (!value) {
    throw new Error(`Missing required environment variable: ${name} (LLM_PROVIDER=${provider})`);
  }
  return value;
}

export function loadEnv(source: RawEnv = process.env): EnvConfig {
  const portRaw = source.PORT ?? "3000";
  const port = Number(portRaw);
  const timeoutRaw = source.LLM_TIMEOUT_MS ?? "180000";
  const llmTimeoutMs = Number(timeoutRaw);
  const openaiMaxTokensRaw = source.OPENAI_MAX_TOKENS ?? "8192";
  const openaiMaxTokens = Number(openaiMaxTokensRaw);
  const geminiMaxTokensRaw = source.GEMINI_MAX_OUTPUT_TOKENS ?? "16384";
  const geminiMaxOutputTokens = Number(geminiMaxTokensRaw);
  const maxReviewsRaw = source.MAX_REVIEWS_DEFAULT ?? "200";
  const maxReviewsDefault = Number(maxReviewsRaw);
  const logLevel = parseLogLevel((source.LOG_LEVEL ?? "info").trim().toLowerCase());
  const llmProvider = parseProvider((source.LLM_PROVIDER ?? "openai").trim().toLowerCase());

  if (!Number.isInteger(port) || port <= 0) {
    throw new Error(`Invalid PORT value: ${portRaw}`);
  }
  if (!Number.isInteger(llmTimeoutMs) || llmTimeoutMs < 1000) {
    throw new Error(`Invalid LLM_TIMEOUT_MS value: ${timeoutRaw}`);
  }
  if (!Number.isInteger(openaiMaxTokens) || openaiMaxTokens <= 0) {
    throw new Error(`Invalid OPENAI_MAX_TOKENS value: ${openaiMaxTokensRaw}`);
  }
  if (!Number.isInteger(geminiMaxOutputTokens) || geminiMaxOutputTokens <= 0) {
    throw new Error(`Invalid GEMINI_MAX_OUTPUT_TOKENS value: ${geminiMaxTokensRaw}`);
  }
  if (!Number.isInteger(maxReviewsDefault) || maxReviewsDefault <= 0) {
    throw new Error(`Invalid MAX_REVIEWS_DEFAULT value: ${maxReviewsRaw}`);
  }

  return {
    nodeEnv: source.NODE_ENV ?? "development",
    port,
    logLevel,
    llmProvider,
    llmTimeoutMs,
    openaiApiKey:
      llmProvider === "openai"
        ? getRequiredFor(source, "OPENAI_API_KEY", llmProvider)
        : getOptionalTrimmed(source, "OPENAI_API_KEY"),
    openaiBaseUrl: (getOptionalTrimmed(source, "OPENAI_BASE_URL") ?? "https://api.openai.com/v1").replace(/\/+$/, ""),
    openaiModel: getOptionalTrimmed(source, "OPENAI_MODEL") ?? "gpt-4o-mini",
    openaiMaxTokens,
    geminiApiKey:
      llmProvider === "gemini"
        ? getRequiredFor(source, "GEMINI_API_KEY", llmProvider)
        : getOptionalTrimmed(source, "GEMINI_API_KEY"),
    geminiModel: getOptionalTrimmed(source, "GEMINI_MODEL") ?? "gemini-1.5-flash",
    geminiMaxOutputTokens,
    maxReviewsDefault,
    uploadLimit: getOptionalTrimmed(source, "UPLOAD_LIMIT") ?? "15mb",
  };
}

function parseLogLevel(value: string): LogLevel {
  if (value === "debug" || value === "info" || value === "warn" || value === "error") {
    return value;
  }
  throw new Error(`Invalid LOG_LEVEL value: ${value}`);
}

function parseProvider(value: string): LlmProviderName {
  if (value === "openai" || value === "gemini") {
    return value;
  }
  throw new Error(`LLM_PROVIDER must be 'openai' or 'gemini', got: ${value}`);
}
