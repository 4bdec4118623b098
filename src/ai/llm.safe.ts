import { Logger } from "../config/logger";
import {
  EmptyGenerationError,
  GenerationOutput,
  GenerationRequest,
  TextGenerationProvider,
} from "./providers/generation-provider";

export interface GenerationSafeCallArgs {
  provider: TextGenerationProvider;
  request: GenerationRequest;
  logger?: Logger;
  timeoutMs?: number;
}

export type SafeGenerationErrorCode = "timeout" | "transient_failure" | "llm_failure";

export type SafeGenerationResult =
  | { ok: true; output: GenerationOutput }
  | { ok: false; error_code: "empty_response"; raw: string; finishReason: string | null; message: string }
  | { ok: false; error_code: SafeGenerationErrorCode; message: string };

const DEFAULT_TIMEOUT_MS = 180_000;

export async function callGenerationSafe(args: GenerationSafeCallArgs): Promise<SafeGenerationResult> {
  const timeoutMs = normalizeTimeout(args.timeoutMs);
  const attempt = async (): Promise<GenerationOutput> =>
    withTimeout(args.provider.generate(args.request), timeoutMs);

  try {
    return { ok: true, output: await attempt() };
  } catch (error) {
    if (!isTransientError(error)) {
      return toFailure(error);
    }
  }

  args.logger?.warn("llm.safe.retry.once", {
    provider: args.provider.name,
    modelName: args.provider.getModelName(),
  });
  try {
    return { ok: true, output: await attempt() };
  } catch (error) {
    return toFailure(error);
  }
}

function toFailure(error: unknown): SafeGenerationResult {
  const message = error instanceof Error ? error.message : "Unknown error";
  if (error instanceof EmptyGenerationError) {
    return {
      ok: false,
      error_code: "empty_response",
      raw: error.rawBody,
      finishReason: error.finishReason,
      message,
    };
  }
  return {
    ok: false,
    error_code: isTimeoutError(error)
      ? "timeout"
      : isTransientError(error)
        ? "transient_failure"
        : "llm_failure",
    message,
  };
}

function normalizeTimeout(value?: number): number {
  if (typeof value === "number" && Number.isFinite(value) && value > 0) {
    return Math.round(value);
  }
  return DEFAULT_TIMEOUT_MS;
}

function withTimeout<T>(promise: Promise<T>, timeoutMs: number): Promise<T> {
  return new Promise<T>((resolve, reject) => {
    const timer = setTimeout(() => {
      reject(new Error("timeout"));
    }, timeoutMs);
    promise
      .then((value) => {
        clearTimeout(timer);
        resolve(value);
      })
      .catch((error: unknown) => {
        clearTimeout(timer);
        reject(error);
      });
  });
}

function isTimeoutError(error: unknown): boolean {
  const message = error instanceof Error ? error.message.toLowerCase() : "";
  return message.includes("timeout");
}

function isTransientError(error: unknown): boolean {
  const message = error instanceof Error ? error.message.toLowerCase() : "";
  return (
    message.includes("timeout") ||
    message.includes("econnreset") ||
    message.includes("network") ||
    message.includes("429") ||
    message.includes("rate limit") ||
    message.includes("http 500") ||
    message.includes("http 502") ||
    message.includes("http 503") ||
    message.includes("http 504")
  );
}
