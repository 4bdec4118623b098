import { Logger } from "../config/logger";
import { callGenerationSafe, SafeGenerationErrorCode } from "../ai/llm.safe";
import { buildReviewsText, resolveAnalysisPrompt } from "../ai/prompts/review-analysis.v1.prompt";
import { TextGenerationProvider } from "../ai/providers/generation-provider";
import { decodeModelResponse } from "../ai/response.decoder";
import {
  DecodePath,
  isStructuredResult,
  JsonValue,
  ReviewRecord,
  StructuredResult,
} from "../shared/types/review-report.types";

const NORMAL_FINISH_REASONS = new Set(["STOP", "END_TURN", "FINISH"]);

export interface AnalyzeReviewsInput {
  reviews: ReviewRecord[];
  customPrompt?: string;
}

export type ReviewAnalysisResult =
  | {
      ok: true;
      report: StructuredResult;
      decodePath: DecodePath;
      finishReason: string | null;
    }
  | {
      ok: false;
      error_code: SafeGenerationErrorCode;
      message: string;
    };

export class ReviewAnalysisService {
  constructor(
    private readonly provider: TextGenerationProvider,
    private readonly logger: Logger,
    private readonly timeoutMs?: number,
  ) {}

  async analyze(input: AnalyzeReviewsInput): Promise<ReviewAnalysisResult> {
    const startedAt = Date.now();
    const safe = await callGenerationSafe({
      provider: this.provider,
      request: {
        prompt: resolveAnalysisPrompt(input.customPrompt),
        reviewsText: buildReviewsText(input.reviews),
      },
      logger: this.logger,
      timeoutMs: this.timeoutMs,
    });

    if (!safe.ok) {
      if (safe.error_code === "empty_response") {
        this.logger.warn("analysis.empty_response", {
          provider: this.provider.name,
          finishReason: safe.finishReason,
        });
        return {
          ok: true,
          report: {
            raw_output: safe.raw,
            parse_error: safe.message,
            error_position: null,
            finish_reason: safe.finishReason,
          },
          decodePath: "fallback",
          finishReason: safe.finishReason,
        };
      }
      this.logger.error("analysis.failed", {
        provider: this.provider.name,
        errorCode: safe.error_code,
        error: safe.message,
      });
      return { ok: false, error_code: safe.error_code, message: safe.message };
    }

    const decoded = decodeModelResponse(safe.output.text);
    this.logger.info("response.decoded", {
      provider: this.provider.name,
      path: decoded.path,
      chars: safe.output.text.length,
    });

    const report = attachTruncationWarning(toReport(decoded.value), safe.output.finishReason);
    this.logger.info("analysis.completed", {
      provider: this.provider.name,
      modelName: this.provider.getModelName(),
      reviews: input.reviews.length,
      decodePath: decoded.path,
      finishReason: safe.output.finishReason,
      latencyMs: Date.now() - startedAt,
    });
    return {
      ok: true,
      report,
      decodePath: decoded.path,
      finishReason: safe.output.finishReason,
    };
  }
}

function toReport(value: JsonValue): StructuredResult {
  if (isStructuredResult(value)) {
    return value;
  }
  return { raw_output: JSON.stringify(value) };
}

export function isNormalFinishReason(finishReason: string): boolean {
  return NORMAL_FINISH_REASONS.has(finishReason.trim().toUpperCase());
}

/**
 * Returns a copy with `_warning` set when the provider stopped for a reason
 * other than a normal completion. The input report is left untouched.
 */
export function attachTruncationWarning(
  report: StructuredResult,
  finishReason: string | null,
): StructuredResult {
  if (!finishReason || isNormalFinishReason(finishReason)) {
    return report;
  }
  return {
    ...report,
    _warning: `Response may be incomplete (finishReason: ${finishReason})`,
  };
}
