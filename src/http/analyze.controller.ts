import { Request, Response, Router } from "express";
import { Logger } from "../config/logger";
import { ReviewAnalysisService } from "../analysis/review-analysis.service";
import { renderReportHtml } from "../reports/report.renderer";
import { ReviewFileError } from "../reviews/review-file.errors";
import { ReviewFileService } from "../reviews/review-file.service";
import { ReviewRecord, StructuredResult } from "../shared/types/review-report.types";

const REPORT_FILE_NAME = "hotel_reviews_report.html";

interface AnalyzeControllerDeps {
  reviewFileService: ReviewFileService;
  analysisService: ReviewAnalysisService;
  logger: Logger;
  maxReviewsDefault: number;
  now?: () => Date;
}

export interface AnalyzeRequest {
  fileName: string;
  content: Buffer;
  customPrompt: string;
  maxReviews: number;
}

type ParseResult = { ok: true; value: AnalyzeRequest } | { ok: false; error: string };

type AnalysisOutcome =
  | {
      ok: true;
      report: StructuredResult;
      totalReviews: number;
      analyzedReviews: number;
    }
  | { ok: false; status: number; payload: Record<string, unknown> };

const BASE64_PATTERN = /^[A-Za-z0-9+/\r\n]*={0,2}\s*$/;

export function parseAnalyzeRequestBody(body: unknown, maxReviewsDefault: number): ParseResult {
  if (!body || typeof body !== "object" || Array.isArray(body)) {
    return { ok: false, error: "Invalid body" };
  }
  const input: Record<string, unknown> = { ...body };

  const fileName = typeof input.file_name === "string" ? input.file_name.trim() : "";
  if (!fileName) {
    return { ok: false, error: "file_name is required" };
  }
  const contentBase64 = typeof input.content_base64 === "string" ? input.content_base64 : "";
  if (!contentBase64 || !BASE64_PATTERN.test(contentBase64)) {
    return { ok: false, error: "content_base64 must be a non-empty base64 string" };
  }

  const customPrompt = typeof input.custom_prompt === "string" ? input.custom_prompt : "";
  const maxReviewsRaw = input.max_reviews ?? maxReviewsDefault;
  const maxReviews = typeof maxReviewsRaw === "string" ? Number(maxReviewsRaw) : maxReviewsRaw;
  if (typeof maxReviews !== "number" || !Number.isInteger(maxReviews) || maxReviews <= 0) {
    return { ok: false, error: "max_reviews must be a positive integer" };
  }

  return {
    ok: true,
    value: {
      fileName,
      content: Buffer.from(contentBase64, "base64"),
      customPrompt,
      maxReviews,
    },
  };
}

export function buildAnalyzeController(deps: AnalyzeControllerDeps): Router {
  const router = Router();

  async function runAnalysis(request: Request): Promise<AnalysisOutcome> {
    const parsed = parseAnalyzeRequestBody(request.body, deps.maxReviewsDefault);
    if (!parsed.ok) {
      return { ok: false, status: 400, payload: { ok: false, error: parsed.error } };
    }

    let reviews: ReviewRecord[];
    try {
      reviews = deps.reviewFileService.extractReviews(parsed.value.content, parsed.value.fileName);
    } catch (error) {
      if (error instanceof ReviewFileError) {
        return { ok: false, status: 400, payload: { ok: false, error: error.message } };
      }
      throw error;
    }
    if (!reviews.length) {
      return { ok: false, status: 400, payload: { ok: false, error: "No reviews found in file" } };
    }

    const limited = reviews.slice(0, parsed.value.maxReviews);
    const result = await deps.analysisService.analyze({
      reviews: limited,
      customPrompt: parsed.value.customPrompt,
    });
    if (!result.ok) {
      return {
        ok: false,
        status: 502,
        payload: { ok: false, error: "Analysis failed", error_code: result.error_code },
      };
    }
    return {
      ok: true,
      report: result.report,
      totalReviews: reviews.length,
      analyzedReviews: limited.length,
    };
  }

  router.post("/", async (request: Request, response: Response) => {
    try {
      const outcome = await runAnalysis(request);
      if (!outcome.ok) {
        response.status(outcome.status).json(outcome.payload);
        return;
      }
      response.status(200).json({
        report: outcome.report,
        total_reviews: outcome.totalReviews,
        analyzed_reviews: outcome.analyzedReviews,
      });
    } catch (error) {
      deps.logger.error("Failed to analyze reviews", {
        error: error instanceof Error ? error.message : "Unknown error",
      });
      response.status(500).json({ ok: false, error: "Internal error" });
    }
  });

  router.post("/report", async (request: Request, response: Response) => {
    try {
      const outcome = await runAnalysis(request);
      if (!outcome.ok) {
        response.status(outcome.status).json(outcome.payload);
        return;
      }
      const html = renderReportHtml(outcome.report, { generatedAt: deps.now?.() });
      response.status(200).attachment(REPORT_FILE_NAME).type("html").send(html);
    } catch (error) {
      deps.logger.error("Failed to build review report", {
        error: error instanceof Error ? error.message : "Unknown error",
      });
      response.status(500).json({ ok: false, error: "Internal error" });
    }
  });

  return router;
}
