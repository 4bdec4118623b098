import express, { Express, NextFunction, Request, Response } from "express";
import { ReviewAnalysisService } from "./analysis/review-analysis.service";
import { TextGenerationProvider } from "./ai/providers/generation-provider";
import { createGenerationProvider } from "./ai/providers/provider.factory";
import { EnvConfig } from "./config/env";
import { createLogger, Logger } from "./config/logger";
import { buildAnalyzeController } from "./http/analyze.controller";
import { ReviewFileService } from "./reviews/review-file.service";

export interface AppContext {
  app: Express;
  logger: Logger;
  provider: TextGenerationProvider;
}

export interface AppOverrides {
  logger?: Logger;
  provider?: TextGenerationProvider;
  now?: () => Date;
}

export function createApp(env: EnvConfig, overrides?: AppOverrides): AppContext {
  const logger = overrides?.logger ?? createLogger({ minLevel: env.logLevel });
  const app = express();

  app.use(express.json({ limit: env.uploadLimit }));

  const provider = overrides?.provider ?? createGenerationProvider(env, logger);
  const reviewFileService = new ReviewFileService(logger);
  const analysisService = new ReviewAnalysisService(provider, logger, env.llmTimeoutMs);

  app.get("/health", (_request: Request, response: Response) => {
    response.status(200).json({ ok: true, status: "healthy" });
  });

  app.use(
    "/analyze",
    buildAnalyzeController({
      reviewFileService,
      analysisService,
      logger,
      maxReviewsDefault: env.maxReviewsDefault,
      now: overrides?.now,
    }),
  );

  // express.json rejects oversized or malformed bodies before the routes run
  app.use((error: unknown, _request: Request, response: Response, next: NextFunction) => {
    if (response.headersSent) {
      next(error);
      return;
    }
    const status = readHttpStatus(error);
    logger.warn("Request rejected", {
      status,
      error: error instanceof Error ? error.message : "Unknown error",
    });
    response.status(status).json({ ok: false, error: status === 413 ? "Payload too large" : "Invalid request" });
  });

  return { app, logger, provider };
}

function readHttpStatus(error: unknown): number {
  if (error && typeof error === "object" && "status" in error && typeof error.status === "number") {
    return error.status >= 400 && error.status < 500 ? error.status : 500;
  }
  return 500;
}
