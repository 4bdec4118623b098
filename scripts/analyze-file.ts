import "dotenv/config";
import { readFile, writeFile } from "node:fs/promises";
import path from "node:path";
import { ReviewAnalysisService } from "../src/analysis/review-analysis.service";
import { createGenerationProvider } from "../src/ai/providers/provider.factory";
import { loadEnv } from "../src/config/env";
import { createLogger } from "../src/config/logger";
import { renderReportHtml } from "../src/reports/report.renderer";
import { ReviewFileService } from "../src/reviews/review-file.service";

async function run(): Promise<void> {
  const [inputPath, outputArg] = process.argv.slice(2);
  if (!inputPath) {
    throw new Error("Usage: analyze:file <reviews.csv|xlsx|txt> [report.html]");
  }

  const env = loadEnv();
  const logger = createLogger({ minLevel: env.logLevel });
  const provider = createGenerationProvider(env, logger);
  const reviewFileService = new ReviewFileService(logger);
  const analysisService = new ReviewAnalysisService(provider, logger, env.llmTimeoutMs);

  const reviews = reviewFileService.extractReviews(await readFile(inputPath), path.basename(inputPath));
  if (!reviews.length) {
    throw new Error(`No reviews found in ${inputPath}`);
  }

  const limited = reviews.slice(0, env.maxReviewsDefault);
  const result = await analysisService.analyze({ reviews: limited });
  if (!result.ok) {
    throw new Error(`Analysis failed: ${result.error_code} (${result.message})`);
  }

  const outputPath =
    outputArg ?? path.join(path.dirname(inputPath), `${path.parse(inputPath).name}.report.html`);
  await writeFile(outputPath, renderReportHtml(result.report), "utf8");
  process.stdout.write(
    `Report written to ${outputPath} (${limited.length}/${reviews.length} reviews, decode: ${result.decodePath}).\n`,
  );
}

run().catch((error: unknown) => {
  process.stderr.write(`${error instanceof Error ? error.message : String(error)}\n`);
  process.exitCode = 1;
});
