import { Logger } from "../config/logger";
import { ReviewRecord } from "../shared/types/review-report.types";
import { extractPlainTextReviews } from "./extractors/plain-text.extractor";
import { extractCsvReviews, extractWorkbookReviews } from "./extractors/spreadsheet.extractor";
import { ReviewFileError } from "./review-file.errors";

export type ReviewFileType = "csv" | "xlsx" | "txt" | "unknown";

export class ReviewFileService {
  constructor(private readonly logger: Logger) {}

  detectFileType(fileName?: string): ReviewFileType {
    const normalizedFileName = (fileName ?? "").trim().toLowerCase();

    if (normalizedFileName.endsWith(".csv")) {
      return "csv";
    }
    if (normalizedFileName.endsWith(".xlsx") || normalizedFileName.endsWith(".xls")) {
      return "xlsx";
    }
    if (normalizedFileName.endsWith(".txt")) {
      return "txt";
    }
    return "unknown";
  }

  extractReviews(buffer: Buffer, fileName?: string): ReviewRecord[] {
    const type = this.detectFileType(fileName);
    if (type === "unknown") {
      throw new ReviewFileError("Unsupported file format. Use CSV, XLSX or TXT.");
    }

    const reviews =
      type === "csv"
        ? extractCsvReviews(buffer)
        : type === "xlsx"
          ? extractWorkbookReviews(buffer)
          : extractPlainTextReviews(buffer);

    this.logger.info("reviews.extracted", {
      fileName,
      fileType: type,
      bytes: buffer.length,
      reviews: reviews.length,
    });
    return reviews;
  }
}
