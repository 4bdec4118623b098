import { ReviewRecord } from "../../shared/types/review-report.types";
import { decodeReviewText } from "./text-decoding";

export function extractPlainTextReviews(buffer: Buffer): ReviewRecord[] {
  return decodeReviewText(buffer)
    .split(/\r\n|\r|\n/)
    .map((line) => line.trim())
    .filter((line) => line.length > 0)
    .map((text) => ({ text }));
}
