import * as XLSX from "xlsx";
import { ReviewRecord } from "../../shared/types/review-report.types";
import { ReviewFileError } from "../review-file.errors";
import { decodeReviewText } from "./text-decoding";

const REVIEW_COLUMN_NAMES = ["review", "text", "comment", "отзыв", "комментарий", "текст"];
const EMPTY_CELL_LITERALS = new Set(["", "nan", "none"]);

export function extractWorkbookReviews(buffer: Buffer): ReviewRecord[] {
  return extractFromWorkbook(readWorkbook(() => XLSX.read(buffer, { type: "buffer" })));
}

export function extractCsvReviews(buffer: Buffer): ReviewRecord[] {
  const text = quoteLeadingMarkup(decodeReviewText(buffer));
  // raw keeps cell text as-is instead of guessing numbers and dates
  return extractFromWorkbook(readWorkbook(() => XLSX.read(text, { type: "string", raw: true })));
}

/**
 * xlsx reads string input that starts with `<` as an HTML table. Quoting the
 * first cell keeps such a file on the CSV path without changing its value.
 */
export function quoteLeadingMarkup(text: string): string {
  if (!text.startsWith("<")) {
    return text;
  }
  const match = /[,;\t\r\n]/.exec(text);
  const end = match ? match.index : text.length;
  return `"${text.slice(0, end).replace(/"/g, '""')}"${text.slice(end)}`;
}

function readWorkbook(read: () => XLSX.WorkBook): XLSX.WorkBook {
  try {
    return read();
  } catch (error) {
    throw new ReviewFileError(
      `Could not read spreadsheet: ${error instanceof Error ? error.message : "Unknown error"}`,
    );
  }
}

function extractFromWorkbook(workbook: XLSX.WorkBook): ReviewRecord[] {
  const firstSheetName = workbook.SheetNames[0];
  if (!firstSheetName) {
    return [];
  }
  const sheet = workbook.Sheets[firstSheetName];
  if (!sheet) {
    return [];
  }
  const matrix = XLSX.utils.sheet_to_json<unknown[]>(sheet, {
    header: 1,
    raw: false,
    defval: "",
    blankrows: false,
  });
  return extractFromRows(matrix);
}

export function extractFromRows(matrix: unknown[][]): ReviewRecord[] {
  const headerRowIndex = matrix.findIndex((row) =>
    row.some((cell) => cellText(cell).length > 0),
  );
  if (headerRowIndex === -1) {
    return [];
  }

  const reviewColumn = findReviewColumn(matrix[headerRowIndex].map((cell) => cellText(cell).toLowerCase()));
  const reviews: ReviewRecord[] = [];
  for (const row of matrix.slice(headerRowIndex + 1)) {
    const text = cellText(row[reviewColumn]);
    if (EMPTY_CELL_LITERALS.has(text.toLowerCase())) {
      continue;
    }
    reviews.push({ text });
  }
  return reviews;
}

function findReviewColumn(headers: string[]): number {
  for (const target of REVIEW_COLUMN_NAMES) {
    const index = headers.indexOf(target);
    if (index >= 0) {
      return index;
    }
  }
  return 0;
}

function cellText(cell: unknown): string {
  if (cell === null || cell === undefined) {
    return "";
  }
  return String(cell).trim();
}
