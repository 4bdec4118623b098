import assert from "node:assert/strict";
import { describe, it } from "node:test";
import * as XLSX from "xlsx";
import { extractFromRows, quoteLeadingMarkup } from "../../reviews/extractors/spreadsheet.extractor";
import { decodeReviewText } from "../../reviews/extractors/text-decoding";
import { ReviewFileError } from "../../reviews/review-file.errors";
import { ReviewFileService } from "../../reviews/review-file.service";

const logger = {
  debug() {},
  info() {},
  warn() {},
  error() {},
};

const service = new ReviewFileService(logger);

describe("ReviewFileService.detectFileType", () => {
  it("maps extensions case-insensitively", () => {
    assert.equal(service.detectFileType("Reviews.CSV"), "csv");
    assert.equal(service.detectFileType("export.xlsx"), "xlsx");
    assert.equal(service.detectFileType("legacy.xls"), "xlsx");
    assert.equal(service.detectFileType("notes.txt"), "txt");
    assert.equal(service.detectFileType("report.pdf"), "unknown");
    assert.equal(service.detectFileType(undefined), "unknown");
  });
});

describe("ReviewFileService.extractReviews", () => {
  it("reads one review per non-empty line from text files", () => {
    const reviews = service.extractReviews(Buffer.from("Great stay\n\n  Dirty room  \r\n"), "reviews.txt");
    assert.deepEqual(reviews, [{ text: "Great stay" }, { text: "Dirty room" }]);
  });

  it("picks the review column from a CSV header and skips empty markers", () => {
    const csv = "id,review\n1,Lovely staff\n2,\"Noisy, thin walls\"\n3,nan\n";
    const reviews = service.extractReviews(Buffer.from(csv), "reviews.csv");
    assert.deepEqual(reviews, [{ text: "Lovely staff" }, { text: "Noisy, thin walls" }]);
  });

  it("splits text files on a lone carriage return", () => {
    const reviews = service.extractReviews(Buffer.from("One\rTwo\r"), "mac.txt");
    assert.deepEqual(reviews, [{ text: "One" }, { text: "Two" }]);
  });

  it("reads a CSV whose first cell starts with markup", () => {
    const reviews = service.extractReviews(Buffer.from("<b>review</b>,x\nGood,1\n"), "markup.csv");
    assert.deepEqual(reviews, [{ text: "Good" }]);
  });

  it("falls back to the first column when no header matches", () => {
    const csv = "Guest notes,Stay date\nFirst visit was fine,2024-02-01\nSecond visit was better,2024-03-10\n";
    const reviews = service.extractReviews(Buffer.from(csv), "notes.csv");
    assert.deepEqual(reviews, [{ text: "First visit was fine" }, { text: "Second visit was better" }]);
  });

  it("decodes windows-1251 CSV files", () => {
    // "Дата,Отзыв\n1,Хорошо\n" in windows-1251
    const bytes = Buffer.from([
      0xc4, 0xe0, 0xf2, 0xe0, 0x2c, 0xce, 0xf2, 0xe7, 0xfb, 0xe2, 0x0a,
      0x31, 0x2c, 0xd5, 0xee, 0xf0, 0xee, 0xf8, 0xee, 0x0a,
    ]);
    const reviews = service.extractReviews(bytes, "ru.csv");
    assert.deepEqual(reviews, [{ text: "Хорошо" }]);
  });

  it("reads the first sheet of an xlsx workbook", () => {
    const workbook = XLSX.utils.book_new();
    const sheet = XLSX.utils.aoa_to_sheet([
      ["Date", "Отзыв"],
      ["2024-01-01", "Прекрасный отель"],
      ["2024-01-02", ""],
      ["2024-01-03", "Завтрак мог быть лучше"],
    ]);
    XLSX.utils.book_append_sheet(workbook, sheet, "Reviews");
    const buffer: Buffer = XLSX.write(workbook, { type: "buffer", bookType: "xlsx" });

    const reviews = service.extractReviews(buffer, "reviews.xlsx");
    assert.deepEqual(reviews, [{ text: "Прекрасный отель" }, { text: "Завтрак мог быть лучше" }]);
  });

  it("rejects unsupported formats", () => {
    assert.throws(
      () => service.extractReviews(Buffer.from("%PDF-1.4"), "reviews.pdf"),
      (error: unknown) =>
        error instanceof ReviewFileError && error.message === "Unsupported file format. Use CSV, XLSX or TXT.",
    );
  });
});

describe("extractFromRows", () => {
  it("uses the first non-empty row as header", () => {
    const reviews = extractFromRows([
      ["", ""],
      ["Name", "Comment"],
      ["Ann", "Quiet rooms"],
      ["Bob", "None"],
      ["Cid", "  "],
    ]);
    assert.deepEqual(reviews, [{ text: "Quiet rooms" }]);
  });

  it("returns nothing for an empty sheet", () => {
    assert.deepEqual(extractFromRows([]), []);
  });
});

describe("quoteLeadingMarkup", () => {
  it("quotes only the first cell and escapes its quotes", () => {
    assert.equal(quoteLeadingMarkup("<a href=\"x\">,b\n1,2"), "\"<a href=\"\"x\"\">\",b\n1,2");
  });

  it("leaves other text unchanged", () => {
    assert.equal(quoteLeadingMarkup("review,x\n"), "review,x\n");
  });
});

describe("decodeReviewText", () => {
  it("strips a UTF-8 byte order mark", () => {
    const bytes = Buffer.concat([Buffer.from([0xef, 0xbb, 0xbf]), Buffer.from("Clean", "utf8")]);
    assert.equal(decodeReviewText(bytes), "Clean");
  });

  it("decodes windows-1251 when every byte is defined there", () => {
    assert.equal(decodeReviewText(Buffer.from([0x43, 0x61, 0x66, 0xe9])), "Cafй");
  });

  it("moves on to windows-1252 when a byte is undefined in windows-1251", () => {
    assert.equal(decodeReviewText(Buffer.from([0x41, 0x98, 0xe9])), "A\u02dcé");
  });

  it("falls back to latin1 when neither code page defines every byte", () => {
    assert.equal(decodeReviewText(Buffer.from([0x41, 0x98, 0x81])), "A\u0098\u0081");
  });
});
