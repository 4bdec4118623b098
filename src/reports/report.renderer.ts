import { NO_CRITICAL_ISSUES_SENTINEL } from "../ai/prompts/review-analysis.v1.prompt";
import { isStructuredResult, JsonValue, StructuredResult } from "../shared/types/review-report.types";

const DEFAULT_REPORT_TITLE = "Hotel Review Analysis Report";

export interface RenderReportOptions {
  title?: string;
  generatedAt?: Date;
}

const EMPTY_SECTION = `<p class="empty">—</p>`;

export function escapeHtml(value: string): string {
  return value
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;")
    .replace(/"/g, "&quot;")
    .replace(/'/g, "&#39;");
}

export function formatGeneratedAt(date: Date): string {
  const pad = (value: number): string => String(value).padStart(2, "0");
  return `${pad(date.getUTCDate())}.${pad(date.getUTCMonth() + 1)}.${date.getUTCFullYear()} ${pad(date.getUTCHours())}:${pad(date.getUTCMinutes())} UTC`;
}

function itemText(value: JsonValue): string {
  if (typeof value === "string") {
    return value;
  }
  return JSON.stringify(value);
}

export function toItemList(value: JsonValue | undefined): string[] {
  if (value === undefined || value === null || value === "") {
    return [];
  }
  if (Array.isArray(value)) {
    return value.map(itemText).filter((item) => item.trim().length > 0);
  }
  return [itemText(value)];
}

function renderTextSection(heading: string, value: JsonValue | undefined): string {
  const text = value === undefined || value === null ? "" : itemText(value).trim();
  return [
    `<section>`,
    `<h2>${escapeHtml(heading)}</h2>`,
    text ? `<p>${escapeHtml(text)}</p>` : EMPTY_SECTION,
    `</section>`,
  ].join("\n");
}

function renderListSection(heading: string, value: JsonValue | undefined, critical = false): string {
  const items = toItemList(value);
  if (!items.length) {
    return [`<section>`, `<h2>${escapeHtml(heading)}</h2>`, EMPTY_SECTION, `</section>`].join("\n");
  }
  const rows = items.map((item) => {
    const bullet = critical && item !== NO_CRITICAL_ISSUES_SENTINEL ? "⚠️" : "•";
    return `<li><span class="bullet">${bullet}</span> ${escapeHtml(item)}</li>`;
  });
  return [`<section>`, `<h2>${escapeHtml(heading)}</h2>`, `<ul>`, ...rows, `</ul>`, `</section>`].join("\n");
}

function renderQuotes(value: JsonValue | undefined): string {
  if (value === undefined || !isStructuredResult(value)) {
    return "";
  }
  const blocks: string[] = [];
  const quote = (text: string): string => `<blockquote>"${escapeHtml(text)}"</blockquote>`;
  const wow = toItemList(value.wow_effect);
  if (wow.length) {
    blocks.push(`<h3>⭐ Wow effect</h3>`, ...wow.map(quote));
  }
  const positive = toItemList(value.typical_positive);
  if (positive.length) {
    blocks.push(`<h3>✅ Typical praise</h3>`, ...positive.map(quote));
  }
  const negatives = toItemList(value.typical_negatives);
  if (negatives.length) {
    blocks.push(`<h3>❌ Typical complaints</h3>`, ...negatives.map(quote));
  }
  if (!blocks.length) {
    return "";
  }
  return [`<section>`, `<h2>💬 Review quotes</h2>`, ...blocks, `</section>`].join("\n");
}

function renderRawOutput(report: StructuredResult): string {
  const raw = itemText(report.raw_output);
  const paragraphs = raw
    .split("\n")
    .filter((line) => line.trim().length > 0)
    .map((line) => `<p class="raw">${escapeHtml(line)}</p>`);
  const parseError = report.parse_error;
  const errorLine =
    typeof parseError === "string" && parseError
      ? `<p class="error">Parse error: ${escapeHtml(parseError)}</p>`
      : "";
  return [
    `<section>`,
    `<h2>📄 Unprocessed model output</h2>`,
    errorLine,
    ...(paragraphs.length ? paragraphs : [EMPTY_SECTION]),
    `</section>`,
  ]
    .filter((line) => line.length > 0)
    .join("\n");
}

function renderStructuredSections(report: StructuredResult): string[] {
  const sections = [
    renderTextSection("📋 Executive summary", report.executive_summary),
    renderQuotes(report.quotes),
    renderListSection("✅ Strengths", report.positives),
    renderListSection("❌ Weaknesses", report.negatives),
    renderListSection("🚨 Red flags", report.risk_flags, true),
    renderListSection("📌 Action plan", report.action_plan ?? report.actionable_recommendations),
    renderListSection("💡 Systemic improvements", report.best_practices),
  ];
  if ("key_themes" in report) {
    sections.push(renderListSection("🔑 Key themes", report.key_themes));
  }
  return sections.filter((section) => section.length > 0);
}

/**
 * Renders an analysis report as a standalone HTML document. A report carrying
 * `raw_output` is shown as unprocessed text instead of structured sections.
 */
export function renderReportHtml(report: StructuredResult, options?: RenderReportOptions): string {
  const title = options?.title?.trim() || DEFAULT_REPORT_TITLE;
  const generatedAt = options?.generatedAt ?? new Date();
  const warning = report._warning;
  const body = [
    `<h1>${escapeHtml(title)}</h1>`,
    `<p class="muted">Generated: ${formatGeneratedAt(generatedAt)}</p>`,
    typeof warning === "string" && warning ? `<p class="warning">${escapeHtml(warning)}</p>` : "",
    ...("raw_output" in report ? [renderRawOutput(report)] : renderStructuredSections(report)),
  ].filter((line) => line.length > 0);

  return `<!doctype html>
<html lang="en">
<head>
  <meta charset="UTF-8" />
  <meta name="viewport" content="width=device-width, initial-scale=1" />
  <title>${escapeHtml(title)}</title>
  <style>
    :root {
      --text: #1a202c;
      --muted: #4a5568;
      --heading: #2c5282;
      --danger: #b42318;
      --border: #e2e8f0;
    }
    body {
      margin: 0 auto;
      max-width: 820px;
      padding: 2cm;
      font-family: "DejaVu Sans", "Segoe UI", sans-serif;
      font-size: 10pt;
      line-height: 1.4;
      color: var(--text);
    }
    h1 { font-size: 16pt; margin: 0 0 12px; }
    h2 { font-size: 12pt; color: var(--heading); margin: 18px 0 6px; }
    h3 { font-size: 10pt; margin: 10px 0 4px; }
    p { text-align: justify; margin: 0 0 6px; }
    ul { list-style: none; padding-left: 15px; }
    li { margin-bottom: 4px; }
    blockquote { margin: 0 0 6px 20px; color: var(--muted); font-style: italic; }
    .muted { color: var(--muted); }
    .warning { color: var(--danger); border: 1px solid var(--danger); padding: 6px 10px; border-radius: 6px; }
    .error { color: var(--danger); }
    .raw { font-family: "DejaVu Sans Mono", monospace; white-space: pre-wrap; text-align: left; }
  </style>
</head>
<body>
${body.join("\n")}
</body>
</html>
`;
}
