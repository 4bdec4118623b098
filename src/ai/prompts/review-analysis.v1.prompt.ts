import { ReviewRecord } from "../../shared/types/review-report.types";

export const REVIEW_ANALYSIS_V1_PROMPT = `You are a hospitality quality analyst.

You receive a list of guest reviews for one hotel.

Rules:
- Base every statement on the reviews only. Do not invent facts.
- Group repeated complaints and praise into themes and keep the most frequent first.
- Risk flags are issues that threaten safety, health, legal compliance or reputation (hygiene, pests, security, discrimination, fraud). If there are none, return exactly ["No critical issues found"].
- Quotes must be copied from the reviews, shortened if needed, never rewritten.
- The action plan is concrete operational steps for hotel management, ordered by impact.
- Best practices are systemic improvements that prevent the problems from recurring.
- Write all text values in the language most of the reviews are written in.`;

export const REVIEW_ANALYSIS_JSON_SCHEMA_INSTRUCTION = `Return one JSON object only. No markdown, no commentary.

Output JSON schema:
{
  "executive_summary": "string, 3-5 sentences",
  "quotes": {
    "wow_effect": "string",
    "typical_positive": "string",
    "typical_negatives": ["string"]
  },
  "positives": ["string"],
  "negatives": ["string"],
  "risk_flags": ["string"],
  "action_plan": ["string"],
  "best_practices": ["string"]
}`;

export const NO_CRITICAL_ISSUES_SENTINEL = "No critical issues found";

export function resolveAnalysisPrompt(customPrompt?: string): string {
  const trimmed = (customPrompt ?? "").trim();
  return trimmed || REVIEW_ANALYSIS_V1_PROMPT;
}

export function buildReviewsText(reviews: ReviewRecord[]): string {
  return reviews
    .map((review) => review.text.trim())
    .filter((text) => text.length > 0)
    .map((text) => `- ${text}`)
    .join("\n");
}
