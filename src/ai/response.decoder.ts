import {
  DecodePath,
  DiagnosticResult,
  JsonValue,
} from "../shared/types/review-report.types";

const FENCE_MARKER = "```";

export interface DecodeOutcome {
  value: JsonValue;
  path: DecodePath;
}

interface StrictDecodeFailure {
  message: string;
  position: number | null;
}

type StrictDecodeResult = { ok: true; value: JsonValue } | { ok: false; error: StrictDecodeFailure };

interface DelimiterCounts {
  openMappings: number;
  closeMappings: number;
  openSequences: number;
  closeSequences: number;
}

interface ScanState {
  insideString: boolean;
  escapePending: boolean;
  lastCleanBoundary: number;
}

/**
 * Removes a wrapping ``` fence. Content starts after the opening marker line
 * and stops at the first line that is exactly a closing marker; anything after
 * it is dropped. An unclosed fence keeps every line to the end.
 */
export function stripCodeFence(raw: string): string {
  const text = raw.trim();
  if (!text.startsWith(FENCE_MARKER)) {
    return text;
  }

  const payload: string[] = [];
  let insideFence = false;
  for (const line of text.split("\n")) {
    const stripped = line.trim();
    if (!insideFence && stripped.startsWith(FENCE_MARKER)) {
      insideFence = true;
      continue;
    }
    if (stripped === FENCE_MARKER) {
      break;
    }
    if (insideFence) {
      payload.push(line);
    }
  }
  return payload.join("\n").trim();
}

export function decodeStrict(text: string): StrictDecodeResult {
  try {
    const value: JsonValue = JSON.parse(text);
    return { ok: true, value };
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    return { ok: false, error: { message, position: extractErrorPosition(message) } };
  }
}

function extractErrorPosition(message: string): number | null {
  const match = /at position (\d+)/.exec(message);
  return match ? Number(match[1]) : null;
}

function countDelimiters(text: string): DelimiterCounts {
  const counts: DelimiterCounts = { openMappings: 0, closeMappings: 0, openSequences: 0, closeSequences: 0 };
  for (const char of text) {
    if (char === "{") counts.openMappings += 1;
    else if (char === "}") counts.closeMappings += 1;
    else if (char === "[") counts.openSequences += 1;
    else if (char === "]") counts.closeSequences += 1;
  }
  return counts;
}

function scanStep(state: ScanState, char: string, index: number): ScanState {
  if (state.escapePending) {
    return { ...state, escapePending: false };
  }
  if (char === "\\") {
    return { ...state, escapePending: true };
  }
  const insideString = char === "\"" ? !state.insideString : state.insideString;
  if (!insideString && (char === "," || char === "]" || char === "}")) {
    return { insideString, escapePending: false, lastCleanBoundary: index + 1 };
  }
  return { ...state, insideString };
}

export function scanCleanBoundary(text: string): ScanState {
  let state: ScanState = { insideString: false, escapePending: false, lastCleanBoundary: 0 };
  for (let index = 0; index < text.length; index += 1) {
    state = scanStep(state, text.charAt(index), index);
  }
  return state;
}

/**
 * Closes a response cut off by the token limit. Returns null when the
 * delimiters are already balanced, i.e. the text is not truncation-shaped.
 * Missing `]` are appended before missing `}`, which fits arrays nested in
 * object fields and nothing deeper.
 */
export function repairTruncatedJson(input: string): string | null {
  let text = input.trim();
  if (!text) {
    return null;
  }

  const before = countDelimiters(text);
  if (before.openMappings <= before.closeMappings && before.openSequences <= before.closeSequences) {
    return null;
  }

  const scan = scanCleanBoundary(text);
  if (scan.insideString && scan.lastCleanBoundary > 0) {
    text = text.slice(0, scan.lastCleanBoundary);
  }

  const after = countDelimiters(text);
  const missingSequences = "]".repeat(Math.max(0, after.openSequences - after.closeSequences));
  const missingMappings = "}".repeat(Math.max(0, after.openMappings - after.closeMappings));
  return `${text.replace(/,+$/, "")}${missingSequences}${missingMappings}`;
}

export function buildDiagnosticResult(text: string, failure: StrictDecodeFailure): DiagnosticResult {
  return {
    raw_output: text,
    parse_error: failure.message || "Unparseable model output",
    error_position: failure.position,
  };
}

/**
 * Decodes raw model text into a JSON value and reports which path produced it.
 * Never throws: unparseable text comes back as
 * `{ raw_output, parse_error, error_position }`.
 */
export function decodeModelResponse(raw: string): DecodeOutcome {
  const text = stripCodeFence(raw);
  const strict = decodeStrict(text);
  if (strict.ok) {
    return { value: strict.value, path: "strict" };
  }

  const candidate = repairTruncatedJson(text);
  if (candidate !== null) {
    const repaired = decodeStrict(candidate);
    if (repaired.ok) {
      return { value: repaired.value, path: "repaired" };
    }
  }

  return { value: buildDiagnosticResult(text, strict.error), path: "fallback" };
}
