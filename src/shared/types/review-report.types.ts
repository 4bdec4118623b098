export type JsonPrimitive = string | number | boolean | null;

export type JsonValue = JsonPrimitive | JsonValue[] | { [key: string]: JsonValue };

export type StructuredResult = { [key: string]: JsonValue };

export type DiagnosticResult = {
  raw_output: string;
  parse_error: string;
  error_position: number | null;
};

export type DecodePath = "strict" | "repaired" | "fallback";

export interface ReviewRecord {
  text: string;
}

export function isStructuredResult(value: JsonValue): value is StructuredResult {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}
