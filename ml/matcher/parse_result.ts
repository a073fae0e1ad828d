import type { MatchConfidence, MatchResult, MatchSuccess } from "./types";
import { MatcherError, PARSE_FAILURE_MESSAGE, errorMessage, toMatchFailure } from "./errors";

const TEXT_FIELDS = ["ctcae_term", "grade", "grade_description", "meddra_soc", "rationale"] as const;

function isRecord(value: unknown): value is Record<string, unknown> {
  return Boolean(value) && typeof value === "object" && !Array.isArray(value);
}

function asText(value: unknown): string | undefined {
  if (typeof value === "string") return value;
  if (typeof value === "number" && Number.isFinite(value)) return String(value);
  return undefined;
}

function asConfidence(value: unknown): MatchConfidence | undefined {
  if (typeof value !== "string") return undefined;
  const normalized = value.trim().toLowerCase();
  if (normalized === "high" || normalized === "medium" || normalized === "low") return normalized;
  return undefined;
}

function notJson(reason: string, cause?: unknown): MatcherError {
  return new MatcherError({
    code: "RESPONSE_NOT_JSON",
    stage: "PARSE",
    message: PARSE_FAILURE_MESSAGE,
    details: [reason],
    cause,
  });
}

/**
 * Reads the span from the first "{" to the last "}" as a JSON object. Prose
 * around the object is tolerated unless it contains braces of its own.
 */
export function readResponseObject(raw: string): Record<string, unknown> {
  const start = raw.indexOf("{");
  const end = raw.lastIndexOf("}");
  if (start < 0 || end < start) {
    throw notJson("no JSON object in response");
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw.slice(start, end + 1));
  } catch (error) {
    throw notJson(errorMessage(error), error);
  }
  if (!isRecord(parsed)) {
    throw notJson("response JSON is not an object");
  }
  return parsed;
}

export function parseMatchResponse(raw: string, symptom: string, details = ""): MatchResult {
  let parsed: Record<string, unknown>;
  try {
    parsed = readResponseObject(raw);
  } catch (error) {
    return { ...toMatchFailure(error, symptom, details), raw_response: raw };
  }

  const result: MatchSuccess = { original_symptom: symptom };
  if (details) result.details = details;
  for (const field of TEXT_FIELDS) {
    const value = asText(parsed[field]);
    if (value !== undefined) result[field] = value;
  }
  const confidence = asConfidence(parsed.confidence);
  if (confidence) result.confidence = confidence;
  return result;
}
