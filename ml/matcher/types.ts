export type MatchConfidence = "high" | "medium" | "low";

/**
 * Fields the model is asked to return. Any of them may be missing from a
 * parsed response, so consumers treat absence as unknown.
 */
export type MatchSuccess = {
  original_symptom: string;
  details?: string;
  ctcae_term?: string;
  grade?: string;
  grade_description?: string;
  meddra_soc?: string;
  confidence?: MatchConfidence;
  rationale?: string;
  error?: never;
};

export type MatchFailure = {
  original_symptom: string;
  details?: string;
  error: string;
  raw_response?: string;
};

export type MatchResult = MatchSuccess | MatchFailure;

export function isMatchFailure(result: MatchResult): result is MatchFailure {
  return typeof result.error === "string";
}
