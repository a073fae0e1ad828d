import type { MatchResult } from "./types";
import { isMatchFailure } from "./types";
import { formatGradeDescription } from "../terms/format";

function show(value: string | undefined): string {
  return value ?? "unknown";
}

/** Lines printed by the command-line matcher. */
export function formatMatchResult(result: MatchResult, verbose = false): string[] {
  if (isMatchFailure(result)) {
    const lines = [`Error: ${result.error}`];
    if (verbose && result.raw_response !== undefined) {
      lines.push(`Raw response: ${result.raw_response}`);
    }
    return lines;
  }

  const lines = [
    `CTCAE Term: ${show(result.ctcae_term)}`,
    `Grade: ${show(result.grade)}`,
    `Category: ${show(result.meddra_soc)}`,
    `Match Confidence: ${show(result.confidence)}`,
  ];
  if (verbose) {
    lines.push(`Grade Description: ${result.grade_description ? formatGradeDescription(result.grade_description) : "unknown"}`);
    lines.push(`Rationale: ${show(result.rationale)}`);
  }
  return lines;
}
