import type { MatchFailure } from "./types";

export type MatcherErrorCode =
  | "RETRIEVAL_FAILED"
  | "GENERATION_FAILED"
  | "RESPONSE_NOT_JSON"
  | "MATCH_TIMEOUT"
  | "INDEX_WRITE_FAILED"
  | "CONFIGURATION_INVALID";

export type MatchStage =
  | "INIT"
  | "RETRIEVE_TERMS"
  | "RETRIEVE_GRADES"
  | "ASSEMBLE_CONTEXT"
  | "GENERATE"
  | "PARSE"
  | "DONE";

export const PARSE_FAILURE_MESSAGE = "Failed to parse LLM response as JSON";

export class MatcherError extends Error {
  readonly code: MatcherErrorCode;
  readonly stage?: MatchStage;
  readonly details: string[];

  constructor(params: {
    code: MatcherErrorCode;
    message: string;
    stage?: MatchStage;
    details?: string[];
    cause?: unknown;
  }) {
    super(params.message, params.cause === undefined ? undefined : { cause: params.cause });
    this.name = "MatcherError";
    this.code = params.code;
    this.stage = params.stage;
    this.details = params.details ?? [];
  }
}

export function configurationError(message: string, details: string[] = []): MatcherError {
  return new MatcherError({ code: "CONFIGURATION_INVALID", message, details });
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export function toMatchFailure(error: unknown, symptom: string, details = ""): MatchFailure {
  const failure: MatchFailure = {
    original_symptom: symptom,
    error: errorMessage(error),
  };
  if (details) failure.details = details;
  return failure;
}
