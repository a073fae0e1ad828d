import Ajv from "ajv";
import type { ValidateFunction } from "ajv";
import addFormats from "ajv-formats";
import termRecordSchema from "./term_record.schema.json";
import termsFileSchema from "./terms_file.schema.json";
import retrievableDocumentSchema from "./retrievable_document.schema.json";
import matcherConfigSchema from "./matcher_config.schema.json";
import matchRequestSchema from "./match_request.schema.json";
import type { EmbeddedDocument, TermRecord } from "../rag/types";
import type { CtcaeMatcherConfig } from "../config";
import { MatcherError, type MatcherErrorCode } from "../matcher/errors";

export type TermsFile = {
  version?: string;
  terms: Array<Record<string, unknown>>;
  categories?: string[];
};

export type MatchRequestBody = {
  symptom: string;
  details?: string;
};

const ajv = new Ajv({ allErrors: true, strict: true });
addFormats(ajv);

export const validateTermRecord = ajv.compile<TermRecord>(termRecordSchema);
export const validateTermsFile = ajv.compile<TermsFile>(termsFileSchema);
export const validateEmbeddedDocument = ajv.compile<EmbeddedDocument>(retrievableDocumentSchema);
export const validateMatcherConfig = ajv.compile<CtcaeMatcherConfig>(matcherConfigSchema);
export const validateMatchRequest = ajv.compile<MatchRequestBody>(matchRequestSchema);

export function collectErrors<T>(validate: ValidateFunction<T>): string[] {
  return (validate.errors ?? []).map((e) => `${e.instancePath || "/"} ${e.message ?? "is invalid"}`);
}

export function assertValid<T>(
  validate: ValidateFunction<T>,
  data: unknown,
  label: string,
  code: MatcherErrorCode = "CONFIGURATION_INVALID"
): asserts data is T {
  if (!validate(data)) {
    const errors = collectErrors(validate);
    throw new MatcherError({
      code,
      message: `Schema validation failed for ${label}: ${errors.join("; ")}`,
      details: errors,
    });
  }
}
