import type { DocumentSearch } from "../rag/retrieve";
import { assembleContext } from "../rag/context";
import type { Logger } from "../logging/logger";
import type { Generator } from "./generator";
import { isMatchFailure, type MatchResult } from "./types";
import { MatcherError, toMatchFailure, type MatchStage } from "./errors";
import { parseMatchResponse } from "./parse_result";

export const EMPTY_SYMPTOM_MESSAGE = "Symptom must be a non-empty string";

/** Largest delay setTimeout honours; longer ones fire after 1ms. */
export const MAX_TIMEOUT_MS = 2_147_483_647;

export type SymptomMatcherOptions = {
  retriever: DocumentSearch;
  generator: Generator;
  logger: Logger;
  termK?: number;
  gradeK?: number;
  timeoutMs?: number;
};

/**
 * Two-pass retrieval (terms for precision, grade descriptions for recall)
 * followed by a single completion. `match` resolves to a failure result
 * instead of rejecting.
 */
export class SymptomMatcher {
  private readonly retriever: DocumentSearch;
  private readonly generator: Generator;
  private readonly logger: Logger;
  private readonly termK: number;
  private readonly gradeK: number;
  private readonly timeoutMs: number;

  constructor(options: SymptomMatcherOptions) {
    this.retriever = options.retriever;
    this.generator = options.generator;
    this.logger = options.logger;
    this.termK = options.termK ?? 3;
    this.gradeK = options.gradeK ?? 5;
    this.timeoutMs = Math.min(options.timeoutMs ?? 60_000, MAX_TIMEOUT_MS);
  }

  async match(symptom: string, details = ""): Promise<MatchResult> {
    if (typeof symptom !== "string" || !symptom.trim()) {
      return toMatchFailure(new Error(EMPTY_SYMPTOM_MESSAGE), typeof symptom === "string" ? symptom : "", details);
    }

    let timer: NodeJS.Timeout | undefined;
    const deadline = new Promise<MatchResult>((resolve) => {
      timer = setTimeout(() => {
        const error = new MatcherError({
          code: "MATCH_TIMEOUT",
          message: `Symptom matching timed out after ${this.timeoutMs}ms`,
        });
        this.logger.warn(error.message);
        resolve(toMatchFailure(error, symptom, details));
      }, this.timeoutMs);
    });

    try {
      return await Promise.race([this.run(symptom, details), deadline]);
    } finally {
      clearTimeout(timer);
    }
  }

  private async run(symptom: string, details: string): Promise<MatchResult> {
    let stage: MatchStage = "INIT";
    const enter = (next: MatchStage) => {
      stage = next;
      this.logger.debug(`stage ${next}`);
    };

    try {
      enter("INIT");
      enter("RETRIEVE_TERMS");
      const termSearch = this.retriever.search(symptom, this.termK, "term");
      enter("RETRIEVE_GRADES");
      const gradeSearch = this.retriever.search(`${symptom} ${details}`, this.gradeK, "grade_description");
      const [termHits, gradeHits] = await Promise.all([termSearch, gradeSearch]);
      this.logger.debug(`retrieved ${termHits.length} term and ${gradeHits.length} grade hits`);

      enter("ASSEMBLE_CONTEXT");
      const context = assembleContext(termHits, gradeHits);

      enter("GENERATE");
      const raw = await this.generator.generate(symptom, details, context);

      enter("PARSE");
      const result = parseMatchResponse(raw, symptom, details);
      if (isMatchFailure(result)) {
        this.logger.warn(`match failed at PARSE: ${result.error}`);
      }
      enter("DONE");
      return result;
    } catch (error) {
      const failure = toMatchFailure(error, symptom, details);
      this.logger.warn(`match failed at ${stage}: ${failure.error}`);
      return failure;
    }
  }
}
