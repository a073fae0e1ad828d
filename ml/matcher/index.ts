import { assertRuntimeCredentials, loadConfig, type CtcaeMatcherConfig } from "../config";
import { createEmbedder, type Embedder } from "../rag/embeddings";
import type { VectorIndex } from "../rag/store";
import { createVectorIndex } from "../rag/supabase_store";
import { Retriever } from "../rag/retrieve";
import { createLogger, type Logger } from "../logging/logger";
import { OpenAIGenerator, type Generator } from "./generator";
import { loadPromptTemplate } from "./prompt_loader";
import { SymptomMatcher } from "./symptom_matcher";

export type { MatchResult, MatchSuccess, MatchFailure, MatchConfidence } from "./types";
export { isMatchFailure } from "./types";
export { SymptomMatcher } from "./symptom_matcher";

export type MatcherDependencies = {
  index?: VectorIndex;
  embedder?: Embedder;
  generator?: Generator;
  logger?: Logger;
};

/**
 * Builds a matcher from configuration. Injected dependencies replace the
 * ones the configuration would create, and skip their credential checks.
 */
export function createSymptomMatcher(config: CtcaeMatcherConfig, deps: MatcherDependencies = {}): SymptomMatcher {
  if (!deps.index || !deps.embedder || !deps.generator) {
    assertRuntimeCredentials(config);
  }
  const logger = deps.logger ?? createLogger("matcher", { level: config.log_level });
  const index = deps.index ?? createVectorIndex(config);
  const embedder = deps.embedder ?? createEmbedder(config.embedding, config.openai_api_key);
  const generator =
    deps.generator ??
    new OpenAIGenerator({
      apiKey: config.openai_api_key ?? "",
      model: config.model,
      temperature: config.temperature,
      template: loadPromptTemplate(config.prompt_path),
    });

  return new SymptomMatcher({
    retriever: new Retriever(index, embedder, logger.child("retrieve")),
    generator,
    logger,
    termK: config.term_k,
    gradeK: config.grade_k,
    timeoutMs: config.timeout_ms,
  });
}

let cached: SymptomMatcher | null = null;

export function getSymptomMatcher(): SymptomMatcher {
  if (!cached) {
    cached = createSymptomMatcher(loadConfig());
  }
  return cached;
}
