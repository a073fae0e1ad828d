import type { EmbeddedDocument, RetrievableDocument, TermRecord } from "./types";
import type { Embedder } from "./embeddings";
import type { VectorIndex } from "./store";
import type { Logger } from "../logging/logger";
import { errorMessage } from "../matcher/errors";

const DEFAULT_BATCH_SIZE = 100;

/**
 * Id prefix for a term's documents. Case-insensitive like term names in the
 * repository, and otherwise lossless, so distinct names never share ids.
 */
export function termKey(name: string): string {
  return encodeURIComponent(name.trim().toLowerCase());
}

/**
 * One "term" document, then one "grade_description" document per grade with
 * a non-blank description, in grade order.
 */
export function buildTermDocuments(term: TermRecord): RetrievableDocument[] {
  const key = termKey(term.ctcae_term);
  const docs: RetrievableDocument[] = [
    {
      id: `${key}:term`,
      content: `${term.ctcae_term}: ${term.definition} (${term.meddra_soc})`,
      metadata: {
        doc_type: "term",
        meddra_code: term.meddra_code,
        meddra_soc: term.meddra_soc,
        ctcae_term: term.ctcae_term,
        definition: term.definition,
      },
    },
  ];

  for (const grade of term.grades) {
    if (!grade.description.trim()) continue;
    docs.push({
      id: `${key}:grade:${grade.grade}`,
      content: `${term.ctcae_term} Grade ${grade.grade}: ${grade.description}`,
      metadata: {
        doc_type: "grade_description",
        meddra_code: term.meddra_code,
        meddra_soc: term.meddra_soc,
        ctcae_term: term.ctcae_term,
        grade: grade.grade,
        description: grade.description,
      },
    });
  }
  return docs;
}

export class TermIndexer {
  private readonly index: VectorIndex;
  private readonly embedder: Embedder;
  private readonly logger: Logger;
  private readonly batchSize: number;

  constructor(params: { index: VectorIndex; embedder: Embedder; logger: Logger; batchSize?: number }) {
    this.index = params.index;
    this.embedder = params.embedder;
    this.logger = params.logger;
    this.batchSize = Math.max(1, params.batchSize ?? DEFAULT_BATCH_SIZE);
  }

  /**
   * Writes every term's documents and returns how many were committed.
   * Failed batches are logged and skipped.
   */
  async indexTerms(terms: TermRecord[], options: { reset?: boolean } = {}): Promise<number> {
    if (options.reset) {
      try {
        await this.index.deleteCollection();
      } catch (error) {
        this.logger.debug(`reset of ${this.index.collection} skipped: ${errorMessage(error)}`);
      }
    }

    const seen = new Set<string>();
    const docs: RetrievableDocument[] = [];
    for (const term of terms) {
      const key = termKey(term.ctcae_term);
      if (seen.has(key)) {
        this.logger.warn(`term ${term.ctcae_term} skipped: duplicate of an earlier term`);
        continue;
      }
      seen.add(key);
      docs.push(...buildTermDocuments(term));
    }
    const batches = Math.ceil(docs.length / this.batchSize);
    let committed = 0;

    for (let start = 0; start < docs.length; start += this.batchSize) {
      const batch = docs.slice(start, start + this.batchSize);
      const batchNumber = start / this.batchSize + 1;
      try {
        const embeddings = await this.embedder.embed(batch.map((doc) => doc.content));
        if (embeddings.length !== batch.length) {
          throw new Error(`expected ${batch.length} embeddings, got ${embeddings.length}`);
        }
        const withEmbeddings: EmbeddedDocument[] = batch.map((doc, i) => ({ ...doc, embedding: embeddings[i] }));
        committed += await this.index.upsert(withEmbeddings);
        this.logger.info(`batch ${batchNumber}/${batches}: ${batch.length} documents`);
      } catch (error) {
        this.logger.error(`batch ${batchNumber}/${batches} failed: ${errorMessage(error)}`);
      }
    }

    this.logger.info(`indexed ${committed}/${docs.length} documents into ${this.index.collection}`);
    return committed;
  }
}
