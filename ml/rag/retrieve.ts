import type { DocType, SearchHit } from "./types";
import type { Embedder } from "./embeddings";
import type { VectorIndex } from "./store";
import type { Logger } from "../logging/logger";
import { errorMessage } from "../matcher/errors";

export interface DocumentSearch {
  search(query: string, k: number, kind: DocType): Promise<SearchHit[]>;
}

export class Retriever implements DocumentSearch {
  constructor(
    private readonly index: VectorIndex,
    private readonly embedder: Embedder,
    private readonly logger: Logger
  ) {}

  /**
   * Top-k hits of one document kind, in backend order. Embedding or backend
   * failures are logged and yield no hits.
   */
  async search(query: string, k: number, kind: DocType): Promise<SearchHit[]> {
    try {
      const [embedding] = await this.embedder.embed([query]);
      if (!embedding) {
        throw new Error("embedder returned no vector");
      }
      return await this.index.similaritySearchWithScore(embedding, k, { doc_type: kind });
    } catch (error) {
      this.logger.warn(`${kind} search failed: ${errorMessage(error)}`);
      return [];
    }
  }
}
