import type { Embedder } from "../../ml/rag/embeddings";
import type { VectorIndex } from "../../ml/rag/store";
import type { EmbeddedDocument, SearchHit, TermRecord } from "../../ml/rag/types";
import { createLogger, type Logger } from "../../ml/logging/logger";

export const NAUSEA: TermRecord = {
  meddra_code: "10028813",
  meddra_soc: "Gastrointestinal disorders",
  ctcae_term: "Nausea",
  definition: "Queasy sensation with urge to vomit.",
  grades: [
    { grade: "1", description: "Loss of appetite without alteration in eating habits" },
    { grade: "2", description: "Oral intake decreased without significant weight loss" },
    { grade: "3", description: "Inadequate oral caloric or fluid intake; tube feeding indicated" },
  ],
};

export const HEADACHE: TermRecord = {
  meddra_code: "10019211",
  meddra_soc: "Nervous system disorders",
  ctcae_term: "Headache",
  definition: "Marked discomfort in various parts of the head, not confined to the area of distribution of any nerve.",
  grades: [
    { grade: "1", description: "Mild pain" },
    { grade: "2", description: "Moderate pain; limiting instrumental ADL" },
    { grade: "3", description: "Severe pain; limiting self care ADL" },
    { grade: "4", description: "   " },
  ],
};

export function testLogger(scope = "test"): Logger {
  return createLogger(scope, { level: "debug", capture: true, silent: true });
}

export function termHit(term: TermRecord, score: number): SearchHit {
  return {
    document: {
      id: `${term.ctcae_term.toLowerCase()}:term`,
      content: `${term.ctcae_term}: ${term.definition} (${term.meddra_soc})`,
      metadata: {
        doc_type: "term",
        meddra_code: term.meddra_code,
        meddra_soc: term.meddra_soc,
        ctcae_term: term.ctcae_term,
        definition: term.definition,
      },
    },
    score,
  };
}

export function gradeHit(term: TermRecord, index: number, score: number): SearchHit {
  const grade = term.grades[index];
  return {
    document: {
      id: `${term.ctcae_term.toLowerCase()}:grade:${grade.grade}`,
      content: `${term.ctcae_term} Grade ${grade.grade}: ${grade.description}`,
      metadata: {
        doc_type: "grade_description",
        meddra_code: term.meddra_code,
        meddra_soc: term.meddra_soc,
        ctcae_term: term.ctcae_term,
        grade: grade.grade,
        description: grade.description,
      },
    },
    score,
  };
}

/** In-memory index that records writes and replays canned hits. */
export class MemoryVectorIndex implements VectorIndex {
  readonly collection = "test_collection";
  readonly written: EmbeddedDocument[] = [];
  deletes = 0;

  constructor(private readonly hits: SearchHit[] = []) {}

  async upsert(docs: EmbeddedDocument[]): Promise<number> {
    this.written.push(...docs);
    return docs.length;
  }

  async deleteCollection(): Promise<void> {
    this.deletes += 1;
    this.written.length = 0;
  }

  async similaritySearchWithScore(_embedding: number[], k: number): Promise<SearchHit[]> {
    return this.hits.slice(0, k);
  }
}

export class FailingEmbedder implements Embedder {
  readonly model = "failing";
  calls = 0;

  constructor(private readonly failOnCall: number, private readonly message = "embedding backend unavailable") {}

  async embed(texts: string[]): Promise<number[][]> {
    this.calls += 1;
    if (this.calls === this.failOnCall) {
      throw new Error(this.message);
    }
    return texts.map(() => [1, 0, 0]);
  }
}
