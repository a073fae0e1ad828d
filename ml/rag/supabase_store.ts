import { createClient, type SupabaseClient } from "@supabase/supabase-js";

import type { CtcaeMatcherConfig } from "../config";
import type { EmbeddedDocument, MetadataFilter, RetrievableDocument, SearchHit } from "./types";
import { MatcherError, configurationError } from "../matcher/errors";
import { assertValid, collectErrors, validateEmbeddedDocument } from "../schemas/validators";
import { SqliteVectorIndex, type VectorIndex } from "./store";

export const MATCH_RPC = "match_ctcae_documents";

type MatchRow = {
  id: string;
  content: string;
  metadata: unknown;
  similarity: number;
};

function isMatchRow(value: unknown): value is MatchRow {
  if (!value || typeof value !== "object") return false;
  return (
    "id" in value &&
    typeof value.id === "string" &&
    "content" in value &&
    typeof value.content === "string" &&
    "metadata" in value &&
    "similarity" in value &&
    typeof value.similarity === "number"
  );
}

function toDocument(row: MatchRow): RetrievableDocument {
  // the RPC does not return embeddings; validate metadata through the document schema
  const candidate: unknown = { id: row.id, content: row.content, metadata: row.metadata, embedding: [0] };
  if (!validateEmbeddedDocument(candidate)) {
    throw new MatcherError({
      code: "RETRIEVAL_FAILED",
      message: `Supabase row ${row.id} failed validation`,
      details: collectErrors(validateEmbeddedDocument),
    });
  }
  return { id: candidate.id, content: candidate.content, metadata: candidate.metadata };
}

/**
 * pgvector-backed index. Rows live in one table keyed by (collection, id);
 * search goes through the match_ctcae_documents RPC, which returns
 * similarity = 1 - cosine distance.
 */
export class SupabaseVectorIndex implements VectorIndex {
  readonly collection: string;
  private readonly table: string;
  private readonly client: SupabaseClient;

  constructor(params: { collection: string; table?: string; client?: SupabaseClient; url?: string; key?: string }) {
    this.collection = params.collection;
    this.table = params.table ?? "ctcae_documents";
    if (params.client) {
      this.client = params.client;
      return;
    }
    if (!params.url || !params.key) {
      throw configurationError("SUPABASE_URL and SUPABASE_SERVICE_ROLE_KEY are required for the supabase backend");
    }
    this.client = createClient(params.url, params.key, {
      auth: { persistSession: false, autoRefreshToken: false },
    });
  }

  async upsert(docs: EmbeddedDocument[]): Promise<number> {
    if (docs.length === 0) return 0;
    for (const doc of docs) {
      assertValid(validateEmbeddedDocument, doc, "EmbeddedDocument", "INDEX_WRITE_FAILED");
    }
    const rows = docs.map((doc) => ({
      collection: this.collection,
      id: doc.id,
      content: doc.content,
      doc_type: doc.metadata.doc_type,
      metadata: doc.metadata,
      embedding: doc.embedding,
      updated_at: new Date().toISOString(),
    }));
    const { error } = await this.client.from(this.table).upsert(rows, { onConflict: "collection,id" });
    if (error) {
      throw new MatcherError({
        code: "INDEX_WRITE_FAILED",
        message: `Supabase upsert failed: ${error.message}`,
      });
    }
    return rows.length;
  }

  async deleteCollection(): Promise<void> {
    const { error } = await this.client.from(this.table).delete().eq("collection", this.collection);
    if (error) {
      throw new MatcherError({
        code: "INDEX_WRITE_FAILED",
        message: `Supabase delete failed: ${error.message}`,
      });
    }
  }

  async similaritySearchWithScore(
    embedding: number[],
    k: number,
    filter: MetadataFilter = {}
  ): Promise<SearchHit[]> {
    if (k <= 0) return [];
    const { data, error } = await this.client.rpc(MATCH_RPC, {
      collection_name: this.collection,
      query_embedding: embedding,
      match_count: k,
      metadata_filter: filter,
    });
    if (error) {
      throw new MatcherError({
        code: "RETRIEVAL_FAILED",
        message: `Supabase search failed: ${error.message}`,
      });
    }
    const rows: unknown = data;
    if (!Array.isArray(rows)) return [];
    return rows
      .filter(isMatchRow)
      .map((row) => ({ document: toDocument(row), score: row.similarity }))
      .sort((a, b) => b.score - a.score)
      .slice(0, k);
  }
}

export function createVectorIndex(config: CtcaeMatcherConfig): VectorIndex {
  if (config.index.backend === "supabase") {
    return new SupabaseVectorIndex({
      collection: config.collection_name,
      table: config.index.table,
      url: config.index.supabase_url,
      key: config.index.supabase_key,
    });
  }
  return new SqliteVectorIndex({
    dbPath: config.index.sqlite_path,
    collection: config.collection_name,
    table: config.index.table,
  });
}
