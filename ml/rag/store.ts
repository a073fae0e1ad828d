import fs from "node:fs";
import path from "node:path";
import Database from "better-sqlite3";

import type { EmbeddedDocument, MetadataFilter, SearchHit } from "./types";
import { MatcherError, configurationError } from "../matcher/errors";
import { assertValid, collectErrors, validateEmbeddedDocument } from "../schemas/validators";

/**
 * Nearest-neighbor index over one collection. Implementations return hits
 * ordered by descending cosine similarity.
 */
export interface VectorIndex {
  readonly collection: string;
  upsert(docs: EmbeddedDocument[]): Promise<number>;
  deleteCollection(): Promise<void>;
  similaritySearchWithScore(embedding: number[], k: number, filter?: MetadataFilter): Promise<SearchHit[]>;
}

const TABLE_NAME = /^[a-z_][a-z0-9_]*$/;
const FILTER_KEYS = ["doc_type", "ctcae_term", "meddra_soc"] as const;

export function cosineSimilarity(a: number[], b: number[]): number {
  if (a.length === 0 || a.length !== b.length) return 0;
  let dot = 0;
  let na = 0;
  let nb = 0;
  for (let i = 0; i < a.length; i += 1) {
    dot += a[i] * b[i];
    na += a[i] * a[i];
    nb += b[i] * b[i];
  }
  if (na === 0 || nb === 0) return 0;
  return dot / (Math.sqrt(na) * Math.sqrt(nb));
}

type StoredRow = {
  id: string;
  content: string;
  metadata: string;
  embedding: string;
};

export class SqliteVectorIndex implements VectorIndex {
  readonly collection: string;
  private readonly dbPath: string;
  private readonly table: string;
  private db: Database.Database | null = null;

  constructor(params: { dbPath: string; collection: string; table?: string }) {
    const table = params.table ?? "ctcae_documents";
    if (!TABLE_NAME.test(table)) {
      throw configurationError(`Invalid index table name: ${table}`);
    }
    this.dbPath = params.dbPath;
    this.collection = params.collection;
    this.table = table;
  }

  private connection(): Database.Database {
    if (this.db) return this.db;
    fs.mkdirSync(path.dirname(this.dbPath), { recursive: true });
    const db = new Database(this.dbPath);
    db.pragma("journal_mode = WAL");
    db.exec(`
      CREATE TABLE IF NOT EXISTS ${this.table} (
        collection TEXT NOT NULL,
        id TEXT NOT NULL,
        content TEXT NOT NULL,
        doc_type TEXT NOT NULL,
        metadata TEXT NOT NULL,
        embedding TEXT NOT NULL,
        updated_at TEXT NOT NULL,
        PRIMARY KEY (collection, id)
      );
      CREATE INDEX IF NOT EXISTS idx_${this.table}_kind ON ${this.table}(collection, doc_type);
    `);
    this.db = db;
    return db;
  }

  async upsert(docs: EmbeddedDocument[]): Promise<number> {
    if (docs.length === 0) return 0;
    for (const doc of docs) {
      assertValid(validateEmbeddedDocument, doc, "EmbeddedDocument", "INDEX_WRITE_FAILED");
    }
    const db = this.connection();
    const stmt = db.prepare(
      `INSERT INTO ${this.table} (collection, id, content, doc_type, metadata, embedding, updated_at)
       VALUES (?, ?, ?, ?, ?, ?, ?)
       ON CONFLICT(collection, id) DO UPDATE SET
         content=excluded.content,
         doc_type=excluded.doc_type,
         metadata=excluded.metadata,
         embedding=excluded.embedding,
         updated_at=excluded.updated_at`
    );
    const now = new Date().toISOString();
    const write = db.transaction((batch: EmbeddedDocument[]) => {
      for (const doc of batch) {
        stmt.run(
          this.collection,
          doc.id,
          doc.content,
          doc.metadata.doc_type,
          JSON.stringify(doc.metadata),
          JSON.stringify(doc.embedding),
          now
        );
      }
    });
    write(docs);
    return docs.length;
  }

  async deleteCollection(): Promise<void> {
    this.connection().prepare(`DELETE FROM ${this.table} WHERE collection = ?`).run(this.collection);
  }

  async similaritySearchWithScore(
    embedding: number[],
    k: number,
    filter: MetadataFilter = {}
  ): Promise<SearchHit[]> {
    if (k <= 0) return [];
    const clauses = ["collection = ?"];
    const params: string[] = [this.collection];
    for (const key of FILTER_KEYS) {
      const value = filter[key];
      if (value === undefined) continue;
      clauses.push(`json_extract(metadata, '$.${key}') = ?`);
      params.push(value);
    }

    const rows = this.connection()
      .prepare<string[], StoredRow>(
        `SELECT id, content, metadata, embedding FROM ${this.table} WHERE ${clauses.join(" AND ")}`
      )
      .all(...params);

    return rows
      .map((row) => {
        const doc = parseStoredRow(row);
        return {
          document: { id: doc.id, content: doc.content, metadata: doc.metadata },
          score: cosineSimilarity(embedding, doc.embedding),
        };
      })
      .sort((a, b) => b.score - a.score)
      .slice(0, k);
  }

  countDocuments(filter: MetadataFilter = {}): number {
    const clauses = ["collection = ?"];
    const params: string[] = [this.collection];
    if (filter.doc_type) {
      clauses.push("doc_type = ?");
      params.push(filter.doc_type);
    }
    const row = this.connection()
      .prepare<string[], { total: number }>(`SELECT COUNT(*) AS total FROM ${this.table} WHERE ${clauses.join(" AND ")}`)
      .get(...params);
    return row?.total ?? 0;
  }

  close(): void {
    this.db?.close();
    this.db = null;
  }
}

function parseStoredRow(row: StoredRow): EmbeddedDocument {
  let candidate: unknown;
  try {
    candidate = {
      id: row.id,
      content: row.content,
      metadata: JSON.parse(row.metadata),
      embedding: JSON.parse(row.embedding),
    };
  } catch (error) {
    throw new MatcherError({
      code: "RETRIEVAL_FAILED",
      message: `Stored document ${row.id} is not valid JSON`,
      cause: error,
    });
  }
  if (!validateEmbeddedDocument(candidate)) {
    throw new MatcherError({
      code: "RETRIEVAL_FAILED",
      message: `Stored document ${row.id} failed validation`,
      details: collectErrors(validateEmbeddedDocument),
    });
  }
  return candidate;
}
