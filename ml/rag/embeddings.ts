import OpenAI from "openai";
import crypto from "node:crypto";

import type { EmbeddingConfig } from "../config";
import { configurationError } from "../matcher/errors";

export interface Embedder {
  readonly model: string;
  embed(texts: string[]): Promise<number[][]>;
}

function tokenize(text: string): string[] {
  return text
    .toLowerCase()
    .split(/[^a-z0-9]+/g)
    .filter((token) => token.length > 0);
}

function bucketFor(token: string, dimensions: number): number {
  const hash = crypto.createHash("sha256").update(token).digest();
  return hash.readUInt32BE(0) % dimensions;
}

/**
 * Deterministic hashed bag-of-words vectors. Texts sharing tokens get a
 * positive cosine similarity, so lexical matches rank first offline.
 */
export function hashEmbedding(text: string, dimensions: number): number[] {
  const vector: number[] = new Array<number>(dimensions).fill(0);
  for (const token of tokenize(text)) {
    vector[bucketFor(token, dimensions)] += 1;
  }
  return vector;
}

export class HashedEmbedder implements Embedder {
  readonly model: string;

  constructor(private readonly dimensions = 512) {
    this.model = `hashed-bow-${dimensions}`;
  }

  async embed(texts: string[]): Promise<number[][]> {
    return texts.map((text) => hashEmbedding(text, this.dimensions));
  }
}

export class OpenAIEmbedder implements Embedder {
  readonly model: string;
  private readonly client: OpenAI;

  constructor(params: { apiKey: string; model: string; client?: OpenAI }) {
    this.model = params.model;
    this.client = params.client ?? new OpenAI({ apiKey: params.apiKey });
  }

  async embed(texts: string[]): Promise<number[][]> {
    if (texts.length === 0) return [];
    const response = await this.client.embeddings.create({ model: this.model, input: texts });
    if (response.data.length !== texts.length) {
      throw new Error("Embedding response length mismatch");
    }
    return [...response.data].sort((a, b) => a.index - b.index).map((item) => item.embedding);
  }
}

export function createEmbedder(config: EmbeddingConfig, apiKey?: string): Embedder {
  if (config.mode === "hashed") {
    return new HashedEmbedder(config.dimensions);
  }
  if (!apiKey) {
    throw configurationError("OPENAI_API_KEY is required for openai embeddings");
  }
  return new OpenAIEmbedder({ apiKey, model: config.model });
}
