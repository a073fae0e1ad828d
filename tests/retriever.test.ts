import { describe, it, expect, vi } from "vitest";
import { Retriever } from "../ml/rag/retrieve";
import { HashedEmbedder } from "../ml/rag/embeddings";
import { FailingEmbedder, MemoryVectorIndex, NAUSEA, termHit, testLogger } from "./helpers/ctcae_fixtures";

describe("Retriever", () => {
  it("filters the index by document kind", async () => {
    const index = new MemoryVectorIndex([termHit(NAUSEA, 0.8)]);
    const spy = vi.spyOn(index, "similaritySearchWithScore");
    const retriever = new Retriever(index, new HashedEmbedder(16), testLogger());

    const hits = await retriever.search("queasy", 3, "term");

    expect(hits).toEqual([termHit(NAUSEA, 0.8)]);
    expect(spy).toHaveBeenCalledWith(expect.any(Array), 3, { doc_type: "term" });
  });

  it("returns no hits when embedding fails", async () => {
    const logger = testLogger("retrieve");
    const retriever = new Retriever(new MemoryVectorIndex([termHit(NAUSEA, 0.8)]), new FailingEmbedder(1), logger);

    const hits = await retriever.search("queasy", 3, "term");

    expect(hits).toEqual([]);
    expect(logger.entries).toEqual([
      expect.objectContaining({ level: "warn", message: "term search failed: embedding backend unavailable" }),
    ]);
  });

  it("returns no hits when the index fails", async () => {
    const index = new MemoryVectorIndex();
    vi.spyOn(index, "similaritySearchWithScore").mockRejectedValue(new Error("connection refused"));
    const logger = testLogger("retrieve");
    const retriever = new Retriever(index, new HashedEmbedder(16), logger);

    const hits = await retriever.search("queasy", 5, "grade_description");

    expect(hits).toEqual([]);
    expect(logger.entries[0].message).toBe("grade_description search failed: connection refused");
  });
});
