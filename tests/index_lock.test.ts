import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { acquireIndexLock, releaseIndexLock } from "../ml/rag/index_lock";

let testDir = "";
let testDbPath = "";

describe("index lock (SQLite)", () => {
  beforeEach(() => {
    testDir = fs.mkdtempSync(path.join(os.tmpdir(), "index-lock-"));
    testDbPath = path.join(testDir, "ctcae_index.db");
  });

  afterEach(() => {
    vi.unstubAllEnvs();
    fs.rmSync(testDir, { recursive: true, force: true });
  });

  it("acquires a lease for a collection", async () => {
    const result = await acquireIndexLock(testDbPath, "ctcae_terms", "indexer-1", 300);

    expect(result.acquired).toBe(true);
    expect(result.lock_id).toEqual(expect.any(String));
  });

  it("rejects a second indexer while the lease is live", async () => {
    const first = await acquireIndexLock(testDbPath, "ctcae_terms", "indexer-1", 300);
    expect(first.acquired).toBe(true);

    const second = await acquireIndexLock(testDbPath, "ctcae_terms", "indexer-2", 300);
    expect(second.acquired).toBe(false);
    expect(second.lock_id).toBeUndefined();
    expect(second.message).toContain("is being indexed by indexer-1");
  });

  it("keeps leases per collection", async () => {
    await acquireIndexLock(testDbPath, "ctcae_terms", "indexer-1", 300);
    const other = await acquireIndexLock(testDbPath, "ctcae_terms_v2", "indexer-2", 300);

    expect(other.acquired).toBe(true);
  });

  it("allows a new lease after release", async () => {
    const first = await acquireIndexLock(testDbPath, "ctcae_terms", "indexer-1", 300);
    await releaseIndexLock(testDbPath, String(first.lock_id));

    const second = await acquireIndexLock(testDbPath, "ctcae_terms", "indexer-2", 300);
    expect(second.acquired).toBe(true);
    expect(second.lock_id).not.toBe(first.lock_id);
  });

  it("replaces an expired lease", async () => {
    const first = await acquireIndexLock(testDbPath, "ctcae_terms", "indexer-1", 0);
    expect(first.acquired).toBe(true);

    const second = await acquireIndexLock(testDbPath, "ctcae_terms", "indexer-2", 300);
    expect(second.acquired).toBe(true);
  });

  it("writes the lease table only to the database it is given", async () => {
    const envPath = path.join(testDir, "from_env.db");
    const nestedPath = path.join(testDir, "nested", "locks.db");
    vi.stubEnv("CTCAE_INDEX_DB_PATH", envPath);

    const first = await acquireIndexLock(nestedPath, "ctcae_terms", "indexer-1", 300);
    const second = await acquireIndexLock(nestedPath, "ctcae_terms", "indexer-2", 300);

    expect(first.acquired).toBe(true);
    expect(second.acquired).toBe(false);
    expect(fs.existsSync(nestedPath)).toBe(true);
    expect(fs.existsSync(envPath)).toBe(false);
  });
});
