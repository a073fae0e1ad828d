import crypto from "node:crypto";
import fs from "node:fs";
import path from "node:path";
import Database from "better-sqlite3";

export type AcquireLockResult = {
  acquired: boolean;
  lock_id?: string;
  message?: string;
};

type LockRow = {
  lock_id: string;
  owner: string;
  expires_at: string;
};

function openLockDb(dbPath: string) {
  fs.mkdirSync(path.dirname(dbPath), { recursive: true });
  const db = new Database(dbPath);
  db.exec(`
    create table if not exists index_locks (
      collection text primary key,
      lock_id text not null,
      owner text not null,
      expires_at text not null
    );
  `);
  return db;
}

/**
 * Takes a lease on the collection. An expired lease is replaced; a live one
 * is reported with its owner.
 */
export async function acquireIndexLock(
  dbPath: string,
  collection: string,
  owner: string,
  ttl_seconds: number = 600
): Promise<AcquireLockResult> {
  const db = openLockDb(dbPath);
  try {
    const now = new Date();
    const expires_at = new Date(now.getTime() + ttl_seconds * 1000).toISOString();
    const lock_id = crypto.randomUUID();

    const take = db.transaction((): AcquireLockResult => {
      const existing = db
        .prepare<[string], LockRow>("select lock_id, owner, expires_at from index_locks where collection = ?")
        .get(collection);
      if (existing && new Date(existing.expires_at) > now) {
        return {
          acquired: false,
          message: `Collection ${collection} is being indexed by ${existing.owner} until ${existing.expires_at}.`,
        };
      }
      db.prepare(
        `insert into index_locks (collection, lock_id, owner, expires_at)
         values (?, ?, ?, ?)
         on conflict(collection) do update set
           lock_id = excluded.lock_id,
           owner = excluded.owner,
           expires_at = excluded.expires_at`
      ).run(collection, lock_id, owner, expires_at);
      return { acquired: true, lock_id };
    });

    return take.immediate();
  } finally {
    db.close();
  }
}

export async function releaseIndexLock(dbPath: string, lock_id: string): Promise<void> {
  const db = openLockDb(dbPath);
  try {
    db.prepare("delete from index_locks where lock_id = ?").run(lock_id);
  } finally {
    db.close();
  }
}
