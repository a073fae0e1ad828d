import "dotenv/config";
import minimist from "minimist";

import { loadConfig } from "../ml/config";
import { createLogger } from "../ml/logging/logger";
import { createEmbedder } from "../ml/rag/embeddings";
import { TermIndexer } from "../ml/rag/ingest";
import { acquireIndexLock, releaseIndexLock } from "../ml/rag/index_lock";
import { createVectorIndex } from "../ml/rag/supabase_store";
import { TermRepository } from "../ml/terms/term_repository";

async function run() {
  const args = minimist(process.argv.slice(2), {
    string: ["terms", "collection"],
    boolean: ["reset"],
    default: { reset: true },
  });

  const config = loadConfig({
    overrides: {
      ...(args.terms ? { terms_path: String(args.terms) } : {}),
      ...(args.collection ? { collection_name: String(args.collection) } : {}),
    },
  });
  const logger = createLogger("index", { level: config.log_level });

  const repository = TermRepository.fromFile(config.terms_path, logger.child("terms"));
  if (repository.size === 0) {
    throw new Error(`No CTCAE terms found in ${config.terms_path}`);
  }

  const lock = await acquireIndexLock(
    config.index.sqlite_path,
    config.collection_name,
    `create_vector_store:${process.pid}`,
    600
  );
  if (!lock.acquired || !lock.lock_id) {
    throw new Error(lock.message ?? "Index lock unavailable.");
  }

  try {
    const indexer = new TermIndexer({
      index: createVectorIndex(config),
      embedder: createEmbedder(config.embedding, config.openai_api_key),
      logger,
      batchSize: config.batch_size,
    });
    logger.info(`indexing ${repository.size} terms into ${config.collection_name}`);
    const count = await indexer.indexTerms(repository.all(), { reset: args.reset !== false });
    console.log(JSON.stringify({ ok: true, count }, null, 2));
  } finally {
    await releaseIndexLock(config.index.sqlite_path, lock.lock_id);
  }
}

run().catch((error) => {
  console.error(error);
  process.exit(1);
});
