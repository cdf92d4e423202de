import { DocumentLoader } from "../documents/document-loader.js";
import { IndexCorruptionError, IngestionError } from "../shared/errors.js";
import {
  logChunked,
  logEmbeddingProgress,
  logIndexBuilt,
  logIndexLoadFailed,
  logIndexLoaded,
  logIndexPersisted,
} from "../shared/rag-logger.js";
import { chunkDocuments, validateChunkingOptions } from "./chunker.js";
import type { Embedder } from "./embedder.js";
import type { ChunkingOptions } from "./types.js";
import { VectorIndex } from "./vector-index.js";

export interface IndexBuilderOptions {
  docsPath: string;
  indexPath: string;
  chunking: ChunkingOptions;
  embedder: Embedder;
  loader?: DocumentLoader;
  /** Skip the persisted index and ingest the documents again. */
  forceRebuild?: boolean;
}

export type IndexOrigin = "loaded" | "built";

export interface IndexInitResult {
  index: VectorIndex;
  origin: IndexOrigin;
  /** Documents left out of a fresh build; always empty for a loaded index. */
  skipped: IngestionError[];
}

/**
 * Startup policy: a persisted index is loaded as-is and the document
 * directory is not looked at, even if it changed since the index was built.
 * Only a missing or unusable index triggers full ingestion.
 */
export async function loadOrBuildIndex(options: IndexBuilderOptions): Promise<IndexInitResult> {
  if (!options.forceRebuild && (await VectorIndex.exists(options.indexPath))) {
    try {
      const index = await VectorIndex.load(options.indexPath, { model: options.embedder.model });
      logIndexLoaded(options.indexPath, index.size, index.model);
      return { index, origin: "loaded", skipped: [] };
    } catch (err) {
      if (!(err instanceof IndexCorruptionError)) {
        throw err;
      }
      logIndexLoadFailed(options.indexPath, err.message);
    }
  }

  const { index, skipped } = await buildIndex(options);
  return { index, origin: "built", skipped };
}

/**
 * Full ingestion: load, chunk, embed, build, persist. A failing embedding
 * call aborts before anything is written.
 */
export async function buildIndex(
  options: IndexBuilderOptions,
): Promise<{ index: VectorIndex; skipped: IngestionError[] }> {
  validateChunkingOptions(options.chunking);

  const loader = options.loader ?? new DocumentLoader();
  const loaded = await loader.loadDirectory(options.docsPath);

  if (loaded.documents.length === 0) {
    const reasons = loaded.errors.map((error) =>
      error.sourceId ? `${error.sourceId}: ${error.message}` : error.message,
    );
    throw new IngestionError(
      reasons.length > 0
        ? `No document could be loaded from ${options.docsPath} (${reasons.join("; ")}).`
        : `No PDF documents found in ${options.docsPath}.`,
      null,
    );
  }

  const fragments = [...chunkDocuments(loaded.documents, options.chunking)];
  logChunked(loaded.documents.length, fragments.length, options.chunking.maxLength, options.chunking.overlap);

  const vectors = await options.embedder.embedBatch(
    fragments.map((fragment) => fragment.text),
    logEmbeddingProgress,
  );

  const index = VectorIndex.build(
    options.embedder.model,
    fragments.map((fragment, i) => ({ fragment, vector: vectors[i] ?? [] })),
  );
  logIndexBuilt(index.size, index.dimensions);

  await index.persist(options.indexPath);
  logIndexPersisted(options.indexPath);

  return { index, skipped: loaded.errors };
}
