import type { SourceDocument } from "../documents/types.js";
import { documentText, pageAt, pageStartOffsets } from "../documents/document.js";
import { ConfigError } from "../shared/errors.js";
import type { ChunkingOptions, Fragment } from "./types.js";

export const DEFAULT_CHUNKING: ChunkingOptions = {
  maxLength: 1500,
  overlap: 200,
};

export function validateChunkingOptions(options: ChunkingOptions): void {
  if (!Number.isInteger(options.maxLength) || options.maxLength < 1) {
    throw new ConfigError(`Fragment max length must be a positive integer, got ${options.maxLength}.`, "CHUNK_SIZE");
  }
  if (!Number.isInteger(options.overlap) || options.overlap < 0) {
    throw new ConfigError(`Fragment overlap must be a non-negative integer, got ${options.overlap}.`, "CHUNK_OVERLAP");
  }
  if (options.overlap >= options.maxLength) {
    throw new ConfigError(
      `Fragment overlap (${options.overlap}) must be smaller than max length (${options.maxLength}).`,
      "CHUNK_OVERLAP",
    );
  }
}

/**
 * Slides a window of `maxLength` characters over the document text with a
 * stride of `maxLength - overlap`, so consecutive fragments share exactly
 * `overlap` characters. The last window ends at the end of the text.
 */
export function* chunkDocument(
  document: SourceDocument,
  options: ChunkingOptions = DEFAULT_CHUNKING,
): Generator<Fragment, void, undefined> {
  validateChunkingOptions(options);

  const text = documentText(document);
  if (text.length === 0) return;

  const offsets = pageStartOffsets(document);
  const stride = options.maxLength - options.overlap;

  for (let start = 0; ; start += stride) {
    const end = Math.min(start + options.maxLength, text.length);
    yield {
      sourceId: document.id,
      text: text.slice(start, end),
      startOffset: start,
      page: pageAt(offsets, start),
    };
    if (end >= text.length) return;
  }
}

export function* chunkDocuments(
  documents: Iterable<SourceDocument>,
  options: ChunkingOptions = DEFAULT_CHUNKING,
): Generator<Fragment, void, undefined> {
  for (const document of documents) {
    yield* chunkDocument(document, options);
  }
}
