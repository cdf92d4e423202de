import type { Embedder } from "./embedder.js";
import type { VectorIndex } from "./vector-index.js";
import type { RetrievalResult } from "./types.js";
import { ServiceError } from "../shared/errors.js";
import { logRetrieval } from "../shared/rag-logger.js";

export const DEFAULT_TOP_K = 4;

export interface RetrieverOptions {
  embedder: Embedder;
  index: VectorIndex;
  topK?: number;
}

export class Retriever {
  private readonly embedder: Embedder;
  private readonly index: VectorIndex;
  readonly topK: number;

  constructor(options: RetrieverOptions) {
    this.embedder = options.embedder;
    this.index = options.index;
    this.topK = options.topK ?? DEFAULT_TOP_K;
    if (!Number.isInteger(this.topK) || this.topK < 1) {
      throw new RangeError(`topK must be an integer >= 1, got ${this.topK}.`);
    }
  }

  get knownSources(): string[] {
    return this.index.sources();
  }

  async retrieve(question: string): Promise<RetrievalResult> {
    const vector = await this.embedder.embed(question);
    // A provider returning another width is a service fault, not a bad query.
    if (this.index.size > 0 && vector.length !== this.index.dimensions) {
      throw new ServiceError(
        `Query embedding has ${vector.length} dimensions; the index expects ${this.index.dimensions}.`,
        "embedding",
      );
    }
    const matches = this.index.search(vector, this.topK);
    logRetrieval(question, matches.length, matches[0]?.score ?? null);
    return matches;
  }
}
