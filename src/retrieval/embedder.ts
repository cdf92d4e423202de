import type { EmbeddingProvider } from "../core/contracts/provider.js";
import { ServiceError, errorMessage } from "../shared/errors.js";

export interface EmbedderOptions {
  provider: EmbeddingProvider;
  batchSize?: number;
}

export type EmbeddingProgress = (done: number, total: number) => void;

const DEFAULT_BATCH_SIZE = 64;

/**
 * Maps text to vectors through one embedding model. Every vector it hands out
 * has the dimensionality of the first one it saw; anything else, like any
 * provider failure, is a {@link ServiceError}.
 */
export class Embedder {
  private readonly provider: EmbeddingProvider;
  private readonly batchSize: number;
  private dimensions: number | null = null;

  constructor(options: EmbedderOptions) {
    this.provider = options.provider;
    this.batchSize = Math.max(1, Math.floor(options.batchSize ?? DEFAULT_BATCH_SIZE));
  }

  get model(): string {
    return this.provider.model;
  }

  async embed(text: string): Promise<number[]> {
    const [vector] = await this.request([text]);
    if (!vector) {
      throw new ServiceError("Embedding service returned no vector.", "embedding");
    }
    return vector;
  }

  async embedBatch(texts: string[], onProgress?: EmbeddingProgress): Promise<number[][]> {
    const vectors: number[][] = [];

    for (let i = 0; i < texts.length; i += this.batchSize) {
      const batch = texts.slice(i, i + this.batchSize);
      vectors.push(...(await this.request(batch)));
      onProgress?.(Math.min(i + this.batchSize, texts.length), texts.length);
    }

    return vectors;
  }

  private async request(texts: string[]): Promise<number[][]> {
    let vectors: number[][];
    try {
      const response = await this.provider.embed({ texts });
      vectors = response.vectors;
    } catch (err) {
      throw new ServiceError(`Embedding request failed: ${errorMessage(err)}`, "embedding", { cause: err });
    }

    if (vectors.length !== texts.length) {
      throw new ServiceError(
        `Embedding service returned ${vectors.length} vector(s) for ${texts.length} input(s).`,
        "embedding",
      );
    }

    for (const vector of vectors) {
      this.checkDimensions(vector);
    }
    return vectors;
  }

  private checkDimensions(vector: number[]): void {
    if (vector.length === 0) {
      throw new ServiceError("Embedding service returned an empty vector.", "embedding");
    }
    if (this.dimensions === null) {
      this.dimensions = vector.length;
      return;
    }
    if (vector.length !== this.dimensions) {
      throw new ServiceError(
        `Embedding dimension changed from ${this.dimensions} to ${vector.length}.`,
        "embedding",
      );
    }
  }
}
