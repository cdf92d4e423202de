import type OpenAI from "openai";
import type { EmbeddingProvider } from "../../core/contracts/provider.js";
import type { EmbeddingRequest, EmbeddingResponse } from "../../core/contracts/llm-protocol.js";
import { createOpenAiClient, type OpenAiClientOptions } from "./client.js";

export interface OpenAiEmbeddingProviderOptions extends OpenAiClientOptions {
  model: string;
}

export function createOpenAiEmbeddingProvider(options: OpenAiEmbeddingProviderOptions): EmbeddingProvider {
  let client: OpenAI | null = null;

  return {
    name: "openai-embeddings",
    version: "1.0.0",
    model: options.model,

    start() {
      client = createOpenAiClient(options);
    },

    stop() {
      client = null;
    },

    async embed(request: EmbeddingRequest): Promise<EmbeddingResponse> {
      if (!client) {
        throw new Error("OpenAI embedding provider not started.");
      }
      if (request.texts.length === 0) {
        return { model: options.model, vectors: [] };
      }

      const response = await client.embeddings.create({
        model: options.model,
        input: request.texts,
      });

      // The API may return rows out of request order; `index` is authoritative.
      const vectors = [...response.data]
        .sort((a, b) => a.index - b.index)
        .map((row) => row.embedding);

      return { model: options.model, vectors };
    },
  };
}
