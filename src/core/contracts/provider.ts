import type {
  EmbeddingRequest,
  EmbeddingResponse,
  LlmTurnInput,
  LlmTurnOutput,
} from "./llm-protocol.js";

export interface LlmProvider {
  name: string;
  version: string;
  model: string;
  start(): void | Promise<void>;
  stop(): void | Promise<void>;
  generateTurn(input: LlmTurnInput): Promise<LlmTurnOutput>;
}

export interface EmbeddingProvider {
  name: string;
  version: string;
  /** Identity the vectors are tied to; a persisted index built with another model is unusable. */
  model: string;
  start(): void | Promise<void>;
  stop(): void | Promise<void>;
  embed(request: EmbeddingRequest): Promise<EmbeddingResponse>;
}
