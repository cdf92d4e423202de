export type { LlmProvider, EmbeddingProvider } from "./contracts/provider.js";
export type {
  EmbeddingRequest,
  EmbeddingResponse,
  LlmMessage,
  LlmTurnInput,
  LlmTurnOutput,
} from "./contracts/llm-protocol.js";
