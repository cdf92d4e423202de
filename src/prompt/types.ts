import type { LlmMessage } from "../core/contracts/llm-protocol.js";

export type PromptSectionId = "directive" | "fragments" | "question";

export interface PromptSectionMetadata {
  id: PromptSectionId;
  bytes: number;
  included: boolean;
  reason?: string;
}

export interface AssembledPrompt {
  messages: LlmMessage[];
  sections: PromptSectionMetadata[];
}
