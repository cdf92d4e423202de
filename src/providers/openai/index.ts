import type OpenAI from "openai";
import type { LlmProvider } from "../../core/contracts/provider.js";
import type { LlmMessage, LlmTurnInput, LlmTurnOutput } from "../../core/contracts/llm-protocol.js";
import { createOpenAiClient, type OpenAiClientOptions } from "./client.js";

export interface OpenAiLlmProviderOptions extends OpenAiClientOptions {
  model: string;
  temperature?: number;
}

function toOpenAiMessages(messages: LlmMessage[]): OpenAI.Chat.Completions.ChatCompletionMessageParam[] {
  const out: OpenAI.Chat.Completions.ChatCompletionMessageParam[] = [];

  for (const msg of messages) {
    switch (msg.role) {
      case "system":
      case "user":
      case "assistant":
        out.push({ role: msg.role, content: msg.content });
        break;
      default: {
        const unexpected: never = msg.role;
        throw new Error(`Unsupported message role: ${String(unexpected)}`);
      }
    }
  }

  return out;
}

export function createOpenAiLlmProvider(options: OpenAiLlmProviderOptions): LlmProvider {
  let client: OpenAI | null = null;

  return {
    name: "openai",
    version: "1.0.0",
    model: options.model,

    start() {
      client = createOpenAiClient(options);
    },

    stop() {
      client = null;
    },

    async generateTurn(input: LlmTurnInput): Promise<LlmTurnOutput> {
      if (!client) {
        throw new Error("OpenAI provider not started.");
      }

      const response = await client.chat.completions.create({
        model: options.model,
        messages: toOpenAiMessages(input.messages),
        ...(options.temperature !== undefined ? { temperature: options.temperature } : {}),
      });

      const reply = response.choices[0]?.message?.content;
      if (!reply) {
        throw new Error("Empty response from OpenAI.");
      }

      return {
        type: "assistant",
        content: reply,
      };
    },
  };
}
