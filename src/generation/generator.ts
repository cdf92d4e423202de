import type { LlmProvider } from "../core/contracts/provider.js";
import type { AssembledPrompt } from "../prompt/types.js";
import { ServiceError, errorMessage } from "../shared/errors.js";
import { logGeneration } from "../shared/rag-logger.js";

export interface GeneratorOptions {
  provider: LlmProvider;
}

/** One request, one raw answer. Timeouts and retries belong to the provider's client. */
export class Generator {
  private readonly provider: LlmProvider;

  constructor(options: GeneratorOptions) {
    this.provider = options.provider;
  }

  async generate(prompt: AssembledPrompt): Promise<string> {
    const startedAt = Date.now();

    let content: string;
    try {
      const output = await this.provider.generateTurn({ messages: prompt.messages });
      content = output.content;
    } catch (err) {
      throw new ServiceError(`Generation request failed: ${errorMessage(err)}`, "generation", { cause: err });
    }

    const promptChars = prompt.messages.reduce((sum, message) => sum + message.content.length, 0);
    logGeneration(this.provider.model, promptChars, Date.now() - startedAt);
    return content;
  }
}
