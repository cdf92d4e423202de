import { AnswerFormatter } from "../answer/formatter.js";
import type { Answer } from "../answer/types.js";
import type { Generator } from "../generation/generator.js";
import { assemblePrompt } from "../prompt/assembler.js";
import type { Retriever } from "../retrieval/retriever.js";
import { ServiceError, devError } from "../shared/index.js";

export const SERVICE_FAILURE_MESSAGE = "Ocorreu um erro ao processar sua pergunta. Por favor, tente novamente.";

export interface StandardsAssistantOptions {
  retriever: Retriever;
  generator: Generator;
  formatter?: AnswerFormatter;
}

export type AssistantReply =
  | { kind: "answer"; answer: Answer }
  | { kind: "failure"; message: string; error: ServiceError };

/**
 * One question in, one grounded answer out: retrieve, assemble, generate,
 * format. A service failure ends only the current turn.
 */
export class StandardsAssistant {
  private readonly retriever: Retriever;
  private readonly generator: Generator;
  private readonly formatter: AnswerFormatter;

  constructor(options: StandardsAssistantOptions) {
    this.retriever = options.retriever;
    this.generator = options.generator;
    this.formatter = options.formatter ?? new AnswerFormatter({ knownSources: options.retriever.knownSources });
  }

  async ask(question: string): Promise<AssistantReply> {
    try {
      const retrieval = await this.retriever.retrieve(question);
      const prompt = assemblePrompt(question, retrieval);
      const raw = await this.generator.generate(prompt);
      return { kind: "answer", answer: this.formatter.format(raw, retrieval) };
    } catch (err) {
      if (err instanceof ServiceError) {
        devError(`${err.service} service failed:`, err.message);
        return { kind: "failure", message: SERVICE_FAILURE_MESSAGE, error: err };
      }
      throw err;
    }
  }
}
