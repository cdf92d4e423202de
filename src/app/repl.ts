import readline from "node:readline";
import type { StandardsAssistant } from "./assistant.js";

export const BANNER = "--- Assistente de Normas Técnicas ---";
export const PROMPT = "\nSua pergunta: ";
export const EMPTY_QUESTION_MESSAGE = "Por favor, digite uma pergunta.";
export const GOODBYE_MESSAGE = "Até logo!";
const DEFAULT_EXIT_TOKENS = ["sair", "exit"];

export interface InteractiveLoopOptions {
  input: NodeJS.ReadableStream;
  output: NodeJS.WritableStream;
  assistant: Pick<StandardsAssistant, "ask">;
  exitTokens?: string[];
}

export function isExitCommand(line: string, exitTokens: readonly string[] = DEFAULT_EXIT_TOKENS): boolean {
  const normalized = line.trim().toLowerCase();
  return exitTokens.some((token) => token.toLowerCase() === normalized);
}

/** Reads one question per line until an exit word or end of input. */
export async function runInteractiveLoop(options: InteractiveLoopOptions): Promise<void> {
  const { input, output, assistant } = options;
  const exitTokens = options.exitTokens ?? DEFAULT_EXIT_TOKENS;
  const write = (text: string): void => {
    output.write(text);
  };

  const rl = readline.createInterface({ input, terminal: false });

  write(`${BANNER}\n`);
  write(`Digite "${exitTokens[0] ?? "sair"}" para encerrar.\n`);
  write(PROMPT);

  try {
    for await (const line of rl) {
      if (isExitCommand(line, exitTokens)) {
        break;
      }

      const question = line.trim();
      if (question.length === 0) {
        write(`${EMPTY_QUESTION_MESSAGE}\n`);
        write(PROMPT);
        continue;
      }

      const reply = await assistant.ask(question);
      const text = reply.kind === "answer" ? reply.answer.text : reply.message;
      write(`\nAssistente: ${text}\n`);
      write(PROMPT);
    }
  } finally {
    rl.close();
  }

  write(`\n${GOODBYE_MESSAGE}\n`);
}
