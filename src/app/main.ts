import { parseArgs } from "node:util";
import { AnswerFormatter } from "../answer/formatter.js";
import { loadSettings, type Settings } from "../config/settings.js";
import type { EmbeddingProvider, LlmProvider } from "../core/index.js";
import { Generator } from "../generation/generator.js";
import { createOpenAiLlmProvider } from "../providers/openai/index.js";
import { createOpenAiEmbeddingProvider } from "../providers/openai/embeddings.js";
import { Embedder } from "../retrieval/embedder.js";
import { loadOrBuildIndex, type IndexInitResult } from "../retrieval/index-builder.js";
import { Retriever } from "../retrieval/retriever.js";
import {
  ConfigError,
  IngestionError,
  ServiceError,
  devLog,
  devWarn,
  errorMessage,
  type ServiceKind,
} from "../shared/index.js";
import { StandardsAssistant } from "./assistant.js";
import { runInteractiveLoop } from "./repl.js";

export interface CliArgs {
  rebuild: boolean;
  question: string | null;
}

const SERVICE_LABELS: Record<ServiceKind, string> = {
  embedding: "embeddings",
  generation: "geração de respostas",
};

/** User-facing text for a failure while preparing the index; null for anything unexpected. */
export function startupFailureMessage(err: unknown): string | null {
  if (err instanceof IngestionError) {
    return `Não foi possível carregar as normas: ${err.message}`;
  }
  if (err instanceof ServiceError) {
    return `Falha no serviço de ${SERVICE_LABELS[err.service]} ao preparar as normas: ${err.message}`;
  }
  return null;
}

export function parseCliArgs(argv: string[]): CliArgs {
  const { values, positionals } = parseArgs({
    args: argv,
    options: {
      rebuild: { type: "boolean", default: false },
    },
    allowPositionals: true,
  });

  const question = positionals.join(" ").trim();
  return {
    rebuild: values.rebuild ?? false,
    question: question.length > 0 ? question : null,
  };
}

export async function main(argv: string[] = process.argv.slice(2)): Promise<void> {
  let args: CliArgs;
  try {
    args = parseCliArgs(argv);
  } catch (err) {
    console.error(errorMessage(err));
    console.error("Uso: normas-rag [--rebuild] [pergunta]");
    process.exitCode = 1;
    return;
  }

  let settings: Settings;
  try {
    settings = loadSettings();
  } catch (err) {
    if (err instanceof ConfigError) {
      console.error(`Configuração inválida (${err.key}): ${err.message}`);
      process.exitCode = 1;
      return;
    }
    throw err;
  }

  const clientOptions = {
    apiKey: settings.openai.apiKey,
    baseUrl: settings.openai.baseUrl,
    timeoutMs: settings.openai.timeoutMs,
    maxRetries: settings.openai.maxRetries,
  };
  const embeddingProvider: EmbeddingProvider = createOpenAiEmbeddingProvider({
    ...clientOptions,
    model: settings.openai.embeddingModel,
  });
  const llmProvider: LlmProvider = createOpenAiLlmProvider({
    ...clientOptions,
    model: settings.openai.model,
    temperature: settings.openai.temperature,
  });

  await embeddingProvider.start();
  await llmProvider.start();

  try {
    const embedder = new Embedder({ provider: embeddingProvider, batchSize: settings.embeddingBatchSize });

    let init: IndexInitResult;
    try {
      init = await loadOrBuildIndex({
        docsPath: settings.docsPath,
        indexPath: settings.indexPath,
        chunking: settings.chunking,
        embedder,
        forceRebuild: args.rebuild,
      });
    } catch (err) {
      const message = startupFailureMessage(err);
      if (message === null) {
        throw err;
      }
      console.error(message);
      process.exitCode = 1;
      return;
    }

    for (const skipped of init.skipped) {
      devWarn(`Document skipped: ${skipped.sourceId ?? "(collection)"}: ${skipped.message}`);
    }
    devLog(`Index ${init.origin}: ${init.index.size} fragment(s) from ${init.index.sources().length} document(s)`);

    const retriever = new Retriever({ embedder, index: init.index, topK: settings.topK });
    const assistant = new StandardsAssistant({
      retriever,
      generator: new Generator({ provider: llmProvider }),
      formatter: new AnswerFormatter({ knownSources: retriever.knownSources }),
    });

    if (args.question) {
      const reply = await assistant.ask(args.question);
      if (reply.kind === "answer") {
        console.log(reply.answer.text);
      } else {
        console.log(reply.message);
        process.exitCode = 1;
      }
      return;
    }

    await runInteractiveLoop({ input: process.stdin, output: process.stdout, assistant });
  } finally {
    await llmProvider.stop();
    await embeddingProvider.stop();
  }
}
