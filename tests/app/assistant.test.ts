import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { mkdtemp, rm } from "node:fs/promises";
import { join } from "node:path";
import { tmpdir } from "node:os";
import { SERVICE_FAILURE_MESSAGE, StandardsAssistant, type AssistantReply } from "../../src/app/assistant.js";
import { REFUSAL_MESSAGE } from "../../src/answer/refusal.js";
import type { Answer } from "../../src/answer/types.js";
import { DocumentLoader } from "../../src/documents/document-loader.js";
import { Generator } from "../../src/generation/generator.js";
import { Embedder } from "../../src/retrieval/embedder.js";
import { loadOrBuildIndex } from "../../src/retrieval/index-builder.js";
import { Retriever } from "../../src/retrieval/retriever.js";
import { FakeEmbeddingProvider, FakeLlmProvider, TextExtractor, writeDocs, type Responder } from "../helpers/fakes.js";

const A_PAGES = ["O aterramento deve ser feito com haste de cobre.", "O disjuntor deve ser dimensionado pela corrente."];
const B_TEXT = "A iluminação de emergência deve durar uma hora.";

function answerOf(reply: AssistantReply): Answer {
  if (reply.kind !== "answer") {
    throw new Error(`expected an answer, got: ${reply.message}`);
  }
  return reply.answer;
}

describe("StandardsAssistant", () => {
  let tempDir = "";
  let embeddingProvider: FakeEmbeddingProvider;

  beforeEach(async () => {
    tempDir = await mkdtemp(join(tmpdir(), "rag-assistant-"));
    await writeDocs(join(tempDir, "docs"), { "A.pdf": A_PAGES.join("\f"), "B.pdf": B_TEXT });
    embeddingProvider = new FakeEmbeddingProvider();
  });

  afterEach(async () => {
    if (tempDir) {
      await rm(tempDir, { recursive: true, force: true });
    }
  });

  async function createAssistant(
    llm: FakeLlmProvider,
    queryProvider: FakeEmbeddingProvider = embeddingProvider,
  ): Promise<StandardsAssistant> {
    const { index } = await loadOrBuildIndex({
      docsPath: join(tempDir, "docs"),
      indexPath: join(tempDir, "index"),
      chunking: { maxLength: 1500, overlap: 200 },
      embedder: new Embedder({ provider: embeddingProvider }),
      loader: new DocumentLoader({ extractors: [new TextExtractor()] }),
    });
    return new StandardsAssistant({
      retriever: new Retriever({ embedder: new Embedder({ provider: queryProvider }), index }),
      generator: new Generator({ provider: llm }),
    });
  }

  it("cites only the document that holds the answer", async () => {
    const assistant = await createAssistant(new FakeLlmProvider());

    const answer = answerOf(await assistant.ask("Quanto tempo dura a iluminação de emergência?"));

    expect(answer.text).toBe(`De acordo com a norma: ${B_TEXT} (Fonte: B.pdf)`);
    expect(answer.citedSources).toEqual(new Set(["B.pdf"]));
  });

  it("answers from a multi-page document", async () => {
    const assistant = await createAssistant(new FakeLlmProvider());

    const answer = answerOf(await assistant.ask("Como deve ser feito o aterramento?"));

    expect(answer.text).toBe(`De acordo com a norma: ${A_PAGES.join("\n")} (Fonte: A.pdf)`);
    expect(answer.citedSources).toEqual(new Set(["A.pdf"]));
  });

  it("refuses a question the standards do not cover", async () => {
    const assistant = await createAssistant(new FakeLlmProvider());

    const answer = answerOf(await assistant.ask("Qual é a capital da França?"));

    expect(answer.text).toBe(REFUSAL_MESSAGE);
    expect(answer.citedSources.size).toBe(0);
  });

  it("adds the retrieved sources when the model forgets to cite", async () => {
    const uncited: Responder = () => "Use haste de cobre.";
    const assistant = await createAssistant(new FakeLlmProvider(uncited));

    const answer = answerOf(await assistant.ask("Como deve ser feito o aterramento?"));

    expect(answer.text).toBe("Use haste de cobre.\n(Fonte: A.pdf, B.pdf)");
    expect(answer.citedSources).toEqual(new Set(["A.pdf", "B.pdf"]));
  });

  it("sends the retrieved fragments to the model, best match first", async () => {
    const llm = new FakeLlmProvider();
    const assistant = await createAssistant(llm);

    await assistant.ask("Quanto tempo dura a iluminação de emergência?");

    const user = llm.inputs[0]?.messages[1]?.content ?? "";
    expect(user.indexOf("[Fonte: B.pdf | página 1]")).toBeLessThan(user.indexOf("[Fonte: A.pdf | página 1]"));
    expect(user.endsWith("# Pergunta\n\nQuanto tempo dura a iluminação de emergência?")).toBe(true);
  });

  it("reports a generation failure and stays usable", async () => {
    const llm = new FakeLlmProvider();
    const assistant = await createAssistant(llm);

    llm.failWith = new Error("rate limited");
    const failed = await assistant.ask("Como deve ser feito o aterramento?");
    expect(failed).toMatchObject({ kind: "failure", message: SERVICE_FAILURE_MESSAGE });
    expect(failed.kind === "failure" && failed.error.service).toBe("generation");

    llm.failWith = null;
    const answer = answerOf(await assistant.ask("Como deve ser feito o aterramento?"));
    expect(answer.citedSources).toEqual(new Set(["A.pdf"]));
  });

  it("reports an embedding failure during a question", async () => {
    const assistant = await createAssistant(new FakeLlmProvider());

    embeddingProvider.failWith = new Error("connection reset");
    const failed = await assistant.ask("Como deve ser feito o aterramento?");

    expect(failed).toMatchObject({ kind: "failure", message: SERVICE_FAILURE_MESSAGE });
    expect(failed.kind === "failure" && failed.error.service).toBe("embedding");
  });

  it("reports a query embedding that does not match the index width as a failure", async () => {
    const narrow = new FakeEmbeddingProvider("fake-embedding-model", () => [1, 0]);
    const llm = new FakeLlmProvider();
    const assistant = await createAssistant(llm, narrow);

    const failed = await assistant.ask("Como deve ser feito o aterramento?");

    expect(failed).toMatchObject({ kind: "failure", message: SERVICE_FAILURE_MESSAGE });
    expect(failed.kind === "failure" && failed.error.service).toBe("embedding");
    expect(failed.kind === "failure" && failed.error.message).toBe(
      "Query embedding has 2 dimensions; the index expects 3.",
    );
    expect(llm.inputs).toEqual([]);
  });
});
