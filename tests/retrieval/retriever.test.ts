import { describe, expect, it } from "vitest";
import { Embedder } from "../../src/retrieval/embedder.js";
import { Retriever } from "../../src/retrieval/retriever.js";
import { VectorIndex } from "../../src/retrieval/vector-index.js";
import { ServiceError } from "../../src/shared/errors.js";
import { FakeEmbeddingProvider, fragment, keywordVector } from "../helpers/fakes.js";

function buildIndex(): VectorIndex {
  const texts: Array<[string, string]> = [
    ["A.pdf", "O aterramento deve usar haste de cobre."],
    ["B.pdf", "A iluminação de emergência dura uma hora."],
    ["C.pdf", "O disjuntor protege o circuito contra aterramento falho."],
  ];
  return VectorIndex.build(
    "fake-embedding-model",
    texts.map(([source, text]) => ({ fragment: fragment(source, text), vector: keywordVector(text) })),
  );
}

describe("Retriever", () => {
  it("returns the k closest fragments, best first", async () => {
    const retriever = new Retriever({
      embedder: new Embedder({ provider: new FakeEmbeddingProvider() }),
      index: buildIndex(),
      topK: 2,
    });

    const result = await retriever.retrieve("Como fazer o aterramento?");

    expect(result.map((m) => m.fragment.sourceId)).toEqual(["A.pdf", "C.pdf"]);
    expect(result[0]?.score).toBeCloseTo(1, 6);
    expect(result[1]?.score).toBeCloseTo(Math.SQRT1_2, 6);
  });

  it("defaults to four fragments", async () => {
    const retriever = new Retriever({
      embedder: new Embedder({ provider: new FakeEmbeddingProvider() }),
      index: buildIndex(),
    });

    expect(retriever.topK).toBe(4);
    expect(await retriever.retrieve("disjuntor")).toHaveLength(3);
  });

  it("embeds the question again on every call", async () => {
    const provider = new FakeEmbeddingProvider();
    const retriever = new Retriever({ embedder: new Embedder({ provider }), index: buildIndex() });

    await retriever.retrieve("aterramento");
    await retriever.retrieve("aterramento");

    expect(provider.calls).toEqual([["aterramento"], ["aterramento"]]);
  });

  it("exposes the sources of the whole index", () => {
    const retriever = new Retriever({
      embedder: new Embedder({ provider: new FakeEmbeddingProvider() }),
      index: buildIndex(),
    });

    expect(retriever.knownSources).toEqual(["A.pdf", "B.pdf", "C.pdf"]);
  });

  it("reports a query embedding of the wrong width as an embedding service failure", async () => {
    const retriever = new Retriever({
      embedder: new Embedder({ provider: new FakeEmbeddingProvider("fake-embedding-model", () => [1, 0]) }),
      index: buildIndex(),
    });

    const failure = retriever.retrieve("aterramento");

    await expect(failure).rejects.toBeInstanceOf(ServiceError);
    await expect(failure).rejects.toMatchObject({
      service: "embedding",
      message: "Query embedding has 2 dimensions; the index expects 3.",
    });
  });

  it("rejects an invalid topK", () => {
    expect(
      () =>
        new Retriever({
          embedder: new Embedder({ provider: new FakeEmbeddingProvider() }),
          index: buildIndex(),
          topK: 0,
        }),
    ).toThrow(RangeError);
  });
});
