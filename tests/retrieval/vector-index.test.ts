import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { mkdtemp, readdir, rm, writeFile } from "node:fs/promises";
import { join } from "node:path";
import { tmpdir } from "node:os";
import { VectorIndex } from "../../src/retrieval/vector-index.js";
import { IndexCorruptionError } from "../../src/shared/errors.js";
import { fragment } from "../helpers/fakes.js";

function sampleIndex(model = "model-a"): VectorIndex {
  return VectorIndex.build(model, [
    { fragment: fragment("a.pdf", "alpha"), vector: [1, 0] },
    { fragment: fragment("b.pdf", "beta"), vector: [0, 1] },
    { fragment: fragment("a.pdf", "gamma", 2, 10), vector: [1, 1] },
  ]);
}

describe("VectorIndex search", () => {
  it("orders matches by cosine similarity and truncates to k", () => {
    const result = sampleIndex().search([1, 0], 2);

    expect(result.map((m) => m.fragment.text)).toEqual(["alpha", "gamma"]);
    expect(result[0]?.score).toBeCloseTo(1, 6);
    expect(result[1]?.score).toBeCloseTo(Math.SQRT1_2, 6);
  });

  it("returns every fragment when k exceeds the size", () => {
    expect(sampleIndex().search([0, 1], 10)).toHaveLength(3);
  });

  it("keeps insertion order for equal scores", () => {
    const index = VectorIndex.build("m", [
      { fragment: fragment("first.pdf"), vector: [1, 1] },
      { fragment: fragment("second.pdf"), vector: [1, 1] },
    ]);

    expect(index.search([1, 1], 2).map((m) => m.fragment.sourceId)).toEqual(["first.pdf", "second.pdf"]);
  });

  it("scores a zero query vector as 0 everywhere", () => {
    const result = sampleIndex().search([0, 0], 3);

    expect(result.map((m) => m.score)).toEqual([0, 0, 0]);
    expect(result.map((m) => m.fragment.text)).toEqual(["alpha", "beta", "gamma"]);
  });

  it("returns nothing from an empty index", () => {
    expect(VectorIndex.build("m", []).search([1, 2], 3)).toEqual([]);
  });

  it("rejects an invalid k", () => {
    expect(() => sampleIndex().search([1, 0], 0)).toThrow(RangeError);
    expect(() => sampleIndex().search([1, 0], 1.5)).toThrow(RangeError);
  });

  it("rejects a query of the wrong dimensionality", () => {
    expect(() => sampleIndex().search([1, 0, 0], 1)).toThrow(RangeError);
  });

  it("rejects entries of mixed dimensionality", () => {
    expect(() =>
      VectorIndex.build("m", [
        { fragment: fragment("a.pdf"), vector: [1, 0] },
        { fragment: fragment("b.pdf"), vector: [1] },
      ]),
    ).toThrow(RangeError);
  });

  it("lists distinct sources in first-seen order", () => {
    expect(sampleIndex().sources()).toEqual(["a.pdf", "b.pdf"]);
    expect(sampleIndex().size).toBe(3);
  });
});

describe("VectorIndex persistence", () => {
  let tempDir = "";
  let location = "";

  beforeEach(async () => {
    tempDir = await mkdtemp(join(tmpdir(), "rag-index-"));
    location = join(tempDir, "index");
  });

  afterEach(async () => {
    if (tempDir) {
      await rm(tempDir, { recursive: true, force: true });
    }
  });

  it("loads back an index that answers queries identically", async () => {
    const original = VectorIndex.build("model-a", [
      { fragment: fragment("a.pdf", "alpha"), vector: [0.1, 0.2, 0.3] },
      { fragment: fragment("b.pdf", "beta", 4, 120), vector: [0.3, 0.1, 0.7] },
      { fragment: fragment("c.pdf", "gamma"), vector: [-0.5, 0.4, 0.05] },
    ]);
    await original.persist(location);

    const loaded = await VectorIndex.load(location, { model: "model-a" });

    expect(loaded.model).toBe("model-a");
    expect(loaded.dimensions).toBe(3);
    expect(loaded.size).toBe(3);
    expect(loaded.search([0.2, 0.2, 0.2], 3)).toEqual(original.search([0.2, 0.2, 0.2], 3));
    expect(loaded.search([1, -1, 0], 2)).toEqual(original.search([1, -1, 0], 2));
  });

  it("replaces a previous index without leaving staging directories behind", async () => {
    await sampleIndex().persist(location);
    await VectorIndex.build("model-a", [{ fragment: fragment("z.pdf"), vector: [1, 0] }]).persist(location);

    const loaded = await VectorIndex.load(location, { model: "model-a" });
    expect(loaded.sources()).toEqual(["z.pdf"]);
    expect(await readdir(tempDir)).toEqual(["index"]);
    expect((await readdir(location)).sort()).toEqual(["fragments.json", "vectors.bin"]);
  });

  it("reports whether an index exists", async () => {
    expect(await VectorIndex.exists(location)).toBe(false);
    await sampleIndex().persist(location);
    expect(await VectorIndex.exists(location)).toBe(true);
  });

  it("refuses an index built with another embedding model", async () => {
    await sampleIndex("model-a").persist(location);

    await expect(VectorIndex.load(location, { model: "model-b" })).rejects.toThrow(
      'Index was built with embedding model "model-a" but "model-b" is configured.',
    );
  });

  it("treats a missing artifact as corruption", async () => {
    await sampleIndex().persist(location);
    await rm(join(location, "vectors.bin"));

    expect(await VectorIndex.exists(location)).toBe(true);
    await expect(VectorIndex.load(location, { model: "model-a" })).rejects.toBeInstanceOf(IndexCorruptionError);
  });

  it("treats malformed fragment metadata as corruption", async () => {
    await sampleIndex().persist(location);
    await writeFile(join(location, "fragments.json"), "{not json", "utf8");

    await expect(VectorIndex.load(location, { model: "model-a" })).rejects.toThrow("fragments.json is not valid JSON.");
  });

  it("treats a truncated vector file as corruption", async () => {
    await sampleIndex().persist(location);
    await writeFile(join(location, "vectors.bin"), Buffer.alloc(3));

    await expect(VectorIndex.load(location, { model: "model-a" })).rejects.toThrow(
      "vectors.bin holds 3 bytes; expected 24.",
    );
  });
});
