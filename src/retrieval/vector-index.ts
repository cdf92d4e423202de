import { mkdir, mkdtemp, readFile, rename, rm, stat, writeFile } from "node:fs/promises";
import { basename, dirname, join, resolve } from "node:path";
import { IndexCorruptionError, errorMessage } from "../shared/errors.js";
import type { EmbeddedFragment, Fragment, RetrievalResult } from "./types.js";

const FORMAT_VERSION = 1;
const VECTORS_FILE = "vectors.bin";
const FRAGMENTS_FILE = "fragments.json";
const FLOAT_BYTES = 4;

interface IndexManifest {
  formatVersion: number;
  model: string;
  dimensions: number;
  count: number;
  createdAt: string;
  fragments: Fragment[];
}

export interface LoadIndexOptions {
  /** Embedding model the caller will query with; a different one makes the index unusable. */
  model: string;
}

/**
 * Fragments plus their embedding vectors, searched by cosine similarity.
 *
 * Vectors are held as float32, the same precision they are persisted with,
 * so a loaded index scores queries exactly like the one that was saved.
 * Instances never change after construction.
 */
export class VectorIndex {
  private readonly norms: Float64Array;

  private constructor(
    readonly model: string,
    readonly dimensions: number,
    private readonly fragments: readonly Fragment[],
    private readonly matrix: Float32Array,
  ) {
    this.norms = new Float64Array(fragments.length);
    for (let row = 0; row < fragments.length; row++) {
      let sum = 0;
      const offset = row * dimensions;
      for (let col = 0; col < dimensions; col++) {
        const value = matrix[offset + col] ?? 0;
        sum += value * value;
      }
      this.norms[row] = Math.sqrt(sum);
    }
  }

  static build(model: string, entries: readonly EmbeddedFragment[]): VectorIndex {
    const dimensions = entries[0]?.vector.length ?? 0;
    const matrix = new Float32Array(entries.length * dimensions);

    entries.forEach((entry, row) => {
      if (entry.vector.length !== dimensions) {
        throw new RangeError(
          `Fragment ${row} has ${entry.vector.length} dimensions; the index expects ${dimensions}.`,
        );
      }
      matrix.set(entry.vector, row * dimensions);
    });

    return new VectorIndex(
      model,
      dimensions,
      entries.map((entry) => ({ ...entry.fragment })),
      matrix,
    );
  }

  static async exists(location: string): Promise<boolean> {
    const target = resolve(location);
    const found = await Promise.all([
      pathExists(join(target, FRAGMENTS_FILE)),
      pathExists(join(target, VECTORS_FILE)),
    ]);
    return found.some(Boolean);
  }

  /** Both artifacts load together or not at all. */
  static async load(location: string, options: LoadIndexOptions): Promise<VectorIndex> {
    const target = resolve(location);

    let manifestText: string;
    let vectorBytes: Buffer;
    try {
      [manifestText, vectorBytes] = await Promise.all([
        readFile(join(target, FRAGMENTS_FILE), "utf8"),
        readFile(join(target, VECTORS_FILE)),
      ]);
    } catch (err) {
      throw new IndexCorruptionError(`Index artifact missing or unreadable: ${errorMessage(err)}`, target, {
        cause: err,
      });
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(manifestText);
    } catch (err) {
      throw new IndexCorruptionError(`${FRAGMENTS_FILE} is not valid JSON.`, target, { cause: err });
    }

    const manifest = parseManifest(parsed, target);
    if (manifest.model !== options.model) {
      throw new IndexCorruptionError(
        `Index was built with embedding model "${manifest.model}" but "${options.model}" is configured.`,
        target,
      );
    }

    const expectedBytes = manifest.count * manifest.dimensions * FLOAT_BYTES;
    if (vectorBytes.length !== expectedBytes) {
      throw new IndexCorruptionError(
        `${VECTORS_FILE} holds ${vectorBytes.length} bytes; expected ${expectedBytes}.`,
        target,
      );
    }

    const matrix = new Float32Array(manifest.count * manifest.dimensions);
    for (let i = 0; i < matrix.length; i++) {
      matrix[i] = vectorBytes.readFloatLE(i * FLOAT_BYTES);
    }

    return new VectorIndex(manifest.model, manifest.dimensions, manifest.fragments, matrix);
  }

  get size(): number {
    return this.fragments.length;
  }

  /** Distinct source ids in first-seen order. */
  sources(): string[] {
    return [...new Set(this.fragments.map((fragment) => fragment.sourceId))];
  }

  search(queryVector: readonly number[], k: number): RetrievalResult {
    if (!Number.isInteger(k) || k < 1) {
      throw new RangeError(`k must be an integer >= 1, got ${k}.`);
    }
    if (this.fragments.length === 0) {
      return [];
    }
    if (queryVector.length !== this.dimensions) {
      throw new RangeError(
        `Query vector has ${queryVector.length} dimensions; the index expects ${this.dimensions}.`,
      );
    }

    let queryNormSq = 0;
    for (const value of queryVector) {
      queryNormSq += value * value;
    }
    const queryNorm = Math.sqrt(queryNormSq);

    const scored = this.fragments.map((_, row) => ({ row, score: this.cosine(queryVector, queryNorm, row) }));
    scored.sort((a, b) => b.score - a.score || a.row - b.row);

    return scored.slice(0, k).map(({ row, score }) => {
      const fragment = this.fragments[row];
      if (!fragment) {
        throw new RangeError(`No fragment at row ${row}.`);
      }
      return { fragment: { ...fragment }, score };
    });
  }

  /**
   * Writes both artifacts into a sibling staging directory and renames it
   * over `location`, so an interrupted persist never leaves a loadable
   * half-written index behind.
   */
  async persist(location: string): Promise<void> {
    const target = resolve(location);
    const parent = dirname(target);
    await mkdir(parent, { recursive: true });

    const staging = await mkdtemp(join(parent, `.${basename(target)}.staging-`));
    try {
      const manifest: IndexManifest = {
        formatVersion: FORMAT_VERSION,
        model: this.model,
        dimensions: this.dimensions,
        count: this.fragments.length,
        createdAt: new Date().toISOString(),
        fragments: [...this.fragments],
      };

      const bytes = Buffer.alloc(this.matrix.length * FLOAT_BYTES);
      for (let i = 0; i < this.matrix.length; i++) {
        bytes.writeFloatLE(this.matrix[i] ?? 0, i * FLOAT_BYTES);
      }

      await writeFile(join(staging, VECTORS_FILE), bytes);
      await writeFile(join(staging, FRAGMENTS_FILE), JSON.stringify(manifest), "utf8");
      await replaceDirectory(staging, target);
    } catch (err) {
      await rm(staging, { recursive: true, force: true });
      throw err;
    }
  }

  private cosine(query: readonly number[], queryNorm: number, row: number): number {
    const rowNorm = this.norms[row] ?? 0;
    if (queryNorm === 0 || rowNorm === 0) {
      return 0;
    }

    let dot = 0;
    const offset = row * this.dimensions;
    for (let col = 0; col < this.dimensions; col++) {
      dot += (query[col] ?? 0) * (this.matrix[offset + col] ?? 0);
    }
    return dot / (queryNorm * rowNorm);
  }
}

async function replaceDirectory(staging: string, target: string): Promise<void> {
  if (!(await pathExists(target))) {
    await rename(staging, target);
    return;
  }

  const retired = `${target}.old-${process.pid}-${Date.now()}`;
  await rename(target, retired);
  try {
    await rename(staging, target);
  } catch (err) {
    await rename(retired, target);
    throw err;
  }
  await rm(retired, { recursive: true, force: true });
}

async function pathExists(path: string): Promise<boolean> {
  try {
    await stat(path);
    return true;
  } catch {
    return false;
  }
}

function parseManifest(value: unknown, location: string): IndexManifest {
  if (!value || typeof value !== "object") {
    throw new IndexCorruptionError(`${FRAGMENTS_FILE} is not an object.`, location);
  }

  const row = value as Record<string, unknown>;
  const { formatVersion, model, dimensions, count, createdAt, fragments } = row;

  if (formatVersion !== FORMAT_VERSION) {
    throw new IndexCorruptionError(`Unsupported index format version: ${String(formatVersion)}.`, location);
  }
  if (
    typeof model !== "string" ||
    !isNonNegativeInteger(dimensions) ||
    !isNonNegativeInteger(count) ||
    typeof createdAt !== "string" ||
    !Array.isArray(fragments)
  ) {
    throw new IndexCorruptionError(`${FRAGMENTS_FILE} is missing required fields.`, location);
  }

  const parsedFragments = fragments.filter(isFragment);
  if (parsedFragments.length !== fragments.length || parsedFragments.length !== count) {
    throw new IndexCorruptionError(
      `${FRAGMENTS_FILE} lists ${parsedFragments.length} valid fragment(s) but declares ${count}.`,
      location,
    );
  }

  return { formatVersion, model, dimensions, count, createdAt, fragments: parsedFragments };
}

function isNonNegativeInteger(value: unknown): value is number {
  return typeof value === "number" && Number.isInteger(value) && value >= 0;
}

function isFragment(value: unknown): value is Fragment {
  if (!value || typeof value !== "object") {
    return false;
  }

  const row = value as Record<string, unknown>;
  return (
    typeof row["sourceId"] === "string" &&
    typeof row["text"] === "string" &&
    isNonNegativeInteger(row["startOffset"]) &&
    isNonNegativeInteger(row["page"])
  );
}
