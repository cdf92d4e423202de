import { ConfigError } from "../shared/errors.js";
import { DEFAULT_CHUNKING, validateChunkingOptions } from "../retrieval/chunker.js";
import { DEFAULT_TOP_K } from "../retrieval/retriever.js";
import type { ChunkingOptions } from "../retrieval/types.js";

export type Env = Record<string, string | undefined>;

export interface Settings {
  docsPath: string;
  indexPath: string;
  chunking: ChunkingOptions;
  topK: number;
  embeddingBatchSize: number;
  openai: {
    apiKey: string;
    baseUrl?: string;
    model: string;
    embeddingModel: string;
    temperature: number;
    timeoutMs: number;
    maxRetries: number;
  };
}

const DEFAULTS = {
  docsPath: "docs",
  indexPath: "vectorstore/index",
  model: "gpt-4",
  embeddingModel: "text-embedding-ada-002",
  temperature: 0,
  timeoutMs: 60_000,
  maxRetries: 0,
  embeddingBatchSize: 64,
} as const;

function readString(env: Env, name: string, fallback: string): string {
  const raw = env[name]?.trim();
  return raw && raw.length > 0 ? raw : fallback;
}

function readInt(env: Env, name: string, fallback: number, min: number): number {
  const raw = env[name]?.trim();
  if (!raw) return fallback;
  const parsed = Number(raw);
  if (!Number.isInteger(parsed) || parsed < min) {
    throw new ConfigError(`${name} must be an integer >= ${min}, got "${raw}".`, name);
  }
  return parsed;
}

function readNumber(env: Env, name: string, fallback: number, min: number, max: number): number {
  const raw = env[name]?.trim();
  if (!raw) return fallback;
  const parsed = Number(raw);
  if (!Number.isFinite(parsed) || parsed < min || parsed > max) {
    throw new ConfigError(`${name} must be a number between ${min} and ${max}, got "${raw}".`, name);
  }
  return parsed;
}

/** Reads the assistant settings from environment variables; throws {@link ConfigError} on bad values. */
export function loadSettings(env: Env = process.env): Settings {
  const apiKey = env["OPENAI_API_KEY"]?.trim();
  if (!apiKey) {
    throw new ConfigError("Missing OPENAI_API_KEY environment variable.", "OPENAI_API_KEY");
  }

  const chunking: ChunkingOptions = {
    maxLength: readInt(env, "CHUNK_SIZE", DEFAULT_CHUNKING.maxLength, 1),
    overlap: readInt(env, "CHUNK_OVERLAP", DEFAULT_CHUNKING.overlap, 0),
  };
  validateChunkingOptions(chunking);

  const baseUrl = env["OPENAI_BASE_URL"]?.trim();

  return {
    docsPath: readString(env, "DOCS_PATH", DEFAULTS.docsPath),
    indexPath: readString(env, "INDEX_PATH", DEFAULTS.indexPath),
    chunking,
    topK: readInt(env, "RETRIEVAL_TOP_K", DEFAULT_TOP_K, 1),
    embeddingBatchSize: readInt(env, "EMBEDDING_BATCH_SIZE", DEFAULTS.embeddingBatchSize, 1),
    openai: {
      apiKey,
      ...(baseUrl ? { baseUrl } : {}),
      model: readString(env, "OPENAI_MODEL", DEFAULTS.model),
      embeddingModel: readString(env, "OPENAI_EMBEDDING_MODEL", DEFAULTS.embeddingModel),
      temperature: readNumber(env, "OPENAI_TEMPERATURE", DEFAULTS.temperature, 0, 2),
      timeoutMs: readInt(env, "OPENAI_TIMEOUT_MS", DEFAULTS.timeoutMs, 1),
      maxRetries: readInt(env, "OPENAI_MAX_RETRIES", DEFAULTS.maxRetries, 0),
    },
  };
}
