/**
 * Pipeline logger.
 *
 * Every line prints a bright green [RAG] prefix followed by a category:
 *   INGEST: document discovery, extraction, chunking
 *   INDEX: index load / build / persist
 *   QUERY: retrieval and answer formatting per question
 *   MODEL: embedding and generation calls
 */

import { isLogEnabled } from "./debug-log.js";

const R = "\x1b[0m";
const GREEN = "\x1b[32m";
const DIM = "\x1b[2m";
const BOLD = "\x1b[1m";
const CYAN = "\x1b[36m";
const YELLOW = "\x1b[33m";
const MAGENTA = "\x1b[35m";
const WHITE = "\x1b[37m";

type Category = "INGEST" | "INDEX" | "QUERY" | "MODEL";

const CATEGORY_COLORS: Record<Category, string> = {
  INGEST: CYAN,
  INDEX: MAGENTA,
  QUERY: YELLOW,
  MODEL: WHITE,
};

function ts(): string {
  return new Date().toISOString().slice(11, 23); // HH:MM:SS.mmm
}

function ragLog(category: Category, message: string, detail?: Record<string, unknown>): void {
  if (!isLogEnabled()) return;

  const color = CATEGORY_COLORS[category];
  const prefix = `${GREEN}${BOLD}[RAG]${R}`;
  const cat = `${color}${category.padEnd(6)}${R}`;
  const time = `${DIM}${ts()}${R}`;

  if (detail) {
    const parts = Object.entries(detail)
      .map(([k, v]) => `${DIM}${k}=${R}${formatValue(v)}`)
      .join(" ");
    console.error(`${prefix} ${time} ${cat} ${message}  ${parts}`);
  } else {
    console.error(`${prefix} ${time} ${cat} ${message}`);
  }
}

function formatValue(v: unknown): string {
  if (v === null || v === undefined) return `${DIM}null${R}`;
  if (typeof v === "string") {
    if (v.length > 80) return `"${v.slice(0, 77)}..."`;
    return `"${v}"`;
  }
  if (typeof v === "number" || typeof v === "boolean") return String(v);
  return JSON.stringify(v);
}

// ── Ingestion ──────────────────────────────────────────────

export function logIngestStart(docsPath: string, fileCount: number): void {
  ragLog("INGEST", "▶ Loading documents", { dir: docsPath, files: fileCount });
}

export function logDocumentLoaded(sourceId: string, pages: number, chars: number): void {
  ragLog("INGEST", "+ Document loaded", { source: sourceId, pages, chars });
}

export function logDocumentSkipped(sourceId: string, reason: string): void {
  ragLog("INGEST", "⚠ Document SKIPPED", { source: sourceId, reason });
}

export function logChunked(documents: number, fragments: number, maxLength: number, overlap: number): void {
  ragLog("INGEST", "✂ Documents chunked", { documents, fragments, maxLength, overlap });
}

// ── Index ──────────────────────────────────────────────────

export function logIndexLoaded(location: string, fragments: number, model: string): void {
  ragLog("INDEX", "📖 Persisted index LOADED", { location, fragments, model });
}

export function logIndexLoadFailed(location: string, reason: string): void {
  ragLog("INDEX", "⚠ Persisted index unusable, rebuilding", { location, reason });
}

export function logIndexBuilt(fragments: number, dimensions: number): void {
  ragLog("INDEX", "★ Index BUILT", { fragments, dimensions });
}

export function logIndexPersisted(location: string): void {
  ragLog("INDEX", "💾 Index PERSISTED", { location });
}

// ── Query ──────────────────────────────────────────────────

export function logRetrieval(question: string, matches: number, topScore: number | null): void {
  ragLog("QUERY", "🔎 Retrieved fragments", {
    question,
    matches,
    topScore: topScore === null ? null : Math.round(topScore * 1000) / 1000,
  });
}

export function logAnswer(refused: boolean, citedSources: Iterable<string>, appendedCitation: boolean): void {
  ragLog("QUERY", refused ? "∅ Answer REFUSED" : "✓ Answer ready", {
    cited: [...citedSources].join(", "),
    appendedCitation,
  });
}

// ── Model ──────────────────────────────────────────────────

export function logEmbeddingProgress(done: number, total: number): void {
  ragLog("MODEL", "Embedding progress", { done, total });
}

export function logGeneration(model: string, promptChars: number, elapsedMs: number): void {
  ragLog("MODEL", "Generation complete", { model, promptChars, elapsedMs });
}
