/**
 * Colour-coded diagnostic logger.
 *
 * Lines carry a bright magenta [RAG] prefix and go to stderr, so the
 * question/answer transcript on stdout stays readable:
 *
 *   normas-rag 2>rag.log
 *
 * Set RAG_LOG=0 to silence every diagnostic line.
 */

const RESET = "\x1b[0m";
const MAGENTA = "\x1b[35m";
const CYAN = "\x1b[36m";
const YELLOW = "\x1b[33m";
const RED = "\x1b[31m";

const PREFIX = `${MAGENTA}[RAG]${RESET}`;

export function isLogEnabled(): boolean {
  return process.env["RAG_LOG"] !== "0";
}

export function devLog(...args: unknown[]): void {
  if (!isLogEnabled()) return;
  console.error(PREFIX, `${CYAN}INFO${RESET}`, ...args);
}

export function devWarn(...args: unknown[]): void {
  if (!isLogEnabled()) return;
  console.error(PREFIX, `${YELLOW}WARN${RESET}`, ...args);
}

export function devError(...args: unknown[]): void {
  if (!isLogEnabled()) return;
  console.error(PREFIX, `${RED}ERROR${RESET}`, ...args);
}
