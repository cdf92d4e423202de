import type { SourceDocument } from "./types.js";

export const PAGE_SEPARATOR = "\n";

export function documentText(document: SourceDocument): string {
  return document.pages.join(PAGE_SEPARATOR);
}

/** Start offset of every page inside {@link documentText}. */
export function pageStartOffsets(document: SourceDocument): number[] {
  const offsets: number[] = [];
  let cursor = 0;
  for (const page of document.pages) {
    offsets.push(cursor);
    cursor += page.length + PAGE_SEPARATOR.length;
  }
  return offsets;
}

/** 1-based page containing `offset`. */
export function pageAt(offsets: number[], offset: number): number {
  let page = 1;
  for (let i = 0; i < offsets.length; i++) {
    const start = offsets[i];
    if (start === undefined || start > offset) break;
    page = i + 1;
  }
  return page;
}
