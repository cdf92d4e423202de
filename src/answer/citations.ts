import type { CitationExtraction } from "./types.js";

const FILENAME_CHAR = /[\p{L}\p{N}_.-]/u;

function fold(value: string): string {
  return value.normalize("NFC").toLocaleLowerCase("pt-BR");
}

function containsStandalone(haystack: string, needle: string): boolean {
  let from = 0;
  while (from <= haystack.length - needle.length) {
    const at = haystack.indexOf(needle, from);
    if (at === -1) return false;

    const before = at > 0 ? haystack.charAt(at - 1) : "";
    const after = haystack.charAt(at + needle.length);
    const startsClean = before === "" || !FILENAME_CHAR.test(before);
    const endsClean = after === "" || !/[\p{L}\p{N}_]/u.test(after);
    if (startsClean && endsClean) return true;

    from = at + 1;
  }
  return false;
}

/**
 * Best-effort scan of free-form model output for cited source files.
 *
 * Only known source ids count, matched case-insensitively wherever they
 * stand alone in the text; a file name outside the corpus is not a
 * citation. Callers must not rely on this alone to guarantee a citation.
 */
export function extractCitations(text: string, knownSources: Iterable<string> = []): CitationExtraction {
  const haystack = fold(text);
  const sources = new Set<string>();

  const known = [...new Set(knownSources)].filter((source) => source.length > 0);
  for (const source of known) {
    if (containsStandalone(haystack, fold(source))) {
      sources.add(source);
    }
  }

  return sources.size > 0 ? { found: true, sources } : { found: false };
}
