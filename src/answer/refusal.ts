export const REFUSAL_MESSAGE = "Não encontrei essa informação nas normas disponíveis.";

const CITATION_CLAUSE = /\(?\s*fontes?\s*:[^)\n]*\)?/giu;
const SURROUNDING_QUOTES = /^["'“”«»`]+|["'“”«»`]+$/gu;

function normalizeForComparison(value: string): string {
  return value
    .normalize("NFC")
    .replace(CITATION_CLAUSE, " ")
    .replace(/\s+/g, " ")
    .trim()
    .replace(SURROUNDING_QUOTES, "")
    .replace(/[.!\s]+$/u, "")
    .trim()
    .toLocaleLowerCase("pt-BR");
}

const NORMALIZED_REFUSAL = normalizeForComparison(REFUSAL_MESSAGE);

/**
 * True when the text is the refusal message, ignoring case, whitespace,
 * Unicode composition, wrapping quotes, the final period and any
 * "(Fonte: ...)" clause the model tacked on.
 */
export function isRefusal(text: string): boolean {
  return normalizeForComparison(text) === NORMALIZED_REFUSAL;
}
