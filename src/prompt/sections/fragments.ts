import { REFUSAL_MESSAGE } from "../../answer/refusal.js";
import type { Fragment, RetrievalResult } from "../../retrieval/types.js";
import { joinPromptBlocks } from "./shared.js";

const FRAGMENT_SEPARATOR = "\n\n---\n\n";

export function formatSourceTag(fragment: Fragment): string {
  return `[Fonte: ${fragment.sourceId} | página ${fragment.page}]`;
}

export function renderFragmentsSection(retrieval: RetrievalResult): string {
  if (retrieval.length === 0) {
    return joinPromptBlocks([
      "# Trechos das normas",
      "Nenhum trecho das normas disponíveis foi encontrado para esta pergunta.",
      `Instrução: sem trechos de apoio, responda EXATAMENTE com: "${REFUSAL_MESSAGE}"`,
    ]);
  }

  const blocks = retrieval.map(({ fragment }) => `${formatSourceTag(fragment)}\n${fragment.text.trim()}`);
  return joinPromptBlocks(["# Trechos das normas", blocks.join(FRAGMENT_SEPARATOR)]);
}
