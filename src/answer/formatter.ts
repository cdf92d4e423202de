import type { RetrievalResult } from "../retrieval/types.js";
import { logAnswer } from "../shared/rag-logger.js";
import { extractCitations } from "./citations.js";
import { REFUSAL_MESSAGE, isRefusal } from "./refusal.js";
import type { Answer } from "./types.js";

export interface AnswerFormatterOptions {
  /** Every source id in the index, so citations of documents outside the retrieval are recognised too. */
  knownSources?: Iterable<string>;
}

export function refusalAnswer(): Answer {
  return { text: REFUSAL_MESSAGE, citedSources: new Set<string>() };
}

function retrievalSources(retrieval: RetrievalResult): string[] {
  return [...new Set(retrieval.map((match) => match.fragment.sourceId))];
}

/**
 * Last word on the "cite or refuse" contract, whatever the model did:
 *   1. a refusal (in any casing, even with stray citations) becomes the exact refusal;
 *   2. an answer citing no indexed document gets the retrieved sources appended;
 *   3. with nothing retrieved and nothing cited there is no grounding, so it is refused.
 */
export class AnswerFormatter {
  private readonly knownSources: string[];

  constructor(options?: AnswerFormatterOptions) {
    this.knownSources = [...(options?.knownSources ?? [])];
  }

  format(rawAnswer: string, retrieval: RetrievalResult): Answer {
    const text = rawAnswer.trim();
    if (text.length === 0 || isRefusal(text)) {
      logAnswer(true, [], false);
      return refusalAnswer();
    }

    const retrieved = retrievalSources(retrieval);
    const extraction = extractCitations(text, [...retrieved, ...this.knownSources]);
    if (extraction.found) {
      logAnswer(false, extraction.sources, false);
      return { text, citedSources: extraction.sources };
    }

    if (retrieved.length === 0) {
      logAnswer(true, [], false);
      return refusalAnswer();
    }

    const appended = [...retrieved].sort();
    logAnswer(false, appended, true);
    return {
      text: `${text}\n(Fonte: ${appended.join(", ")})`,
      citedSources: new Set(appended),
    };
  }
}
