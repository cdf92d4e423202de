import type { RetrievalResult } from "../retrieval/types.js";
import { renderDirectiveSection } from "./sections/directive.js";
import { renderFragmentsSection } from "./sections/fragments.js";
import { renderQuestionSection } from "./sections/question.js";
import { joinPromptBlocks } from "./sections/shared.js";
import type { AssembledPrompt, PromptSectionId, PromptSectionMetadata } from "./types.js";

function makeSection(id: PromptSectionId, content: string, missingReason: string): PromptSectionMetadata {
  if (content.trim().length === 0) {
    return {
      id,
      bytes: 0,
      included: false,
      reason: missingReason,
    };
  }

  return {
    id,
    bytes: Buffer.byteLength(content, "utf-8"),
    included: true,
  };
}

/**
 * Directive goes in the system message; fragments and the question, in that
 * order, in the user message.
 */
export function assemblePrompt(question: string, retrieval: RetrievalResult): AssembledPrompt {
  const directive = renderDirectiveSection();
  const fragments = renderFragmentsSection(retrieval);
  const questionBlock = renderQuestionSection(question);

  return {
    messages: [
      { role: "system", content: directive },
      { role: "user", content: joinPromptBlocks([fragments, questionBlock]) },
    ],
    sections: [
      makeSection("directive", directive, "Directive is empty"),
      makeSection("fragments", fragments, "No fragments rendered"),
      makeSection("question", questionBlock, "Question is empty"),
    ],
  };
}
