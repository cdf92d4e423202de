export interface Answer {
  text: string;
  /** Empty exactly when `text` is the refusal message. */
  citedSources: ReadonlySet<string>;
}

export type CitationExtraction =
  | { found: true; sources: ReadonlySet<string> }
  | { found: false };
