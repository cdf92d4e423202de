export interface Fragment {
  sourceId: string;
  text: string;
  /** Offset of `text` inside the document's page-joined text. */
  startOffset: number;
  /** 1-based page on which the fragment starts. */
  page: number;
}

export interface EmbeddedFragment {
  fragment: Fragment;
  vector: number[];
}

export interface RetrievalMatch {
  fragment: Fragment;
  score: number;
}

/** Ordered by non-increasing score; ties keep index insertion order. */
export type RetrievalResult = RetrievalMatch[];

export interface ChunkingOptions {
  maxLength: number;
  overlap: number;
}
