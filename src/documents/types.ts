import type { IngestionError } from "../shared/errors.js";

export type DocumentKind = "pdf" | "unknown";

/** One source file of the corpus. `id` is the filename and is what answers cite. */
export interface SourceDocument {
  id: string;
  pages: string[];
}

export interface DocumentLoadResult {
  documents: SourceDocument[];
  errors: IngestionError[];
  totalPages: number;
  totalChars: number;
}

export interface ExtractorInput {
  filePath: string;
  fileName: string;
  bytes: Buffer;
}

export interface ExtractorOutput {
  kind: DocumentKind;
  pages: string[];
  warnings?: string[];
}

export interface DocumentExtractor {
  supports(kind: DocumentKind): boolean;
  extract(input: ExtractorInput): Promise<ExtractorOutput>;
}
