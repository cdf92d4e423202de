import { readFile, readdir, stat } from "node:fs/promises";
import { extname, join, resolve } from "node:path";
import type {
  DocumentExtractor,
  DocumentKind,
  DocumentLoadResult,
  ExtractorInput,
  SourceDocument,
} from "./types.js";
import { PdfExtractor } from "./extractors/pdf-extractor.js";
import { IngestionError, errorMessage } from "../shared/errors.js";
import { logDocumentLoaded, logDocumentSkipped, logIngestStart } from "../shared/rag-logger.js";

const DEFAULT_MAX_FILE_BYTES = 100 * 1024 * 1024;

export interface DocumentLoaderOptions {
  extractors?: DocumentExtractor[];
  maxFileBytes?: number;
}

/**
 * Reads every PDF directly inside a directory (no recursion) into a
 * {@link SourceDocument} keyed by filename. A file that cannot be read or
 * holds no text is reported in `errors` and skipped; the rest still load.
 */
export class DocumentLoader {
  private readonly extractors: DocumentExtractor[];
  private readonly maxFileBytes: number;

  constructor(options?: DocumentLoaderOptions) {
    this.extractors = options?.extractors ?? [new PdfExtractor()];
    this.maxFileBytes = options?.maxFileBytes ?? DEFAULT_MAX_FILE_BYTES;
  }

  async loadDirectory(docsPath: string): Promise<DocumentLoadResult> {
    const result: DocumentLoadResult = {
      documents: [],
      errors: [],
      totalPages: 0,
      totalChars: 0,
    };

    const root = resolve(docsPath);
    let fileNames: string[];
    try {
      fileNames = await listPdfFiles(root);
    } catch (err) {
      result.errors.push(
        new IngestionError(`Document directory not found or unreadable: ${root}`, null, { cause: err }),
      );
      return result;
    }

    logIngestStart(root, fileNames.length);

    for (const fileName of fileNames) {
      try {
        const document = await this.loadFile(join(root, fileName), fileName);
        const chars = document.pages.reduce((sum, page) => sum + page.length, 0);
        result.documents.push(document);
        result.totalPages += document.pages.length;
        result.totalChars += chars;
        logDocumentLoaded(document.id, document.pages.length, chars);
      } catch (err) {
        const error = err instanceof IngestionError
          ? err
          : new IngestionError(`Failed to extract text: ${errorMessage(err)}`, fileName, { cause: err });
        result.errors.push(error);
        logDocumentSkipped(fileName, error.message);
      }
    }

    return result;
  }

  private async loadFile(filePath: string, fileName: string): Promise<SourceDocument> {
    const fileStat = await stat(filePath);
    if (fileStat.size > this.maxFileBytes) {
      throw new IngestionError(`File exceeds size limit (${this.maxFileBytes} bytes).`, fileName);
    }

    const kind = extensionToKind(extname(fileName).toLowerCase());
    const extractor = this.extractors.find((entry) => entry.supports(kind));
    if (!extractor) {
      throw new IngestionError(`Unsupported document type: ${kind}`, fileName);
    }

    const bytes = await readFile(filePath);
    const raw = await extractor.extract({ filePath, fileName, bytes } satisfies ExtractorInput);
    const pages = raw.pages.map(compactWhitespace);

    if (pages.every((page) => page.length === 0)) {
      const reason = raw.warnings?.[0] ?? "No extractable text found.";
      throw new IngestionError(reason, fileName);
    }

    return { id: fileName, pages };
  }
}

async function listPdfFiles(root: string): Promise<string[]> {
  const entries = await readdir(root, { withFileTypes: true });
  return entries
    .filter((entry) => entry.isFile() && extensionToKind(extname(entry.name).toLowerCase()) === "pdf")
    .map((entry) => entry.name)
    .sort();
}

function extensionToKind(ext: string): DocumentKind {
  switch (ext) {
    case ".pdf":
      return "pdf";
    default:
      return "unknown";
  }
}

function compactWhitespace(value: string): string {
  return value.replace(/\r/g, "\n").replace(/\t/g, " ").replace(/[ ]+/g, " ").replace(/\n{3,}/g, "\n\n").trim();
}
