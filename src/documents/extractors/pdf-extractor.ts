import type {
  DocumentExtractor,
  DocumentKind,
  ExtractorInput,
  ExtractorOutput,
} from "../types.js";

export class PdfExtractor implements DocumentExtractor {
  supports(kind: DocumentKind): boolean {
    return kind === "pdf";
  }

  async extract(input: ExtractorInput): Promise<ExtractorOutput> {
    const { getDocument } = await import("pdfjs-dist/legacy/build/pdf.mjs");

    const loadingTask = getDocument({
      data: new Uint8Array(input.bytes),
      useWorkerFetch: false,
      isEvalSupported: false,
      disableFontFace: true,
    });
    const pdfDoc = await loadingTask.promise;

    try {
      const pages: string[] = [];
      for (let pageNumber = 1; pageNumber <= pdfDoc.numPages; pageNumber++) {
        const page = await pdfDoc.getPage(pageNumber);
        const textContent = await page.getTextContent();
        const text = textContent.items
          .map((item) => ("str" in item ? item.str + (item.hasEOL ? "\n" : " ") : ""))
          .join("");
        pages.push(text);
        page.cleanup();
      }

      const warnings: string[] = [];
      if (pages.every((page) => page.trim().length === 0)) {
        warnings.push("No extractable text found in PDF. This may be a scanned document (OCR disabled).");
      }

      return {
        kind: "pdf",
        pages,
        ...(warnings.length > 0 ? { warnings } : {}),
      };
    } finally {
      await pdfDoc.destroy();
    }
  }
}
