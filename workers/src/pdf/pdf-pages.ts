/**
 * Splits a PDF into per-page sources: the embedded text layer read with
 * unpdf, plus a renderer producing a one-page PDF (pdf-lib) that the OCR
 * provider reads directly.
 */

import { extractText, getDocumentProxy } from "unpdf";
import { PDFDocument } from "pdf-lib";
import type { PageDecoder, PageImage, PageSource } from "../types.js";

/**
 * Extract a single page as a standalone PDF
 */
export async function extractSinglePage(
  source: PDFDocument,
  pageIndex: number,
): Promise<Uint8Array> {
  const target = await PDFDocument.create();
  const [page] = await target.copyPages(source, [pageIndex]);
  target.addPage(page);
  return target.save();
}

export class PdfPageDecoder implements PageDecoder {
  async decode(pdfBytes: Uint8Array): Promise<PageSource[]> {
    // pdf.js may detach the buffer it is given
    const pdf = await getDocumentProxy(new Uint8Array(pdfBytes));
    let texts: string[];
    try {
      const { text } = await extractText(pdf, { mergePages: false });
      texts = text.map((pageText) => pageText.normalize("NFC"));
    } finally {
      await pdf.destroy();
    }

    // Loaded on the first page that needs OCR, then shared
    let loaded: Promise<PDFDocument> | null = null;
    const load = () => {
      loaded ??= PDFDocument.load(pdfBytes, { ignoreEncryption: true });
      return loaded;
    };

    return texts.map(
      (nativeText, index): PageSource => ({
        index,
        nativeText,
        renderImage: async (): Promise<PageImage> => ({
          pageIndex: index,
          mimeType: "application/pdf",
          data: await extractSinglePage(await load(), index),
        }),
      }),
    );
  }
}
