import { getDocumentProxy } from "unpdf";
import type { PageText } from "../types.js";
import type { Extractor } from "./types.js";

export class PdfExtractor implements Extractor {
  readonly name = "pdf";
  readonly extensions = [".pdf"];

  async extract(bytes: Uint8Array): Promise<PageText[]> {
    // pdf.js takes ownership of the buffer it is given
    const pdf = await getDocumentProxy(bytes.slice());

    const pages: PageText[] = [];
    try {
      for (let i = 1; i <= pdf.numPages; i++) {
        const page = await pdf.getPage(i);
        const textContent = await page.getTextContent();
        const text = textContent.items
          .map((item) => ("str" in item ? item.str : ""))
          .join(" ");
        pages.push({ pageNumber: i, text });
      }
    } finally {
      await pdf.destroy();
    }

    return pages;
  }
}
