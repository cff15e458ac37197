import { createCanvas } from "@napi-rs/canvas";
import { CORPUS_CONFIG } from "../config.js";
import { openPdf } from "./pdfjs.js";

export interface PageImage {
  pageNumber: number;
  dataUrl: string;
}

/**
 * Renders the given 1-based pages to PNG data URLs. Page numbers outside the
 * document are skipped.
 */
export async function renderPages(
  bytes: Uint8Array,
  pageNumbers: readonly number[],
  scale: number = CORPUS_CONFIG.renderScale,
): Promise<PageImage[]> {
  const pdf = await openPdf(bytes);
  const images: PageImage[] = [];

  try {
    for (const pageNumber of pageNumbers) {
      if (pageNumber < 1 || pageNumber > pdf.numPages) continue;

      const page = await pdf.getPage(pageNumber);
      const viewport = page.getViewport({ scale });
      const canvas = createCanvas(
        Math.floor(viewport.width),
        Math.floor(viewport.height),
      );
      const ctx = canvas.getContext("2d");

      await page.render({
        canvasContext: ctx,
        viewport,
        canvas: null,
      }).promise;

      const pngBuffer = await canvas.encode("png");
      images.push({
        pageNumber,
        dataUrl: `data:image/png;base64,${pngBuffer.toString("base64")}`,
      });
    }
  } finally {
    await pdf.destroy();
  }

  return images;
}
