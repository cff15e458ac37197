import { BlendMode, PDFDocument, rgb, type PDFPage } from "pdf-lib";
import { openPdf, type PdfDocumentProxy } from "./pdfjs.js";
import { TextLayer, type TextRun } from "./text-layer.js";
import type { Region, RenderedDocument, RenderedPage } from "./types.js";

type PdfPageProxy = Awaited<ReturnType<PdfDocumentProxy["getPage"]>>;
type TextContentItem = Awaited<ReturnType<PdfPageProxy["getTextContent"]>>["items"][number];
type TextItem = Extract<TextContentItem, { str: string }>;

const HIGHLIGHT_COLOR = rgb(1, 1, 0);
const HIGHLIGHT_OPACITY = 0.4;

function toRun(item: TextItem): TextRun {
  const [, , c = 0, d = 0, e = 0, f = 0] = item.transform.map(Number);
  return {
    str: item.str,
    x: e,
    y: f,
    width: item.width,
    height: item.height || Math.hypot(c, d),
    hasEOL: item.hasEOL,
  };
}

export async function readTextRuns(pdf: PdfDocumentProxy, pageNumber: number): Promise<TextRun[]> {
  const page = await pdf.getPage(pageNumber);
  const content = await page.getTextContent();
  const runs: TextRun[] = [];
  for (const item of content.items) {
    if ("str" in item && item.str.length > 0) runs.push(toRun(item));
  }
  return runs;
}

class PdfRenderedPage implements RenderedPage {
  constructor(
    readonly pageNumber: number,
    private readonly layer: TextLayer,
    private readonly target: PDFPage,
  ) {}

  search(text: string): Region[] {
    return this.layer.search(text).flat();
  }

  mark(region: Region): void {
    this.target.drawRectangle({
      ...region,
      color: HIGHLIGHT_COLOR,
      opacity: HIGHLIGHT_OPACITY,
      blendMode: BlendMode.Multiply,
    });
  }
}

/**
 * A PDF opened twice: pdf.js supplies the positioned text layer, pdf-lib
 * draws the marks and writes the result.
 */
export class PdfRenderedDocument implements RenderedDocument {
  private constructor(
    private readonly doc: PDFDocument,
    readonly pages: readonly RenderedPage[],
  ) {}

  static async open(bytes: Uint8Array): Promise<PdfRenderedDocument> {
    const doc = await PDFDocument.load(bytes);
    const targets = doc.getPages();
    const pdf = await openPdf(bytes);

    const pages: RenderedPage[] = [];
    try {
      for (let i = 1; i <= pdf.numPages; i++) {
        const target = targets[i - 1];
        if (!target) break;
        const layer = new TextLayer(await readTextRuns(pdf, i));
        pages.push(new PdfRenderedPage(i, layer, target));
      }
    } finally {
      await pdf.destroy();
    }

    return new PdfRenderedDocument(doc, pages);
  }

  async save(): Promise<Uint8Array> {
    return this.doc.save();
  }
}
