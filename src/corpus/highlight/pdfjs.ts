import { DOMMatrix, DOMPoint, ImageData, Path2D } from "@napi-rs/canvas";

// Polyfill DOM globals that pdfjs-dist needs in Node.js
const g = globalThis as Record<string, unknown>;
if (!g.DOMMatrix) g.DOMMatrix = DOMMatrix;
if (!g.DOMPoint) g.DOMPoint = DOMPoint;
if (!g.ImageData) g.ImageData = ImageData;
if (!g.Path2D) g.Path2D = Path2D;

type Pdfjs = typeof import("pdfjs-dist/legacy/build/pdf.mjs");
export type PdfDocumentProxy = Awaited<ReturnType<Pdfjs["getDocument"]>["promise"]>;

// Dynamic import — must happen after polyfills are in place
let _pdfjs: Pdfjs | null = null;

async function getPdfjs(): Promise<Pdfjs> {
  if (!_pdfjs) {
    _pdfjs = await import("pdfjs-dist/legacy/build/pdf.mjs");
  }
  return _pdfjs;
}

export async function openPdf(bytes: Uint8Array): Promise<PdfDocumentProxy> {
  const pdfjs = await getPdfjs();
  // pdf.js detaches the buffer it is handed, so give it a copy
  return pdfjs.getDocument({
    data: bytes.slice(),
    useSystemFonts: true,
    isEvalSupported: false,
    verbosity: 0,
  }).promise;
}
