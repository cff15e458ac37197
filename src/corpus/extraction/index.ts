import type { Extractor } from "./types.js";
import { PdfExtractor } from "./pdf-extractor.js";
import { DocxExtractor } from "./docx-extractor.js";
import { TextExtractor } from "./text-extractor.js";

const registry = new Map<string, Extractor>();

export function registerExtractor(extractor: Extractor): void {
  for (const ext of extractor.extensions) {
    registry.set(ext.toLowerCase(), extractor);
  }
}

export function getExtractor(extension: string): Extractor {
  const extractor = registry.get(extension.toLowerCase());
  if (!extractor) {
    throw new Error(`No extractor for ${extension || "files without extension"}`);
  }
  return extractor;
}

// Register defaults
registerExtractor(new PdfExtractor());
registerExtractor(new DocxExtractor());
registerExtractor(new TextExtractor());

export { PdfExtractor } from "./pdf-extractor.js";
export { DocxExtractor } from "./docx-extractor.js";
export { TextExtractor, splitPages } from "./text-extractor.js";
export type { Extractor } from "./types.js";
