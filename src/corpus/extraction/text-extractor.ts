import type { PageText } from "../types.js";
import type { Extractor } from "./types.js";

/** Form feeds separate pages; text without them is a single page. */
export function splitPages(text: string): PageText[] {
  return text
    .replace(/\r\n/g, "\n")
    .split("\f")
    .map((pageText, i) => ({ pageNumber: i + 1, text: pageText }));
}

export class TextExtractor implements Extractor {
  readonly name = "text";
  readonly extensions = [".txt"];

  async extract(bytes: Uint8Array): Promise<PageText[]> {
    return splitPages(new TextDecoder("utf-8").decode(bytes));
  }
}
