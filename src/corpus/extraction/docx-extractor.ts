import mammoth from "mammoth";
import type { PageText } from "../types.js";
import type { Extractor } from "./types.js";
import { splitPages } from "./text-extractor.js";

export class DocxExtractor implements Extractor {
  readonly name = "docx";
  readonly extensions = [".docx"];

  async extract(bytes: Uint8Array): Promise<PageText[]> {
    const { value } = await mammoth.extractRawText({ buffer: Buffer.from(bytes) });
    return splitPages(value);
  }
}
