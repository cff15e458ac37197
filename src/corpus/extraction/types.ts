import type { PageText } from "../types.js";

export interface Extractor {
  readonly name: string;
  readonly extensions: readonly string[];
  extract(bytes: Uint8Array): Promise<PageText[]>;
}
