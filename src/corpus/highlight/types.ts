import type { Outcome } from "../types.js";

/** Rectangle in PDF user space (origin bottom-left). */
export interface Region {
  x: number;
  y: number;
  width: number;
  height: number;
}

export interface RenderedPage {
  readonly pageNumber: number;
  /** Case-insensitive search that treats any whitespace run as one space. */
  search(text: string): Region[];
  mark(region: Region): void;
}

export interface RenderedDocument {
  readonly pages: readonly RenderedPage[];
  save(): Promise<Uint8Array>;
}

export interface MatchStrategy {
  readonly name: string;
  locate(page: RenderedPage, span: string): Outcome<Region[]>;
}

export interface HighlightReport {
  regions: number;
  pagesMarked: number[];
  unmatched: string[];
}
