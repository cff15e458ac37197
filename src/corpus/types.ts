export interface PageText {
  pageNumber: number;
  text: string;
}

export interface Page {
  pageNumber: number;
  content: string;
  summary: string;
  wordCount: number;
}

export interface ContentCache {
  filename: string;
  pages: Page[];
  fullContent: string;
  cachedAt: string;
}

export interface Annotation {
  pageNumber: number;
  summary: string;
  keywords: string[];
  relations: string[];
}

export interface AnnotationFile {
  filename: string;
  summaries: Annotation[];
}

export interface IndexEntry {
  filename: string;
  filePath: string;
  contentHash: string;
  totalPages: number;
  totalWords: number;
  documentSummary: string;
  lastUpdated: string;
  contentCachePath: string;
}

export interface IndexTable {
  [filename: string]: IndexEntry;
}

export interface RetrievedDocument {
  filename: string;
  filePath: string;
  relevanceScore: number;
  pages: Page[];
  fullContent: string;
  documentSummary: string;
}

export interface AnnotationHit {
  filename: string;
  pageNumber: number;
  summary: string;
  keywords: string[];
  relations: string[];
  relevanceScore: number;
}

/** Result of one strategy attempt; the caller moves on to the next on failure. */
export type Outcome<T> = { ok: true; value: T } | { ok: false; reason: string };

export type Logger = (msg: string) => void;
