import { readFile } from "node:fs/promises";
import { CORPUS_CONFIG } from "./config.js";
import type { ContentStore } from "./content-store.js";
import { describeError } from "./errors.js";
import { highlightPdf } from "./highlight/highlighter.js";
import { renderPages, type PageImage } from "./highlight/page-renderer.js";
import { retrieve } from "./retriever.js";
import { splitIntoChunks } from "./sentence-extractor.js";
import type { IndexTable, Logger, RetrievedDocument } from "./types.js";
import { mapWithConcurrency } from "./worker-pool.js";

export interface SentenceSource {
  extract(query: string, chunks: string[], topK?: number): Promise<string[]>;
}

export interface SearchOptions {
  table: IndexTable;
  contentStore: ContentStore;
  sentences: SentenceSource;
  previews?: boolean;
  log?: Logger;
}

export interface SearchResult {
  filename: string;
  relevanceScore: number;
  sentences: string[];
  pageSummaries: string[];
  highlighted: Uint8Array | null;
  previews: PageImage[];
}

async function searchDocument(
  query: string,
  doc: RetrievedDocument,
  options: SearchOptions,
  log: Logger,
): Promise<SearchResult | null> {
  const sentences = await options.sentences.extract(query, splitIntoChunks(doc.fullContent));
  if (sentences.length === 0) return null;

  const result: SearchResult = {
    filename: doc.filename,
    relevanceScore: doc.relevanceScore,
    sentences,
    pageSummaries: doc.pages.map((p) => p.summary),
    highlighted: null,
    previews: [],
  };

  if (!doc.filename.toLowerCase().endsWith(".pdf")) return result;

  const original = new Uint8Array(await readFile(doc.filePath));
  const highlight = await highlightPdf(original, sentences, log);
  result.highlighted = highlight.bytes;

  if (options.previews && highlight.pagesMarked.length > 0) {
    result.previews = await renderPages(
      highlight.bytes,
      highlight.pagesMarked.slice(0, CORPUS_CONFIG.maxPageImages),
    );
  }
  return result;
}

/**
 * Ranks documents for `query`, asks the sentence source for the passages
 * that answer it and highlights those passages in PDF originals. Documents
 * that fail are logged and left out.
 */
export async function searchCorpus(
  query: string,
  options: SearchOptions,
): Promise<SearchResult[]> {
  const log = options.log ?? (() => {});
  const docs = await retrieve(query, options.table, options.contentStore);
  if (docs.length === 0) return [];

  const results = await mapWithConcurrency(
    docs,
    CORPUS_CONFIG.searchConcurrency,
    async (doc) => {
      try {
        return await searchDocument(query, doc, options, log);
      } catch (err) {
        log(`corpus: search in ${doc.filename} failed: ${describeError(err)}`);
        return null;
      }
    },
  );

  return results.filter((r): r is SearchResult => r !== null);
}
