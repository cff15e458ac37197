import type { CorpusSettings } from "./config.js";
import { ContentStore } from "./content-store.js";
import { highlightPdf } from "./highlight/highlighter.js";
import { IndexStore } from "./index-store.js";
import { indexDocuments, type IndexRunReport } from "./pipeline.js";
import { retrieve, searchAnnotations } from "./retriever.js";
import { searchCorpus, type SearchResult } from "./search.js";
import { SentenceExtractor } from "./sentence-extractor.js";
import { createSummarizer } from "./summarization/index.js";
import type { AnnotationHit, IndexTable, Logger, RetrievedDocument } from "./types.js";

export interface Corpus {
  query(text: string): Promise<RetrievedDocument[]>;
  searchPages(text: string): Promise<AnnotationHit[]>;
  search(text: string, options?: { previews?: boolean }): Promise<SearchResult[]>;
  highlight(bytes: Uint8Array, spans: readonly string[]): Promise<Uint8Array>;
  reindex(): Promise<IndexRunReport>;
  readonly documentCount: number;
  readonly lastRun: IndexRunReport;
}

/**
 * Indexes the documents directory and returns the query surface over it.
 * Only one corpus should index a given store at a time.
 */
export async function initCorpus(
  settings: CorpusSettings,
  log: Logger = console.log,
): Promise<Corpus> {
  const indexStore = new IndexStore(settings.indexPath);
  const contentStore = new ContentStore(settings.cacheDir);
  const summarizer = createSummarizer(settings, log);
  const sentences = settings.apiKey
    ? new SentenceExtractor({ apiKey: settings.apiKey, model: settings.model })
    : null;

  const run = () =>
    indexDocuments({
      documentsDir: settings.documentsDir,
      indexStore,
      contentStore,
      summarizer,
      log,
    });

  let lastRun = await run();
  let table: IndexTable = lastRun.table;

  log(`corpus ready: ${Object.keys(table).length} document(s) (${summarizer.name} summaries)`);

  return {
    get documentCount() {
      return Object.keys(table).length;
    },
    get lastRun() {
      return lastRun;
    },
    query(text: string) {
      return retrieve(text, table, contentStore);
    },
    async searchPages(text: string) {
      const indexed = (await contentStore.loadAllAnnotations()).filter((f) => f.filename in table);
      return searchAnnotations(text, indexed);
    },
    search(text: string, options = {}) {
      if (!sentences) {
        return Promise.reject(new Error("Sentence search needs OPENROUTER_API_KEY"));
      }
      return searchCorpus(text, {
        table,
        contentStore,
        sentences,
        previews: options.previews,
        log,
      });
    },
    async highlight(bytes: Uint8Array, spans: readonly string[]) {
      return (await highlightPdf(bytes, spans, log)).bytes;
    },
    async reindex() {
      lastRun = await run();
      table = lastRun.table;
      return lastRun;
    },
  };
}
