import { readFile } from "node:fs/promises";
import path from "node:path";
import { CORPUS_CONFIG } from "./config.js";
import { annotatePage } from "./annotator.js";
import { ContentStore } from "./content-store.js";
import { ExtractionError, describeError } from "./errors.js";
import { getExtractor } from "./extraction/index.js";
import { scanDocuments, type ScannedFile } from "./file-scanner.js";
import { IndexStore } from "./index-store.js";
import type { Summarizer } from "./summarization/types.js";
import type {
  Annotation,
  IndexEntry,
  IndexTable,
  Logger,
  Page,
  PageText,
} from "./types.js";
import { mapWithConcurrency } from "./worker-pool.js";

export interface PipelineOptions {
  documentsDir: string;
  indexStore: IndexStore;
  contentStore: ContentStore;
  summarizer: Summarizer;
  concurrency?: number;
  log?: Logger;
}

export interface IndexRunReport {
  table: IndexTable;
  processed: string[];
  unchanged: string[];
  failed: string[];
  removed: string[];
}

interface PageResult {
  page: Page;
  annotation: Annotation;
}

export function countWords(text: string): number {
  return text.split(/\s+/).filter(Boolean).length;
}

export function buildDocumentSummary(
  pages: Page[],
  maxLength: number = CORPUS_CONFIG.documentSummaryLength,
): string {
  const joined = pages.map((p) => p.summary).join(" ");
  return joined.length > maxLength ? joined.slice(0, maxLength) + "..." : joined;
}

/** Summarizes and annotates one page. Blank pages yield `null`. */
export async function processPage(
  unit: PageText,
  summarizer: Summarizer,
): Promise<PageResult | null> {
  const content = unit.text.trim();
  if (!content) return null;

  const summary = await summarizer.summarize(content, CORPUS_CONFIG.pageSummaryLength);
  const page: Page = {
    pageNumber: unit.pageNumber,
    content,
    summary,
    wordCount: countWords(unit.text),
  };
  return { page, annotation: annotatePage(page) };
}

async function extractPages(file: ScannedFile): Promise<PageText[]> {
  try {
    const bytes = await readFile(file.filePath);
    const extractor = getExtractor(path.extname(file.filename));
    return await extractor.extract(new Uint8Array(bytes));
  } catch (err) {
    throw new ExtractionError(file.filename, describeError(err), { cause: err });
  }
}

async function processDocument(
  file: ScannedFile,
  options: PipelineOptions,
  log: Logger,
): Promise<IndexEntry> {
  const { filename } = file;
  const { contentStore, summarizer } = options;

  log(`corpus: extracting ${filename}...`);
  const pageTexts = await extractPages(file);

  log(`corpus: summarizing ${filename} (${pageTexts.length} pages)...`);
  const results = await mapWithConcurrency(
    pageTexts,
    options.concurrency ?? CORPUS_CONFIG.pageConcurrency,
    async (unit) => {
      try {
        return await processPage(unit, summarizer);
      } catch (err) {
        log(`corpus: page ${unit.pageNumber} of ${filename} failed: ${describeError(err)}`);
        return null;
      }
    },
    (done, total) => log(`corpus: ${filename}: ${done}/${total} pages`),
  );

  const completed = results
    .filter((r): r is PageResult => r !== null)
    .sort((a, b) => a.page.pageNumber - b.page.pageNumber);
  if (completed.length === 0) {
    throw new ExtractionError(filename, "no text content");
  }

  const pages = completed.map((r) => r.page);
  const fullContent = pages.map((p) => p.content).join(" ");
  await contentStore.saveContent(filename, pages, fullContent);
  await contentStore.saveAnnotations(
    filename,
    completed.map((r) => r.annotation),
  );

  return {
    filename,
    filePath: file.filePath,
    contentHash: file.hash,
    totalPages: pages.length,
    totalWords: pages.reduce((sum, p) => sum + p.wordCount, 0),
    documentSummary: buildDocumentSummary(pages),
    lastUpdated: new Date().toISOString(),
    contentCachePath: contentStore.contentPath(filename),
  };
}

/** Returns false when the content cache is gone and the file must be reprocessed. */
async function ensureCaches(
  filename: string,
  contentStore: ContentStore,
  log: Logger,
): Promise<boolean> {
  const cache = await contentStore.loadContent(filename);
  if (!cache) {
    log(`corpus: ${filename} has no content cache, reprocessing`);
    return false;
  }
  if (await contentStore.loadAnnotations(filename)) return true;

  log(`corpus: rebuilding annotations for ${filename}`);
  await contentStore.saveAnnotations(filename, cache.pages.map(annotatePage));
  return true;
}

/**
 * Brings the index up to date with the documents directory. Unchanged files
 * keep their entries verbatim; changed and new files are reprocessed one at a
 * time. The index file is replaced once, after every document is done.
 */
export async function indexDocuments(options: PipelineOptions): Promise<IndexRunReport> {
  const log = options.log ?? (() => {});
  const { indexStore, contentStore } = options;

  log(`corpus: scanning ${options.documentsDir}...`);
  const existing = await indexStore.load();
  const scan = await scanDocuments(options.documentsDir, existing);

  const table: IndexTable = {};
  const report: IndexRunReport = {
    table,
    processed: [],
    unchanged: [],
    failed: [],
    removed: scan.deleted,
  };

  const pending = [...scan.newOrChanged];
  for (const file of scan.unchanged) {
    const entry = existing[file.filename];
    if (!entry) continue;
    if (!(await ensureCaches(file.filename, contentStore, log))) {
      pending.push(file);
      continue;
    }
    table[file.filename] = entry;
    report.unchanged.push(file.filename);
  }
  if (report.unchanged.length > 0) {
    log(`corpus: ${report.unchanged.length} file(s) unchanged, skipping`);
  }

  if (pending.length > 0) {
    log(`corpus: processing ${pending.length} new/changed file(s)`);
  }
  for (const file of pending) {
    try {
      table[file.filename] = await processDocument(file, options, log);
      report.processed.push(file.filename);
      log(`corpus: ${file.filename} done`);
    } catch (err) {
      if (!(err instanceof ExtractionError)) throw err;
      log(`corpus: ${err.message}, skipping`);
      report.failed.push(file.filename);
    }
  }

  await indexStore.replace(table);

  if (scan.deleted.length > 0) {
    log(`corpus: cleaning up ${scan.deleted.length} deleted file(s)`);
    for (const filename of scan.deleted) {
      await contentStore.remove(filename);
    }
  }
  for (const filename of report.failed) {
    await contentStore.remove(filename);
  }

  log(`corpus: index saved with ${Object.keys(table).length} document(s)`);
  return report;
}
