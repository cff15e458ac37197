export { initCorpus, type Corpus } from "./corpus/corpus.js";
export { CORPUS_CONFIG, loadSettings, type CorpusSettings, type SummarizerKind } from "./corpus/config.js";
export { indexDocuments, type IndexRunReport, type PipelineOptions } from "./corpus/pipeline.js";
export { IndexStore } from "./corpus/index-store.js";
export { ContentStore } from "./corpus/content-store.js";
export { hashFile, UNKNOWN_HASH } from "./corpus/file-scanner.js";
export { retrieve, searchAnnotations } from "./corpus/retriever.js";
export { searchCorpus, type SearchResult, type SentenceSource } from "./corpus/search.js";
export { SentenceExtractor } from "./corpus/sentence-extractor.js";
export { extractKeywords, extractRelations, annotatePage } from "./corpus/annotator.js";
export {
  AiSummarizer,
  RuleBasedSummarizer,
  createSummarizer,
  summarizeByRules,
  type Summarizer,
} from "./corpus/summarization/index.js";
export { registerExtractor, getExtractor, type Extractor } from "./corpus/extraction/index.js";
export { highlightPdf, highlightDocument, type HighlightResult } from "./corpus/highlight/highlighter.js";
export { PdfRenderedDocument } from "./corpus/highlight/pdf-document.js";
export { renderPages, type PageImage } from "./corpus/highlight/page-renderer.js";
export type {
  MatchStrategy,
  Region,
  RenderedDocument,
  RenderedPage,
} from "./corpus/highlight/types.js";
export { ExtractionError, PersistenceError } from "./corpus/errors.js";
export type * from "./corpus/types.js";
