import path from "node:path";
import { config as loadDotenv } from "dotenv";

export const CORPUS_CONFIG = {
  documentsDir: path.resolve("documents"),
  cacheDir: path.resolve("content_cache"),
  indexPath: path.resolve("document_index.json"),

  extensions: [".pdf", ".txt", ".docx"],
  hashChunkSize: 64 * 1024,

  pageSummaryLength: 400,
  documentSummaryLength: 1000,
  pageConcurrency: 4,

  chatCompletionsUrl: "https://openrouter.ai/api/v1/chat/completions",
  summaryModel: "google/gemini-2.5-flash",
  summaryInputChars: 2000,
  summaryOvershoot: 50,
  requestTimeoutMs: 30_000,

  topK: 3,
  annotationTopK: 5,
  sentenceChunkWords: 2000,
  sentencesPerDocument: 5,
  searchConcurrency: 3,

  renderScale: 1.5,
  maxPageImages: 4,
} as const;

export type SummarizerKind = "ai" | "rule-based";

export interface CorpusSettings {
  documentsDir: string;
  cacheDir: string;
  indexPath: string;
  summarizer: SummarizerKind;
  apiKey: string | null;
  model: string;
}

function readEnv(): NodeJS.ProcessEnv {
  loadDotenv();
  return process.env;
}

/**
 * Builds settings from the environment. The summarizer variant is an explicit
 * choice (`CORPUS_SUMMARIZER`); a key alone never switches it on.
 */
export function loadSettings(env: NodeJS.ProcessEnv = readEnv()): CorpusSettings {
  const kind = env["CORPUS_SUMMARIZER"]?.trim() || "rule-based";
  if (kind !== "ai" && kind !== "rule-based") {
    throw new Error(`Unknown summarizer: ${kind} (expected "ai" or "rule-based")`);
  }

  const apiKey = env["OPENROUTER_API_KEY"]?.trim() || null;
  if (kind === "ai" && !apiKey) {
    throw new Error("CORPUS_SUMMARIZER=ai requires OPENROUTER_API_KEY");
  }

  return {
    documentsDir: path.resolve(env["CORPUS_DOCUMENTS_DIR"] ?? CORPUS_CONFIG.documentsDir),
    cacheDir: path.resolve(env["CORPUS_CACHE_DIR"] ?? CORPUS_CONFIG.cacheDir),
    indexPath: path.resolve(env["CORPUS_INDEX_PATH"] ?? CORPUS_CONFIG.indexPath),
    summarizer: kind,
    apiKey,
    model: env["CORPUS_SUMMARY_MODEL"]?.trim() || CORPUS_CONFIG.summaryModel,
  };
}
