import { CORPUS_CONFIG } from "./config.js";
import type { ContentStore } from "./content-store.js";
import type {
  AnnotationFile,
  AnnotationHit,
  IndexTable,
  RetrievedDocument,
} from "./types.js";

export function queryWords(query: string): string[] {
  return query.toLowerCase().split(/\s+/).filter(Boolean);
}

/** Non-overlapping occurrences of `needle` in `haystack`. */
export function countOccurrences(haystack: string, needle: string): number {
  if (!needle) return 0;
  let count = 0;
  for (let at = haystack.indexOf(needle); at !== -1; at = haystack.indexOf(needle, at + needle.length)) {
    count++;
  }
  return count;
}

export function scoreDocument(words: string[], fullContent: string, summary: string): number {
  const content = fullContent.toLowerCase();
  const summaryLower = summary.toLowerCase();
  let score = 0;
  for (const word of words) {
    score += countOccurrences(content, word) + 2 * countOccurrences(summaryLower, word);
  }
  return score;
}

/**
 * Ranks indexed documents by raw term frequency: content hits count once,
 * summary hits twice. Documents scoring zero are left out.
 */
export async function retrieve(
  query: string,
  table: IndexTable,
  contentStore: ContentStore,
  topK: number = CORPUS_CONFIG.topK,
): Promise<RetrievedDocument[]> {
  const words = queryWords(query);
  if (words.length === 0) return [];

  const ranked: RetrievedDocument[] = [];
  for (const entry of Object.values(table)) {
    const cache = await contentStore.loadContent(entry.filename);
    if (!cache) continue;

    const relevanceScore = scoreDocument(words, cache.fullContent, entry.documentSummary);
    if (relevanceScore === 0) continue;

    ranked.push({
      filename: entry.filename,
      filePath: entry.filePath,
      relevanceScore,
      pages: cache.pages,
      fullContent: cache.fullContent,
      documentSummary: entry.documentSummary,
    });
  }

  return ranked.sort((a, b) => b.relevanceScore - a.relevanceScore).slice(0, topK);
}

/** Page-level matches against annotation summaries. */
export function searchAnnotations(
  query: string,
  annotations: AnnotationFile[],
  limit: number = CORPUS_CONFIG.annotationTopK,
): AnnotationHit[] {
  const words = new Set(queryWords(query));
  const hits: AnnotationHit[] = [];

  for (const file of annotations) {
    for (const annotation of file.summaries) {
      const summary = annotation.summary.toLowerCase();
      let relevanceScore = 0;
      for (const word of words) {
        relevanceScore += countOccurrences(summary, word) * 3;
      }
      if (relevanceScore > 0) {
        hits.push({ filename: file.filename, ...annotation, relevanceScore });
      }
    }
  }

  return hits.sort((a, b) => b.relevanceScore - a.relevanceScore).slice(0, limit);
}
