import stopWordList from "./data/stop-words.json" with { type: "json" };
import type { Annotation, Page } from "./types.js";

const STOP_WORDS = new Set<string>(stopWordList);

const MAX_SINGLE_KEYWORDS = 15;
const MAX_COMPOUND_KEYWORDS = 10;
const MAX_KEYWORDS = 20;
const MAX_RELATIONS = 15;

const TOKEN_PATTERN = /\b[A-Za-z][A-Za-z0-9]*\b|\b\d+(?:\.\d+)?%?\b/g;
const WORD_PATTERN = /\b[A-Za-z][A-Za-z0-9]*\b/g;

export type RelationFamily = "numerical" | "causal" | "comparative" | "temporal";

export const RELATION_PATTERNS: Record<RelationFamily, RegExp[]> = {
  numerical: [
    /\b\d+(?:\.\d+)?\s*(?:percent|%|times|fold|increase|decrease|ratio|rate)\b/gi,
    /\b(?:increased|decreased|reduced|improved|enhanced)\s+by\s+\d+(?:\.\d+)?\s*(?:percent|%)?\b/gi,
    /\b(?:from|between)\s+\d+(?:\.\d+)?\s+(?:to|and)\s+\d+(?:\.\d+)?\b/gi,
  ],
  causal: [
    /\b\w+\s+(?:causes?|leads?\s+to|results?\s+in|due\s+to|because\s+of)\s+\w+\b/gi,
    /\b(?:if|when|while|since)\s+\w+.*?\s+then\s+\w+\b/gi,
    /\b\w+\s+(?:affects?|influences?|impacts?)\s+\w+\b/gi,
  ],
  comparative: [
    /\b\w+\s+(?:is|are|was|were)\s+(?:higher|lower|greater|less|better|worse)\s+than\s+\w+\b/gi,
    /\b(?:compared\s+to|versus|vs\.?)\s+\w+\b/gi,
    /\b(?:more|less)\s+\w+\s+than\s+\w+\b/gi,
  ],
  temporal: [
    /\b(?:before|after|during|while|when|since|until)\s+\w+.*?\w+\b/gi,
    /\b(?:in|at|on)\s+\d{4}\b|\b(?:january|february|march|april|may|june|july|august|september|october|november|december)\s+\d{4}\b/gi,
  ],
};

export function isStopWord(word: string): boolean {
  return STOP_WORDS.has(word);
}

/**
 * Top single words by frequency followed by two-word terms. Ties keep the
 * order in which words first appear.
 */
export function extractKeywords(text: string): string[] {
  const counts = new Map<string, number>();
  for (const token of text.toLowerCase().match(TOKEN_PATTERN) ?? []) {
    if (token.length < 4 || STOP_WORDS.has(token)) continue;
    counts.set(token, (counts.get(token) ?? 0) + 1);
  }

  const single = [...counts.entries()]
    .sort((a, b) => b[1] - a[1])
    .slice(0, MAX_SINGLE_KEYWORDS)
    .map(([word]) => word);

  const compounds = new Set<string>();
  for (const sentence of text.split(/[.!?]+/)) {
    const words = sentence.toLowerCase().match(WORD_PATTERN) ?? [];
    for (const [i, word] of words.entries()) {
      const next = words[i + 1];
      if (next === undefined) break;
      if (STOP_WORDS.has(word) || STOP_WORDS.has(next)) continue;
      const compound = `${word} ${next}`;
      if (compound.length > 8) compounds.add(compound);
    }
  }

  return [...single, ...[...compounds].slice(0, MAX_COMPOUND_KEYWORDS)].slice(0, MAX_KEYWORDS);
}

export function extractRelations(text: string): string[] {
  const seen = new Set<string>();
  for (const patterns of Object.values(RELATION_PATTERNS)) {
    for (const pattern of patterns) {
      for (const match of text.match(pattern) ?? []) {
        const relation = match.trim();
        if (relation.length > 10 && relation.length < 150) seen.add(relation);
      }
    }
  }
  return [...seen].slice(0, MAX_RELATIONS);
}

export function annotatePage(page: Page): Annotation {
  return {
    pageNumber: page.pageNumber,
    summary: page.summary,
    keywords: extractKeywords(page.content),
    relations: extractRelations(page.content),
  };
}
