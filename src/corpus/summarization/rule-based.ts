import type { Outcome } from "../types.js";
import type { Summarizer, SummaryStrategy } from "./types.js";

const IMPORTANT_TERMS = [
  "important",
  "key",
  "main",
  "primary",
  "significant",
  "conclusion",
  "result",
  "summary",
  "objective",
  "goal",
  "purpose",
  "method",
  "approach",
  "finding",
  "recommendation",
];

interface RankedSentence {
  sentence: string;
  position: number;
  score: number;
}

function truncate(text: string, maxLength: number): string {
  return text.slice(0, Math.max(0, maxLength - 3)) + "...";
}

function isCapitalized(word: string): boolean {
  const first = word.charAt(0);
  return word.length > 1 && first !== first.toLowerCase() && first === first.toUpperCase();
}

/** Breaks after every `.`, `!` and `?` as well as at line ends. */
export function splitSentences(text: string): string[] {
  return text
    .replace(/([.!?])/g, "$1\n")
    .split("\n")
    .map((s) => s.trim())
    .filter((s) => s.length > 0);
}

export function scoreSentence(sentence: string, position: number, count: number): number {
  let score = 0;
  const lower = sentence.toLowerCase();

  if (/\d/.test(sentence)) score += 2;

  for (const term of IMPORTANT_TERMS) {
    if (lower.includes(term)) score += 3;
  }

  if (position === 0 || position === count - 1) score += 1;

  const words = sentence.split(/\s+/).filter(Boolean);
  score += words.filter(isCapitalized).length * 0.5;

  if (words.length > 10) score += 1;

  return score;
}

/**
 * Extractive summary built from the best-scoring sentences. Sentences come out
 * in score order, not document order.
 */
export function summarizeByRules(text: string, maxLength: number): string {
  if (text.length <= maxLength) return text;

  const sentences = splitSentences(text);
  if (sentences.length < 2) return truncate(text, maxLength);

  const ranked: RankedSentence[] = sentences
    .map((sentence, position) => ({
      sentence,
      position,
      score: scoreSentence(sentence, position, sentences.length),
    }))
    .sort((a, b) => b.score - a.score || a.position - b.position);

  const parts: string[] = [];
  let used = 0;
  for (const { sentence } of ranked) {
    if (used + sentence.length + 3 <= maxLength) {
      parts.push(sentence);
      used += sentence.length + 1;
    } else if (used === 0) {
      return truncate(sentence, maxLength);
    }
  }

  if (parts.length === 0) return truncate(text, maxLength);

  let summary = parts.join(" ");
  if (used < maxLength && text.length > used) summary += "...";
  return summary;
}

export class RuleBasedSummarizer implements Summarizer, SummaryStrategy {
  readonly name = "rule-based";

  async summarize(text: string, maxLength: number): Promise<string> {
    return summarizeByRules(text, maxLength);
  }

  async attempt(text: string, maxLength: number): Promise<Outcome<string>> {
    return { ok: true, value: summarizeByRules(text, maxLength) };
  }
}
