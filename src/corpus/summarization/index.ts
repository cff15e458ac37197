import type { CorpusSettings } from "../config.js";
import type { Logger } from "../types.js";
import { AiSummarizer } from "./ai-summarizer.js";
import { RuleBasedSummarizer } from "./rule-based.js";
import type { Summarizer } from "./types.js";

export function createSummarizer(
  settings: Pick<CorpusSettings, "summarizer" | "apiKey" | "model">,
  log?: Logger,
): Summarizer {
  if (settings.summarizer === "rule-based") {
    return new RuleBasedSummarizer();
  }
  if (!settings.apiKey) {
    throw new Error("The ai summarizer needs an API key");
  }
  return new AiSummarizer({ apiKey: settings.apiKey, model: settings.model }, log);
}

export { AiSummarizer, buildSummaryPrompt } from "./ai-summarizer.js";
export { RuleBasedSummarizer, summarizeByRules, splitSentences, scoreSentence } from "./rule-based.js";
export type { Summarizer, SummaryStrategy } from "./types.js";
