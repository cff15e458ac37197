import { CORPUS_CONFIG } from "../config.js";
import { describeError } from "../errors.js";
import { completePrompt, type ChatOptions } from "../openrouter.js";
import type { Logger, Outcome } from "../types.js";
import { RuleBasedSummarizer } from "./rule-based.js";
import type { Summarizer, SummaryStrategy } from "./types.js";

export function buildSummaryPrompt(text: string, maxLength: number): string {
  return (
    `Please create a concise summary of the following text in approximately ${maxLength} characters or less. ` +
    "Focus on the most important information, key findings, main points, and essential details. " +
    "Preserve important numbers, dates, names, and technical terms.\n\n" +
    "Text to summarize:\n" +
    text.slice(0, CORPUS_CONFIG.summaryInputChars)
  );
}

class RemoteSummary implements SummaryStrategy {
  readonly name = "remote";

  constructor(private readonly options: ChatOptions) {}

  async attempt(text: string, maxLength: number): Promise<Outcome<string>> {
    let summary: string;
    try {
      summary = await completePrompt(buildSummaryPrompt(text, maxLength), this.options);
    } catch (err) {
      return { ok: false, reason: describeError(err) };
    }

    if (!summary) return { ok: false, reason: "empty summary" };
    if (summary.length > maxLength + CORPUS_CONFIG.summaryOvershoot) {
      return { ok: false, reason: `summary of ${summary.length} chars exceeds ${maxLength}` };
    }
    return { ok: true, value: summary };
  }
}

/**
 * Summarizes through the chat-completions API, dropping to the rule-based
 * summary on any failed attempt.
 */
export class AiSummarizer implements Summarizer {
  readonly name = "ai";
  private readonly fallback = new RuleBasedSummarizer();
  private readonly strategies: SummaryStrategy[];

  constructor(
    options: ChatOptions,
    private readonly log: Logger = () => {},
  ) {
    this.strategies = [new RemoteSummary(options), this.fallback];
  }

  async summarize(text: string, maxLength: number): Promise<string> {
    if (text.length <= maxLength) return text;

    for (const strategy of this.strategies) {
      const outcome = await strategy.attempt(text, maxLength);
      if (outcome.ok) return outcome.value;
      this.log(`corpus: ${strategy.name} summary failed (${outcome.reason}), falling back`);
    }
    return this.fallback.summarize(text, maxLength);
  }
}
